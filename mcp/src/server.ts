import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CliGateway, Logger } from '@aws-cli-gateway/runtime';
import { registerAwsCliTools } from './tools/aws-cli.js';

export const SERVER_NAME = 'AWS MCP Server';
export const SERVER_VERSION = '1.0.0';
export const SERVER_INSTRUCTIONS =
  'Use this server to retrieve AWS CLI documentation and execute AWS CLI commands.';

export interface CreateServerOptions {
  gateway: CliGateway;
  logger?: Logger;
}

export function createServer(options: CreateServerOptions): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    { instructions: SERVER_INSTRUCTIONS },
  );

  registerAwsCliTools(server, options);

  return server;
}
