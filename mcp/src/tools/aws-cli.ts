/**
 * AWS CLI tools: documentation lookup and validated command execution.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  CommandCancelledError,
  CommandExecutionError,
  CommandValidationError,
  formatAwsOutput,
  silentLogger,
  toErrorMessage,
  type CliGateway,
  type Logger,
} from '@aws-cli-gateway/runtime';
import { toolErrorResponse, toolTextResponse, type ToolTextResponse } from './response.js';

export const HELP_TOOL_NAME = 'aws_cli_help';
export const PIPELINE_TOOL_NAME = 'aws_cli_pipeline';

export interface AwsCliToolsOptions {
  gateway: CliGateway;
  logger?: Logger;
}

export const helpInputShape = {
  service: z.string().min(1).describe('AWS service (e.g., s3, ec2)'),
  command: z.string().optional().describe('Command within the service (e.g., ls, describe-instances)'),
};

export const pipelineInputShape = {
  command: z
    .string()
    .min(1)
    .describe('Complete AWS CLI command, optionally piped into Unix utilities (e.g., aws s3 ls | grep logs)'),
  timeout: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Timeout in seconds, applied to each pipeline stage'),
};

export interface HelpRequest {
  service: string;
  command?: string;
}

export interface PipelineRequest {
  command: string;
  timeout?: number;
}

export async function handleHelpRequest(
  options: AwsCliToolsOptions,
  request: HelpRequest,
  signal?: AbortSignal,
): Promise<ToolTextResponse> {
  const logger = options.logger ?? silentLogger;
  logger.info(`Getting documentation for service: ${request.service}, command: ${request.command ?? 'None'}`);

  try {
    const result = await options.gateway.getHelp(request.service, request.command, { signal });
    return toolTextResponse(result.helpText);
  } catch (error) {
    logger.error(`Unexpected error in ${HELP_TOOL_NAME}: ${toErrorMessage(error)}`);
    return toolErrorResponse(`Error retrieving help: ${toErrorMessage(error)}`);
  }
}

/**
 * Validate and run a command. Successful output is formatted for
 * readability; every failure comes back as an error response.
 */
export async function handlePipelineRequest(
  options: AwsCliToolsOptions,
  request: PipelineRequest,
  signal?: AbortSignal,
): Promise<ToolTextResponse> {
  const logger = options.logger ?? silentLogger;
  logger.info(`Executing command: ${request.command}`);

  try {
    const result = await options.gateway.run(request.command, {
      timeoutSeconds: request.timeout,
      signal,
    });
    if (result.status === 'error') {
      return toolErrorResponse(result.output);
    }
    return toolTextResponse(formatAwsOutput(result.output));
  } catch (error) {
    if (error instanceof CommandValidationError) {
      logger.warn(`Command validation error: ${error.message}`);
      return toolErrorResponse(`Command validation error: ${error.message}`);
    }
    if (error instanceof CommandExecutionError) {
      logger.warn(`Command execution error: ${error.message}`);
      return toolErrorResponse(`Command execution error: ${error.message}`);
    }
    if (error instanceof CommandCancelledError) {
      logger.info(error.message);
      return toolErrorResponse(error.message);
    }
    logger.error(`Unexpected error in ${PIPELINE_TOOL_NAME}: ${toErrorMessage(error)}`);
    return toolErrorResponse(`Unexpected error: ${toErrorMessage(error)}`);
  }
}

/**
 * Register the AWS CLI tools on the MCP server.
 */
export function registerAwsCliTools(server: McpServer, options: AwsCliToolsOptions): void {
  server.tool(
    HELP_TOOL_NAME,
    'Get AWS CLI command documentation by running `aws <service> [command] help`',
    helpInputShape,
    async (args, extra) => handleHelpRequest(options, args, extra.signal),
  );

  server.tool(
    PIPELINE_TOOL_NAME,
    'Execute an AWS CLI command after security validation. The command may pipe into ' +
      'common Unix utilities such as grep, jq, sort, head or wc.',
    pipelineInputShape,
    async (args, extra) => handlePipelineRequest(options, args, extra.signal),
  );
}
