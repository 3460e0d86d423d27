/**
 * Command line entry for the stdio MCP server.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  AwsCliGateway,
  createLogger,
  isLogLevel,
  loadGatewayConfig,
  LOG_LEVEL_NAMES,
  stderrSink,
  toErrorMessage,
  type CliGateway,
  type CreateGatewayOptions,
  type GatewayConfig,
  type LogLevel,
  type Logger,
} from '@aws-cli-gateway/runtime';
import { createServer } from './server.js';

export type CliStatusCode = 0 | 1 | 2;

export interface ParsedArgv {
  help: boolean;
  logLevel?: LogLevel;
  errors: string[];
}

/** Gateway as the CLI needs it: the tool surface plus shutdown. */
export interface ServedGateway extends CliGateway {
  close(): void;
}

export interface CliOutput {
  write(text: string): unknown;
}

export interface CliRunOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  stdout?: CliOutput;
  logger?: Logger;
  /** Default: AwsCliGateway.create */
  createGateway?: (config: GatewayConfig, options: CreateGatewayOptions) => Promise<ServedGateway>;
  /** Default: stdio */
  transport?: Transport;
  /**
   * Client input; the server shuts down when it ends. Default: process.stdin
   * when the stdio transport is used.
   */
  input?: NodeJS.ReadableStream;
}

export const CLI_NAME = 'aws-cli-gateway-mcp';

export function buildHelp(): string {
  return [
    `${CLI_NAME} [--help] [--log-level <level>]`,
    '',
    'Serves AWS CLI documentation and validated command execution over MCP (stdio).',
    '',
    'Options:',
    '  -h, --help                 Show this usage',
    `      --log-level <level>    ${LOG_LEVEL_NAMES.join('|')} (overrides AWS_MCP_LOG_LEVEL)`,
    '',
    'Environment:',
    '  AWS_MCP_TIMEOUT               Command timeout in seconds (default: 30)',
    '  AWS_MCP_MAX_OUTPUT            Maximum output characters (default: 10000)',
    '  AWS_MCP_MAX_CALLS_PER_SECOND  Command launches per second (default: 5)',
    '  AWS_MCP_SECURITY_MODE         strict|permissive (default: strict)',
    '  AWS_MCP_SECURITY_CONFIG       Security policy file (YAML or JSON)',
    '  AWS_MCP_LOG_LEVEL             Log level (default: info)',
    '  AWS_PROFILE                   AWS profile (default: default)',
    '  AWS_REGION                    Region appended to commands that name none',
  ].join('\n');
}

export function parseArgv(argv: string[]): ParsedArgv {
  const parsed: ParsedArgv = { help: false, errors: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === '-h' || token === '--help') {
      parsed.help = true;
      continue;
    }

    if (token === '--log-level' || token.startsWith('--log-level=')) {
      const inline = token.includes('=') ? token.slice(token.indexOf('=') + 1) : undefined;
      const value = inline ?? argv[index + 1];
      if (inline === undefined) index += 1;

      if (value === undefined || value.length === 0) {
        parsed.errors.push('--log-level requires a value');
        continue;
      }
      const level = value.toLowerCase();
      if (isLogLevel(level)) {
        parsed.logLevel = level;
      } else {
        parsed.errors.push(`Invalid --log-level '${value}' (expected one of: ${LOG_LEVEL_NAMES.join(', ')})`);
      }
      continue;
    }

    parsed.errors.push(
      token.startsWith('-') ? `Unknown option: ${token}` : `Unexpected argument: ${token}`,
    );
  }

  return parsed;
}

/**
 * Run the server until its transport closes, its input ends or the process
 * receives SIGINT/SIGTERM.
 */
export async function runCli(options: CliRunOptions = {}): Promise<CliStatusCode> {
  const argv = options.argv ?? process.argv.slice(2);
  const stdout = options.stdout ?? process.stdout;

  const parsed = parseArgv(argv);
  const logger = options.logger ?? createLogger(parsed.logLevel ?? 'info', '[aws-cli-gateway]', stderrSink);

  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      logger.error(error);
    }
    return 2;
  }
  if (parsed.help) {
    stdout.write(`${buildHelp()}\n`);
    return 0;
  }

  const config = loadGatewayConfig(options.env ?? process.env, logger);
  logger.setLevel(parsed.logLevel ?? config.logLevel);

  const createGateway =
    options.createGateway ?? ((gatewayConfig, gatewayOptions) => AwsCliGateway.create(gatewayConfig, gatewayOptions));
  const gateway = await createGateway(config, { logger });

  if (!(await gateway.isInstalled())) {
    logger.error('AWS CLI is not installed or not in PATH. Please install AWS CLI.');
    gateway.close();
    return 1;
  }

  const server = createServer({ gateway, logger });
  const closed = new Promise<void>((resolve) => {
    server.server.onclose = () => resolve();
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close().catch((error: unknown) => {
      logger.error(`Error closing server: ${toErrorMessage(error)}`);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const input = options.input ?? (options.transport ? undefined : process.stdin);
  const onInputEnd = () => {
    logger.info('Client input closed, shutting down');
    server.close().catch((error: unknown) => {
      logger.error(`Error closing server: ${toErrorMessage(error)}`);
    });
  };
  input?.once('end', onInputEnd);

  try {
    await server.connect(options.transport ?? new StdioServerTransport());
    logger.info('AWS MCP Server running on stdio');
    await closed;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    input?.off('end', onInputEnd);
    gateway.close();
  }

  logger.info('AWS MCP Server stopped');
  return 0;
}
