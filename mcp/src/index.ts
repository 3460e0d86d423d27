/**
 * @aws-cli-gateway/mcp - MCP server exposing AWS CLI help and validated
 * command execution.
 *
 * @packageDocumentation
 */

export {
  createServer,
  SERVER_NAME,
  SERVER_VERSION,
  SERVER_INSTRUCTIONS,
  type CreateServerOptions,
} from './server.js';
export {
  registerAwsCliTools,
  handleHelpRequest,
  handlePipelineRequest,
  helpInputShape,
  pipelineInputShape,
  HELP_TOOL_NAME,
  PIPELINE_TOOL_NAME,
  type AwsCliToolsOptions,
  type HelpRequest,
  type PipelineRequest,
} from './tools/aws-cli.js';
export { toolTextResponse, toolErrorResponse, type ToolTextResponse } from './tools/response.js';
export {
  runCli,
  parseArgv,
  buildHelp,
  CLI_NAME,
  type CliRunOptions,
  type CliStatusCode,
  type ParsedArgv,
  type ServedGateway,
  type CliOutput,
} from './cli.js';
