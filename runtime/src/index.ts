/**
 * @aws-cli-gateway/runtime - validation and execution core for the AWS CLI gateway
 *
 * Re-exports the tokenizer, security rule engine, validator, execution
 * engine, output formatter and gateway facade.
 *
 * @packageDocumentation
 */

export const VERSION = '1.0.0';

// Shell syntax
export { tokenize, isPipeCommand, splitPipeCommand } from './shell/tokenizer.js';

// Security
export {
  type SecurityMode,
  type ValidationRule,
  type SecurityConfig,
  type CompiledRule,
  type CompiledSecurityConfig,
  type CommandClassification,
  type SecurityPolicySnapshot,
  SECURITY_MODES,
  GENERAL_CATEGORY,
} from './security/types.js';
export {
  CLI_PROGRAM,
  MISSING_PROGRAM_MESSAGE,
  MISSING_SERVICE_MESSAGE,
  restrictedMessage,
  compileSecurityConfig,
  classifyCommand,
} from './security/rules.js';
export {
  DEFAULT_SECURITY_CONFIG,
  validateSecurityConfigFile,
  parseSecurityConfig,
  readSecurityConfigFile,
  loadSecurityConfig,
} from './security/policy-file.js';
export { SecurityPolicy, type SecurityPolicyConfig } from './security/policy.js';
export {
  SecurityPolicyWatcher,
  DEFAULT_POLICY_WATCH_DEBOUNCE_MS,
  type PolicyReloadCallback,
  type PolicyWatchErrorCallback,
} from './security/watcher.js';
export {
  CommandValidator,
  ALLOWED_PIPE_COMMANDS,
  isAllowedPipeCommand,
  toValidationError,
  type ValidationOutcome,
  type CommandValidatorConfig,
} from './security/validator.js';

// Execution
export {
  type CommandResult,
  type CommandStatus,
  type CommandHelpResult,
  type CommandRunner,
  type ExecuteOptions,
  successResult,
  errorResult,
} from './execution/types.js';
export {
  CommandExecutor,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_MAX_OUTPUT_LENGTH,
  TRUNCATION_MARKER,
  truncateOutput,
  timeoutMessage,
  type CommandExecutorConfig,
} from './execution/executor.js';
export {
  RateLimiter,
  DEFAULT_MAX_CALLS_PER_SECOND,
  RATE_LIMIT_WINDOW_MS,
  type RateLimiterConfig,
} from './execution/rate-limiter.js';
export {
  AUTH_ERROR_SIGNATURES,
  UNKNOWN_PROFILE_PATTERN,
  AUTH_ERROR_PREFIX,
  AUTH_REMEDIATION_HINT,
  NO_ERROR_OUTPUT_MESSAGE,
  isAuthError,
  describeFailure,
} from './execution/auth.js';
export { runProcess, type ProcessOutcome, type RunProcessOptions } from './execution/process.js';

// Output
export {
  formatAwsOutput,
  formatTableOutput,
  formatListOutput,
  isJson,
  parseOutputFormatHint,
  LIST_BULLET,
  type OutputFormatHint,
} from './output/formatter.js';

// Gateway
export { type GatewayConfig, type CliGateway } from './gateway/types.js';
export { loadGatewayConfig, validateGatewayEnv, DEFAULT_GATEWAY_CONFIG } from './gateway/config.js';
export {
  AwsCliGateway,
  buildHelpCommand,
  type AwsCliGatewayOptions,
  type CreateGatewayOptions,
} from './gateway/gateway.js';

// Errors
export {
  RuntimeErrorCodes,
  type RuntimeErrorCode,
  type ValidationFailureKind,
  RuntimeError,
  CommandValidationError,
  CommandExecutionError,
  CommandCancelledError,
  PolicyLoadError,
  isRuntimeError,
} from './types/errors.js';

// Utilities
export {
  type Logger,
  type LogLevel,
  type LogSink,
  createLogger,
  silentLogger,
  consoleSink,
  stderrSink,
  isLogLevel,
  LOG_LEVEL_NAMES,
} from './utils/logger.js';
export { sleep, toErrorMessage } from './utils/async.js';
