/**
 * Gateway configuration and facade types.
 *
 * @module
 */

import type { CommandHelpResult, CommandResult, ExecuteOptions } from '../execution/types.js';
import type { SecurityMode } from '../security/types.js';
import type { LogLevel } from '../utils/logger.js';

export interface GatewayConfig {
  /** Default per-command (and per pipeline stage) timeout. */
  readonly timeoutSeconds: number;
  /** Characters of successful output returned before truncation. */
  readonly maxOutputLength: number;
  readonly maxCallsPerSecond: number;
  readonly securityMode: SecurityMode;
  /** YAML or JSON policy file; built-in tables when unset. */
  readonly securityConfigPath?: string;
  readonly logLevel: LogLevel;
  readonly profile: string;
  readonly region?: string;
}

/**
 * The two operations offered to protocol layers, plus the startup check.
 */
export interface CliGateway {
  /** Never throws for validation or engine failures; they become help text. */
  getHelp(service: string, command?: string, options?: ExecuteOptions): Promise<CommandHelpResult>;
  /**
   * @throws CommandValidationError when the command is rejected
   * @throws CommandExecutionError when the engine fails
   */
  run(command: string, options?: ExecuteOptions): Promise<CommandResult>;
  isInstalled(): Promise<boolean>;
}
