/**
 * Execution result types.
 *
 * @module
 */

/**
 * Outcome of anything that reached a child process. On `error` the output
 * is a diagnostic, never command stdout.
 */
export type CommandResult =
  | { readonly status: 'success'; readonly output: string }
  | { readonly status: 'error'; readonly output: string };

export type CommandStatus = CommandResult['status'];

export interface CommandHelpResult {
  readonly helpText: string;
}

export interface ExecuteOptions {
  /** Overrides the configured timeout. Applies to each pipeline stage. */
  readonly timeoutSeconds?: number;
  /** Aborting kills the running child and rejects with CommandCancelledError. */
  readonly signal?: AbortSignal;
}

export function successResult(output: string): CommandResult {
  return { status: 'success', output };
}

export function errorResult(output: string): CommandResult {
  return { status: 'error', output };
}

/** Execution surface consumed by the gateway; implemented by CommandExecutor. */
export interface CommandRunner {
  execute(command: string, options?: ExecuteOptions): Promise<CommandResult>;
  executePipeline(command: string, options?: ExecuteOptions): Promise<CommandResult>;
  isInstalled(): Promise<boolean>;
}
