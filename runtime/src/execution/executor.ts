/**
 * Execution engine for validated AWS CLI commands and pipelines.
 *
 * Commands are split into argv by the tokenizer and spawned directly, never
 * through a shell. Pipelines run stage by stage: each stage's stdout is fed
 * to the next stage's stdin once it has exited successfully.
 *
 * @module
 */

import { splitPipeCommand, tokenize } from '../shell/tokenizer.js';
import { runProcess, type ProcessOutcome } from './process.js';
import { describeFailure, NO_ERROR_OUTPUT_MESSAGE } from './auth.js';
import type { RateLimiter } from './rate-limiter.js';
import {
  errorResult,
  successResult,
  type CommandResult,
  type CommandRunner,
  type ExecuteOptions,
} from './types.js';
import { CommandCancelledError, CommandExecutionError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';

export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_MAX_OUTPUT_LENGTH = 10_000;
export const TRUNCATION_MARKER = '\n... (output truncated)';

const VERSION_CHECK_TIMEOUT_MS = 10_000;

export interface CommandExecutorConfig {
  /** Default: 30 */
  readonly timeoutSeconds?: number;
  /** Maximum characters of stdout returned on success. Default: 10000 */
  readonly maxOutputLength?: number;
  /** Appended as `--region` to aws commands that do not name one. */
  readonly region?: string;
  /** Exported as AWS_PROFILE unless the environment already sets it. */
  readonly profile?: string;
  /** Gates each execute/executePipeline call when present. */
  readonly rateLimiter?: RateLimiter;
  /** Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

export function truncateOutput(output: string, maxLength: number): string {
  if (output.length <= maxLength) return output;
  let end = maxLength;
  // keep surrogate pairs whole
  if (end > 0 && isHighSurrogate(output.charCodeAt(end - 1)) && isLowSurrogate(output.charCodeAt(end))) {
    end -= 1;
  }
  return output.slice(0, end) + TRUNCATION_MARKER;
}

export function timeoutMessage(timeoutSeconds: number): string {
  return `Command timed out after ${timeoutSeconds} seconds`;
}

function isHelpInvocation(argv: readonly string[]): boolean {
  return argv[argv.length - 1] === 'help';
}

export class CommandExecutor implements CommandRunner {
  private readonly timeoutSeconds: number;
  private readonly maxOutputLength: number;
  private readonly region: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly rateLimiter: RateLimiter | undefined;
  private readonly logger: Logger;

  constructor(config: CommandExecutorConfig = {}) {
    this.timeoutSeconds = config.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.maxOutputLength = config.maxOutputLength ?? DEFAULT_MAX_OUTPUT_LENGTH;
    this.region = config.region || undefined;
    this.rateLimiter = config.rateLimiter;
    this.logger = config.logger ?? silentLogger;

    const baseEnv = config.env ?? process.env;
    this.env =
      config.profile && baseEnv.AWS_PROFILE === undefined
        ? { ...baseEnv, AWS_PROFILE: config.profile }
        : baseEnv;
  }

  /**
   * Run a single command. Non-zero exits and timeouts come back as error
   * results.
   *
   * @throws CommandExecutionError when the process cannot be started
   * @throws CommandCancelledError when `options.signal` aborts
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const timeoutSeconds = options.timeoutSeconds ?? this.timeoutSeconds;
    const argv = this.withRegion(tokenize(command));
    if (argv.length === 0) {
      throw new CommandExecutionError('empty command');
    }

    await this.rateLimiter?.acquire();
    const outcome = await this.run(argv, timeoutSeconds, options.signal);
    return this.finalResult(outcome, timeoutSeconds);
  }

  /**
   * Run a pipeline. Every stage gets the full timeout; a non-zero exit of
   * an intermediate stage stops the pipeline with that stage's stderr.
   *
   * @throws CommandExecutionError when a stage cannot be started
   * @throws CommandCancelledError when `options.signal` aborts
   */
  async executePipeline(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const timeoutSeconds = options.timeoutSeconds ?? this.timeoutSeconds;
    const stages = splitPipeCommand(command).map((stage, index) => {
      const argv = tokenize(stage);
      if (argv.length === 0) {
        throw new CommandExecutionError(`empty command at position ${index}`);
      }
      return index === 0 ? this.withRegion(argv) : argv;
    });
    if (stages.length === 0) {
      throw new CommandExecutionError('empty command');
    }

    await this.rateLimiter?.acquire();

    let input: Buffer | undefined;
    for (let index = 0; index < stages.length; index += 1) {
      const outcome = await this.run(stages[index], timeoutSeconds, options.signal, input);
      if (index === stages.length - 1) {
        return this.finalResult(outcome, timeoutSeconds);
      }
      if (outcome.kind === 'timed_out') {
        return errorResult(timeoutMessage(timeoutSeconds));
      }
      if (outcome.exitCode !== 0) {
        const stderr = outcome.stderr.toString('utf8');
        this.logger.debug(`Pipeline stage ${index} exited with ${outcome.exitCode ?? outcome.signal}`);
        return errorResult(stderr.trim().length > 0 ? stderr : NO_ERROR_OUTPUT_MESSAGE);
      }
      input = outcome.stdout;
    }

    // Unreachable: the loop returns on its last stage.
    throw new CommandExecutionError('pipeline produced no result');
  }

  /**
   * Liveness probe: true when `aws --version` starts and exits zero.
   */
  async isInstalled(): Promise<boolean> {
    try {
      const outcome = await runProcess(['aws', '--version'], {
        timeoutMs: VERSION_CHECK_TIMEOUT_MS,
        env: this.env,
        logger: this.logger,
      });
      return outcome.kind === 'exited' && outcome.exitCode === 0;
    } catch (err) {
      this.logger.debug(`AWS CLI not available: ${toErrorMessage(err)}`);
      return false;
    }
  }

  private async run(
    argv: readonly string[],
    timeoutSeconds: number,
    signal: AbortSignal | undefined,
    input?: Buffer,
  ): Promise<ProcessOutcome> {
    this.logger.debug(`Executing: ${argv.join(' ')}`);
    try {
      const outcome = await runProcess(argv, {
        timeoutMs: timeoutSeconds * 1000,
        input,
        signal,
        env: this.env,
        logger: this.logger,
      });
      if (outcome.kind === 'timed_out') {
        this.logger.warn(`${timeoutMessage(timeoutSeconds)}: ${argv.join(' ')}`);
      }
      return outcome;
    } catch (err) {
      if (err instanceof CommandCancelledError) {
        throw err;
      }
      throw new CommandExecutionError(toErrorMessage(err), err);
    }
  }

  private finalResult(outcome: ProcessOutcome, timeoutSeconds: number): CommandResult {
    if (outcome.kind === 'timed_out') {
      return errorResult(timeoutMessage(timeoutSeconds));
    }
    if (outcome.exitCode !== 0) {
      return errorResult(describeFailure(outcome.stderr.toString('utf8')));
    }
    return successResult(truncateOutput(outcome.stdout.toString('utf8'), this.maxOutputLength));
  }

  private withRegion(argv: string[]): string[] {
    if (!this.region || argv[0]?.toLowerCase() !== 'aws' || isHelpInvocation(argv)) {
      return argv;
    }
    const hasRegion = argv.some((token) => token === '--region' || token.startsWith('--region='));
    return hasRegion ? argv : [...argv, '--region', this.region];
  }
}
