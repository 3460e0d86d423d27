/**
 * Command validation for single commands and pipelines.
 *
 * @module
 */

import pipeCommands from './pipe-commands.json' with { type: 'json' };
import { isPipeCommand, splitPipeCommand, tokenize } from '../shell/tokenizer.js';
import { classifyCommand } from './rules.js';
import type { SecurityPolicy } from './policy.js';
import { CommandValidationError, type ValidationFailureKind } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Programs accepted after the first pipeline stage. The CLI itself is never
 * on this list, so a dangerous command cannot hide in a later stage.
 */
export const ALLOWED_PIPE_COMMANDS: ReadonlySet<string> = new Set(pipeCommands);

export type ValidationOutcome =
  | {
      readonly valid: true;
      /** Denials relaxed by permissive mode. */
      readonly warnings: readonly string[];
    }
  | {
      readonly valid: false;
      readonly kind: ValidationFailureKind;
      readonly message: string;
      readonly stage?: number;
    };

export interface CommandValidatorConfig {
  readonly policy: SecurityPolicy;
  readonly logger?: Logger;
}

const VALID: ValidationOutcome = Object.freeze({ valid: true, warnings: [] });

export function isAllowedPipeCommand(program: string): boolean {
  return ALLOWED_PIPE_COMMANDS.has(program);
}

/** Convert a failed outcome into the error thrown across API boundaries. */
export function toValidationError(
  outcome: Extract<ValidationOutcome, { valid: false }>,
): CommandValidationError {
  return new CommandValidationError(outcome.message, outcome.kind, outcome.stage);
}

export class CommandValidator {
  private readonly policy: SecurityPolicy;
  private readonly logger: Logger;

  constructor(config: CommandValidatorConfig) {
    this.policy = config.policy;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Validate one `aws` invocation. Permissive mode turns security denials
   * into warnings; structural failures always fail.
   */
  validateSingle(command: string): ValidationOutcome {
    const { config, mode } = this.policy.current;
    const classification = classifyCommand(command, config);

    if (classification.allowed) {
      return VALID;
    }
    if (classification.kind === 'security_denied' && mode === 'permissive') {
      this.logger.warn(
        `Security warning (permissive mode): ${classification.reason} Command: ${command}`,
      );
      return { valid: true, warnings: [classification.reason] };
    }
    return { valid: false, kind: classification.kind, message: classification.reason };
  }

  /**
   * Validate a command that may contain pipes. Empty stages are reported
   * first, then later stages not starting with an allowed program, then
   * the `aws` command in stage 0.
   */
  validatePipeline(command: string): ValidationOutcome {
    if (command.trim().length === 0) {
      return { valid: false, kind: 'structural', message: 'Empty command' };
    }
    if (!isPipeCommand(command)) {
      return this.validateSingle(command);
    }

    const stages = splitPipeCommand(command);
    const emptyIndex = stages.findIndex((stage) => stage.length === 0);
    if (emptyIndex !== -1) {
      return {
        valid: false,
        kind: 'structural',
        message: `Empty command at position ${emptyIndex}`,
        stage: emptyIndex,
      };
    }

    for (let index = 1; index < stages.length; index += 1) {
      const program = tokenize(stages[index])[0];
      if (program === undefined || program.length === 0) {
        return {
          valid: false,
          kind: 'structural',
          message: `Empty command at position ${index}`,
          stage: index,
        };
      }
      if (!isAllowedPipeCommand(program)) {
        return {
          valid: false,
          kind: 'stage_not_allowed',
          message: `Command '${program}' at position ${index} not allowed in pipes`,
          stage: index,
        };
      }
    }

    const first = this.validateSingle(stages[0]);
    if (!first.valid) {
      return { ...first, stage: 0 };
    }

    return first;
  }

  /**
   * @throws CommandValidationError when the pipeline is rejected
   */
  assertValid(command: string): void {
    const outcome = this.validatePipeline(command);
    if (!outcome.valid) {
      throw toValidationError(outcome);
    }
  }
}
