/**
 * Error types and utilities for @aws-cli-gateway/runtime
 *
 * Expected validation outcomes are returned as tagged results; these classes
 * cover the cases that cross an API boundary as thrown errors.
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

export const RuntimeErrorCodes = {
  /** Command rejected by structural, security or pipeline checks */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** Command could not be started, or the engine failed while running it */
  EXECUTION_ERROR: 'EXECUTION_ERROR',
  /** Caller aborted a running command */
  COMMAND_CANCELLED: 'COMMAND_CANCELLED',
  /** Security policy file could not be read or parsed */
  POLICY_LOAD_ERROR: 'POLICY_LOAD_ERROR',
} as const;

export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Runtime Error Class
// ============================================================================

/**
 * Base class for all runtime errors.
 *
 * @example
 * ```typescript
 * try {
 *   await gateway.run('aws s3 ls');
 * } catch (err) {
 *   if (err instanceof RuntimeError) {
 *     console.log(`Runtime error: ${err.code} - ${err.message}`);
 *   }
 * }
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Runtime Error Classes
// ============================================================================

/**
 * Distinguishes why a command was rejected. All kinds surface as the same
 * error class; the message text differs per kind.
 */
export type ValidationFailureKind = 'structural' | 'security_denied' | 'stage_not_allowed';

export class CommandValidationError extends RuntimeError {
  public readonly kind: ValidationFailureKind;
  /** Pipeline stage index the failure belongs to, when known. */
  public readonly stage?: number;

  constructor(message: string, kind: ValidationFailureKind, stage?: number) {
    super(message, RuntimeErrorCodes.VALIDATION_ERROR);
    this.name = 'CommandValidationError';
    this.kind = kind;
    this.stage = stage;
  }
}

/**
 * Raised only for engine faults: the process could not be spawned or the
 * orchestration itself failed. Child process failures are CommandResults.
 */
export class CommandExecutionError extends RuntimeError {
  constructor(detail: string, cause?: unknown) {
    super(`Failed to execute command: ${detail}`, RuntimeErrorCodes.EXECUTION_ERROR, { cause });
    this.name = 'CommandExecutionError';
  }
}

export class CommandCancelledError extends RuntimeError {
  public readonly command: string;

  constructor(command: string) {
    super(`Command was cancelled: ${command}`, RuntimeErrorCodes.COMMAND_CANCELLED);
    this.name = 'CommandCancelledError';
    this.command = command;
  }
}

export class PolicyLoadError extends RuntimeError {
  public readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Failed to load security policy from ${path}: ${reason}`, RuntimeErrorCodes.POLICY_LOAD_ERROR, {
      cause,
    });
    this.name = 'PolicyLoadError';
    this.path = path;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Type guard to check if an error is a RuntimeError.
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}
