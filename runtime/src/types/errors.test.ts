import { describe, it, expect } from 'vitest';
import {
  RuntimeErrorCodes,
  RuntimeError,
  CommandValidationError,
  CommandExecutionError,
  CommandCancelledError,
  PolicyLoadError,
  isRuntimeError,
} from './errors.js';

describe('RuntimeErrorCodes', () => {
  it('uses the code name as its value', () => {
    for (const [key, value] of Object.entries(RuntimeErrorCodes)) {
      expect(value).toBe(key);
    }
  });
});

describe('CommandValidationError', () => {
  it('carries kind, stage and the validation code', () => {
    const err = new CommandValidationError("Command 'sudo' at position 1 not allowed", 'stage_not_allowed', 1);

    expect(err).toBeInstanceOf(RuntimeError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('CommandValidationError');
    expect(err.code).toBe(RuntimeErrorCodes.VALIDATION_ERROR);
    expect(err.kind).toBe('stage_not_allowed');
    expect(err.stage).toBe(1);
    expect(err.message).toBe("Command 'sudo' at position 1 not allowed");
  });

  it('leaves stage undefined for single commands', () => {
    const err = new CommandValidationError("Commands must start with 'aws'", 'structural');
    expect(err.stage).toBeUndefined();
  });
});

describe('CommandExecutionError', () => {
  it('prefixes the message and keeps the cause', () => {
    const cause = new Error('spawn aws ENOENT');
    const err = new CommandExecutionError('spawn aws ENOENT', cause);

    expect(err.message).toBe('Failed to execute command: spawn aws ENOENT');
    expect(err.code).toBe(RuntimeErrorCodes.EXECUTION_ERROR);
    expect(err.cause).toBe(cause);
  });
});

describe('CommandCancelledError', () => {
  it('names the cancelled command', () => {
    const err = new CommandCancelledError('aws s3 ls');
    expect(err.command).toBe('aws s3 ls');
    expect(err.message).toBe('Command was cancelled: aws s3 ls');
    expect(err.code).toBe(RuntimeErrorCodes.COMMAND_CANCELLED);
  });
});

describe('PolicyLoadError', () => {
  it('includes path and reason', () => {
    const err = new PolicyLoadError('/etc/policy.yaml', 'file not found');
    expect(err.path).toBe('/etc/policy.yaml');
    expect(err.message).toBe('Failed to load security policy from /etc/policy.yaml: file not found');
  });
});

describe('isRuntimeError', () => {
  it('distinguishes runtime errors from plain errors', () => {
    expect(isRuntimeError(new CommandCancelledError('aws s3 ls'))).toBe(true);
    expect(isRuntimeError(new Error('plain'))).toBe(false);
    expect(isRuntimeError('string')).toBe(false);
  });
});
