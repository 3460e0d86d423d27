import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ProcessOutcome, RunProcessOptions } from './process.js';
import type { Logger } from '../utils/logger.js';

const runProcessMock = vi.fn<[readonly string[], RunProcessOptions], Promise<ProcessOutcome>>();

vi.mock('./process.js', () => ({
  runProcess: (argv: readonly string[], options: RunProcessOptions) => runProcessMock(argv, options),
}));

// Import after mock setup
import { CommandExecutor, TRUNCATION_MARKER, truncateOutput } from './executor.js';
import { RateLimiter } from './rate-limiter.js';
import { AUTH_ERROR_PREFIX, AUTH_REMEDIATION_HINT, NO_ERROR_OUTPUT_MESSAGE } from './auth.js';
import { CommandCancelledError, CommandExecutionError } from '../types/errors.js';

function exited(stdout = '', exitCode: number | null = 0, stderr = ''): ProcessOutcome {
  return { kind: 'exited', exitCode, signal: null, stdout: Buffer.from(stdout), stderr: Buffer.from(stderr) };
}

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), setLevel: vi.fn() };
}

function argvOf(call: number): readonly string[] {
  return runProcessMock.mock.calls[call][0];
}

function optionsOf(call: number): RunProcessOptions {
  return runProcessMock.mock.calls[call][1];
}

describe('CommandExecutor', () => {
  beforeEach(() => {
    runProcessMock.mockReset();
  });

  describe('execute', () => {
    it('returns stdout on success', async () => {
      runProcessMock.mockResolvedValueOnce(exited('bucket-a\n'));

      const result = await new CommandExecutor().execute('aws s3 ls');

      expect(result).toEqual({ status: 'success', output: 'bucket-a\n' });
      expect(argvOf(0)).toEqual(['aws', 's3', 'ls']);
      expect(optionsOf(0).timeoutMs).toBe(30_000);
      expect(optionsOf(0).input).toBeUndefined();
    });

    it('keeps quoted arguments intact', async () => {
      runProcessMock.mockResolvedValueOnce(exited('[]'));

      await new CommandExecutor().execute(`aws ec2 describe-instances --query "Reservations[].Instances[?State.Name=='running']"`);

      expect(argvOf(0)).toEqual([
        'aws',
        'ec2',
        'describe-instances',
        '--query',
        "Reservations[].Instances[?State.Name=='running']",
      ]);
    });

    it('truncates long output', async () => {
      runProcessMock.mockResolvedValueOnce(exited('abcdefgh'));

      const result = await new CommandExecutor({ maxOutputLength: 5 }).execute('aws s3 ls');

      expect(result).toEqual({ status: 'success', output: 'abcde' + TRUNCATION_MARKER });
    });

    it('reports a timeout with the effective limit', async () => {
      const logger = mockLogger();
      runProcessMock.mockResolvedValueOnce({ kind: 'timed_out' });

      const result = await new CommandExecutor({ logger }).execute('aws s3 ls', { timeoutSeconds: 2 });

      expect(result).toEqual({ status: 'error', output: 'Command timed out after 2 seconds' });
      expect(optionsOf(0).timeoutMs).toBe(2000);
      expect(logger.warn).toHaveBeenCalledWith('Command timed out after 2 seconds: aws s3 ls');
    });

    it('classifies authentication failures', async () => {
      runProcessMock.mockResolvedValueOnce(exited('', 255, 'Unable to locate credentials.\n'));

      const result = await new CommandExecutor().execute('aws s3 ls');

      expect(result).toEqual({
        status: 'error',
        output: `${AUTH_ERROR_PREFIX} Unable to locate credentials.\n${AUTH_REMEDIATION_HINT}`,
      });
    });

    it('returns other stderr verbatim', async () => {
      runProcessMock.mockResolvedValueOnce(exited('', 254, 'An error occurred (NoSuchBucket)\n'));

      const result = await new CommandExecutor().execute('aws s3 ls s3://missing');

      expect(result).toEqual({ status: 'error', output: 'An error occurred (NoSuchBucket)\n' });
    });

    it('substitutes a message when a failure prints nothing', async () => {
      runProcessMock.mockResolvedValueOnce(exited('', 1, ''));

      const result = await new CommandExecutor().execute('aws s3 ls');

      expect(result).toEqual({ status: 'error', output: NO_ERROR_OUTPUT_MESSAGE });
    });

    it('wraps launch failures in CommandExecutionError', async () => {
      runProcessMock.mockRejectedValueOnce(new Error('spawn aws ENOENT'));

      const pending = new CommandExecutor().execute('aws s3 ls');

      await expect(pending).rejects.toBeInstanceOf(CommandExecutionError);
      await expect(pending).rejects.toThrow('Failed to execute command: spawn aws ENOENT');
    });

    it('propagates cancellation and forwards the signal', async () => {
      const controller = new AbortController();
      runProcessMock.mockRejectedValueOnce(new CommandCancelledError('aws s3 ls'));

      await expect(
        new CommandExecutor().execute('aws s3 ls', { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CommandCancelledError);
      expect(optionsOf(0).signal).toBe(controller.signal);
    });

    it('rejects an empty command without spawning', async () => {
      await expect(new CommandExecutor().execute('   ')).rejects.toBeInstanceOf(CommandExecutionError);
      expect(runProcessMock).not.toHaveBeenCalled();
    });
  });

  describe('region and profile', () => {
    it.each([
      ['aws s3 ls', ['aws', 's3', 'ls', '--region', 'eu-west-1']],
      ['aws s3 ls --region us-east-1', ['aws', 's3', 'ls', '--region', 'us-east-1']],
      ['aws s3 ls --region=us-east-1', ['aws', 's3', 'ls', '--region=us-east-1']],
      ['aws s3 help', ['aws', 's3', 'help']],
    ])('runs %s as the expected argv', async (command, expected) => {
      runProcessMock.mockResolvedValueOnce(exited());

      await new CommandExecutor({ region: 'eu-west-1' }).execute(command);

      expect(argvOf(0)).toEqual(expected);
    });

    it('exports the profile when the environment has none', async () => {
      runProcessMock.mockResolvedValue(exited());

      await new CommandExecutor({ profile: 'dev', env: { PATH: '/bin' } }).execute('aws s3 ls');
      await new CommandExecutor({ profile: 'dev', env: { AWS_PROFILE: 'ops' } }).execute('aws s3 ls');

      expect(optionsOf(0).env).toEqual({ PATH: '/bin', AWS_PROFILE: 'dev' });
      expect(optionsOf(1).env).toEqual({ AWS_PROFILE: 'ops' });
    });
  });

  describe('executePipeline', () => {
    it('feeds each stage output to the next stage', async () => {
      runProcessMock.mockResolvedValueOnce(exited('a\nb\n')).mockResolvedValueOnce(exited('2\n'));

      const result = await new CommandExecutor({ region: 'eu-west-1' }).executePipeline('aws s3 ls | wc -l');

      expect(result).toEqual({ status: 'success', output: '2\n' });
      expect(argvOf(0)).toEqual(['aws', 's3', 'ls', '--region', 'eu-west-1']);
      expect(argvOf(1)).toEqual(['wc', '-l']);
      expect(optionsOf(0).input).toBeUndefined();
      expect(optionsOf(1).input).toEqual(Buffer.from('a\nb\n'));
    });

    it('gives every stage the full timeout', async () => {
      runProcessMock.mockResolvedValueOnce(exited('x')).mockResolvedValueOnce(exited('x'));

      await new CommandExecutor().executePipeline('aws s3 ls | head -1', { timeoutSeconds: 7 });

      expect(optionsOf(0).timeoutMs).toBe(7000);
      expect(optionsOf(1).timeoutMs).toBe(7000);
    });

    it('stops at a failing intermediate stage with its stderr', async () => {
      runProcessMock.mockResolvedValueOnce(exited('', 255, 'Unable to locate credentials\n'));

      const result = await new CommandExecutor().executePipeline('aws s3 ls | grep x');

      expect(result).toEqual({ status: 'error', output: 'Unable to locate credentials\n' });
      expect(runProcessMock).toHaveBeenCalledTimes(1);
    });

    it('stops at a timed out intermediate stage', async () => {
      runProcessMock.mockResolvedValueOnce({ kind: 'timed_out' });

      const result = await new CommandExecutor().executePipeline('aws s3 ls | grep x', { timeoutSeconds: 3 });

      expect(result).toEqual({ status: 'error', output: 'Command timed out after 3 seconds' });
      expect(runProcessMock).toHaveBeenCalledTimes(1);
    });

    it('reports a silent last-stage failure', async () => {
      runProcessMock.mockResolvedValueOnce(exited('a\n')).mockResolvedValueOnce(exited('', 1, ''));

      const result = await new CommandExecutor().executePipeline('aws s3 ls | grep zzz');

      expect(result).toEqual({ status: 'error', output: NO_ERROR_OUTPUT_MESSAGE });
    });

    it('acquires the rate limiter once per pipeline', async () => {
      const rateLimiter = new RateLimiter({ maxCallsPerSecond: 10 });
      const acquire = vi.spyOn(rateLimiter, 'acquire');
      runProcessMock.mockResolvedValue(exited('x'));

      await new CommandExecutor({ rateLimiter }).executePipeline('aws s3 ls | sort | uniq');

      expect(acquire).toHaveBeenCalledTimes(1);
      expect(runProcessMock).toHaveBeenCalledTimes(3);
    });
  });

  describe('isInstalled', () => {
    it('runs aws --version', async () => {
      runProcessMock.mockResolvedValueOnce(exited('aws-cli/2.15.0'));

      await expect(new CommandExecutor().isInstalled()).resolves.toBe(true);
      expect(argvOf(0)).toEqual(['aws', '--version']);
      expect(optionsOf(0).timeoutMs).toBe(10_000);
    });

    it('is false when the CLI cannot start or fails', async () => {
      runProcessMock
        .mockRejectedValueOnce(new Error('spawn aws ENOENT'))
        .mockResolvedValueOnce(exited('', 127))
        .mockResolvedValueOnce({ kind: 'timed_out' });
      const executor = new CommandExecutor();

      await expect(executor.isInstalled()).resolves.toBe(false);
      await expect(executor.isInstalled()).resolves.toBe(false);
      await expect(executor.isInstalled()).resolves.toBe(false);
    });
  });
});

describe('truncateOutput', () => {
  const text = 'ab\u{1F600}cd';

  it('returns output within the limit unchanged', () => {
    expect(truncateOutput(text, 6)).toBe(text);
  });

  it('does not split a surrogate pair at the limit', () => {
    expect(truncateOutput(text, 3)).toBe('ab' + TRUNCATION_MARKER);
    expect(truncateOutput(text, 4)).toBe('ab\u{1F600}' + TRUNCATION_MARKER);
  });
});
