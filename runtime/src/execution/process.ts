/**
 * Spawns one child process without a shell and collects its output under a
 * timeout.
 *
 * @module
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { CommandCancelledError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';

export type ProcessOutcome =
  | {
      readonly kind: 'exited';
      /** null when the child was ended by a signal. */
      readonly exitCode: number | null;
      readonly signal: NodeJS.Signals | null;
      readonly stdout: Buffer;
      readonly stderr: Buffer;
    }
  | { readonly kind: 'timed_out' };

export interface RunProcessOptions {
  readonly timeoutMs: number;
  /** Written to stdin, which is then closed. Without it stdin is ignored. */
  readonly input?: Buffer;
  readonly signal?: AbortSignal;
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
}

/**
 * Run `argv` and resolve once it closes or the timeout elapses. A timed
 * out or aborted child receives SIGKILL exactly once; a failed kill is
 * logged and does not change the outcome.
 *
 * Rejects with the spawn error when the program cannot be started, and
 * with CommandCancelledError when `signal` aborts.
 */
export function runProcess(
  argv: readonly string[],
  options: RunProcessOptions,
): Promise<ProcessOutcome> {
  const [file, ...args] = argv;
  const logger = options.logger ?? silentLogger;
  const { signal } = options;

  return new Promise<ProcessOutcome>((resolve, reject) => {
    if (file === undefined) {
      reject(new Error('No program to run'));
      return;
    }
    if (signal?.aborted) {
      reject(new CommandCancelledError(argv.join(' ')));
      return;
    }

    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        shell: false,
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        env: options.env,
        windowsHide: true,
      });
    } catch (err) {
      reject(err);
      return;
    }

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const kill = (reason: string) => {
      try {
        if (!child.kill('SIGKILL')) {
          logger.error(`Failed to kill ${file} after ${reason}`);
        }
      } catch (err) {
        logger.error(`Error killing ${file} after ${reason}: ${toErrorMessage(err)}`);
      }
    };

    const settle = (finish: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      finish();
    };

    const timer = setTimeout(() => {
      settle(() => {
        kill(`timeout of ${options.timeoutMs}ms`);
        resolve({ kind: 'timed_out' });
      });
    }, options.timeoutMs);

    const onAbort = () => {
      settle(() => {
        kill('cancellation');
        reject(new CommandCancelledError(argv.join(' ')));
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (err) => {
      settle(() => reject(err));
    });

    child.on('close', (code: number | null, closeSignal: NodeJS.Signals | null) => {
      settle(() =>
        resolve({
          kind: 'exited',
          exitCode: code,
          signal: closeSignal,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
        }),
      );
    });

    if (options.input !== undefined && child.stdin) {
      child.stdin.on('error', (err) => {
        // The next stage may exit before reading all input (head, grep -q).
        logger.debug(`stdin of ${file} closed early: ${toErrorMessage(err)}`);
      });
      child.stdin.end(options.input);
    }
  });
}
