/**
 * Reloads a SecurityPolicy when its file changes on disk.
 *
 * @module
 */

import { watch, type FSWatcher } from 'node:fs';
import type { SecurityPolicy } from './policy.js';
import type { SecurityPolicySnapshot } from './types.js';

export type PolicyReloadCallback = (snapshot: SecurityPolicySnapshot) => void;
export type PolicyWatchErrorCallback = (error: Error) => void;

export const DEFAULT_POLICY_WATCH_DEBOUNCE_MS = 500;

export class SecurityPolicyWatcher {
  private readonly policy: SecurityPolicy;
  private readonly path: string;
  private readonly debounceMs: number;
  private watcher: FSWatcher | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(policy: SecurityPolicy, path: string, debounceMs = DEFAULT_POLICY_WATCH_DEBOUNCE_MS) {
    this.policy = policy;
    this.path = path;
    this.debounceMs = debounceMs;
  }

  get watching(): boolean {
    return this.watcher !== null;
  }

  start(onReload?: PolicyReloadCallback, onError?: PolicyWatchErrorCallback): void {
    if (this.watcher) return;

    const reportError = (err: unknown) => {
      onError?.(err instanceof Error ? err : new Error(String(err)));
    };

    try {
      this.watcher = watch(this.path, () => {
        if (this.debounceTimer) {
          clearTimeout(this.debounceTimer);
        }
        this.debounceTimer = setTimeout(() => {
          this.debounceTimer = null;
          void this.policy
            .reload()
            .then((snapshot) => onReload?.(snapshot))
            .catch(reportError);
        }, this.debounceMs);
      });

      this.watcher.on('error', reportError);
    } catch (err) {
      reportError(err);
    }
  }

  stop(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }
}
