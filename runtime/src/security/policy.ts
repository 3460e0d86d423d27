/**
 * Owner of the active security policy snapshot.
 *
 * Snapshots are immutable. `reload`, `replace` and `setMode` build a new
 * snapshot and install it with a single assignment, so a validation call
 * that read `current` keeps a consistent view even while a reload runs.
 *
 * @module
 */

import { compileSecurityConfig } from './rules.js';
import { DEFAULT_SECURITY_CONFIG, loadSecurityConfig } from './policy-file.js';
import type { SecurityConfig, SecurityMode, SecurityPolicySnapshot } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface SecurityPolicyConfig {
  /** Default: 'strict' */
  readonly mode?: SecurityMode;
  /** Policy file consulted by `reload()`. */
  readonly path?: string;
  /** Tables for the first snapshot. Default: built-in policy */
  readonly initial?: SecurityConfig;
  readonly logger?: Logger;
  readonly now?: () => number;
}

export class SecurityPolicy {
  private snapshot: SecurityPolicySnapshot;
  private reloadGeneration = 0;

  private readonly path: string | undefined;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: SecurityPolicyConfig = {}) {
    this.path = config.path;
    this.logger = config.logger ?? silentLogger;
    this.now = config.now ?? Date.now;
    this.snapshot = this.buildSnapshot(
      config.initial ?? DEFAULT_SECURITY_CONFIG,
      config.mode ?? 'strict',
      null,
    );
  }

  /**
   * Create a policy and load its file, if any. Never throws: an unusable
   * file leaves the built-in tables active.
   */
  static async load(config: SecurityPolicyConfig = {}): Promise<SecurityPolicy> {
    const policy = new SecurityPolicy(config);
    if (config.path) {
      await policy.reload();
    }
    return policy;
  }

  get current(): SecurityPolicySnapshot {
    return this.snapshot;
  }

  get mode(): SecurityMode {
    return this.snapshot.mode;
  }

  /**
   * Re-read the policy file and install the result. When reloads overlap,
   * the most recently started one wins.
   */
  async reload(): Promise<SecurityPolicySnapshot> {
    const generation = ++this.reloadGeneration;
    const config = await loadSecurityConfig(this.path, this.logger);
    if (generation !== this.reloadGeneration) {
      return this.snapshot;
    }
    const source = config === DEFAULT_SECURITY_CONFIG ? null : (this.path ?? null);
    this.snapshot = this.buildSnapshot(config, this.snapshot.mode, source);
    this.logger.info(`Security policy reloaded (${this.path ?? 'built-in defaults'})`);
    return this.snapshot;
  }

  /** Install in-memory tables, superseding any reload still in flight. */
  replace(config: SecurityConfig): SecurityPolicySnapshot {
    this.reloadGeneration += 1;
    this.snapshot = this.buildSnapshot(config, this.snapshot.mode, null);
    return this.snapshot;
  }

  setMode(mode: SecurityMode): SecurityPolicySnapshot {
    if (mode !== this.snapshot.mode) {
      this.logger.info(`Security mode set to ${mode}`);
    }
    this.snapshot = Object.freeze({ ...this.snapshot, mode });
    return this.snapshot;
  }

  private buildSnapshot(
    config: SecurityConfig,
    mode: SecurityMode,
    source: string | null,
  ): SecurityPolicySnapshot {
    return Object.freeze({
      config: compileSecurityConfig(config, this.logger),
      mode,
      source,
      loadedAt: this.now(),
    });
  }
}
