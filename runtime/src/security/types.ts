/**
 * Security policy types.
 *
 * @module
 */

export type SecurityMode = 'strict' | 'permissive';

export const SECURITY_MODES: readonly SecurityMode[] = ['strict', 'permissive'];

/** Category whose regex rules and safe patterns apply to every service. */
export const GENERAL_CATEGORY = 'general';

export interface ValidationRule {
  readonly pattern: string;
  readonly description: string;
  /** Returned to the caller when the rule matches. */
  readonly errorMessage: string;
  /** When false, `pattern` is matched as a literal substring. */
  readonly isRegex: boolean;
}

/**
 * Policy tables as authored. Keys of `dangerousCommands` and `safePatterns`
 * are service names (`iam`, `s3api`); keys of `regexRules` are categories,
 * where `general` always applies.
 */
export interface SecurityConfig {
  readonly dangerousCommands: Readonly<Record<string, readonly string[]>>;
  readonly safePatterns: Readonly<Record<string, readonly string[]>>;
  readonly regexRules: Readonly<Record<string, readonly ValidationRule[]>>;
}

export interface CompiledRule extends ValidationRule {
  /** Compiled once at load; null for literal rules. */
  readonly matcher: RegExp | null;
}

/**
 * Lookup form of a SecurityConfig. Maps keep service names supplied by
 * callers away from object prototype keys.
 */
export interface CompiledSecurityConfig {
  readonly dangerousCommands: ReadonlyMap<string, readonly string[]>;
  readonly safePatterns: ReadonlyMap<string, readonly string[]>;
  readonly regexRules: ReadonlyMap<string, readonly CompiledRule[]>;
}

/**
 * Outcome of classifying one command. Structural failures are kept apart
 * from security denials because permissive mode relaxes only the latter.
 */
export type CommandClassification =
  | {
      readonly allowed: true;
      readonly service: string;
      /** Safe pattern that overrode a dangerous prefix, if any. */
      readonly override?: string;
    }
  | {
      readonly allowed: false;
      readonly kind: 'structural' | 'security_denied';
      readonly reason: string;
      /** Prefix or regex pattern that caused the denial. */
      readonly rule?: string;
    };

export interface SecurityPolicySnapshot {
  readonly config: CompiledSecurityConfig;
  readonly mode: SecurityMode;
  /** Policy file path, or null for built-in or in-memory tables. */
  readonly source: string | null;
  readonly loadedAt: number;
}
