/**
 * Security policy file loading and validation.
 *
 * Policy files are YAML (JSON is accepted, being a YAML subset) with three
 * optional top-level sections: `dangerous_commands`, `safe_patterns` and
 * `regex_rules`. A missing section keeps the built-in default for it.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import defaultPolicy from './default-policy.json' with { type: 'json' };
import type { SecurityConfig, ValidationRule } from './types.js';
import { PolicyLoadError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';

// ============================================================================
// Validation
// ============================================================================

const SECTION_KEYS = ['dangerous_commands', 'safe_patterns', 'regex_rules'] as const;

/** YAML mappings parse to plain objects; sequences to arrays. */
function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function validateStringListMap(value: unknown, section: string, errors: string[]): void {
  if (!isMapping(value)) {
    errors.push(`${section} must be a mapping of service name to list of strings`);
    return;
  }
  for (const [key, entries] of Object.entries(value)) {
    if (!isStringList(entries)) {
      errors.push(`${section}.${key} must be a list of strings`);
    }
  }
}

function validateRuleMap(value: unknown, errors: string[]): void {
  if (!isMapping(value)) {
    errors.push('regex_rules must be a mapping of category to list of rules');
    return;
  }
  for (const [category, rules] of Object.entries(value)) {
    if (!Array.isArray(rules)) {
      errors.push(`regex_rules.${category} must be a list of rules`);
      continue;
    }
    const entries: unknown[] = rules;
    entries.forEach((rule, index) => {
      const path = `regex_rules.${category}[${index}]`;
      if (!isMapping(rule)) {
        errors.push(`${path} must be an object`);
        return;
      }
      if (typeof rule.pattern !== 'string' || rule.pattern.length === 0) {
        errors.push(`${path}.pattern must be a non-empty string`);
      }
      if (typeof rule.error_message !== 'string' || rule.error_message.length === 0) {
        errors.push(`${path}.error_message must be a non-empty string`);
      }
      if (rule.description !== undefined && typeof rule.description !== 'string') {
        errors.push(`${path}.description must be a string`);
      }
      if (rule.is_regex !== undefined && typeof rule.is_regex !== 'boolean') {
        errors.push(`${path}.is_regex must be a boolean`);
      }
    });
  }
}

/**
 * Check the shape of a parsed policy document. Regex syntax is not checked
 * here; malformed patterns are dropped at compile time.
 */
export function validateSecurityConfigFile(
  obj: unknown,
): { valid: boolean; errors: string[] } {
  if (!isMapping(obj)) {
    return { valid: false, errors: ['Security policy must be a mapping'] };
  }

  const errors: string[] = [];
  const unknownKeys = Object.keys(obj).filter(
    (key) => !SECTION_KEYS.some((section) => section === key),
  );
  if (unknownKeys.length > 0) {
    errors.push(`Unknown sections: ${unknownKeys.join(', ')}`);
  }
  if (obj.dangerous_commands !== undefined) {
    validateStringListMap(obj.dangerous_commands, 'dangerous_commands', errors);
  }
  if (obj.safe_patterns !== undefined) {
    validateStringListMap(obj.safe_patterns, 'safe_patterns', errors);
  }
  if (obj.regex_rules !== undefined) {
    validateRuleMap(obj.regex_rules, errors);
  }

  return { valid: errors.length === 0, errors };
}

// ============================================================================
// Conversion
// ============================================================================

function toStringListMap(value: unknown): Record<string, readonly string[]> {
  const result: Record<string, readonly string[]> = {};
  if (!isMapping(value)) return result;
  for (const [key, entries] of Object.entries(value)) {
    if (isStringList(entries)) {
      result[key] = Object.freeze([...entries]);
    }
  }
  return result;
}

function toRuleMap(value: unknown): Record<string, readonly ValidationRule[]> {
  const result: Record<string, readonly ValidationRule[]> = {};
  if (!isMapping(value)) return result;
  for (const [category, rules] of Object.entries(value)) {
    if (!Array.isArray(rules)) continue;
    const entries: unknown[] = rules;
    const converted: ValidationRule[] = [];
    for (const rule of entries) {
      if (!isMapping(rule)) continue;
      const { pattern, description, error_message: errorMessage, is_regex: isRegex } = rule;
      if (typeof pattern !== 'string' || typeof errorMessage !== 'string') continue;
      converted.push(
        Object.freeze({
          pattern,
          description: typeof description === 'string' ? description : '',
          errorMessage,
          isRegex: typeof isRegex === 'boolean' ? isRegex : true,
        }),
      );
    }
    result[category] = Object.freeze(converted);
  }
  return result;
}

/**
 * Convert a parsed policy document into a SecurityConfig. Sections absent
 * from the document come from `fallback`.
 *
 * @throws PolicyLoadError when the document fails validation
 */
export function parseSecurityConfig(
  obj: unknown,
  fallback: SecurityConfig,
  source = '<inline>',
): SecurityConfig {
  const result = validateSecurityConfigFile(obj);
  if (!result.valid || !isMapping(obj)) {
    throw new PolicyLoadError(source, result.errors.join('; '));
  }

  return Object.freeze({
    dangerousCommands:
      obj.dangerous_commands === undefined
        ? fallback.dangerousCommands
        : Object.freeze(toStringListMap(obj.dangerous_commands)),
    safePatterns:
      obj.safe_patterns === undefined
        ? fallback.safePatterns
        : Object.freeze(toStringListMap(obj.safe_patterns)),
    regexRules:
      obj.regex_rules === undefined
        ? fallback.regexRules
        : Object.freeze(toRuleMap(obj.regex_rules)),
  });
}

const EMPTY_CONFIG: SecurityConfig = {
  dangerousCommands: {},
  safePatterns: {},
  regexRules: {},
};

/** Built-in policy used when no file is configured or the file is unusable. */
export const DEFAULT_SECURITY_CONFIG: SecurityConfig = parseSecurityConfig(
  defaultPolicy,
  EMPTY_CONFIG,
  'default-policy.json',
);

// ============================================================================
// Loading
// ============================================================================

/**
 * Read and parse a policy file.
 *
 * @throws PolicyLoadError when the file is missing, unparsable or invalid
 */
export async function readSecurityConfigFile(
  path: string,
  fallback: SecurityConfig = DEFAULT_SECURITY_CONFIG,
): Promise<SecurityConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new PolicyLoadError(path, toErrorMessage(err), err);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new PolicyLoadError(path, `invalid YAML: ${toErrorMessage(err)}`, err);
  }

  return parseSecurityConfig(parsed ?? {}, fallback, path);
}

/**
 * Load the policy for `path`, falling back to the built-in defaults on any
 * failure. Never throws.
 */
export async function loadSecurityConfig(
  path: string | undefined,
  logger: Logger = silentLogger,
): Promise<SecurityConfig> {
  if (!path) {
    return DEFAULT_SECURITY_CONFIG;
  }
  try {
    const config = await readSecurityConfigFile(path);
    logger.info(`Loaded security policy from ${path}`);
    return config;
  } catch (err) {
    logger.error(toErrorMessage(err));
    logger.warn('Using default security configuration');
    return DEFAULT_SECURITY_CONFIG;
  }
}
