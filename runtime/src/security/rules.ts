/**
 * Security rule engine.
 *
 * Evaluation order for one command, first decisive step wins:
 *  1. structural shape (`aws [global options] <service> ...`)
 *  2. regex rules of the `general` category and of the service
 *  3. dangerous command prefixes of the service
 *  4. safe pattern overrides for a dangerous match
 *
 * @module
 */

import { tokenize } from '../shell/tokenizer.js';
import {
  GENERAL_CATEGORY,
  type CommandClassification,
  type CompiledRule,
  type CompiledSecurityConfig,
  type SecurityConfig,
  type ValidationRule,
} from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';

export const CLI_PROGRAM = 'aws';

export const MISSING_PROGRAM_MESSAGE = `Commands must start with '${CLI_PROGRAM}'`;
export const MISSING_SERVICE_MESSAGE = 'Command must include an AWS service (e.g., aws s3 ls)';

export function restrictedMessage(prefix: string): string {
  return `This command (${prefix}) is restricted for security reasons.`;
}

/** Global options that consume the following token as their value. */
export const VALUED_GLOBAL_OPTIONS: ReadonlySet<string> = new Set([
  '--region',
  '--profile',
  '--output',
  '--query',
  '--endpoint-url',
  '--ca-bundle',
  '--cli-read-timeout',
  '--cli-connect-timeout',
  '--cli-binary-format',
  '--color',
]);

export interface CommandLayout {
  /** Global options written before the service, values included. */
  leading: string[];
  service: string | undefined;
  rest: string[];
}

/**
 * Split `aws [global options] <service> ...` so the service is found even
 * when options precede it.
 */
export function splitCommandTokens(tokens: readonly string[]): CommandLayout {
  const leading: string[] = [];
  let index = 1;
  while (index < tokens.length && tokens[index].startsWith('-')) {
    const option = tokens[index];
    leading.push(option);
    index += 1;
    if (VALUED_GLOBAL_OPTIONS.has(option) && index < tokens.length) {
      leading.push(tokens[index]);
      index += 1;
    }
  }
  return {
    leading,
    service: index < tokens.length ? tokens[index] : undefined,
    rest: tokens.slice(index + 1),
  };
}

function compileRule(
  category: string,
  rule: ValidationRule,
  logger: Logger,
): CompiledRule | null {
  if (!rule.isRegex) {
    return { ...rule, matcher: null };
  }
  try {
    return { ...rule, matcher: new RegExp(rule.pattern) };
  } catch (err) {
    logger.error(
      `Skipping invalid regex rule in '${category}' (${rule.pattern}): ${toErrorMessage(err)}`,
    );
    return null;
  }
}

/**
 * Build lookup maps and compile every regex rule once. Rules whose pattern
 * does not compile are logged and left out, so they never match.
 */
export function compileSecurityConfig(
  config: SecurityConfig,
  logger: Logger = silentLogger,
): CompiledSecurityConfig {
  const regexRules = new Map<string, readonly CompiledRule[]>();
  for (const [category, rules] of Object.entries(config.regexRules)) {
    const compiled: CompiledRule[] = [];
    for (const rule of rules) {
      const result = compileRule(category, rule, logger);
      if (result) compiled.push(result);
    }
    regexRules.set(category, compiled);
  }

  return {
    dangerousCommands: new Map(Object.entries(config.dangerousCommands)),
    safePatterns: new Map(Object.entries(config.safePatterns)),
    regexRules,
  };
}

function ruleMatches(rule: CompiledRule, text: string): boolean {
  return rule.matcher ? rule.matcher.test(text) : text.includes(rule.pattern);
}

/**
 * General safe patterns are service independent. Flags (`--dry-run`) match
 * any argument; bare words (`help`) match only as the final argument when
 * it is not the value of an option.
 */
function matchesGeneralPattern(pattern: string, args: readonly string[]): boolean {
  if (pattern.startsWith('-')) {
    return args.includes(pattern);
  }
  const last = args.length - 1;
  if (last < 0 || args[last] !== pattern) {
    return false;
  }
  return last === 0 || !args[last - 1].startsWith('-');
}

/**
 * Classify a single `aws` command. Matching runs against the command as
 * written and against its normalized form: tokens re-joined with single
 * spaces, program and service lowercased, and global options written before
 * the service moved after its arguments.
 */
export function classifyCommand(
  command: string,
  config: CompiledSecurityConfig,
): CommandClassification {
  const trimmed = command.trim();
  const tokens = tokenize(trimmed);

  if (tokens.length === 0 || tokens[0].toLowerCase() !== CLI_PROGRAM) {
    return { allowed: false, kind: 'structural', reason: MISSING_PROGRAM_MESSAGE };
  }
  const layout = splitCommandTokens(tokens);
  if (layout.service === undefined || layout.service.length === 0) {
    return { allowed: false, kind: 'structural', reason: MISSING_SERVICE_MESSAGE };
  }

  const service = layout.service.toLowerCase();
  const args = [...layout.leading, ...layout.rest];
  const normalized = [CLI_PROGRAM, service, ...layout.rest, ...layout.leading].join(' ');
  const candidates = normalized === trimmed ? [trimmed] : [trimmed, normalized];

  const categories = service === GENERAL_CATEGORY ? [GENERAL_CATEGORY] : [GENERAL_CATEGORY, service];
  for (const category of categories) {
    for (const rule of config.regexRules.get(category) ?? []) {
      if (candidates.some((text) => ruleMatches(rule, text))) {
        return { allowed: false, kind: 'security_denied', reason: rule.errorMessage, rule: rule.pattern };
      }
    }
  }

  const dangerous = config.dangerousCommands.get(service) ?? [];
  const matchedPrefix = dangerous.find((prefix) =>
    candidates.some((text) => text.startsWith(prefix)),
  );
  if (matchedPrefix === undefined) {
    return { allowed: true, service };
  }

  const servicePatterns = config.safePatterns.get(service) ?? [];
  const serviceOverride = servicePatterns.find((pattern) =>
    candidates.some((text) => text.startsWith(pattern)),
  );
  if (serviceOverride !== undefined) {
    return { allowed: true, service, override: serviceOverride };
  }

  const generalOverride = (config.safePatterns.get(GENERAL_CATEGORY) ?? []).find((pattern) =>
    matchesGeneralPattern(pattern, args),
  );
  if (generalOverride !== undefined) {
    return { allowed: true, service, override: generalOverride };
  }

  return {
    allowed: false,
    kind: 'security_denied',
    reason: restrictedMessage(matchedPrefix),
    rule: matchedPrefix,
  };
}
