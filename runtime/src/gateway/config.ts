/**
 * Gateway configuration from environment variables.
 *
 * | Variable                     | Field              | Default   |
 * |------------------------------|--------------------|-----------|
 * | AWS_MCP_TIMEOUT              | timeoutSeconds     | 30        |
 * | AWS_MCP_MAX_OUTPUT           | maxOutputLength    | 10000     |
 * | AWS_MCP_MAX_CALLS_PER_SECOND | maxCallsPerSecond  | 5         |
 * | AWS_MCP_SECURITY_MODE        | securityMode       | strict    |
 * | AWS_MCP_SECURITY_CONFIG      | securityConfigPath | (none)    |
 * | AWS_MCP_LOG_LEVEL            | logLevel           | info      |
 * | AWS_PROFILE                  | profile            | default   |
 * | AWS_REGION                   | region             | (none)    |
 *
 * @module
 */

import type { GatewayConfig } from './types.js';
import { DEFAULT_MAX_OUTPUT_LENGTH, DEFAULT_TIMEOUT_SECONDS } from '../execution/executor.js';
import { DEFAULT_MAX_CALLS_PER_SECOND } from '../execution/rate-limiter.js';
import { SECURITY_MODES, type SecurityMode } from '../security/types.js';
import { isLogLevel, LOG_LEVEL_NAMES, silentLogger, type LogLevel, type Logger } from '../utils/logger.js';

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = Object.freeze({
  timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
  maxOutputLength: DEFAULT_MAX_OUTPUT_LENGTH,
  maxCallsPerSecond: DEFAULT_MAX_CALLS_PER_SECOND,
  securityMode: 'strict',
  logLevel: 'info',
  profile: 'default',
});

type Env = Readonly<Record<string, string | undefined>>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parsePositiveInteger(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function parseSecurityMode(value: string): SecurityMode | undefined {
  const lowered = value.toLowerCase();
  return SECURITY_MODES.find((mode) => mode === lowered);
}

function parseLogLevel(value: string): LogLevel | undefined {
  const lowered = value.toLowerCase();
  return isLogLevel(lowered) ? lowered : undefined;
}

const NUMERIC_VARS = ['AWS_MCP_TIMEOUT', 'AWS_MCP_MAX_OUTPUT', 'AWS_MCP_MAX_CALLS_PER_SECOND'] as const;

/**
 * Report malformed variables without applying them.
 */
export function validateGatewayEnv(env: Env = process.env): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const name of NUMERIC_VARS) {
    const value = readEnv(env, name);
    if (value !== undefined && parsePositiveInteger(value) === undefined) {
      errors.push(`${name} must be a positive integer, got '${value}'`);
    }
  }

  const mode = readEnv(env, 'AWS_MCP_SECURITY_MODE');
  if (mode !== undefined && parseSecurityMode(mode) === undefined) {
    errors.push(`AWS_MCP_SECURITY_MODE must be one of: ${SECURITY_MODES.join(', ')}`);
  }

  const level = readEnv(env, 'AWS_MCP_LOG_LEVEL');
  if (level !== undefined && parseLogLevel(level) === undefined) {
    errors.push(`AWS_MCP_LOG_LEVEL must be one of: ${LOG_LEVEL_NAMES.join(', ')}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Build the gateway configuration. Malformed values are logged and replaced
 * by their defaults; this never throws.
 */
export function loadGatewayConfig(env: Env = process.env, logger: Logger = silentLogger): GatewayConfig {
  const { errors } = validateGatewayEnv(env);
  for (const error of errors) {
    logger.warn(`${error}; using default`);
  }

  const numeric = (name: (typeof NUMERIC_VARS)[number], fallback: number): number => {
    const value = readEnv(env, name);
    return (value !== undefined ? parsePositiveInteger(value) : undefined) ?? fallback;
  };
  const mode = readEnv(env, 'AWS_MCP_SECURITY_MODE');
  const level = readEnv(env, 'AWS_MCP_LOG_LEVEL');

  return Object.freeze({
    timeoutSeconds: numeric('AWS_MCP_TIMEOUT', DEFAULT_GATEWAY_CONFIG.timeoutSeconds),
    maxOutputLength: numeric('AWS_MCP_MAX_OUTPUT', DEFAULT_GATEWAY_CONFIG.maxOutputLength),
    maxCallsPerSecond: numeric('AWS_MCP_MAX_CALLS_PER_SECOND', DEFAULT_GATEWAY_CONFIG.maxCallsPerSecond),
    securityMode: (mode !== undefined ? parseSecurityMode(mode) : undefined) ?? DEFAULT_GATEWAY_CONFIG.securityMode,
    securityConfigPath: readEnv(env, 'AWS_MCP_SECURITY_CONFIG'),
    logLevel: (level !== undefined ? parseLogLevel(level) : undefined) ?? DEFAULT_GATEWAY_CONFIG.logLevel,
    profile: readEnv(env, 'AWS_PROFILE') ?? DEFAULT_GATEWAY_CONFIG.profile,
    region: readEnv(env, 'AWS_REGION'),
  });
}
