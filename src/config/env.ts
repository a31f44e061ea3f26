/**
 * Service settings from environment variables
 */

import { ConfigurationError } from '../errors';
import { ServiceConfigUpdate } from '../types/config';

function parseBoolean(name: string, value: string, problems: string[]): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  problems.push(`${name} must be a boolean, got "${value}"`);
  return undefined;
}

function parsePositiveInt(name: string, value: string, problems: string[]): number | undefined {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    problems.push(`${name} must be a positive integer, got "${value}"`);
    return undefined;
  }
  return parsed;
}

/**
 * Read PROMPTWARD_* variables. Unset variables keep their defaults;
 * malformed ones throw ConfigurationError.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServiceConfigUpdate {
  const problems: string[] = [];
  const config: ServiceConfigUpdate = {};

  const {
    PROMPTWARD_ENABLE_AUTH,
    PROMPTWARD_API_TOKENS,
    PROMPTWARD_ENABLE_RATE_LIMIT,
    PROMPTWARD_RATE_LIMIT_MAX,
    PROMPTWARD_RATE_LIMIT_WINDOW_MS,
    PROMPTWARD_LOG_PROMPTS,
    PROMPTWARD_BLOCK_MESSAGE,
    PROMPTWARD_AUDIT_MAX_ENTRIES
  } = env;

  if (PROMPTWARD_ENABLE_AUTH !== undefined) {
    config.enableAuth = parseBoolean('PROMPTWARD_ENABLE_AUTH', PROMPTWARD_ENABLE_AUTH, problems);
  }

  if (PROMPTWARD_API_TOKENS !== undefined) {
    config.apiTokens = PROMPTWARD_API_TOKENS.split(',')
      .map(t => t.trim())
      .filter(t => t.length > 0);
  }

  if (PROMPTWARD_ENABLE_RATE_LIMIT !== undefined) {
    config.enableRateLimit = parseBoolean('PROMPTWARD_ENABLE_RATE_LIMIT', PROMPTWARD_ENABLE_RATE_LIMIT, problems);
  }

  if (PROMPTWARD_RATE_LIMIT_MAX !== undefined || PROMPTWARD_RATE_LIMIT_WINDOW_MS !== undefined) {
    const maxRequests = parsePositiveInt('PROMPTWARD_RATE_LIMIT_MAX', PROMPTWARD_RATE_LIMIT_MAX ?? '100', problems);
    const windowMs = parsePositiveInt('PROMPTWARD_RATE_LIMIT_WINDOW_MS', PROMPTWARD_RATE_LIMIT_WINDOW_MS ?? '60000', problems);
    if (maxRequests !== undefined && windowMs !== undefined) {
      config.rateLimit = { maxRequests, windowMs };
    }
  }

  if (PROMPTWARD_LOG_PROMPTS !== undefined) {
    config.logPrompts = parseBoolean('PROMPTWARD_LOG_PROMPTS', PROMPTWARD_LOG_PROMPTS, problems);
  }

  if (PROMPTWARD_BLOCK_MESSAGE !== undefined) {
    if (PROMPTWARD_BLOCK_MESSAGE.trim().length === 0) {
      problems.push('PROMPTWARD_BLOCK_MESSAGE must not be empty');
    } else {
      config.blockMessage = PROMPTWARD_BLOCK_MESSAGE;
    }
  }

  if (PROMPTWARD_AUDIT_MAX_ENTRIES !== undefined) {
    config.auditMaxEntries = parsePositiveInt('PROMPTWARD_AUDIT_MAX_ENTRIES', PROMPTWARD_AUDIT_MAX_ENTRIES, problems);
  }

  if (problems.length > 0) {
    throw new ConfigurationError('Invalid environment', problems);
  }

  return config;
}
