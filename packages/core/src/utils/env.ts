// Environment variable helpers - explicit configuration, loud fallbacks

import { logger } from './logger.js';

/**
 * Get required environment variable with NO FALLBACKS
 * Throws immediately if the variable is missing or empty
 *
 * @param name - Environment variable name
 * @param description - Optional description for better error messages
 * @throws Error if variable is missing or empty
 */
export function getRequiredEnv(name: string, description?: string): string {
  const value = process.env[name];

  if (!value || value.trim() === '') {
    const errorMsg = description
      ? `FATAL: ${name} environment variable is required. ${description}`
      : `FATAL: ${name} environment variable is required. No defaults allowed.`;

    throw new Error(errorMsg);
  }

  return value.trim();
}

/**
 * Get environment variable with fallback (LOGS WARNING WHEN FALLBACK IS USED)
 * Use this ONLY when you have a legitimate reason for a fallback
 */
export function getEnvWithFallback(name: string, fallback: string, description?: string): string {
  const value = process.env[name];

  if (!value || value.trim() === '') {
    logger.warn(`Using fallback for ${name}="${fallback}". ${description || 'Consider setting this explicitly.'}`, {
      env_var: name,
      fallback_value: fallback,
      reason: 'environment_variable_missing',
    });
    return fallback;
  }

  return value.trim();
}

/**
 * Parse a boolean flag. Accepts true/false, 1/0, yes/no, on/off and enabled/disabled
 * (case insensitive); returns undefined for anything else.
 */
export function parseBooleanFlag(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();

  if (['true', '1', 'yes', 'on', 'enabled'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off', 'disabled'].includes(normalized)) {
    return false;
  }
  return undefined;
}
