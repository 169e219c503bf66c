/**
 * Utility functions for environment variable and flag parsing
 */
import { ArgumentError } from '../services/errors';

/**
 * Parse a boolean environment variable that accepts multiple truthy/falsy values:
 * - Truthy: "1", "true", "yes", "on" (case insensitive)
 * - Falsy: "0", "false", "no", "off" (case insensitive) or undefined/empty
 *
 * @param envVar - The environment variable value
 * @param defaultValue - Default value if envVar is undefined/empty or unrecognized (default: false)
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;

  const normalized = envVar.toLowerCase().trim();

  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

/**
 * Get a boolean environment variable with consistent parsing
 * @param name - Environment variable name
 * @param defaultValue - Default value if not set (default: false)
 */
export function getBooleanEnv(name: string, defaultValue = false): boolean {
  return parseBooleanEnv(process.env[name], defaultValue);
}

/**
 * Strict boolean for command line flags: only "true" / "false" in any letter case.
 * Unlike parseBooleanEnv there is no fallback; anything else is an ArgumentError.
 */
export function parseBooleanFlag(flag: string, value: string | undefined): boolean {
  const normalized = (value ?? '').toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ArgumentError(`${flag}: expected true or false, got "${value ?? ''}"`, { flag, value });
}
