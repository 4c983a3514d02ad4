/**
 * Helpers for reading environment variables.
 */

/**
 * Parse a boolean environment value.
 * - Truthy: "1", "true", "yes", "on" (case insensitive)
 * - Falsy: "0", "false", "no", "off" (case insensitive)
 * Anything else (including unset) yields `defaultValue`.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

export function getBooleanEnv(name: string, defaultValue = false): boolean {
  return parseBooleanEnv(process.env[name], defaultValue);
}

/** Comma separated list; empty entries are dropped. */
export function parseCsvEnv(envVar: string | undefined): string[] {
  if (!envVar) return [];
  return envVar.split(',').map(s => s.trim()).filter(Boolean);
}

export function getCsvEnv(name: string): string[] {
  return parseCsvEnv(process.env[name]);
}
