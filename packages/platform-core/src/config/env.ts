/**
 * Environment Variable Helpers
 *
 * Typed readers over an env map (process.env by default). Missing or
 * unparseable values fall back to the supplied default.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function envString(key: string, fallback: string, env: EnvSource = process.env): string {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

export function envOptionalString(key: string, env: EnvSource = process.env): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function envInt(key: string, fallback: number, env: EnvSource = process.env): number {
  const value = env[key];
  if (!value) return fallback;
  const n = parseInt(value, 10);
  return isNaN(n) ? fallback : n;
}

export function envBool(key: string, fallback: boolean, env: EnvSource = process.env): boolean {
  const value = env[key];
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() === 'true';
}

export function envList(key: string, fallback: string[], env: EnvSource = process.env): string[] {
  const value = env[key];
  if (!value) return fallback;
  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
}
