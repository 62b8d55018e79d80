/**
 * Environment helpers
 * Typed accessors over process.env with defaults
 */

export type Env = Record<string, string | undefined>;

export function getEnvOrDefault(key: string, defaultValue: string, env: Env = process.env): string {
  return env[key] ?? defaultValue;
}

export function getEnvIntOrDefault(key: string, defaultValue: number, env: Env = process.env): number {
  const value = env[key];
  return value ? parseInt(value, 10) : defaultValue;
}

export function getEnvFloatOrDefault(key: string, defaultValue: number, env: Env = process.env): number {
  const value = env[key];
  return value ? parseFloat(value) : defaultValue;
}

export function getEnvBoolOrDefault(key: string, defaultValue: boolean, env: Env = process.env): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}
