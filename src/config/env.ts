/**
 * Environment variable loading and validation.
 *
 * Every reader takes the environment as a parameter (defaulting to
 * process.env) so configuration can be resolved from a fixed map in tests.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }

  /**
   * Format the error for display.
   */
  format(): string {
    return `Configuration error: ${this.message}`;
  }
}

function readEnv(key: string, env: EnvSource): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: EnvSource = process.env
): string {
  return readEnv(key, env) ?? defaultValue;
}

/**
 * Get an optional environment variable as a positive integer.
 */
export function optionalEnvPositiveInt(
  key: string,
  defaultValue: number,
  env: EnvSource = process.env
): number {
  const value = readEnv(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`Environment variable ${key} must be a positive integer, got: ${value}`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < 1) {
    throw new ConfigError(`Environment variable ${key} must be at least 1, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: EnvSource = process.env
): boolean {
  const value = readEnv(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
