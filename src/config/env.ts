/**
 * Environment variable loading and validation.
 *
 * Every helper reads from an explicit environment (process.env by default)
 * so configuration can be built from a fixed map in tests.
 */

import "dotenv/config";

export type Env = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string, env: Env = process.env): string {
  const value = env[key];
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string, env: Env = process.env): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Optional environment variable without a default; empty counts as unset.
 */
export function optionalEnvString(key: string, env: Env = process.env): string | undefined {
  const value = env[key];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(key: string, defaultValue: number, env: Env = process.env): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean, env: Env = process.env): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
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
