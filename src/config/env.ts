/**
 * Environment variable loading and validation.
 *
 * Every helper takes the environment map explicitly (defaulting to
 * process.env) so capsule code and tests can resolve configuration from
 * an isolated map.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function read(env: EnvSource, key: string): string | undefined {
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
  return read(env, key) ?? defaultValue;
}

/**
 * Get an optional environment variable with no default.
 */
export function maybeEnv(key: string, env: EnvSource = process.env): string | undefined {
  return read(env, key);
}

/**
 * Get an optional comma-separated environment variable as a list.
 * Blank entries are dropped.
 */
export function optionalEnvList(
  key: string,
  defaultValue: readonly string[],
  env: EnvSource = process.env
): string[] {
  const value = read(env, key);
  if (value === undefined) {
    return [...defaultValue];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
