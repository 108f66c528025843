/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvList,
  maybeEnv,
  type EnvSource,
} from "./env.js";
import { isLogLevel, parseLogLevel } from "../logging/logger.js";

export { ConfigError, type EnvSource } from "./env.js";

// Re-export capsule parameter module
export * from "./parameters/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level used until the parameter set overrides it; normalized when recognized */
  readonly logLevel: string;
  /** Candidate locations of the attached session asset, in priority order */
  readonly dataRoots: readonly string[];
  /** Name prefix of datacube directories inside the data root */
  readonly datacubePrefix: string;
  /** Directory searched for *_input_parameters*.json */
  readonly parametersDir: string;
  /** Root of everything the capsule writes */
  readonly resultsDir: string;
  /** Directory holding report templates */
  readonly templatesDir: string;
  /** Explicit log file path (local runs) */
  readonly logFile?: string;
  /** Batch job id; present only inside a pipeline */
  readonly jobId?: string;
  /** Computation id assigned by the execution platform */
  readonly computationId?: string;
}

export const DEFAULT_DATA_ROOTS: readonly string[] = ["/data", "/tmp/data"];

/**
 * Load application configuration from an environment map.
 */
export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development", env),
    logLevel: parseLogLevel(logLevel) ?? logLevel,
    dataRoots: Object.freeze(optionalEnvList("DATA_ROOTS", DEFAULT_DATA_ROOTS, env)),
    datacubePrefix: optionalEnv("DATACUBE_PREFIX", "datacube", env),
    parametersDir: optionalEnv("PARAMETERS_DIR", "/data/parameters", env),
    resultsDir: optionalEnv("RESULTS_DIR", "/results", env),
    templatesDir: optionalEnv("TEMPLATES_DIR", "templates", env),
    logFile: maybeEnv("LOG_FILE", env),
    jobId: maybeEnv("AWS_BATCH_JOB_ID", env),
    computationId: maybeEnv("CO_COMPUTATION_ID", env),
  });
}

/** Application configuration singleton */
export const config: AppConfig = loadAppConfig();

/**
 * Whether the capsule runs as one instance of a pipeline fan-out.
 */
export function isPipeline(appConfig: AppConfig = config): boolean {
  return appConfig.jobId !== undefined;
}

/**
 * First dash-separated segment of the job id, used to tag outputs and
 * log lines from one pipeline instance.
 */
export function jobShortId(appConfig: AppConfig = config): string | undefined {
  return appConfig.jobId?.split("-")[0];
}

/**
 * Validate configuration values that have no schema.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (appConfig.dataRoots.length === 0) {
    throw new ConfigError("DATA_ROOTS must name at least one directory.");
  }
}
