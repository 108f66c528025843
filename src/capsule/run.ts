/**
 * Capsule entry flow.
 *
 * Reads the parameter set from overrides, the attached parameters file
 * and the command line; processes the session; and leaves the results
 * folders in the state the pipeline expects. Known failures are logged
 * and reported through the exit code so one failed instance stays
 * attributable to its parameter set.
 */

import {
  config as defaultConfig,
  validateConfig,
  jobShortId,
  ConfigError,
  type AppConfig,
} from "../config/index.js";
import {
  loadCapsuleParameters,
  ParameterSourceError,
  ParameterValidationError,
} from "../config/parameters/index.js";
import { AssetError } from "../assets/index.js";
import { AnalysisError } from "../analysis/index.js";
import {
  ReportRenderError,
  TemplateLoadError,
  TemplateParseError,
} from "../report/index.js";
import { RunRecordError, summarizeRunRecord } from "../record/index.js";
import {
  createLogger,
  initRunId,
  isLogLevel,
  type Logger,
} from "../logging/index.js";
import { processSession, type ProcessOutcome } from "./process.js";
import { ensureNonemptyResultsDirs, resolveLogFile } from "./results.js";

export interface RunCapsuleOptions {
  /** Command-line arguments (without node and script path) */
  argv?: readonly string[];
  /** Highest-priority parameter values */
  overrides?: Record<string, unknown>;
  /** Explicit parameters file; skips discovery in config.parametersDir */
  parametersFile?: string;
  config?: AppConfig;
  /** Console logging (default: true) */
  console?: boolean;
}

export interface CapsuleRun {
  readonly exitCode: number;
  readonly runId: string;
  readonly outcome?: ProcessOutcome;
  readonly error?: Error;
}

const KNOWN_ERRORS = [
  ConfigError,
  ParameterSourceError,
  ParameterValidationError,
  AssetError,
  AnalysisError,
  TemplateLoadError,
  TemplateParseError,
  ReportRenderError,
  RunRecordError,
] as const;

function isKnownError(err: unknown): err is Error {
  return KNOWN_ERRORS.some((ErrorClass) => err instanceof ErrorClass);
}

function createCapsuleLogger(appConfig: AppConfig, consoleOutput: boolean): Logger {
  const shortId = jobShortId(appConfig);
  return createLogger({
    level: isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info",
    filePath: resolveLogFile(appConfig),
    console: consoleOutput,
    prefix: shortId === undefined ? "" : `${shortId}.`,
  });
}

/**
 * Run one capsule instance.
 *
 * @throws Error for failures that are not one of the capsule's own errors
 */
export async function runCapsule(options: RunCapsuleOptions = {}): Promise<CapsuleRun> {
  const t0 = Date.now();
  const startedAt = new Date(t0);
  const appConfig = options.config ?? defaultConfig;

  const runId = initRunId(appConfig.jobId);
  const logger = createCapsuleLogger(appConfig, options.console ?? true).child("capsule");

  try {
    validateConfig(appConfig);

    const loaded = loadCapsuleParameters({
      overrides: options.overrides,
      parametersFile: options.parametersFile,
      parametersDir: appConfig.parametersDir,
      argv: options.argv,
    });
    logger.setLevel(loaded.parameters.logging_level);
    logger.debug("Parameter sources", { origins: loaded.origins });

    const outcome = await processSession(loaded.parameters, {
      config: appConfig,
      logger,
      runId,
      startedAt,
      parametersFile: loaded.parametersFile,
    });

    logger.info(summarizeRunRecord(outcome.record));

    ensureNonemptyResultsDirs(appConfig, undefined, logger);
    logger.info(`Time elapsed: ${((Date.now() - t0) / 1000).toFixed(2)} s`);

    return { exitCode: 0, runId, outcome };
  } catch (err) {
    if (!isKnownError(err)) {
      throw err;
    }

    const message = err instanceof ParameterValidationError ? err.format() : err.message;
    logger.error(message, { error: err.name });
    ensureNonemptyResultsDirs(appConfig, undefined, logger);
    return { exitCode: 1, runId, error: err };
  }
}
