/**
 * Result locations and the results-directory contract.
 *
 * Every instance writes to <results>/outputs. Inside a pipeline the file
 * stem gets the job's short id so outputs from instances that process
 * the same session do not collide when the platform collects them.
 */

import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { isPipeline, jobShortId, type AppConfig } from "../config/index.js";
import type { CapsuleParameters } from "../config/parameters/index.js";
import { silentLogger, type Logger } from "../logging/index.js";

export interface OutputPaths {
  readonly report: string;
  readonly record: string;
}

export function outputsDir(appConfig: AppConfig): string {
  return join(appConfig.resultsDir, "outputs");
}

/**
 * `_<job short id>` inside a pipeline, empty otherwise.
 */
export function outputSuffix(appConfig: AppConfig): string {
  const shortId = jobShortId(appConfig);
  return shortId === undefined ? "" : `_${shortId}`;
}

/**
 * Session ids are used as file stems; path separators are replaced.
 */
export function fileStem(sessionId: string): string {
  return sessionId.replace(/[\\/]+/g, "-");
}

export function resolveOutputPaths(
  params: Pick<CapsuleParameters, "session_id">,
  appConfig: AppConfig
): OutputPaths {
  const stem = `${fileStem(params.session_id)}${outputSuffix(appConfig)}`;
  const dir = outputsDir(appConfig);
  return {
    report: join(dir, `${stem}.html`),
    record: join(dir, `${stem}.json`),
  };
}

/**
 * Per-job log file inside a pipeline; the explicit LOG_FILE otherwise.
 */
export function resolveLogFile(appConfig: AppConfig, now: Date = new Date()): string | undefined {
  if (appConfig.jobId !== undefined) {
    const seconds = Math.floor(now.getTime() / 1000);
    return join(appConfig.resultsDir, "logs", `${appConfig.jobId}_${seconds}.log`);
  }
  return appConfig.logFile;
}

/**
 * A pipeline run fails when an expected results folder is missing or
 * empty. Inside a pipeline, create each directory and drop a uniquely
 * named empty file into any that is empty. Outside a pipeline, no-op.
 *
 * @returns Paths of the files created
 */
export function ensureNonemptyResultsDirs(
  appConfig: AppConfig,
  dirs: readonly string[] = [appConfig.resultsDir, outputsDir(appConfig)],
  logger: Logger = silentLogger
): string[] {
  if (!isPipeline(appConfig)) {
    return [];
  }

  const created: string[] = [];
  for (const dir of dirs) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    if (readdirSync(dir).length === 0) {
      const placeholder = join(dir, randomUUID().replace(/-/g, ""));
      logger.info(`Creating ${placeholder} to ensure results folder is not empty`);
      writeFileSync(placeholder, "");
      created.push(placeholder);
    }
  }
  return created;
}
