/**
 * Processing of a single session.
 *
 * One parameter set in, one result out: locate the session in the
 * attached asset, run the drift analysis, and write the HTML report and
 * run record. Nothing here keeps state between calls.
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { AppConfig } from "../config/index.js";
import type { CapsuleParameters } from "../config/parameters/index.js";
import {
  loadUnits,
  locateDataRoot,
  locateDatacubeDir,
  selectSession,
  type UnitRecord,
} from "../assets/index.js";
import { analyzeActivityDrift, type DriftResult } from "../analysis/index.js";
import {
  DRIFT_REPORT_TEMPLATE,
  ReportTemplateLoader,
  buildReportContext,
  renderReport,
} from "../report/index.js";
import {
  createRunMetadata,
  createRunRecord,
  saveRunRecord,
  type RunRecord,
} from "../record/index.js";
import { getRunId, silentLogger, type Logger } from "../logging/index.js";
import { resolveOutputPaths } from "./results.js";

export interface ProcessOptions {
  config: AppConfig;
  logger?: Logger;
  /** Defaults to the current run id */
  runId?: string;
  startedAt?: Date;
  /** Parameters file the set came from, for the run record */
  parametersFile?: string;
  /** Reuse a loader across calls; created from config.templatesDir otherwise */
  templates?: ReportTemplateLoader;
  /** Whether to record the hostname (default: true) */
  captureHostname?: boolean;
}

export interface ProcessOutcome {
  readonly reportPath: string;
  readonly recordPath: string;
  readonly result: DriftResult;
  readonly record: Readonly<RunRecord>;
}

/**
 * Pure core of the capsule: (parameter set, asset units) → result.
 *
 * @throws AssetError    if the session is not in the asset
 * @throws AnalysisError if the area holds too few units
 */
export function runAnalysis(
  params: Readonly<CapsuleParameters>,
  units: readonly UnitRecord[]
): DriftResult {
  return analyzeActivityDrift(selectSession(units, params.session_id), params);
}

/**
 * Locate the attached asset and load its units table.
 */
export async function loadSessionAsset(
  appConfig: AppConfig,
  logger: Logger = silentLogger
): Promise<UnitRecord[]> {
  const dataRoot = locateDataRoot(appConfig.dataRoots);
  logger.debug(`Using data root ${dataRoot}`);
  const datacubeDir = locateDatacubeDir(dataRoot, appConfig.datacubePrefix);
  logger.debug(`Using files in ${datacubeDir}`);
  return loadUnits(datacubeDir);
}

function writeText(filePath: string, text: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(filePath, text, "utf-8");
}

/**
 * Process one session with the given parameters and write its outputs.
 */
export async function processSession(
  params: Readonly<CapsuleParameters>,
  options: ProcessOptions
): Promise<ProcessOutcome> {
  const logger = options.logger ?? silentLogger;
  const startedAt = options.startedAt ?? new Date();

  logger.info("Processing session", {
    session_id: params.session_id,
    area: params.area,
    n_units: params.n_units,
    test: params.test,
  });

  const units = await loadSessionAsset(options.config, logger);
  const result = runAnalysis(params, units);
  logger.info("Analysis complete", {
    sampled: result.summary.count,
    available: result.available_units,
  });

  const templates = options.templates ?? new ReportTemplateLoader(options.config.templatesDir);
  const html = renderReport(templates.load(DRIFT_REPORT_TEMPLATE), buildReportContext(result));

  const paths = resolveOutputPaths(params, options.config);
  logger.info(`Writing results to ${paths.report}`);
  writeText(paths.report, html);

  const record = createRunRecord({
    runMetadata: createRunMetadata({
      runId: options.runId ?? getRunId() ?? "no-run-id",
      startedAt,
      finishedAt: new Date(),
      jobId: options.config.jobId,
      computationId: options.config.computationId,
      parametersFile: options.parametersFile,
      captureHostname: options.captureHostname,
    }),
    parameters: params,
    result,
    reportFile: paths.report,
  });
  saveRunRecord(record, paths.record);
  logger.debug(`Run record saved to ${paths.record}`);

  return { reportPath: paths.report, recordPath: paths.record, result, record };
}
