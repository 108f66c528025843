/**
 * Activity-drift analysis.
 *
 * For one session and brain area: sample `n_units` units, order them by
 * activity drift, and summarize the sample. The function is pure; the
 * same units and parameters always give the same result.
 */

import type { CapsuleParameters } from "../config/parameters/index.js";
import type { UnitRecord } from "../assets/schema.js";
import {
  AnalysisError,
  createRng,
  deriveSeed,
  sampleWithoutReplacement,
} from "./random.js";

/** Sample size ceiling in test mode. */
export const TEST_MODE_UNIT_LIMIT = 5;

export interface DriftUnit {
  readonly unit_id: string;
  readonly location: string;
  readonly activity_drift: number;
}

export interface DriftSummary {
  readonly count: number;
  readonly mean: number | null;
  readonly median: number | null;
  readonly min: number | null;
  readonly max: number | null;
}

export interface DriftResult {
  readonly session_id: string;
  readonly area: string;
  /** n_units as requested */
  readonly requested_units: number;
  /** Units in the area before sampling */
  readonly available_units: number;
  readonly seed: number;
  readonly test: boolean;
  /** Sampled units, ascending by activity_drift then unit_id */
  readonly units: readonly DriftUnit[];
  readonly summary: DriftSummary;
}

function byUnitId(a: { unit_id: string }, b: { unit_id: string }): number {
  return a.unit_id < b.unit_id ? -1 : a.unit_id > b.unit_id ? 1 : 0;
}

function byDrift(a: DriftUnit, b: DriftUnit): number {
  return a.activity_drift - b.activity_drift || byUnitId(a, b);
}

/**
 * Summary statistics over drift values; null stats for an empty sample.
 */
export function summarizeDrift(values: readonly number[]): DriftSummary {
  if (values.length === 0) {
    return { count: 0, mean: null, median: null, min: null, max: null };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];

  return {
    count: sorted.length,
    mean: sorted.reduce((sum, v) => sum + v, 0) / sorted.length,
    median,
    min: sorted[0],
    max: sorted[sorted.length - 1],
  };
}

/**
 * Effective sample size after applying test mode.
 */
export function effectiveSampleSize(params: Pick<CapsuleParameters, "n_units" | "test">): number {
  return params.test ? Math.min(params.n_units, TEST_MODE_UNIT_LIMIT) : params.n_units;
}

/**
 * Run the drift analysis for one parameter set.
 *
 * Candidates are ordered by unit_id before sampling so the result does
 * not depend on row order in the asset.
 *
 * @throws AnalysisError if the area holds fewer units than requested
 */
export function analyzeActivityDrift(
  units: readonly UnitRecord[],
  params: Readonly<CapsuleParameters>
): DriftResult {
  const candidates = units
    .filter((unit) => unit.session_id === params.session_id && unit.structure === params.area)
    .sort(byUnitId);

  const sampleSize = effectiveSampleSize(params);
  if (sampleSize > candidates.length) {
    throw new AnalysisError(
      `Requested ${sampleSize} units but only ${candidates.length} available ` +
        `in area "${params.area}" of session "${params.session_id}"`
    );
  }

  const seed = deriveSeed(params);
  const sampled = sampleWithoutReplacement(candidates, sampleSize, createRng(seed))
    .map((unit): DriftUnit => ({
      unit_id: unit.unit_id,
      location: unit.location,
      activity_drift: unit.activity_drift,
    }))
    .sort(byDrift);

  return {
    session_id: params.session_id,
    area: params.area,
    requested_units: params.n_units,
    available_units: candidates.length,
    seed,
    test: params.test,
    units: sampled,
    summary: summarizeDrift(sampled.map((unit) => unit.activity_drift)),
  };
}
