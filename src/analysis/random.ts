/**
 * Seeded randomness for unit sampling.
 *
 * Sampling must be reproducible: two instances given the same parameter
 * set select the same units. The seed is either supplied explicitly or
 * derived from the parameters that define the analysis.
 */

import { createHash } from "node:crypto";
import type { CapsuleParameters } from "../config/parameters/index.js";

export class AnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnalysisError";
  }
}

/** Uniform float in [0, 1). */
export type Rng = () => number;

/**
 * Create a mulberry32 generator.
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seed for a parameter set: the explicit seed when given, else the first
 * 32 bits of SHA-256 over the analysis-defining fields.
 */
export function deriveSeed(
  params: Pick<CapsuleParameters, "session_id" | "area" | "n_units" | "seed">
): number {
  if (params.seed !== undefined) {
    return params.seed;
  }
  const canonical = JSON.stringify({
    session_id: params.session_id,
    area: params.area,
    n_units: params.n_units,
  });
  return createHash("sha256").update(canonical).digest().readUInt32BE(0);
}

/**
 * Draw `n` distinct items using a partial Fisher-Yates shuffle.
 * The input is not modified.
 *
 * @throws AnalysisError if n is negative, fractional, or exceeds the population
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  n: number,
  rng: Rng
): T[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new AnalysisError(`Sample size must be a non-negative integer, got ${n}`);
  }
  if (n > items.length) {
    throw new AnalysisError(
      `Cannot sample ${n} items from a population of ${items.length}`
    );
  }

  const pool = [...items];
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(rng() * (pool.length - i));
    const picked = pool[j];
    pool[j] = pool[i];
    pool[i] = picked;
  }
  return pool.slice(0, n);
}
