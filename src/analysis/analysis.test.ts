/**
 * Drift Analysis Tests
 *
 * Run with: npx tsx src/analysis/analysis.test.ts
 */

import { strict as assert } from "node:assert";

import { parseCapsuleParameters } from "../config/parameters/index.js";
import type { UnitRecord } from "../assets/schema.js";
import {
  AnalysisError,
  analyzeActivityDrift,
  createRng,
  deriveSeed,
  effectiveSampleSize,
  sampleWithoutReplacement,
  summarizeDrift,
  TEST_MODE_UNIT_LIMIT,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function unit(
  unit_id: string,
  activity_drift: number,
  session_id = "a",
  structure = "VISp"
): UnitRecord {
  return { unit_id, session_id, structure, location: `${structure}-${unit_id}`, activity_drift };
}

const UNITS: UnitRecord[] = [
  unit("u1", 0.3),
  unit("u2", -0.2),
  unit("u3", 0.1),
  unit("u4", 0.1),
  unit("u5", -0.9),
  unit("u6", 0.5),
  unit("u7", 0.0),
  unit("u8", 0.7),
  unit("x1", 0.4, "a", "AUDp"),
  unit("y1", 0.2, "b", "VISp"),
];

const VISP_IN_A = 8;

console.log("\nDrift Analysis Tests\n");

// ═══════════════════════════════════════════════════════════════════════════
// RANDOMNESS
// ═══════════════════════════════════════════════════════════════════════════

test("same seed gives the same stream in [0, 1)", () => {
  const a = createRng(42);
  const b = createRng(42);
  for (let i = 0; i < 100; i++) {
    const value = a();
    assert.equal(value, b());
    assert.ok(value >= 0 && value < 1);
  }
});

test("different seeds give different streams", () => {
  assert.notEqual(createRng(1)(), createRng(2)());
});

test("explicit seed is used as is", () => {
  assert.equal(deriveSeed({ session_id: "a", area: "VISp", n_units: 3, seed: 7 }), 7);
});

test("derived seed is a stable 32-bit integer", () => {
  const params = { session_id: "a", area: "VISp", n_units: 3, seed: undefined };
  const seed = deriveSeed(params);
  assert.equal(seed, deriveSeed({ ...params }));
  assert.ok(Number.isInteger(seed) && seed >= 0 && seed <= 0xffffffff);
  assert.notEqual(seed, deriveSeed({ ...params, n_units: 4 }));
});

test("sampling draws distinct items and leaves the input alone", () => {
  const items = [1, 2, 3, 4, 5, 6];
  const sample = sampleWithoutReplacement(items, 4, createRng(3));
  assert.equal(sample.length, 4);
  assert.equal(new Set(sample).size, 4);
  assert.ok(sample.every((item) => items.includes(item)));
  assert.deepEqual(items, [1, 2, 3, 4, 5, 6]);
});

test("sampling the whole population is a permutation", () => {
  const sample = sampleWithoutReplacement(["a", "b", "c"], 3, createRng(9));
  assert.deepEqual([...sample].sort(), ["a", "b", "c"]);
});

test("sampling zero items gives an empty sample", () => {
  assert.deepEqual(sampleWithoutReplacement([1, 2], 0, createRng(1)), []);
});

test("invalid sample sizes are rejected", () => {
  assert.throws(
    () => sampleWithoutReplacement([1, 2], 3, createRng(1)),
    { name: "AnalysisError", message: "Cannot sample 3 items from a population of 2" }
  );
  assert.throws(
    () => sampleWithoutReplacement([1, 2], -1, createRng(1)),
    { name: "AnalysisError", message: "Sample size must be a non-negative integer, got -1" }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

test("summary of an odd-sized sample", () => {
  assert.deepEqual(summarizeDrift([3, 1, 2]), {
    count: 3, mean: 2, median: 2, min: 1, max: 3,
  });
});

test("median of an even-sized sample averages the middle pair", () => {
  assert.equal(summarizeDrift([4, 1, 3, 2]).median, 2.5);
});

test("summary of an empty sample is all null", () => {
  assert.deepEqual(summarizeDrift([]), {
    count: 0, mean: null, median: null, min: null, max: null,
  });
});

test("test mode caps the sample size", () => {
  assert.equal(effectiveSampleSize({ n_units: 20, test: true }), TEST_MODE_UNIT_LIMIT);
  assert.equal(effectiveSampleSize({ n_units: 3, test: true }), 3);
  assert.equal(effectiveSampleSize({ n_units: 20, test: false }), 20);
});

// ═══════════════════════════════════════════════════════════════════════════
// ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════

test("whole area is ordered by drift, ties by unit id", () => {
  const params = parseCapsuleParameters({ session_id: "a", area: "VISp", n_units: VISP_IN_A });
  const result = analyzeActivityDrift(UNITS, params);
  assert.deepEqual(
    result.units.map((u) => u.unit_id),
    ["u5", "u2", "u7", "u3", "u4", "u1", "u6", "u8"]
  );
  assert.equal(result.available_units, VISP_IN_A);
  assert.equal(result.summary.min, -0.9);
  assert.equal(result.summary.max, 0.7);
  assert.equal(result.summary.median, 0.1);
});

test("sample only holds units of the session and area", () => {
  const params = parseCapsuleParameters({ session_id: "a", area: "VISp", n_units: 3 });
  const result = analyzeActivityDrift(UNITS, params);
  assert.equal(result.units.length, 3);
  assert.ok(result.units.every((u) => u.unit_id.startsWith("u")));
  for (let i = 1; i < result.units.length; i++) {
    const prev = result.units[i - 1];
    const curr = result.units[i];
    assert.ok(prev !== undefined && curr !== undefined);
    assert.ok(prev.activity_drift <= curr.activity_drift);
  }
});

test("zero units gives an empty result", () => {
  const params = parseCapsuleParameters({ session_id: "a", area: "VISp", n_units: 0 });
  const result = analyzeActivityDrift(UNITS, params);
  assert.deepEqual(result.units, []);
  assert.equal(result.summary.count, 0);
  assert.equal(result.summary.mean, null);
});

test("requesting more units than available fails", () => {
  const params = parseCapsuleParameters({ session_id: "a", area: "AUDp", n_units: 2 });
  assert.throws(() => analyzeActivityDrift(UNITS, params), (err: unknown) => {
    assert.ok(err instanceof AnalysisError);
    assert.equal(
      err.message,
      'Requested 2 units but only 1 available in area "AUDp" of session "a"'
    );
    return true;
  });
});

test("test mode samples at most the cap but reports the request", () => {
  const params = parseCapsuleParameters({
    session_id: "a", area: "VISp", n_units: VISP_IN_A, test: true,
  });
  const result = analyzeActivityDrift(UNITS, params);
  assert.equal(result.units.length, TEST_MODE_UNIT_LIMIT);
  assert.equal(result.requested_units, VISP_IN_A);
  assert.equal(result.test, true);
});

test("same parameters give the same result", () => {
  const params = parseCapsuleParameters({ session_id: "a", area: "VISp", n_units: 4 });
  assert.deepEqual(analyzeActivityDrift(UNITS, params), analyzeActivityDrift(UNITS, params));
});

test("result does not depend on row order", () => {
  const params = parseCapsuleParameters({ session_id: "a", area: "VISp", n_units: 4 });
  const reversed = [...UNITS].reverse();
  assert.deepEqual(analyzeActivityDrift(reversed, params), analyzeActivityDrift(UNITS, params));
});

test("explicit seed is recorded and input is not modified", () => {
  const before = JSON.stringify(UNITS);
  const params = parseCapsuleParameters({
    session_id: "a", area: "VISp", n_units: 4, seed: 123,
  });
  const result = analyzeActivityDrift(UNITS, params);
  assert.equal(result.seed, 123);
  assert.equal(JSON.stringify(UNITS), before);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\nResults: ${passed} passed, ${failed} failed\n`);

if (failed > 0) {
  process.exit(1);
}
