/**
 * Run Record Tests
 *
 * Run with: npx tsx src/record/record.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { parseCapsuleParameters } from "../config/parameters/index.js";
import type { DriftResult } from "../analysis/index.js";
import {
  createRunMetadata,
  createRunRecord,
  deserializeRunRecord,
  isVersionCompatible,
  loadRunRecord,
  RECORD_VERSION,
  RunRecordError,
  saveRunRecord,
  serializeRunRecord,
  summarizeRunRecord,
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

function recordError(fn: () => unknown): RunRecordError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RunRecordError) return err;
    throw err;
  }
  throw new Error("expected RunRecordError");
}

const STARTED = new Date("2024-05-01T10:00:00.000Z");
const FINISHED = new Date("2024-05-01T10:00:05.000Z");

function makeResult(): DriftResult {
  return {
    session_id: "a",
    area: "VISp",
    requested_units: 1,
    available_units: 4,
    seed: 11,
    test: false,
    units: [{ unit_id: "u1", location: "VISp-1", activity_drift: 0.5 }],
    summary: { count: 1, mean: 0.5, median: 0.5, min: 0.5, max: 0.5 },
  };
}

function makeRecord() {
  return createRunRecord({
    runMetadata: createRunMetadata({
      runId: "20240501-abc123",
      startedAt: STARTED,
      finishedAt: FINISHED,
      captureHostname: false,
    }),
    parameters: parseCapsuleParameters({ session_id: "a", area: "VISp", n_units: 1 }),
    result: makeResult(),
    reportFile: "/results/outputs/a.html",
  });
}

const tmpRoot = mkdtempSync(join(tmpdir(), "capsule-record-test-"));

console.log("\nRun Record Tests\n");

// ═══════════════════════════════════════════════════════════════════════════
// METADATA
// ═══════════════════════════════════════════════════════════════════════════

test("local metadata has no pipeline fields", () => {
  const meta = createRunMetadata({ runId: "r1", startedAt: STARTED, captureHostname: false });
  assert.deepEqual(meta, {
    runId: "r1",
    startedAt: "2024-05-01T10:00:00.000Z",
    pipeline: false,
  });
});

test("job id marks pipeline metadata", () => {
  const meta = createRunMetadata({
    runId: "job-1",
    jobId: "job-1",
    computationId: "comp-1",
    parametersFile: "/data/parameters/00_a_VISp_1_input_parameters.json",
    captureHostname: false,
  });
  assert.equal(meta.pipeline, true);
  assert.equal(meta.jobId, "job-1");
  assert.equal(meta.computationId, "comp-1");
  assert.equal(meta.parametersFile, "/data/parameters/00_a_VISp_1_input_parameters.json");
});

test("hostname is captured by default", () => {
  assert.equal(typeof createRunMetadata({ runId: "r1" }).hostname, "string");
});

// ═══════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════

test("records are versioned and deeply frozen", () => {
  const record = makeRecord();
  assert.equal(record.recordVersion, RECORD_VERSION);
  assert.ok(Object.isFrozen(record));
  assert.ok(Object.isFrozen(record.runMetadata));
  assert.ok(Object.isFrozen(record.result.units));
});

test("serialized records deserialize to the same value", () => {
  const record = makeRecord();
  assert.deepEqual(deserializeRunRecord(serializeRunRecord(record)), record);
  assert.equal(serializeRunRecord(record, false).includes("\n"), false);
});

test("malformed JSON is rejected", () => {
  const err = recordError(() => deserializeRunRecord("{"));
  assert.ok(err.message.startsWith("Failed to parse run record JSON"));
});

test("invalid structure is rejected with paths", () => {
  const json = JSON.stringify({ ...makeRecord(), reportFile: "" });
  const err = recordError(() => deserializeRunRecord(json));
  assert.equal(
    err.message,
    "Invalid run record format: reportFile: String must contain at least 1 character(s)"
  );
});

test("other major versions are rejected", () => {
  assert.equal(isVersionCompatible("1.4.2"), true);
  assert.equal(isVersionCompatible("2.0.0"), false);
  const json = JSON.stringify({ ...makeRecord(), recordVersion: "2.0.0" });
  const err = recordError(() => deserializeRunRecord(json));
  assert.equal(err.message, `Incompatible run record version: 2.0.0 (current: ${RECORD_VERSION})`);
});

test("saved records load back", () => {
  const filePath = join(tmpRoot, "nested", "a.json");
  const record = makeRecord();
  assert.equal(saveRunRecord(record, filePath), filePath);
  assert.ok(readFileSync(filePath, "utf-8").endsWith("}\n"));
  assert.deepEqual(loadRunRecord(filePath), record);
});

test("loading a missing file fails", () => {
  assert.throws(() => loadRunRecord(join(tmpRoot, "absent.json")), RunRecordError);
});

test("summary names the sample and the report", () => {
  const lines = summarizeRunRecord(makeRecord()).split("\n");
  assert.equal(lines[0], "=== Capsule Run ===");
  assert.ok(lines.includes("Run ID: 20240501-abc123"));
  assert.ok(lines.includes("Finished: 2024-05-01T10:00:05.000Z"));
  assert.ok(lines.includes("Units sampled: 1 of 4"));
  assert.ok(lines.includes("Mean drift: 0.5000"));
  assert.ok(lines.includes("Report: /results/outputs/a.html"));
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(tmpRoot, { recursive: true, force: true });

console.log(`\nResults: ${passed} passed, ${failed} failed\n`);

if (failed > 0) {
  process.exit(1);
}
