/**
 * Configuration Tests
 *
 * Run with: npx tsx src/config/env.test.ts
 */

import { strict as assert } from "node:assert";

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvList,
} from "./env.js";
import {
  DEFAULT_DATA_ROOTS,
  isPipeline,
  jobShortId,
  loadAppConfig,
  validateConfig,
} from "./index.js";

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

console.log("\nConfiguration Tests\n");

// ═══════════════════════════════════════════════════════════════════════════
// ENV HELPERS
// ═══════════════════════════════════════════════════════════════════════════

test("optional helpers fall back to defaults", () => {
  assert.equal(optionalEnv("A", "x", {}), "x");
  assert.equal(optionalEnv("A", "x", { A: "" }), "x");
  assert.equal(maybeEnv("A", {}), undefined);
  assert.equal(maybeEnv("A", { A: "test-secret" }), "test-secret");
});

test("lists are split on commas with blanks dropped", () => {
  assert.deepEqual(optionalEnvList("L", ["d"], { L: " /a, ,/b," }), ["/a", "/b"]);
  assert.deepEqual(optionalEnvList("L", ["d"], {}), ["d"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// APP CONFIG
// ═══════════════════════════════════════════════════════════════════════════

test("defaults describe a local run", () => {
  const cfg = loadAppConfig({});
  assert.equal(cfg.env, "development");
  assert.deepEqual(cfg.dataRoots, DEFAULT_DATA_ROOTS);
  assert.equal(cfg.datacubePrefix, "datacube");
  assert.equal(cfg.parametersDir, "/data/parameters");
  assert.equal(cfg.resultsDir, "/results");
  assert.equal(cfg.jobId, undefined);
  assert.equal(isPipeline(cfg), false);
  assert.equal(jobShortId(cfg), undefined);
  assert.ok(Object.isFrozen(cfg));
});

test("batch job id switches to pipeline mode", () => {
  const cfg = loadAppConfig({ AWS_BATCH_JOB_ID: "abc123-def-456", CO_COMPUTATION_ID: "comp-1" });
  assert.equal(isPipeline(cfg), true);
  assert.equal(jobShortId(cfg), "abc123");
  assert.equal(cfg.computationId, "comp-1");
});

test("validateConfig rejects unknown environments and levels", () => {
  validateConfig(loadAppConfig({ NODE_ENV: "test", LOG_LEVEL: "debug" }));
  assert.throws(() => validateConfig(loadAppConfig({ NODE_ENV: "staging" })), ConfigError);
  assert.throws(() => validateConfig(loadAppConfig({ LOG_LEVEL: "verbose" })), {
    name: "ConfigError",
    message: "Invalid LOG_LEVEL: verbose. Must be debug, info, warn, or error.",
  });
  assert.throws(
    () => validateConfig(loadAppConfig({ DATA_ROOTS: " , " })),
    { message: "DATA_ROOTS must name at least one directory." }
  );
});

test("LOG_LEVEL spellings are normalized before validation", () => {
  const upper = loadAppConfig({ LOG_LEVEL: "INFO" });
  validateConfig(upper);
  assert.equal(upper.logLevel, "info");
  assert.equal(loadAppConfig({ LOG_LEVEL: "WARNING" }).logLevel, "warn");
  assert.equal(loadAppConfig({ LOG_LEVEL: " Debug " }).logLevel, "debug");
  assert.equal(loadAppConfig({ LOG_LEVEL: "40" }).logLevel, "error");
});

console.log(`\nResults: ${passed} passed, ${failed} failed\n`);

if (failed > 0) {
  process.exit(1);
}
