/**
 * Logging Tests
 *
 * Run with: npx tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  createLogger,
  formatLogEntry,
  generateRunId,
  getRunId,
  initRunId,
  isLogLevel,
  parseLogLevel,
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

const tmpRoot = mkdtempSync(join(tmpdir(), "capsule-logging-test-"));
const AT = new Date("2024-05-01T10:00:00.000Z");

console.log("\nLogging Tests\n");

test("run ids carry the date and six hex digits", () => {
  assert.match(generateRunId(AT), /^20240501-[0-9a-f]{6}$/);
});

test("job id becomes the run id", () => {
  assert.equal(initRunId("job-7"), "job-7");
  assert.equal(getRunId(), "job-7");
});

test("entries carry timestamp, padded level, run id and prefix", () => {
  initRunId("job-7");
  assert.equal(
    formatLogEntry("info", "hello", undefined, "abc.capsule | ", AT),
    "[2024-05-01T10:00:00.000Z] [INFO ] [job-7] abc.capsule | hello"
  );
  assert.equal(
    formatLogEntry("error", "failed", { code: 2 }, "", AT),
    '[2024-05-01T10:00:00.000Z] [ERROR] [job-7] failed {"code":2}'
  );
});

test("isLogLevel accepts only the four levels", () => {
  assert.equal(isLogLevel("warn"), true);
  assert.equal(isLogLevel("warning"), false);
  assert.equal(isLogLevel("toString"), false);
});

test("parseLogLevel normalizes names and numeric levels", () => {
  assert.equal(parseLogLevel("INFO"), "info");
  assert.equal(parseLogLevel(" Warning "), "warn");
  assert.equal(parseLogLevel(10), "debug");
  assert.equal(parseLogLevel("30"), "warn");
  assert.equal(parseLogLevel(50), "error");
  assert.equal(parseLogLevel(25), undefined);
  assert.equal(parseLogLevel("verbose"), undefined);
  assert.equal(parseLogLevel(true), undefined);
});

test("file output respects level and child prefixes", () => {
  const filePath = join(tmpRoot, "logs", "run.log");
  const logger = createLogger({ level: "warn", filePath, console: false, prefix: "abc." });
  assert.ok(existsSync(join(tmpRoot, "logs")));

  const child = logger.child("capsule");
  child.info("skipped");
  child.warn("kept");
  logger.setLevel("debug");
  child.debug("now visible");

  const lines = readFileSync(filePath, "utf-8").trimEnd().split("\n");
  assert.equal(lines.length, 2);
  assert.ok(lines[0]?.endsWith("[WARN ] [job-7] abc.capsule | kept"));
  assert.ok(lines[1]?.endsWith("[DEBUG] [job-7] abc.capsule | now visible"));
});

rmSync(tmpRoot, { recursive: true, force: true });

console.log(`\nResults: ${passed} passed, ${failed} failed\n`);

if (failed > 0) {
  process.exit(1);
}
