#!/usr/bin/env node
/**
 * CLI command to materialize a parameter sweep as parameters files.
 *
 * Reads a sweep definition, expands the Cartesian product of its
 * dimensions, and writes one *_input_parameters.json per combination.
 * The pipeline then fans the files out to one capsule instance each.
 *
 * Usage:
 *   npx tsx src/cli/write-parameters.ts --sweep sweep.json --out parameters/
 *   npm run write-parameters -- --sweep sweep.json --out parameters/
 *
 * Options:
 *   --sweep <path>   Sweep definition JSON (required)
 *   --out <dir>      Output directory (default: parameters)
 *   --dry-run        List the files without writing them
 *   --json           Output the report as JSON
 *   -h, --help       Show help
 *
 * Exit codes:
 *   0 - Files written (or listed, with --dry-run)
 *   1 - Invalid arguments, invalid sweep, or existing files
 */

import { parseArgs } from "node:util";

import {
  expandSweep,
  planParameterFiles,
  readSweepFile,
  SweepError,
  writeParameterFiles,
  type WrittenParameterFile,
} from "../sweep/index.js";

// ============================================================
// Types
// ============================================================

export interface WriteParametersReport {
  sweepFile: string;
  outDir: string;
  dryRun: boolean;
  count: number;
  files: Array<{ path: string; session_id: string; area: string; n_units: number }>;
}

export interface WriteParametersArgs {
  sweep?: string;
  out: string;
  dryRun: boolean;
  json: boolean;
  help: boolean;
}

const HELP = `
Usage: write-parameters --sweep <path> [options]

Options:
  --sweep <path>   Sweep definition JSON (required)
  --out <dir>      Output directory (default: parameters)
  --dry-run        List the files without writing them
  --json           Output the report as JSON
  -h, --help       Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

export function parseCliArgs(argv: readonly string[]): WriteParametersArgs {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      sweep: { type: "string" },
      out: { type: "string", default: "parameters" },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return {
    sweep: values.sweep,
    out: values.out ?? "parameters",
    dryRun: values["dry-run"] ?? false,
    json: values.json ?? false,
    help: values.help ?? false,
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printReport(report: WriteParametersReport): void {
  const verb = report.dryRun ? "Would write" : "Wrote";
  console.log("");
  console.log(c("bold", `${verb} ${report.count} parameters file(s) to ${report.outDir}`));
  for (const file of report.files) {
    console.log(`  ${c("dim", "•")} ${file.path}`);
  }
  console.log("");
}

// ============================================================
// Command
// ============================================================

/**
 * Expand the sweep and write (or plan) its parameters files.
 *
 * @throws SweepError if the sweep is invalid or a file already exists
 */
export function writeParameters(
  sweepFile: string,
  outDir: string,
  dryRun = false
): WriteParametersReport {
  const sets = expandSweep(readSweepFile(sweepFile));
  const files: WrittenParameterFile[] = dryRun
    ? planParameterFiles(sets, outDir)
    : writeParameterFiles(sets, outDir);

  return {
    sweepFile,
    outDir,
    dryRun,
    count: files.length,
    files: files.map((file) => ({
      path: file.path,
      session_id: file.parameters.session_id,
      area: file.parameters.area,
      n_units: file.parameters.n_units,
    })),
  };
}

function main(): void {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    return;
  }

  if (args.sweep === undefined) {
    console.error(c("red", "Error: --sweep is required"));
    console.log(HELP);
    process.exitCode = 1;
    return;
  }

  try {
    const report = writeParameters(args.sweep, args.out, args.dryRun);
    if (args.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }
  } catch (err) {
    if (err instanceof SweepError) {
      console.error(c("red", `✗ ${err.format()}`));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] !== undefined &&
  (process.argv[1].endsWith("write-parameters.ts") ||
   process.argv[1].endsWith("write-parameters.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exitCode = 1;
  }
}
