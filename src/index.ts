/**
 * Entry point for the processing capsule.
 *
 * Parameters come from the attached *_input_parameters*.json file and the
 * command line, e.g.:
 *
 *   npx tsx src/index.ts --session_id a --area VISp --n_units 5
 */

import { runCapsule } from "./capsule/index.js";

async function main(): Promise<void> {
  const { exitCode } = await runCapsule({ argv: process.argv.slice(2) });
  process.exitCode = exitCode;
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
