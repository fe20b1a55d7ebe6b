/**
 * Force-Plate Window Analysis CLI
 * ===============================
 *
 * Run with: npx tsx scripts/analyzeForcePlate.ts --subject NAME --mode Throwing trial1.csv
 */

import { runCli } from "../src/lib/cli/runCli";
import { describeError } from "../src/lib/errors";
import { log } from "../src/lib/logger";

runCli(process.argv.slice(2), {
  input: process.stdin,
  output: process.stdout,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.error(describeError(error));
    process.exitCode = 1;
  },
);
