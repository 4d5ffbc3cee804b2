/**
 * energy-price-sync: daily price fetch and publish pipeline
 *
 * Runs the price fetch task and commits any change under the output
 * directory back to the repository.
 */

import "dotenv/config";
import { ChildProcessRunner } from "./src/adapters/ChildProcessRunner";
import { runCli } from "./src/cli";
import { loadPipelineConfig } from "./src/config/pipeline";
import { initDatabase } from "./src/db/database";

// Global error handlers to prevent silent crashes
process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled Rejection at:", promise, "reason:", reason);
  process.exit(1);
});

process.on("uncaughtException", (error) => {
  console.error("Uncaught Exception:", error);
  process.exit(1);
});

async function main(): Promise<number> {
  console.log("=".repeat(60));
  console.log("energy-price-sync");
  console.log("=".repeat(60));

  return runCli(process.argv.slice(2), {
    config: loadPipelineConfig(),
    runner: new ChildProcessRunner(),
    cwd: process.cwd(),
    openDatabase: initDatabase,
  });
}

main()
  .then((code) => {
    if (code !== 0) {
      process.exit(code);
    }
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
