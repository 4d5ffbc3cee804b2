#!/usr/bin/env tsx
/**
 * Price Fetch Script
 *
 * The task the pipeline executes. Writes the monthly price CSVs to the
 * output directory and exits non-zero on failure.
 *
 * Usage:
 *   npm run fetch-prices
 *   npm run fetch-prices -- --test      # probe the price sources only
 */

import "dotenv/config";
import { loadFetchConfig } from "../config/sources";
import { initDatabase } from "../db/database";
import { runFetchPricesJob } from "../jobs/fetch-prices";
import { createHttpClient, testSourceConnections } from "../providers/http";

async function main(): Promise<void> {
  const config = loadFetchConfig();
  const http = createHttpClient();

  if (process.argv.includes("--test")) {
    console.log("Testing price sources...");
    const ok = await testSourceConnections(http);
    if (!ok) {
      process.exitCode = 1;
    }
    return;
  }

  const db = config.dbPath ? initDatabase(config.dbPath) : null;

  try {
    await runFetchPricesJob({ http, db }, { outputDir: config.outputDir, startDate: config.startDate });
  } finally {
    db?.close();
  }
}

main().catch((error) => {
  console.error(`\n❌ Price fetch failed:`, error);
  process.exit(1);
});
