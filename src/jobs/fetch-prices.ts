import { join } from "path";
import { getSeriesConfig, type SeriesId } from "../config/sources";
import type { Database } from "../db/database";
import { getLastPriceSyncedAt, loadPricePoints, savePricePoints, updateLastPriceSyncedAt } from "../db/prices";
import type { IHttpClient } from "../interfaces/IHttpClient";
import { fetchCbsRates } from "../services/cbs";
import { analyzeCompleteness, logCompletenessReport } from "../services/completeness";
import { checkMonthConsistency, logMonthConsistency } from "../services/consistency";
import { writeCsv } from "../services/csv";
import { fetchElectricityPrices, type FetchSeriesOptions } from "../services/electricity";
import { fetchGasPrices } from "../services/gas";
import {
  buildComparison,
  buildMonthlyRows,
  COMPARISON_COLUMNS,
  MONTHLY_COLUMNS,
  monthlyAverages,
} from "../services/monthly";
import type { PricePoint } from "../services/types";
import { addDays, startOfUtcDay } from "../utils/dates";

/**
 * Price Fetch Job
 *
 * Fetches CBS tariffs and dynamic electricity and gas prices, reduces them
 * to monthly averages and writes the published CSV tables.
 * Run by the pipeline as its task, or manually via `npm run fetch-prices`.
 */

export const OUTPUT_FILES = {
  electricity: "monthly_electricity_prices.csv",
  gas: "monthly_gas_prices.csv",
  comparison: "compare_prices.csv",
} as const;

export interface FetchPricesContext {
  http: IHttpClient;
  // price cache; null fetches the full history every run
  db: Database.Database | null;
  now?: () => Date;
}

export interface FetchPricesJobConfig {
  outputDir: string;
  startDate: Date;
  syncOverlapDays?: number;
  batchDelayMs?: number;
  retryDelayMs?: number;
}

export interface FetchPricesResult {
  cbsMonths: number;
  electricityPoints: number;
  gasPoints: number;
  files: string[];
}

type SeriesFetcher = (http: IHttpClient, options: FetchSeriesOptions) => Promise<PricePoint[]>;

const fetchers: Record<SeriesId, SeriesFetcher> = {
  electricity: fetchElectricityPrices,
  gas: fetchGasPrices,
};

async function loadSeries(
  context: FetchPricesContext,
  series: SeriesId,
  range: { start: Date; end: Date },
  config: FetchPricesJobConfig
): Promise<PricePoint[]> {
  const { http, db } = context;
  const fetcher = fetchers[series];
  const options = { batchDelayMs: config.batchDelayMs, retryDelayMs: config.retryDelayMs };

  if (!db) {
    return fetcher(http, { ...options, start: range.start, end: range.end });
  }

  const lastSynced = getLastPriceSyncedAt(db, series);
  let fetchStart = range.start;
  if (lastSynced) {
    // day-aligned so daily series see each day from its first hour
    const resume = startOfUtcDay(addDays(lastSynced, -(config.syncOverlapDays ?? 2)));
    if (resume > fetchStart) {
      fetchStart = resume;
    }
    console.log(`  Resuming ${series} from ${fetchStart.toISOString().slice(0, 10)} (last synced ${lastSynced.toISOString()})`);
  }

  const fetched = await fetcher(http, { ...options, start: fetchStart, end: range.end });
  savePricePoints(db, series, fetched);
  const newest = fetched[fetched.length - 1];
  if (newest) {
    updateLastPriceSyncedAt(db, series, new Date(newest.time));
  }

  return loadPricePoints(db, series, range.start);
}

export async function runFetchPricesJob(
  context: FetchPricesContext,
  config: FetchPricesJobConfig
): Promise<FetchPricesResult> {
  const now = context.now?.() ?? new Date();
  const { outputDir, startDate } = config;

  console.log(`\n⚡ Starting price fetch from ${startDate.toISOString().slice(0, 10)}`);
  console.log(`   Output: ${outputDir}`);
  console.log(`   Cache: ${context.db ? "enabled" : "disabled"}\n`);

  console.log("Fetching CBS tariffs...");
  const cbsRates = await fetchCbsRates(context.http);
  console.log(`  ✓ ${cbsRates.length} CBS months`);

  // day-ahead prices are published for tomorrow
  const electricity = await loadSeries(context, "electricity", { start: startDate, end: addDays(now, 1) }, config);
  if (electricity.length === 0) {
    throw new Error("No electricity prices found");
  }
  console.log(`  ✓ ${electricity.length} electricity prices`);

  const gas = await loadSeries(context, "gas", { start: startDate, end: now }, config);
  if (gas.length === 0) {
    throw new Error("No gas prices found");
  }
  console.log(`  ✓ ${gas.length} gas prices`);

  console.log("\nAnalyzing electricity completeness...");
  logCompletenessReport(analyzeCompleteness(electricity));

  const electricityRows = buildMonthlyRows(
    monthlyAverages(electricity),
    cbsRates,
    getSeriesConfig("electricity").procurementCosts,
    "electricity"
  );
  const gasRows = buildMonthlyRows(monthlyAverages(gas), cbsRates, getSeriesConfig("gas").procurementCosts, "gas");

  logMonthConsistency(
    checkMonthConsistency(
      electricityRows.map((row) => row.month),
      gasRows.map((row) => row.month)
    )
  );

  const electricityPath = join(outputDir, OUTPUT_FILES.electricity);
  const gasPath = join(outputDir, OUTPUT_FILES.gas);
  const comparisonPath = join(outputDir, OUTPUT_FILES.comparison);

  await writeCsv(electricityPath, MONTHLY_COLUMNS, electricityRows);
  await writeCsv(gasPath, MONTHLY_COLUMNS, gasRows);
  await writeCsv(comparisonPath, COMPARISON_COLUMNS, buildComparison(cbsRates, electricityRows, gasRows), {
    decimals: 4,
  });

  console.log(`\n✅ Price fetch complete`);
  console.log(`   ${electricityRows.length} electricity months → ${electricityPath}`);
  console.log(`   ${gasRows.length} gas months → ${gasPath}`);
  console.log(`   Comparison → ${comparisonPath}\n`);

  return {
    cbsMonths: cbsRates.length,
    electricityPoints: electricity.length,
    gasPoints: gas.length,
    files: [electricityPath, gasPath, comparisonPath],
  };
}
