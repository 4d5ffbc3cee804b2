/**
 * Price source configurations
 */

import { z } from "zod";
import { ConfigError } from "./pipeline";

export type SeriesId = "electricity" | "gas";

export interface SeriesConfig {
  name: string;
  provider: string;
  endpoint: string;
  timeoutMs: number;
  batchDays: number;
  // pause between batches
  batchDelayMs: number;
  // EUR per unit, incl. 21% VAT
  procurementCosts: number;
}

export const VAT_MULTIPLIER = 1.21;

export const seriesConfigs: Record<SeriesId, SeriesConfig> = {
  electricity: {
    name: "Electricity",
    provider: "EnergyZero",
    endpoint: "https://api.energyzero.nl/v1/energyprices",
    timeoutMs: 30_000,
    batchDays: 90,
    batchDelayMs: 500,
    procurementCosts: 0.04 * VAT_MULTIPLIER,
  },
  gas: {
    name: "Gas",
    provider: "ANWB",
    endpoint: "https://api.anwb.nl/energy/energy-services/v2/tarieven/gas",
    timeoutMs: 60_000,
    batchDays: 90,
    batchDelayMs: 500,
    procurementCosts: 0.05911 * VAT_MULTIPLIER,
  },
};

export const CBS_CONFIG = {
  endpoint: "https://opendata.cbs.nl/ODataApi/odata/85592NED/TypedDataSet",
  timeoutMs: 30_000,
  // "Btw" dimension key for prices including VAT
  vatIncludedKey: "A048944",
} as const;

/**
 * Get series configuration by id
 */
export function getSeriesConfig(seriesId: SeriesId): SeriesConfig {
  const config = seriesConfigs[seriesId];
  if (!config) {
    throw new ConfigError(`Unknown price series: ${seriesId}`);
  }
  return config;
}

export interface FetchConfig {
  outputDir: string;
  startDate: Date;
  dbPath: string | null;
}

// 2021-02-30 would otherwise roll over into March
function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
}

const fetchEnvSchema = z.object({
  OUTPUT_DIR: z.string().min(1).default("output"),
  PRICE_START_DATE: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .refine(isCalendarDate, "not a calendar date")
    .default("2021-01-01"),
  PRICE_DB_PATH: z.string().optional(),
});

/**
 * Build the fetch task configuration from environment variables.
 * An empty PRICE_DB_PATH disables the price cache.
 */
export function loadFetchConfig(env: NodeJS.ProcessEnv = process.env): FetchConfig {
  const parsed = fetchEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid fetch configuration:\n  ${issues.join("\n  ")}`);
  }

  const vars = parsed.data;
  const dbPath = vars.PRICE_DB_PATH === undefined ? "./data/energy_prices.db" : vars.PRICE_DB_PATH.trim();
  return {
    outputDir: vars.OUTPUT_DIR,
    startDate: new Date(`${vars.PRICE_START_DATE}T00:00:00.000Z`),
    dbPath: dbPath === "" ? null : dbPath,
  };
}
