/**
 * Dynamic electricity prices from the EnergyZero API
 *
 * Hourly all-in market prices (incl. VAT), fetched in batches.
 */

import { getSeriesConfig } from "../config/sources";
import type { IHttpClient } from "../interfaces/IHttpClient";
import { mapWithConcurrency } from "../utils/concurrency";
import { formatApiTimestamp, normaliseTimestamp, splitIntoBatches } from "../utils/dates";
import { sleep, withRetry } from "../utils/retry";
import { type PricePoint, PayloadError } from "./types";

const TIMESTAMP_KEYS = ["readingDate", "timestamp", "datetime", "date", "time"] as const;
const PRICE_KEYS = ["price", "Price", "value", "Value"] as const;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function looksLikePriceList(value: unknown): value is unknown[] {
  if (!Array.isArray(value) || value.length === 0) {
    return false;
  }
  const first: unknown = value[0];
  return isRecord(first) && ("price" in first || "readingDate" in first);
}

/**
 * Locate the price array in an EnergyZero response. The API has shipped
 * several envelope shapes over time.
 */
export function findPriceList(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (!isRecord(payload)) {
    return [];
  }

  const data = payload.data;
  if (isRecord(data) && Array.isArray(data.Prices)) {
    return data.Prices;
  }
  if (Array.isArray(payload.Prices)) {
    return payload.Prices;
  }
  if (Array.isArray(payload.prices)) {
    return payload.prices;
  }
  if (Array.isArray(payload.result)) {
    return payload.result;
  }

  for (const value of Object.values(payload)) {
    if (looksLikePriceList(value)) {
      return value;
    }
  }
  return [];
}

/**
 * Convert raw price entries to points. Entries without a usable timestamp
 * or price are dropped; a price of 0 is kept.
 */
export function extractPricePoints(entries: readonly unknown[]): PricePoint[] {
  const points: PricePoint[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }

    const timeKey = TIMESTAMP_KEYS.find((key) => key in entry);
    const priceKey = PRICE_KEYS.find((key) => key in entry);
    if (timeKey === undefined || priceKey === undefined) {
      continue;
    }

    const rawTime = entry[timeKey];
    const rawPrice = entry[priceKey];
    if (typeof rawTime !== "string" || rawTime === "") {
      continue;
    }
    const price = typeof rawPrice === "number" ? rawPrice : typeof rawPrice === "string" ? Number(rawPrice) : NaN;
    const time = normaliseTimestamp(rawTime);
    if (time === null || !Number.isFinite(price)) {
      continue;
    }

    points.push({ time, price });
  }

  return points;
}

/**
 * Fetch one batch of hourly prices
 */
export async function fetchEnergyZeroBatch(http: IHttpClient, start: Date, end: Date): Promise<PricePoint[]> {
  const config = getSeriesConfig("electricity");
  const payload = await http.getJson(config.endpoint, {
    params: {
      fromDate: formatApiTimestamp(start, "000"),
      tillDate: formatApiTimestamp(end, "999"),
      interval: "4",
      usageType: "1",
      inclBtw: "true",
    },
    timeoutMs: config.timeoutMs,
  });

  const entries = findPriceList(payload);
  if (entries.length === 0) {
    throw new PayloadError(config.provider, "response does not contain price data in expected format");
  }
  return extractPricePoints(entries);
}

export interface FetchSeriesOptions {
  start: Date;
  end: Date;
  retries?: number;
  retryDelayMs?: number;
  // overrides the configured pause between batches
  batchDelayMs?: number;
}

/**
 * Fetch hourly electricity prices between two dates. Each batch is retried;
 * a batch that still fails aborts the fetch.
 */
export async function fetchElectricityPrices(http: IHttpClient, options: FetchSeriesOptions): Promise<PricePoint[]> {
  const config = getSeriesConfig("electricity");
  const batches = splitIntoBatches(options.start, options.end, config.batchDays);
  const delayMs = options.batchDelayMs ?? config.batchDelayMs;

  console.log(`Fetching ${config.name.toLowerCase()} prices from ${config.provider}: ${options.start.toISOString().slice(0, 10)} → ${options.end.toISOString().slice(0, 10)} (${batches.length} batches)`);

  const results = await mapWithConcurrency(batches, 1, async (batch, index) => {
    const points = await withRetry(() => fetchEnergyZeroBatch(http, batch.start, batch.end), {
      maxRetries: options.retries ?? 3,
      baseDelayMs: options.retryDelayMs ?? 1000,
      onRetry: (error, attempt, delay) =>
        console.warn(`  ⚠️ Batch ${index + 1} attempt ${attempt} failed (${error.message}), retrying in ${delay}ms`),
    });
    console.log(`  Batch ${index + 1}/${batches.length}: ${points.length} price points`);
    if (index < batches.length - 1 && delayMs > 0) {
      await sleep(delayMs);
    }
    return points;
  });

  return dedupeByTime(results.flat());
}

/**
 * Sort by time; batch boundaries overlap by one instant, keep the first occurrence
 */
export function dedupeByTime(points: readonly PricePoint[]): PricePoint[] {
  const seen = new Set<string>();
  const unique: PricePoint[] = [];
  for (const point of points) {
    if (!seen.has(point.time)) {
      seen.add(point.time);
      unique.push(point);
    }
  }
  return unique.sort((a, b) => a.time.localeCompare(b.time));
}
