/**
 * Dynamic gas prices from the ANWB energy API
 *
 * The API returns hourly all-in prices in cents; gas tariffs change once a
 * day, so only the first price of each UTC day is kept.
 */

import { z } from "zod";
import { getSeriesConfig } from "../config/sources";
import type { IHttpClient } from "../interfaces/IHttpClient";
import { formatApiTimestamp, normaliseTimestamp, splitIntoBatches, toDayKey } from "../utils/dates";
import { sleep } from "../utils/retry";
import type { FetchSeriesOptions } from "./electricity";
import { type PricePoint, PayloadError } from "./types";

const anwbResponseSchema = z.object({
  data: z.array(
    z
      .object({
        date: z.string(),
        values: z
          .object({
            allInPrijs: z.number().nullish(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
  ),
});

/**
 * Reduce an ANWB response to one price per UTC day, in euros
 */
export function parseDailyGasPrices(payload: unknown): Map<string, PricePoint> {
  const parsed = anwbResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PayloadError("ANWB", "no 'data' field found in the API response");
  }

  const daily = new Map<string, PricePoint>();
  for (const item of parsed.data.data) {
    const time = normaliseTimestamp(item.date);
    if (time === null) {
      continue;
    }
    const dayKey = toDayKey(time);
    if (daily.has(dayKey)) {
      continue;
    }
    const cents = item.values?.allInPrijs;
    if (cents === null || cents === undefined) {
      continue;
    }
    daily.set(dayKey, { time, price: cents / 100 });
  }
  return daily;
}

/**
 * Fetch one batch of gas prices
 */
export async function fetchAnwbGasBatch(http: IHttpClient, start: Date, end: Date): Promise<Map<string, PricePoint>> {
  const config = getSeriesConfig("gas");
  const payload = await http.getJson(config.endpoint, {
    params: {
      startDate: formatApiTimestamp(start),
      endDate: formatApiTimestamp(end),
      interval: "HOUR",
    },
    timeoutMs: config.timeoutMs,
  });
  return parseDailyGasPrices(payload);
}

/**
 * Fetch daily gas prices between two dates. A failing batch is logged and
 * skipped; later batches overwrite days seen in earlier ones.
 */
export async function fetchGasPrices(http: IHttpClient, options: FetchSeriesOptions): Promise<PricePoint[]> {
  const config = getSeriesConfig("gas");
  const batches = splitIntoBatches(options.start, options.end, config.batchDays);
  const delayMs = options.batchDelayMs ?? config.batchDelayMs;

  console.log(`Fetching ${config.name.toLowerCase()} prices from ${config.provider}: ${options.start.toISOString().slice(0, 10)} → ${options.end.toISOString().slice(0, 10)} (${batches.length} batches)`);

  const allDays = new Map<string, PricePoint>();
  for (const [index, batch] of batches.entries()) {
    try {
      const daily = await fetchAnwbGasBatch(http, batch.start, batch.end);
      for (const [day, point] of daily) {
        allDays.set(day, point);
      }
      console.log(`  Batch ${index + 1}/${batches.length}: ${daily.size} days`);
    } catch (error) {
      console.error(`  ❌ Batch ${index + 1}/${batches.length} failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (index < batches.length - 1 && delayMs > 0) {
      await sleep(delayMs);
    }
  }

  return [...allDays.values()].sort((a, b) => a.time.localeCompare(b.time));
}
