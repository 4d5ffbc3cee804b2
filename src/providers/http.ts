/**
 * HTTP client factory for the price sources
 */

import axios from "axios";
import { AxiosAdapter } from "../adapters/AxiosAdapter";
import { CBS_CONFIG, getSeriesConfig } from "../config/sources";
import type { IHttpClient } from "../interfaces/IHttpClient";
import { addDays, formatApiTimestamp } from "../utils/dates";
import { withTimeout } from "../utils/retry";

export const USER_AGENT = "energy-price-sync/0.1";

const PROBE_TIMEOUT_MS = 15_000;

/**
 * Create the axios-backed client used by the fetch job
 */
export function createHttpClient(): IHttpClient {
  return new AxiosAdapter(
    axios.create({
      headers: {
        Accept: "application/json",
        "User-Agent": USER_AGENT,
      },
    })
  );
}

/**
 * Probe each source with a minimal request
 */
export async function testSourceConnections(http: IHttpClient, now: Date = new Date()): Promise<boolean> {
  const yesterday = addDays(now, -1);
  const electricity = getSeriesConfig("electricity");
  const gas = getSeriesConfig("gas");

  const probes: { name: string; run: () => Promise<unknown> }[] = [
    {
      name: "CBS",
      run: () => http.getJson(CBS_CONFIG.endpoint, { params: { $top: "1" }, timeoutMs: CBS_CONFIG.timeoutMs }),
    },
    {
      name: electricity.provider,
      run: () =>
        http.getJson(electricity.endpoint, {
          params: {
            fromDate: formatApiTimestamp(yesterday, "000"),
            tillDate: formatApiTimestamp(now, "999"),
            interval: "4",
            usageType: "1",
            inclBtw: "true",
          },
          timeoutMs: electricity.timeoutMs,
        }),
    },
    {
      name: gas.provider,
      run: () =>
        http.getJson(gas.endpoint, {
          params: { startDate: formatApiTimestamp(yesterday), endDate: formatApiTimestamp(now), interval: "HOUR" },
          timeoutMs: gas.timeoutMs,
        }),
    },
  ];

  let ok = true;
  for (const probe of probes) {
    try {
      await withTimeout(probe.run(), PROBE_TIMEOUT_MS, `${probe.name} probe`);
      console.log(`  ✓ ${probe.name} reachable`);
    } catch (error) {
      ok = false;
      console.error(`  ❌ ${probe.name} unreachable: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return ok;
}
