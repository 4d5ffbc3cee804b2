/**
 * CBS consumer tariffs (StatLine table 85592NED)
 *
 * Monthly average variable supply tariffs and energy tax for electricity
 * and gas, including VAT.
 */

import { z } from "zod";
import { CBS_CONFIG } from "../config/sources";
import type { IHttpClient } from "../interfaces/IHttpClient";
import { type CbsRate, PayloadError } from "./types";

const numeric = z.union([z.number(), z.string()]).nullish();

const cbsRowSchema = z
  .object({
    Btw: z.string().nullish(),
    Perioden: z.string().nullish(),
    VariabelLeveringstariefContractprijs_3: numeric,
    Energiebelasting_6: numeric,
    VariabelLeveringstariefContractprijs_9: numeric,
    Energiebelasting_12: numeric,
  })
  .passthrough();

const cbsResponseSchema = z.object({
  value: z.array(cbsRowSchema).default([]),
});


// Monthly periods look like 2023MM07; yearly ones use JJ00
const MONTHLY_PERIOD = /^(\d{4})MM(\d{2})$/;

function toNumber(value: number | string): number | null {
  const parsed = typeof value === "number" ? value : Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Read a base/tax pair. Returns null when either side is absent,
 * throws when a present value is not numeric.
 */
function readPair(base: unknown, tax: unknown): [number, number] | null {
  if (base === null || base === undefined || tax === null || tax === undefined) {
    return null;
  }
  if ((typeof base !== "number" && typeof base !== "string") || (typeof tax !== "number" && typeof tax !== "string")) {
    throw new TypeError("unexpected tariff type");
  }
  const baseRate = toNumber(base);
  const energyTax = toNumber(tax);
  if (baseRate === null || energyTax === null) {
    throw new TypeError(`non-numeric tariff: ${base} / ${tax}`);
  }
  return [baseRate, energyTax];
}

/**
 * Turn a TypedDataSet response into monthly rates sorted by period
 */
export function parseCbsRates(payload: unknown): CbsRate[] {
  const parsed = cbsResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PayloadError("CBS", `unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
  }

  const rates: CbsRate[] = [];

  for (const row of parsed.data.value) {
    if (row.Btw?.trim() !== CBS_CONFIG.vatIncludedKey || !row.Perioden) {
      continue;
    }
    const match = MONTHLY_PERIOD.exec(row.Perioden.trim());
    if (!match) {
      continue;
    }

    try {
      const rate: CbsRate = { period: `${match[1]}-${match[2]}` };

      const electricity = readPair(row.VariabelLeveringstariefContractprijs_9, row.Energiebelasting_12);
      if (electricity) {
        const [baseRate, energyTax] = electricity;
        rate.baseRate = baseRate;
        rate.energyTax = energyTax;
        rate.total = baseRate + energyTax;
      }

      const gas = readPair(row.VariabelLeveringstariefContractprijs_3, row.Energiebelasting_6);
      if (gas) {
        const [gasBaseRate, gasEnergyTax] = gas;
        rate.gasBaseRate = gasBaseRate;
        rate.gasEnergyTax = gasEnergyTax;
        rate.gasTotal = gasBaseRate + gasEnergyTax;
      }

      if (electricity || gas) {
        rates.push(rate);
      }
    } catch (error) {
      // A malformed row only loses that month
      console.warn(`  ⚠️ Skipping CBS row ${row.Perioden}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  rates.sort((a, b) => a.period.localeCompare(b.period));
  return rates;
}

/**
 * Fetch CBS electricity and gas tariffs per month
 */
export async function fetchCbsRates(http: IHttpClient): Promise<CbsRate[]> {
  const payload = await http.getJson(CBS_CONFIG.endpoint, { timeoutMs: CBS_CONFIG.timeoutMs });
  return parseCbsRates(payload);
}
