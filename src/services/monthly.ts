/**
 * Monthly aggregation of price series and the CBS comparison table
 */

import type { SeriesId } from "../config/sources";
import { toMonthKey } from "../utils/dates";
import type { CbsRate, PricePoint } from "./types";

export interface MonthlyAverage {
  month: string; // YYYY-MM
  price: number;
}

export interface MonthlyPriceRow {
  month: string;
  base_price: number;
  energy_tax: number;
  procurement_costs: number;
  total_price: number;
}

export interface ComparisonRow {
  DATE: string;
  "CBS stroom": number | null;
  "CBS gas": number | null;
  "ANWB stroom": number | null;
  "ANWB gas": number | null;
}

export const MONTHLY_COLUMNS = ["month", "base_price", "energy_tax", "procurement_costs", "total_price"] as const;
export const COMPARISON_COLUMNS = ["DATE", "CBS stroom", "CBS gas", "ANWB stroom", "ANWB gas"] as const;

const MONTH_ABBREVIATIONS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

// toFixed rounds the exact binary value, so 3.412775 becomes 3.41277
export function round5(value: number): number {
  return Number(value.toFixed(5));
}

/**
 * Mean price per UTC calendar month, ordered by month
 */
export function monthlyAverages(points: readonly PricePoint[]): MonthlyAverage[] {
  const buckets = new Map<string, { sum: number; count: number }>();
  for (const point of points) {
    const month = toMonthKey(point.time);
    const bucket = buckets.get(month) ?? { sum: 0, count: 0 };
    bucket.sum += point.price;
    bucket.count += 1;
    buckets.set(month, bucket);
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([month, { sum, count }]) => ({ month, price: sum / count }));
}

/**
 * Combine monthly base prices with CBS energy tax and procurement costs.
 * Months without a matching CBS period or tax value are skipped.
 */
export function buildMonthlyRows(
  monthly: readonly MonthlyAverage[],
  cbsRates: readonly CbsRate[],
  procurementCosts: number,
  series: SeriesId
): MonthlyPriceRow[] {
  const byPeriod = new Map(cbsRates.map((rate) => [rate.period, rate]));
  const rows: MonthlyPriceRow[] = [];

  for (const { month, price } of monthly) {
    const cbs = byPeriod.get(month);
    if (!cbs) {
      console.warn(`  ⚠️ No CBS data for ${month}, skipping`);
      continue;
    }

    const energyTax = series === "electricity" ? cbs.energyTax : cbs.gasEnergyTax;
    if (energyTax === undefined) {
      console.warn(`  ⚠️ No ${series} energy tax for ${month}, skipping`);
      continue;
    }

    rows.push({
      month,
      base_price: round5(price),
      energy_tax: round5(energyTax),
      procurement_costs: round5(procurementCosts),
      total_price: round5(price + energyTax + procurementCosts),
    });
  }

  return rows;
}

/**
 * YYYY-MM → Jan-21
 */
export function formatMonthLabel(month: string): string {
  const match = /^(\d{4})-(\d{2})$/.exec(month);
  const index = match ? Number(match[2]) - 1 : -1;
  if (!match || index < 0 || index > 11) {
    return month;
  }
  return `${MONTH_ABBREVIATIONS[index]}-${match[1].slice(2)}`;
}

/**
 * Outer join of CBS totals and computed monthly totals, ordered by month
 */
export function buildComparison(
  cbsRates: readonly CbsRate[],
  electricity: readonly MonthlyPriceRow[],
  gas: readonly MonthlyPriceRow[]
): ComparisonRow[] {
  const rows = new Map<string, ComparisonRow>();
  const rowFor = (month: string): ComparisonRow => {
    let row = rows.get(month);
    if (!row) {
      row = { DATE: month, "CBS stroom": null, "CBS gas": null, "ANWB stroom": null, "ANWB gas": null };
      rows.set(month, row);
    }
    return row;
  };

  for (const rate of cbsRates) {
    const row = rowFor(rate.period);
    row["CBS stroom"] = rate.total ?? null;
    row["CBS gas"] = rate.gasTotal ?? null;
  }
  for (const entry of electricity) {
    rowFor(entry.month)["ANWB stroom"] = entry.total_price;
  }
  for (const entry of gas) {
    rowFor(entry.month)["ANWB gas"] = entry.total_price;
  }

  return [...rows.values()]
    .sort((a, b) => a.DATE.localeCompare(b.DATE))
    .map((row) => ({ ...row, DATE: formatMonthLabel(row.DATE) }));
}
