/**
 * Hourly completeness diagnostics for the electricity series.
 * Reports gaps and duplicates without filling them.
 */

import type { PricePoint } from "./types";

const HOUR_MS = 60 * 60 * 1000;

export interface DstTransition {
  at: string; // UTC
  kind: "start" | "end";
}

export interface CompletenessReport {
  expectedHours: number;
  missingHours: string[];
  missingByMonth: { month: string; count: number }[];
  duplicates: PricePoint[];
  dstTransitions: DstTransition[];
}

/**
 * Last Sunday of a month, as a UTC date at midnight (month is 1-based)
 */
export function lastSunday(year: number, month: number): Date {
  const last = new Date(Date.UTC(year, month, 0));
  last.setUTCDate(last.getUTCDate() - last.getUTCDay());
  return last;
}

/**
 * Europe/Amsterdam switches at 01:00 UTC on the last Sunday of March and October
 */
export function dstTransitions(fromYear: number, toYear: number): DstTransition[] {
  const transitions: DstTransition[] = [];
  for (let year = fromYear; year <= toYear; year++) {
    for (const [month, kind] of [[3, "start"], [10, "end"]] as const) {
      const day = lastSunday(year, month);
      day.setUTCHours(1);
      transitions.push({ at: day.toISOString(), kind });
    }
  }
  return transitions;
}

export function analyzeCompleteness(points: readonly PricePoint[]): CompletenessReport | null {
  if (points.length === 0) {
    return null;
  }

  const counts = new Map<number, number>();
  for (const point of points) {
    const ms = new Date(point.time).getTime();
    counts.set(ms, (counts.get(ms) ?? 0) + 1);
  }

  const times = [...counts.keys()].sort((a, b) => a - b);
  const first = times[0];
  const last = times[times.length - 1];

  const missingHours: string[] = [];
  const missingByMonth = new Map<string, number>();
  let expectedHours = 0;
  for (let ms = first; ms <= last; ms += HOUR_MS) {
    expectedHours++;
    if (!counts.has(ms)) {
      const iso = new Date(ms).toISOString();
      missingHours.push(iso);
      const month = iso.slice(0, 7);
      missingByMonth.set(month, (missingByMonth.get(month) ?? 0) + 1);
    }
  }

  const duplicates = points.filter((point) => (counts.get(new Date(point.time).getTime()) ?? 0) > 1);

  return {
    expectedHours,
    missingHours,
    missingByMonth: [...missingByMonth.entries()].map(([month, count]) => ({ month, count })),
    duplicates,
    dstTransitions: dstTransitions(new Date(first).getUTCFullYear(), new Date(last).getUTCFullYear()),
  };
}

export function logCompletenessReport(report: CompletenessReport | null): void {
  if (!report) {
    console.log("No data to analyze");
    return;
  }

  if (report.missingHours.length === 0) {
    console.log(`  ✓ No missing hours in ${report.expectedHours} expected hours`);
  } else {
    console.log(`  ⚠️ ${report.missingHours.length} of ${report.expectedHours} hours missing`);
    for (const { month, count } of report.missingByMonth) {
      console.log(`    ${month}: ${count} hours missing`);
    }
    console.log("  DST transitions (an hour may legitimately be absent around these):");
    for (const transition of report.dstTransitions) {
      console.log(`    ${transition.at.slice(0, 16).replace("T", " ")} UTC (DST ${transition.kind === "start" ? "starts" : "ends"})`);
    }
    console.log("  First missing timestamps:");
    for (const iso of report.missingHours.slice(0, 10)) {
      console.log(`    ${iso.slice(0, 16).replace("T", " ")} UTC`);
    }
  }

  if (report.duplicates.length > 0) {
    console.log(`  ⚠️ ${report.duplicates.length} duplicate timestamps`);
    for (const point of report.duplicates.slice(0, 5)) {
      console.log(`    ${point.time.slice(0, 16).replace("T", " ")}: ${point.price}`);
    }
  } else {
    console.log("  ✓ No duplicate timestamps");
  }
}
