const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateRange {
  start: Date;
  end: Date;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Split [start, end) into consecutive ranges of at most `days` days.
 * Each range starts where the previous one ended.
 */
export function splitIntoBatches(start: Date, end: Date, days: number): DateRange[] {
  const batches: DateRange[] = [];
  let current = start;
  while (current < end) {
    const next = addDays(current, days);
    const batchEnd = next < end ? next : end;
    batches.push({ start: current, end: batchEnd });
    current = batchEnd;
  }
  return batches;
}

/**
 * Format as YYYY-MM-DDTHH:MM:SS with a fixed millisecond suffix, as the
 * price APIs expect
 */
export function formatApiTimestamp(date: Date, millis: "000" | "999" = "000"): string {
  return `${date.toISOString().slice(0, 19)}.${millis}Z`;
}

export function toMonthKey(time: string | Date): string {
  const iso = typeof time === "string" ? new Date(time).toISOString() : time.toISOString();
  return iso.slice(0, 7);
}

export function toDayKey(time: string | Date): string {
  const iso = typeof time === "string" ? new Date(time).toISOString() : time.toISOString();
  return iso.slice(0, 10);
}

/**
 * Parse a timestamp and normalise it to a UTC ISO string, or null if invalid
 */
export function normaliseTimestamp(value: string): string | null {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}
