/**
 * CSV serialisation for the published tables
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";

export type CsvValue = string | number | null | undefined;

export interface CsvOptions {
  // fixed decimals for numbers; default prints the shortest round-trip form
  decimals?: number;
}

export function formatCsvNumber(value: number, options: CsvOptions = {}): string {
  if (!Number.isFinite(value)) {
    return "";
  }
  if (options.decimals !== undefined) {
    return value.toFixed(options.decimals);
  }
  // floats keep a decimal point, as in the historical files
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function escapeCell(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function toCsv<K extends string>(
  columns: readonly K[],
  rows: readonly { [P in K]: CsvValue }[],
  options: CsvOptions = {}
): string {
  const lines = [columns.map(escapeCell).join(",")];
  for (const row of rows) {
    const cells = columns.map((column) => {
      const value = row[column];
      if (value === null || value === undefined) {
        return "";
      }
      return escapeCell(typeof value === "number" ? formatCsvNumber(value, options) : value);
    });
    lines.push(cells.join(","));
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Write a CSV file, creating its directory if needed
 */
export async function writeCsv<K extends string>(
  path: string,
  columns: readonly K[],
  rows: readonly { [P in K]: CsvValue }[],
  options: CsvOptions = {}
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, toCsv(columns, rows, options), "utf8");
}
