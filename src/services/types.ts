/**
 * Shared price data types
 */

export interface PricePoint {
  // UTC, normalised with Date#toISOString so rows sort as strings
  time: string;
  price: number;
}

export interface CbsRate {
  period: string; // YYYY-MM
  baseRate?: number;
  energyTax?: number;
  total?: number;
  gasBaseRate?: number;
  gasEnergyTax?: number;
  gasTotal?: number;
}

export class PayloadError extends Error {
  constructor(public readonly source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "PayloadError";
  }
}
