import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildComparison, buildMonthlyRows, formatMonthLabel, monthlyAverages, round5, type MonthlyPriceRow } from "./monthly";

describe("monthlyAverages", () => {
  it("averages per UTC month in month order", () => {
    const averages = monthlyAverages([
      { time: "2024-02-01T00:00:00.000Z", price: 1 },
      { time: "2024-01-01T00:00:00.000Z", price: 0.25 },
      { time: "2024-01-31T23:00:00.000Z", price: 0.75 },
    ]);
    expect(averages).toEqual([
      { month: "2024-01", price: 0.5 },
      { month: "2024-02", price: 1 },
    ]);
  });

  it("returns nothing for no points", () => {
    expect(monthlyAverages([])).toEqual([]);
  });
});

describe("round5", () => {
  it("rounds to five decimals", () => {
    expect(round5(0.123456789)).toBe(0.12346);
    expect(round5(2)).toBe(2);
  });

  it("rounds the stored binary value, not the decimal literal", () => {
    expect(round5(3.412775)).toBe(3.41277);
    expect(round5(-0.000005)).toBe(-0.00001);
  });
});

describe("buildMonthlyRows", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const rates = [
    { period: "2024-01", energyTax: 0.125, gasEnergyTax: 0.5 },
    { period: "2024-02", gasEnergyTax: 0.5 },
  ];

  it("adds the series' energy tax and procurement costs", () => {
    const monthly = [{ month: "2024-01", price: 0.5 }];

    expect(buildMonthlyRows(monthly, rates, 0.25, "electricity")).toEqual([
      { month: "2024-01", base_price: 0.5, energy_tax: 0.125, procurement_costs: 0.25, total_price: 0.875 },
    ]);
    expect(buildMonthlyRows(monthly, rates, 0.25, "gas")).toEqual([
      { month: "2024-01", base_price: 0.5, energy_tax: 0.5, procurement_costs: 0.25, total_price: 1.25 },
    ]);
  });

  it("skips months without CBS data or tax", () => {
    const monthly = [
      { month: "2023-12", price: 0.5 },
      { month: "2024-02", price: 0.5 },
    ];

    expect(buildMonthlyRows(monthly, rates, 0.25, "electricity")).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith("  ⚠️ No CBS data for 2023-12, skipping");
    expect(console.warn).toHaveBeenCalledWith("  ⚠️ No electricity energy tax for 2024-02, skipping");
  });
});

describe("formatMonthLabel", () => {
  it.each([
    ["2021-01", "Jan-21"],
    ["2024-12", "Dec-24"],
    ["2024-13", "2024-13"],
    ["Jan-21", "Jan-21"],
  ])("%s → %s", (month, label) => {
    expect(formatMonthLabel(month)).toBe(label);
  });
});

describe("buildComparison", () => {
  const row = (month: string, total: number): MonthlyPriceRow => ({
    month,
    base_price: 0,
    energy_tax: 0,
    procurement_costs: 0,
    total_price: total,
  });

  it("outer joins CBS and computed totals by month", () => {
    const comparison = buildComparison(
      [
        { period: "2024-02", total: 0.3, gasTotal: 1.2 },
        { period: "2024-01", total: 0.28 },
      ],
      [row("2024-01", 0.875)],
      [row("2023-12", 1.5)]
    );

    expect(comparison).toEqual([
      { DATE: "Dec-23", "CBS stroom": null, "CBS gas": null, "ANWB stroom": null, "ANWB gas": 1.5 },
      { DATE: "Jan-24", "CBS stroom": 0.28, "CBS gas": null, "ANWB stroom": 0.875, "ANWB gas": null },
      { DATE: "Feb-24", "CBS stroom": 0.3, "CBS gas": 1.2, "ANWB stroom": null, "ANWB gas": null },
    ]);
  });
});
