/**
 * Month label consistency between the electricity and gas tables
 */

export interface MonthConsistencyReport {
  duplicates: { electricity: string[]; gas: string[] };
  onlyInElectricity: string[];
  onlyInGas: string[];
  malformed: { electricity: string[]; gas: string[] };
  unsorted: { electricity: boolean; gas: boolean };
}

const MONTH_LABEL = /^\d{4}-(0[1-9]|1[0-2])$/;

function duplicatesOf(months: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const month of months) {
    if (seen.has(month)) {
      duplicates.add(month);
    }
    seen.add(month);
  }
  return [...duplicates];
}

function isSorted(months: readonly string[]): boolean {
  return months.every((month, i) => i === 0 || months[i - 1].localeCompare(month) <= 0);
}

export function checkMonthConsistency(
  electricity: readonly string[],
  gas: readonly string[],
  pattern: RegExp = MONTH_LABEL
): MonthConsistencyReport {
  const electricitySet = new Set(electricity);
  const gasSet = new Set(gas);

  return {
    duplicates: { electricity: duplicatesOf(electricity), gas: duplicatesOf(gas) },
    onlyInElectricity: [...electricitySet].filter((month) => !gasSet.has(month)),
    onlyInGas: [...gasSet].filter((month) => !electricitySet.has(month)),
    malformed: {
      electricity: electricity.filter((month) => !pattern.test(month)),
      gas: gas.filter((month) => !pattern.test(month)),
    },
    unsorted: { electricity: !isSorted(electricity), gas: !isSorted(gas) },
  };
}

/**
 * Log findings; returns the number of findings logged
 */
export function logMonthConsistency(report: MonthConsistencyReport): number {
  const findings: string[] = [];

  if (report.duplicates.electricity.length > 0) findings.push(`Duplicate electricity months: ${report.duplicates.electricity.join(", ")}`);
  if (report.duplicates.gas.length > 0) findings.push(`Duplicate gas months: ${report.duplicates.gas.join(", ")}`);
  if (report.onlyInElectricity.length > 0) findings.push(`Months only in electricity: ${report.onlyInElectricity.join(", ")}`);
  if (report.onlyInGas.length > 0) findings.push(`Months only in gas: ${report.onlyInGas.join(", ")}`);
  if (report.malformed.electricity.length > 0) findings.push(`Malformed electricity months: ${report.malformed.electricity.join(", ")}`);
  if (report.malformed.gas.length > 0) findings.push(`Malformed gas months: ${report.malformed.gas.join(", ")}`);
  if (report.unsorted.electricity) findings.push("Electricity months are not sorted");
  if (report.unsorted.gas) findings.push("Gas months are not sorted");

  for (const finding of findings) {
    console.warn(`  [check] ${finding}`);
  }
  return findings.length;
}
