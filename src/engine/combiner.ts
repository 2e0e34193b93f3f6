import { AmortizationTable } from "../models/AmortizationTable";
import { AMOUNT_FIELDS, AmountField, ScheduleEntry } from "../models/ScheduleEntry";
import { LoanSlice } from "./loanSlice";

type Accumulator = Record<AmountField, number>;

function emptyAccumulator(): Accumulator {
  return {
    totalPayment: 0,
    principal: 0,
    interest: 0,
    extraPayment: 0,
    remainingBalance: 0,
  };
}

/**
 * Sums several amortization tables period by period.
 * Order of the inputs does not matter. The result covers the union of all
 * input periods, sorted ascending; a table contributes nothing to periods it
 * does not contain.
 *
 * @param tables - Tables to combine
 * @returns Combined table (empty when no tables are given)
 */
export function combineTables(tables: readonly AmortizationTable[]): AmortizationTable {
  const byPeriod = new Map<number, Accumulator>();

  for (const table of tables) {
    for (const entry of table.entries) {
      let accumulator = byPeriod.get(entry.period);
      if (!accumulator) {
        accumulator = emptyAccumulator();
        byPeriod.set(entry.period, accumulator);
      }
      for (const field of AMOUNT_FIELDS) {
        accumulator[field] += entry[field];
      }
    }
  }

  const combined: ScheduleEntry[] = [...byPeriod.entries()]
    .sort(([a], [b]) => a - b)
    .map(([period, totals]) => ({ period, ...totals }));

  return new AmortizationTable(combined);
}

/**
 * Sums the schedules of several loan slices.
 */
export function combineSchedules(slices: readonly LoanSlice[]): AmortizationTable {
  return combineTables(slices.map((slice) => slice.schedule));
}

/**
 * Subtracts one schedule from another, row by row.
 * Rows are paired by position and the longer table is truncated; period
 * numbers are taken from the minuend. Not commutative.
 */
export function subtractSchedules(
  minuend: AmortizationTable,
  subtrahend: AmortizationTable
): AmortizationTable {
  const rows = Math.min(minuend.length, subtrahend.length);
  const difference: ScheduleEntry[] = [];

  for (let index = 0; index < rows; index++) {
    const left = minuend.entries[index];
    const right = subtrahend.entries[index];
    difference.push({
      period: left.period,
      totalPayment: left.totalPayment - right.totalPayment,
      principal: left.principal - right.principal,
      interest: left.interest - right.interest,
      extraPayment: left.extraPayment - right.extraPayment,
      remainingBalance: left.remainingBalance - right.remainingBalance,
    });
  }

  return new AmortizationTable(difference);
}
