import type { AmortizationTable } from "../models/AmortizationTable";
import { ScheduleEntry } from "../models/ScheduleEntry";
import { DEFAULT_SUMMARY_HEAD, DEFAULT_SUMMARY_TAIL } from "./constants";

/**
 * Fixed-width text rendering of amortization tables.
 */

export const TABLE_HEADER =
  "Payment # | Total Payment | Principal | Interest | Extra Payment | Remaining Balance";

const COLUMN_WIDTHS = {
  period: 9,
  totalPayment: 13,
  principal: 9,
  interest: 8,
  extraPayment: 13,
  remainingBalance: 17,
} as const;

function amount(value: number, width: number): string {
  return value.toFixed(2).padStart(width);
}

/**
 * Formats one entry as a table row.
 *
 * @example
 * ```ts
 * formatRow({ period: 1, totalPayment: 1000, principal: 900, interest: 100, extraPayment: 0, remainingBalance: 9100 })
 * // "        1 |       1000.00 |    900.00 |   100.00 |          0.00 |           9100.00"
 * ```
 */
export function formatRow(entry: ScheduleEntry): string {
  return [
    String(entry.period).padStart(COLUMN_WIDTHS.period),
    amount(entry.totalPayment, COLUMN_WIDTHS.totalPayment),
    amount(entry.principal, COLUMN_WIDTHS.principal),
    amount(entry.interest, COLUMN_WIDTHS.interest),
    amount(entry.extraPayment, COLUMN_WIDTHS.extraPayment),
    amount(entry.remainingBalance, COLUMN_WIDTHS.remainingBalance),
  ].join(" | ");
}

/**
 * Formats every row of a table, with an optional header line.
 */
export function formatTable(table: AmortizationTable, includeHeader: boolean = true): string {
  const lines = table.entries.map(formatRow);
  return (includeHeader ? [TABLE_HEADER, ...lines] : lines).join("\n");
}

/**
 * Splits entries into runs of consecutive rows sharing the same total payment.
 * Returns [start, end] index pairs, inclusive.
 */
export function findPaymentRuns(entries: readonly ScheduleEntry[]): Array<[number, number]> {
  if (entries.length === 0) {
    return [];
  }

  const runs: Array<[number, number]> = [];
  let start = 0;
  for (let index = 1; index < entries.length; index++) {
    if (entries[index].totalPayment !== entries[start].totalPayment) {
      runs.push([start, index - 1]);
      start = index;
    }
  }
  runs.push([start, entries.length - 1]);
  return runs;
}

/**
 * Formats a table with long runs of identical payments collapsed.
 * A run longer than head + tail rows keeps its first `head` and last `tail`
 * rows around a "..." line. An empty table renders as an empty string.
 */
export function formatSummary(
  table: AmortizationTable,
  head: number = DEFAULT_SUMMARY_HEAD,
  tail: number = DEFAULT_SUMMARY_TAIL
): string {
  const entries = table.entries;
  if (entries.length === 0) {
    return "";
  }

  const lines = [TABLE_HEADER];
  for (const [start, end] of findPaymentRuns(entries)) {
    if (end - start + 1 > head + tail) {
      lines.push(...entries.slice(start, start + head).map(formatRow));
      lines.push("...");
      lines.push(...entries.slice(end - tail + 1, end + 1).map(formatRow));
    } else {
      lines.push(...entries.slice(start, end + 1).map(formatRow));
    }
  }
  return lines.join("\n");
}
