/**
 * Schedule entry data structures
 */

export interface ScheduleEntry {
  readonly period: number;
  readonly totalPayment: number;
  readonly principal: number; // Portion of the payment reducing principal
  readonly interest: number;
  readonly extraPayment: number; // Principal-only payment on top of the scheduled one
  readonly remainingBalance: number;
}

/**
 * Numeric columns of an entry, in display order
 */
export const AMOUNT_FIELDS = [
  "totalPayment",
  "principal",
  "interest",
  "extraPayment",
  "remainingBalance",
] as const;

export type AmountField = (typeof AMOUNT_FIELDS)[number];

/**
 * Entry for a period before a slice starts paying
 */
export function placeholderEntry(period: number): ScheduleEntry {
  return {
    period,
    totalPayment: 0,
    principal: 0,
    interest: 0,
    extraPayment: 0,
    remainingBalance: 0,
  };
}

/**
 * Field-by-field exact comparison of two entries
 */
export function entriesEqual(a: ScheduleEntry, b: ScheduleEntry): boolean {
  return a.period === b.period && AMOUNT_FIELDS.every((field) => a[field] === b[field]);
}
