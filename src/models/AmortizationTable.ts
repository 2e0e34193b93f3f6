import { ScheduleEntry, entriesEqual } from "./ScheduleEntry";
import { formatTable } from "../utils/tableFormatter";
import { DEFAULT_MISMATCH_TOLERANCE } from "../utils/constants";

/**
 * Columns compared when checking two schedules for drift.
 * Extra payment and balance columns are excluded: an adjustment slice books
 * the same principal reduction as an extra payment, one period later.
 */
const COMPARED_COLUMNS = [
  { field: "period", label: "Payment #" },
  { field: "totalPayment", label: "Total Payment" },
  { field: "principal", label: "Principal" },
  { field: "interest", label: "Interest" },
] as const;

/**
 * Ordered, immutable sequence of schedule entries, one per period.
 */
export class AmortizationTable {
  readonly entries: readonly ScheduleEntry[];

  constructor(entries: readonly ScheduleEntry[]) {
    this.entries = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
  }

  get length(): number {
    return this.entries.length;
  }

  getEntry(period: number): ScheduleEntry | undefined {
    return this.entries.find((entry) => entry.period === period);
  }

  lastEntry(): ScheduleEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  /**
   * True when both tables hold the same entries, compared exactly field by field.
   */
  equals(other: AmortizationTable): boolean {
    if (this.entries.length !== other.entries.length) {
      return false;
    }
    return this.entries.every((entry, index) => entriesEqual(entry, other.entries[index]));
  }

  /**
   * Lists rows whose payment columns differ by more than `tolerance`.
   * Returns an empty array when the tables agree.
   */
  findMismatches(other: AmortizationTable, tolerance: number = DEFAULT_MISMATCH_TOLERANCE): string[] {
    const mismatches: string[] = [];

    if (this.entries.length !== other.entries.length) {
      mismatches.push(
        `Length mismatch -> Expected ${this.entries.length} rows, got ${other.entries.length}`
      );
    }

    const rows = Math.min(this.entries.length, other.entries.length);
    for (let index = 0; index < rows; index++) {
      const expected = this.entries[index];
      const actual = other.entries[index];
      const differences: string[] = [];

      for (const { field, label } of COMPARED_COLUMNS) {
        if (Math.abs(expected[field] - actual[field]) > tolerance) {
          differences.push(
            field === "period"
              ? `${label}: Expected ${expected[field]}, got ${actual[field]}`
              : `${label}: Expected ${expected[field].toFixed(2)}, got ${actual[field].toFixed(2)}`
          );
        }
      }

      if (differences.length > 0) {
        mismatches.push(`Row ${index + 1} mismatch -> ${differences.join("; ")}`);
      }
    }

    return mismatches;
  }

  toString(): string {
    return formatTable(this);
  }
}
