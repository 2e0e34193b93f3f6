import { combineSchedules, combineTables, subtractSchedules } from '../../engine/combiner';
import { LoanSlice } from '../../engine/loanSlice';
import { AmortizationTable } from '../../models/AmortizationTable';
import { AMOUNT_FIELDS, ScheduleEntry } from '../../models/ScheduleEntry';
import { shortHighRateLoan, zeroRateLoan } from '../fixtures/loans';

function entry(period: number, amount: number): ScheduleEntry {
  return {
    period,
    totalPayment: amount,
    principal: amount,
    interest: 0,
    extraPayment: 0,
    remainingBalance: amount * 10,
  };
}

describe('combineTables', () => {
  it('should return an empty table for no inputs', () => {
    expect(combineTables([]).length).toBe(0);
  });

  it('should cover the union of periods, sorted ascending', () => {
    const early = new AmortizationTable([entry(1, 10), entry(2, 20)]);
    const late = new AmortizationTable([entry(6, 60), entry(5, 50)]);
    const combined = combineTables([late, early]);

    expect(combined.entries.map((row) => row.period)).toEqual([1, 2, 5, 6]);
    expect(combined.getEntry(5)).toEqual(entry(5, 50));
  });

  it('should add every numeric field of entries sharing a period', () => {
    const a = new AmortizationTable([{ period: 1, totalPayment: 1, principal: 2, interest: 3, extraPayment: 4, remainingBalance: 5 }]);
    const b = new AmortizationTable([{ period: 1, totalPayment: 10, principal: 20, interest: 30, extraPayment: 40, remainingBalance: 50 }]);

    expect(combineTables([a, b]).entries).toEqual([
      { period: 1, totalPayment: 11, principal: 22, interest: 33, extraPayment: 44, remainingBalance: 55 },
    ]);
  });
});

describe('combineSchedules', () => {
  const base = new LoanSlice(shortHighRateLoan);
  const lateStart = new LoanSlice({ principal: 20000, annualRate: 0.06, totalPeriods: 10, startPeriod: 4 });
  const longer = new LoanSlice(zeroRateLoan);

  it('should reproduce a single slice exactly', () => {
    expect(combineSchedules([base]).equals(base.schedule)).toBe(true);
  });

  it('should not depend on input order', () => {
    expect(combineSchedules([base, lateStart]).equals(combineSchedules([lateStart, base]))).toBe(true);
  });

  it('should sum each field over the slices covering a period', () => {
    const slices = [base, lateStart, longer];
    const combined = combineSchedules(slices);

    expect(combined.length).toBe(12);
    for (const row of combined.entries) {
      for (const field of AMOUNT_FIELDS) {
        const expected = slices.reduce(
          (sum, slice) => sum + (slice.schedule.getEntry(row.period)?.[field] ?? 0),
          0
        );
        expect(row[field]).toBeCloseTo(expected, 8);
      }
    }
  });

  it('should take periods beyond shorter slices from the longer one alone', () => {
    const combined = combineSchedules([base, lateStart, longer]);
    expect(combined.getEntry(11)).toEqual(longer.schedule.getEntry(11));
    expect(combined.getEntry(12)).toEqual(longer.schedule.getEntry(12));
  });

  it('should count placeholder periods as zero contributions', () => {
    const combined = combineSchedules([base, lateStart]);
    expect(combined.getEntry(2)).toEqual(base.schedule.getEntry(2));
  });
});

describe('subtractSchedules', () => {
  const base = new LoanSlice(shortHighRateLoan);

  it('should give all zeros for a schedule minus itself', () => {
    const difference = subtractSchedules(base.schedule, base.schedule);
    expect(difference.length).toBe(10);
    for (const row of difference.entries) {
      expect(AMOUNT_FIELDS.every((field) => row[field] === 0)).toBe(true);
    }
  });

  it('should subtract field by field in order', () => {
    const left = new AmortizationTable([entry(1, 30)]);
    const right = new AmortizationTable([entry(1, 10)]);
    expect(subtractSchedules(left, right).entries).toEqual([entry(1, 20)]);
    expect(subtractSchedules(right, left).entries).toEqual([entry(1, -20)]);
  });

  it('should truncate to the shorter table and keep the minuend periods', () => {
    const left = new AmortizationTable([entry(1, 5), entry(2, 5), entry(3, 5)]);
    const right = new AmortizationTable([entry(7, 1), entry(8, 1)]);
    const difference = subtractSchedules(left, right);

    expect(difference.entries.map((row) => row.period)).toEqual([1, 2]);
    expect(difference.getEntry(1)?.totalPayment).toBe(4);
  });
});
