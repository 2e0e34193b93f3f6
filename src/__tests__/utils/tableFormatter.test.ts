import {
  TABLE_HEADER,
  findPaymentRuns,
  formatRow,
  formatSummary,
  formatTable,
} from '../../utils/tableFormatter';
import { AmortizationTable } from '../../models/AmortizationTable';
import { LoanSlice } from '../../engine/loanSlice';
import { zeroRateLoan } from '../fixtures/loans';

const sampleEntry = {
  period: 1,
  totalPayment: 1000,
  principal: 900,
  interest: 100,
  extraPayment: 0,
  remainingBalance: 9100,
};

describe('formatRow', () => {
  it('should right-align every column to its width', () => {
    expect(formatRow(sampleEntry)).toBe(
      '        1 |       1000.00 |    900.00 |   100.00 |          0.00 |           9100.00'
    );
  });

  it('should render negative amounts with two decimals', () => {
    expect(formatRow({ ...sampleEntry, period: 12, totalPayment: -1234.5 })).toBe(
      '       12 |      -1234.50 |    900.00 |   100.00 |          0.00 |           9100.00'
    );
  });
});

describe('formatTable', () => {
  it('should put the header before the rows', () => {
    const table = new AmortizationTable([sampleEntry]);
    expect(formatTable(table)).toBe(`${TABLE_HEADER}\n${formatRow(sampleEntry)}`);
  });

  it('should omit the header on request', () => {
    const table = new AmortizationTable([sampleEntry]);
    expect(formatTable(table, false)).toBe(formatRow(sampleEntry));
  });

  it('should render only the header for an empty table', () => {
    expect(formatTable(new AmortizationTable([]))).toBe(TABLE_HEADER);
  });

  it('should be used by AmortizationTable.toString', () => {
    const table = new AmortizationTable([sampleEntry]);
    expect(String(table)).toBe(formatTable(table));
  });
});

describe('findPaymentRuns', () => {
  it('should group consecutive rows with the same total payment', () => {
    const slice = new LoanSlice({ principal: 300, annualRate: 0, totalPeriods: 6, startPeriod: 4 });
    expect(findPaymentRuns(slice.schedule.entries)).toEqual([
      [0, 2],
      [3, 5],
    ]);
  });

  it('should return no runs for no entries', () => {
    expect(findPaymentRuns([])).toEqual([]);
  });
});

describe('formatSummary', () => {
  it('should collapse a long run of equal payments', () => {
    const slice = new LoanSlice(zeroRateLoan);
    expect(formatSummary(slice.schedule)).toBe(
      [
        TABLE_HEADER,
        '        1 |        100.00 |    100.00 |     0.00 |          0.00 |           1100.00',
        '        2 |        100.00 |    100.00 |     0.00 |          0.00 |           1000.00',
        '...',
        '       11 |        100.00 |    100.00 |     0.00 |          0.00 |            100.00',
        '       12 |        100.00 |    100.00 |     0.00 |          0.00 |              0.00',
      ].join('\n')
    );
  });

  it('should keep short runs intact', () => {
    const slice = new LoanSlice({ principal: 300, annualRate: 0, totalPeriods: 6, startPeriod: 4 });
    expect(formatSummary(slice.schedule)).toBe(formatTable(slice.schedule));
  });

  it('should honour custom head and tail sizes per run', () => {
    const slice = new LoanSlice({ principal: 300, annualRate: 0, totalPeriods: 6, startPeriod: 4 });
    const rows = slice.schedule.entries.map(formatRow);
    expect(formatSummary(slice.schedule, 1, 1)).toBe(
      [TABLE_HEADER, rows[0], '...', rows[2], rows[3], '...', rows[5]].join('\n')
    );
  });

  it('should render nothing for an empty table', () => {
    expect(formatSummary(new AmortizationTable([]))).toBe('');
  });
});
