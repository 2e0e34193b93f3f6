import { toExtraPaymentMap, totalPaid } from '../../models/Payment';

describe('toExtraPaymentMap', () => {
  it('should key payments by period', () => {
    const map = toExtraPaymentMap([
      { period: 5, amount: 5000 },
      { period: 3, amount: -3000 },
    ]);
    expect([...map.entries()]).toEqual([
      [5, 5000],
      [3, -3000],
    ]);
  });

  it('should accumulate payments to the same period', () => {
    const map = toExtraPaymentMap([
      { period: 3, amount: 100 },
      { period: 3, amount: 50 },
    ]);
    expect(map.get(3)).toBe(150);
    expect(map.size).toBe(1);
  });

  it('should add onto an initial map without changing it', () => {
    const initial = new Map([[3, 100]]);
    const map = toExtraPaymentMap([{ period: 3, amount: 25 }], initial);
    expect(map.get(3)).toBe(125);
    expect(initial.get(3)).toBe(100);
  });

  it('should return an empty map for no payments', () => {
    expect(toExtraPaymentMap([]).size).toBe(0);
  });
});

describe('totalPaid', () => {
  it('should sum payment amounts', () => {
    expect(totalPaid([{ period: 1, amount: 12000 }, { period: 1, amount: 500 }])).toBe(12500);
  });

  it('should be zero for no payments', () => {
    expect(totalPaid([])).toBe(0);
  });
});
