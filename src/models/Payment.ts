/**
 * Payment data structures
 */

/**
 * A principal-only payment made in a given period.
 * A payment in the period before a slice starts (period 0 by default) is its down payment.
 */
export interface ExtraPayment {
  amount: number;
  period: number;
}

/**
 * What a loan expects to be paid in one period
 */
export interface PaymentDetails {
  totalPayment: number;
  principal: number;
  interest: number;
  remainingBalance: number;
}

/**
 * Folds payments into a period -> amount map.
 * Payments to the same period accumulate.
 */
export function toExtraPaymentMap(
  payments: readonly ExtraPayment[],
  initial: ReadonlyMap<number, number> = new Map()
): Map<number, number> {
  const map = new Map(initial);
  for (const payment of payments) {
    map.set(payment.period, (map.get(payment.period) ?? 0) + payment.amount);
  }
  return map;
}

/**
 * Sum of all payments in a list
 */
export function totalPaid(payments: readonly ExtraPayment[]): number {
  return payments.reduce((sum, payment) => sum + payment.amount, 0);
}
