import { InvalidLoanParameterError } from "./errors";

/**
 * Financial calculation utilities for loan schedules.
 * All calculations use monthly periods.
 */

/**
 * Converts an annual interest rate to the rate charged per monthly period.
 *
 * @param annualRate - Annual rate as a decimal (e.g., 0.05 for 5%)
 * @returns Monthly rate as a decimal
 *
 * @example
 * ```ts
 * annualToMonthlyRate(0.12) // returns 0.01 (1% per month)
 * ```
 */
export function annualToMonthlyRate(annualRate: number): number {
  return annualRate / 12;
}

/**
 * Calculates the level payment that retires a principal over a number of periods.
 * Formula: PMT = r × P / (1 - (1 + r)^-n)
 *
 * With a zero rate the loan is repaid straight-line: PMT = P / n.
 *
 * @param principal - Amount to amortize (may be negative for offsetting loans)
 * @param paymentPeriods - Number of paying periods, a positive integer
 * @param monthlyRate - Rate per period as a decimal
 * @returns Payment per period
 * @throws InvalidLoanParameterError when the periods are not positive or the formula is undefined
 */
export function annuityPayment(
  principal: number,
  paymentPeriods: number,
  monthlyRate: number
): number {
  if (!Number.isInteger(paymentPeriods) || paymentPeriods <= 0) {
    throw new InvalidLoanParameterError(
      `Payment periods must be a positive integer, got ${paymentPeriods}`
    );
  }

  if (monthlyRate === 0) {
    return principal / paymentPeriods;
  }

  if (monthlyRate <= -1) {
    throw new InvalidLoanParameterError(`Monthly rate must be greater than -1, got ${monthlyRate}`);
  }

  const payment = (monthlyRate * principal) / (1 - Math.pow(1 + monthlyRate, -paymentPeriods));
  if (!Number.isFinite(payment)) {
    throw new InvalidLoanParameterError(
      `Payment is undefined for monthly rate ${monthlyRate} over ${paymentPeriods} periods`
    );
  }
  return payment;
}

/**
 * Clamps a balance so it never crosses zero.
 * A non-negative loan floors at 0; an offsetting (negative) loan caps at 0.
 *
 * @param balance - Balance after the period's payment
 * @param principal - Principal the balance started from; its sign picks the side
 */
export function clampBalance(balance: number, principal: number): number {
  if (principal < 0) {
    return balance > 0 ? 0 : balance;
  }
  return balance < 0 ? 0 : balance;
}

/**
 * Rounds an amount to whole cents.
 *
 * @example
 * ```ts
 * roundToCents(12.346) // returns 12.35
 * roundToCents(-0.004) // returns 0
 * ```
 */
export function roundToCents(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  return rounded === 0 ? 0 : rounded;
}
