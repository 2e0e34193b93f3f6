import { AmortizationTable } from "../models/AmortizationTable";
import { ScheduleEntry, placeholderEntry } from "../models/ScheduleEntry";
import { ExtraPayment, PaymentDetails, toExtraPaymentMap } from "../models/Payment";
import { annualToMonthlyRate, annuityPayment, clampBalance } from "../utils/math";
import { InvalidLoanParameterError } from "../utils/errors";
import { ExtraPaymentMapSchema, LoanTermsSchema, describeIssues } from "../utils/validation";

/**
 * How the periodic payment reacts to an extra payment.
 * - "fixed": the payment never changes; extra payments shorten the payoff.
 * - "recast": after each extra payment the payment is recomputed from the
 *   remaining balance over the remaining periods.
 */
export type PaymentPolicy = "fixed" | "recast";

/**
 * Construction parameters for a loan slice.
 *
 * @property principal - Face value of the loan; negative for offsetting slices
 * @property annualRate - Annual rate as a decimal (e.g., 0.05 for 5%)
 * @property totalPeriods - Length of the schedule in months
 * @property startPeriod - First paying period, default 1; earlier periods are placeholders
 * @property extraPayments - Period -> extra principal paid; the period before startPeriod is a down payment
 * @property paymentPolicy - Default "fixed"
 */
export interface LoanSliceParams {
  principal: number;
  annualRate: number;
  totalPeriods: number;
  startPeriod?: number;
  extraPayments?: ReadonlyMap<number, number>;
  paymentPolicy?: PaymentPolicy;
}

/**
 * One loan or sub-loan with its amortization schedule.
 *
 * Instances are immutable: every update returns a new slice whose schedule is
 * regenerated from its own parameters.
 */
export class LoanSlice {
  readonly principal: number;
  readonly annualRate: number;
  readonly monthlyRate: number;
  readonly totalPeriods: number;
  readonly startPeriod: number;
  readonly paymentPolicy: PaymentPolicy;
  readonly extraPayments: ReadonlyMap<number, number>;
  readonly downPayment: number;
  readonly financedPrincipal: number;
  readonly paymentPeriods: number;
  readonly fixedPayment: number;
  readonly schedule: AmortizationTable;

  constructor(params: LoanSliceParams) {
    const terms = LoanTermsSchema.safeParse(params);
    if (!terms.success) {
      throw new InvalidLoanParameterError("Invalid loan parameters", describeIssues(terms.error));
    }
    const extraPayments = ExtraPaymentMapSchema.safeParse(params.extraPayments ?? new Map());
    if (!extraPayments.success) {
      throw new InvalidLoanParameterError("Invalid extra payments", describeIssues(extraPayments.error));
    }

    this.principal = terms.data.principal;
    this.annualRate = terms.data.annualRate;
    this.monthlyRate = annualToMonthlyRate(this.annualRate);
    this.totalPeriods = terms.data.totalPeriods;
    this.startPeriod = terms.data.startPeriod ?? 1;
    this.paymentPolicy = terms.data.paymentPolicy ?? "fixed";
    this.extraPayments = new Map(extraPayments.data);

    // Paid before the first instalment, so it reduces the amount financed
    this.downPayment = this.extraPayments.get(this.startPeriod - 1) ?? 0;
    this.financedPrincipal = this.principal - this.downPayment;
    this.paymentPeriods = this.totalPeriods - this.startPeriod + 1;

    // A slice starting after its last period never pays
    this.fixedPayment =
      this.paymentPeriods > 0
        ? annuityPayment(this.financedPrincipal, this.paymentPeriods, this.monthlyRate)
        : 0;

    this.schedule = this.generateSchedule();
  }

  /**
   * Builds the period-by-period schedule: placeholders before the start
   * period, then the balance recurrence up to totalPeriods.
   */
  generateSchedule(): AmortizationTable {
    const entries: ScheduleEntry[] = [];

    const firstActive = Math.min(this.startPeriod, this.totalPeriods + 1);
    for (let period = 1; period < firstActive; period++) {
      entries.push(placeholderEntry(period));
    }

    let balance = this.financedPrincipal;
    let payment = this.fixedPayment;

    for (let period = this.startPeriod; period <= this.totalPeriods; period++) {
      const interest = balance * this.monthlyRate;
      const principal = payment - interest;
      const extraPayment = this.extraPayments.get(period) ?? 0;
      balance = clampBalance(balance - (principal + extraPayment), this.financedPrincipal);

      entries.push({
        period,
        totalPayment: payment,
        principal,
        interest,
        extraPayment,
        remainingBalance: balance,
      });

      if (this.paymentPolicy === "recast" && extraPayment !== 0) {
        const remainingPeriods = this.totalPeriods - period;
        if (remainingPeriods > 0) {
          payment = annuityPayment(balance, remainingPeriods, this.monthlyRate);
        }
      }
    }

    return new AmortizationTable(entries);
  }

  /**
   * Returns a new slice with `amount` added to whatever was already paid in `period`.
   */
  withExtraPayment(payment: ExtraPayment): LoanSlice;
  withExtraPayment(amount: number, period: number): LoanSlice;
  withExtraPayment(paymentOrAmount: ExtraPayment | number, period?: number): LoanSlice {
    const payment: ExtraPayment =
      typeof paymentOrAmount === "number"
        ? { amount: paymentOrAmount, period: period ?? Number.NaN }
        : paymentOrAmount;

    return new LoanSlice({
      ...this.params(),
      extraPayments: toExtraPaymentMap([payment], this.extraPayments),
    });
  }

  /**
   * Returns a copy of this slice under another payment policy.
   */
  withPaymentPolicy(paymentPolicy: PaymentPolicy): LoanSlice {
    if (paymentPolicy === this.paymentPolicy) {
      return this;
    }
    return new LoanSlice({ ...this.params(), paymentPolicy });
  }

  /**
   * Expected payment for a period. Period 0 is the down payment period:
   * nothing is due and the full principal is outstanding.
   *
   * @throws RangeError when the period is outside 0..totalPeriods
   */
  getPaymentForPeriod(period: number): PaymentDetails {
    if (period === 0) {
      return {
        totalPayment: 0,
        principal: 0,
        interest: 0,
        remainingBalance: this.principal,
      };
    }

    const entry = this.schedule.getEntry(period);
    if (!entry) {
      throw new RangeError(`Requested period ${period} is out of range 0..${this.totalPeriods}`);
    }

    return {
      totalPayment: entry.totalPayment,
      principal: entry.principal,
      interest: entry.interest,
      remainingBalance: entry.remainingBalance,
    };
  }

  /**
   * Construction parameters that reproduce this slice.
   */
  params(): LoanSliceParams {
    return {
      principal: this.principal,
      annualRate: this.annualRate,
      totalPeriods: this.totalPeriods,
      startPeriod: this.startPeriod,
      extraPayments: this.extraPayments,
      paymentPolicy: this.paymentPolicy,
    };
  }

  toString(): string {
    const remaining = this.schedule.lastEntry()?.remainingBalance ?? this.financedPrincipal;
    return (
      `LoanSlice(principal=${this.financedPrincipal.toFixed(2)}, annualRate=${this.annualRate.toFixed(4)}, ` +
      `totalPeriods=${this.totalPeriods}, startPeriod=${this.startPeriod}, ` +
      `monthlyPayment=${this.fixedPayment.toFixed(2)}, remainingBalance=${remaining.toFixed(2)})`
    );
  }
}
