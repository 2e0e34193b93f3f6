import { AmortizationTable } from "../models/AmortizationTable";
import { ExtraPayment, totalPaid } from "../models/Payment";
import { InvalidLoanParameterError, ScheduleVerificationError, TrancheOperationError } from "../utils/errors";
import { roundToCents } from "../utils/math";
import { combineSchedules, subtractSchedules } from "./combiner";
import { LoanSlice } from "./loanSlice";

/**
 * A fixed tranche must be paid exactly as scheduled; a flexible tranche turns
 * every over- or under-payment into an adjustment.
 */
export type TrancheKind = "fixed" | "flexible";

/**
 * Schedules a tranche can report:
 * - "full": baseline with all adjustments applied
 * - "baseline": the loan as originally scheduled
 * - "adjustments": the adjustment slices combined
 * - "sideloan": full schedule minus the nominal slice
 */
export type ScheduleView = "full" | "baseline" | "adjustments" | "sideloan";

export interface LoanTrancheOptions {
  kind: TrancheKind;
  baseline: LoanSlice;
  nominal?: LoanSlice;
}

/**
 * Tracks one party's share of a loan: a baseline schedule plus, for flexible
 * tranches, every adjustment recorded against it both as an extra payment on
 * the adjusted slice and as an offsetting slice of its own. The two
 * representations must stay equivalent; verification checks that through the
 * schedule combiner.
 */
export class LoanTranche {
  readonly kind: TrancheKind;
  readonly baseline: LoanSlice;
  readonly nominal: LoanSlice;

  private adjusted: LoanSlice;
  private readonly adjustments: LoanSlice[] = [];
  private pendingPayments: ExtraPayment[] = [];
  private period = 0;

  constructor(options: LoanTrancheOptions) {
    this.kind = options.kind;
    // Offsetting slices reproduce extra payments only when the payment is recast
    this.baseline =
      options.kind === "flexible" ? options.baseline.withPaymentPolicy("recast") : options.baseline;
    this.nominal = options.nominal ?? this.baseline;
    this.adjusted = this.baseline;
  }

  get currentPeriod(): number {
    return this.period;
  }

  get adjustedSlice(): LoanSlice {
    return this.adjusted;
  }

  get adjustmentSlices(): readonly LoanSlice[] {
    return [...this.adjustments];
  }

  /**
   * Queues a payment for the current period. Payments are applied on advancePeriod().
   */
  acceptPayment(payment: ExtraPayment): void {
    if (payment.period !== this.period) {
      throw new TrancheOperationError(
        `Payment must be for the current period (current period: ${this.period}, got ${payment.period})`
      );
    }
    this.pendingPayments.push(payment);
  }

  /**
   * Settles the payments queued for the current period and moves to the next one.
   */
  advancePeriod(): void {
    const paid = totalPaid(this.pendingPayments);

    if (this.kind === "fixed") {
      const expected = this.baseline.getPaymentForPeriod(this.period);
      if (roundToCents(paid) !== roundToCents(expected.totalPayment)) {
        throw new TrancheOperationError(
          `Fixed tranche requires exact payment of ${expected.totalPayment.toFixed(2)}, ` +
            `but received ${paid.toFixed(2)}`
        );
      }
    } else {
      const expected = this.adjusted.getPaymentForPeriod(this.period);
      const difference = roundToCents(paid - expected.totalPayment);

      if (difference < 0 && this.period < 1) {
        throw new TrancheOperationError("Down payment cannot be negative");
      }
      if (difference !== 0) {
        this.addAdjustmentPayment({ amount: difference, period: this.period });
      }
    }

    this.pendingPayments = this.pendingPayments.filter((payment) => payment.period > this.period);
    this.period += 1;
  }

  /**
   * Records an extra payment: applied to the adjusted slice and mirrored by an
   * offsetting slice that starts the period after it.
   */
  addAdjustmentPayment(payment: ExtraPayment): void {
    this.assertFlexible();
    const slice = new LoanSlice({
      principal: -payment.amount,
      annualRate: this.baseline.annualRate,
      totalPeriods: this.baseline.totalPeriods,
      startPeriod: payment.period + 1,
    });
    this.addAdjustment(slice, payment);
  }

  /**
   * Records an offsetting slice together with the extra payment it stands for.
   */
  addAdjustmentSlice(slice: LoanSlice): void {
    this.assertFlexible();
    if (
      slice.annualRate !== this.baseline.annualRate ||
      slice.totalPeriods !== this.baseline.totalPeriods
    ) {
      throw new TrancheOperationError(
        "Adjustment slices must share the baseline's annual rate and total periods"
      );
    }
    if (slice.extraPayments.size > 0) {
      throw new TrancheOperationError("Adjustment slices cannot carry extra payments");
    }
    this.addAdjustment(slice, { amount: -slice.principal, period: slice.startPeriod - 1 });
  }

  private assertFlexible(): void {
    if (this.kind !== "flexible") {
      throw new TrancheOperationError("Only flexible tranches can have adjustments");
    }
  }

  private addAdjustment(slice: LoanSlice, payment: ExtraPayment): void {
    // Placeholder periods before the down payment period carry no balance to adjust
    const firstAdjustable = this.baseline.startPeriod - 1;
    if (payment.period < firstAdjustable) {
      throw new TrancheOperationError(
        `Adjustments must be at or after period ${firstAdjustable}, got period ${payment.period}`
      );
    }
    const adjusted = this.adjusted.withExtraPayment(payment);
    this.adjustments.push(slice);
    this.adjusted = adjusted;
  }

  /**
   * Checks that the adjusted schedule still equals the baseline combined with
   * every adjustment slice.
   *
   * @throws ScheduleVerificationError listing the mismatching rows
   */
  verifyAdjustments(): void {
    const adjustedSchedule = this.adjusted.generateSchedule();
    const verificationSchedule = combineSchedules([this.baseline, ...this.adjustments]);

    const mismatches = adjustedSchedule.findMismatches(verificationSchedule);
    if (mismatches.length > 0) {
      throw new ScheduleVerificationError(mismatches);
    }
  }

  /**
   * Returns one of the tranche's schedules. Views built from the adjusted
   * slice ("full", "sideloan") of a flexible tranche are verified first.
   */
  getSchedule(view: ScheduleView = "full"): AmortizationTable {
    if (this.kind === "flexible" && (view === "full" || view === "sideloan")) {
      this.verifyAdjustments();
    }

    switch (view) {
      case "full":
        return this.adjusted.schedule;
      case "baseline":
        return this.baseline.schedule;
      case "adjustments":
        return combineSchedules(this.adjustments);
      case "sideloan":
        return subtractSchedules(this.adjusted.schedule, this.nominal.schedule);
      default: {
        const unknownView: never = view;
        throw new InvalidLoanParameterError(`Unknown schedule view: ${String(unknownView)}`);
      }
    }
  }
}
