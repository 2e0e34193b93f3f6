/**
 * Error types raised by the amortization engine and the tranche ledger.
 */

/**
 * Raised when loan parameters cannot produce a schedule (schema failures,
 * non-positive payment periods, an undefined payment formula).
 */
export class InvalidLoanParameterError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidLoanParameterError";
    this.issues = issues;
  }
}

/**
 * Raised when a flexible tranche's adjusted schedule no longer matches the
 * combination of its baseline and adjustment slices.
 */
export class ScheduleVerificationError extends Error {
  readonly mismatches: string[];

  constructor(mismatches: string[]) {
    super("Adjustment verification failed: amortization tables do not match");
    this.name = "ScheduleVerificationError";
    this.mismatches = mismatches;
  }
}

/**
 * Raised for operations a tranche does not allow in its current state.
 */
export class TrancheOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TrancheOperationError";
  }
}
