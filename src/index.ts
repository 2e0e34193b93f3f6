export { ScheduleEntry, AmountField, AMOUNT_FIELDS, placeholderEntry, entriesEqual } from "./models/ScheduleEntry";
export { AmortizationTable } from "./models/AmortizationTable";
export { ExtraPayment, PaymentDetails, toExtraPaymentMap, totalPaid } from "./models/Payment";
export { LoanSlice, LoanSliceParams, PaymentPolicy } from "./engine/loanSlice";
export { combineTables, combineSchedules, subtractSchedules } from "./engine/combiner";
export { LoanTranche, LoanTrancheOptions, TrancheKind, ScheduleView } from "./engine/loanTranche";
export { formatRow, formatTable, formatSummary, findPaymentRuns, TABLE_HEADER } from "./utils/tableFormatter";
export { annualToMonthlyRate, annuityPayment, clampBalance, roundToCents } from "./utils/math";
export { InvalidLoanParameterError, ScheduleVerificationError, TrancheOperationError } from "./utils/errors";
export * from "./utils/validation";
export * from "./utils/constants";
