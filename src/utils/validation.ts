import { z } from "zod";
import { MAX_TOTAL_PERIODS } from "./constants";

/**
 * Zod validation schemas for loan inputs.
 * Rates are decimal fractions (e.g., 0.05 means 5%).
 */

/**
 * Schema for a period number. Period 0 holds down payments for slices starting at period 1.
 */
export const PeriodSchema = z.number().int().min(0);

/**
 * Schema for a single principal-only payment.
 */
export const ExtraPaymentSchema = z.object({
  amount: z.number().finite(),
  period: PeriodSchema,
});

export const PaymentPolicySchema = z.enum(["fixed", "recast"]);

/**
 * Schema for the scalar terms of a loan slice.
 * Principal may be negative: offsetting slices model payments made against another loan.
 */
export const LoanTermsSchema = z.object({
  principal: z.number().finite(),
  annualRate: z.number().finite(),
  totalPeriods: z.number().int().min(1).max(MAX_TOTAL_PERIODS),
  startPeriod: z.number().int().min(1).optional(),
  paymentPolicy: PaymentPolicySchema.optional(),
});

/**
 * Schema for the period -> amount map carried by a slice.
 */
export const ExtraPaymentMapSchema = z.map(PeriodSchema, z.number().finite());

/**
 * Schema for a loan slice as received over the API.
 * Extra payments arrive as a list; repeated periods accumulate.
 */
export const LoanSliceRequestSchema = LoanTermsSchema.extend({
  extraPayments: z.array(ExtraPaymentSchema).optional(),
});

/**
 * Schema for the combine endpoint.
 */
export const CombineRequestSchema = z.object({
  slices: z.array(LoanSliceRequestSchema),
});

export const TrancheKindSchema = z.enum(["fixed", "flexible"]);

export const ScheduleViewSchema = z.enum(["full", "baseline", "adjustments", "sideloan"]);

/**
 * Schema for the tranche endpoint.
 */
export const TrancheRequestSchema = z.object({
  kind: TrancheKindSchema,
  baseline: LoanSliceRequestSchema,
  nominal: LoanSliceRequestSchema.optional(),
  adjustments: z.array(ExtraPaymentSchema).optional(),
  view: ScheduleViewSchema.optional(),
});

export type LoanSliceRequest = z.infer<typeof LoanSliceRequestSchema>;
export type TrancheRequest = z.infer<typeof TrancheRequestSchema>;

/**
 * Flattens zod issues into "path: message" strings.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
