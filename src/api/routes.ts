import { Router, Request, Response } from "express";
import { LoanSlice } from "../engine/loanSlice";
import { combineSchedules } from "../engine/combiner";
import { LoanTranche } from "../engine/loanTranche";
import { toExtraPaymentMap } from "../models/Payment";
import { formatSummary, formatTable } from "../utils/tableFormatter";
import {
  InvalidLoanParameterError,
  ScheduleVerificationError,
  TrancheOperationError,
} from "../utils/errors";
import {
  CombineRequestSchema,
  LoanSliceRequest,
  LoanSliceRequestSchema,
  TrancheRequest,
  TrancheRequestSchema,
  describeIssues,
} from "../utils/validation";

const router = Router();

/**
 * Builds a loan slice from a validated request body.
 * Extra payments listed for the same period accumulate.
 */
export function sliceFromRequest(request: LoanSliceRequest): LoanSlice {
  return new LoanSlice({
    principal: request.principal,
    annualRate: request.annualRate,
    totalPeriods: request.totalPeriods,
    startPeriod: request.startPeriod,
    paymentPolicy: request.paymentPolicy,
    extraPayments: toExtraPaymentMap(request.extraPayments ?? []),
  });
}

/**
 * Builds a tranche from a validated request body and records its adjustments in order.
 */
export function trancheFromRequest(request: TrancheRequest): LoanTranche {
  const tranche = new LoanTranche({
    kind: request.kind,
    baseline: sliceFromRequest(request.baseline),
    nominal: request.nominal ? sliceFromRequest(request.nominal) : undefined,
  });

  for (const adjustment of request.adjustments ?? []) {
    tranche.addAdjustmentPayment(adjustment);
  }
  return tranche;
}

/**
 * Maps engine errors to HTTP responses; anything unexpected is logged and returns 500.
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof InvalidLoanParameterError) {
    res.status(400).json({ error: error.message, details: error.issues });
    return;
  }
  if (error instanceof TrancheOperationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  if (error instanceof ScheduleVerificationError) {
    res.status(422).json({ error: error.message, mismatches: error.mismatches });
    return;
  }

  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * GET /api/schedule
 * Get information about the schedule endpoint
 */
router.get("/schedule", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Generate the amortization schedule of one loan slice",
    endpoint: "/api/schedule",
    requiredFields: [
      "principal",
      "annualRate (decimal, e.g. 0.05 for 5%)",
      "totalPeriods (1 to 1200 months)",
      "startPeriod (optional, default 1)",
      "paymentPolicy (optional, 'fixed' or 'recast', default 'fixed')",
      "extraPayments (optional, list of { period, amount }; the period before startPeriod is a down payment)",
    ],
    note: "Add ?format=text for the full fixed-width table or ?format=summary for the collapsed view.",
  });
});

/**
 * POST /api/schedule
 * Generate one slice's schedule
 */
router.post("/schedule", (req: Request, res: Response) => {
  const parsed = LoanSliceRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid loan slice request",
      details: describeIssues(parsed.error),
    });
  }

  try {
    const slice = sliceFromRequest(parsed.data);

    if (req.query.format === "text") {
      return res.type("text/plain").send(formatTable(slice.schedule));
    }
    if (req.query.format === "summary") {
      return res.type("text/plain").send(formatSummary(slice.schedule));
    }

    res.json({
      fixedPayment: slice.fixedPayment,
      financedPrincipal: slice.financedPrincipal,
      paymentPeriods: slice.paymentPeriods,
      schedule: slice.schedule.entries,
    });
  } catch (error) {
    sendError(res, error, "schedule generation");
  }
});

/**
 * POST /api/schedule/combine
 * Sum the schedules of several slices period by period
 */
router.post("/schedule/combine", (req: Request, res: Response) => {
  const parsed = CombineRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid combine request",
      details: describeIssues(parsed.error),
    });
  }

  try {
    const slices = parsed.data.slices.map(sliceFromRequest);
    res.json({ schedule: combineSchedules(slices).entries });
  } catch (error) {
    sendError(res, error, "schedule combination");
  }
});

/**
 * POST /api/tranche
 * Apply adjustments to a tranche and return one of its schedules
 */
router.post("/tranche", (req: Request, res: Response) => {
  const parsed = TrancheRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid tranche request",
      details: describeIssues(parsed.error),
    });
  }

  try {
    const tranche = trancheFromRequest(parsed.data);
    const selectedView = parsed.data.view ?? "full";
    res.json({
      kind: tranche.kind,
      view: selectedView,
      schedule: tranche.getSchedule(selectedView).entries,
    });
  } catch (error) {
    sendError(res, error, "tranche schedule");
  }
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Loan Slice Amortization API",
    version: "1.0.0",
    endpoints: {
      schedule: "POST /api/schedule - Amortization schedule of one loan slice",
      combine: "POST /api/schedule/combine - Period-by-period sum of several slices",
      tranche: "POST /api/tranche - Schedule of a tranche with adjustments",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
