import { randomUUID } from "node:crypto";

import { submitAnalysisSchema } from "@triage/shared";
import { fromZodError } from "../lib/errors.js";
import type { AnalysisDraft, Clock } from "../types/domain.js";
import type { CalibrationTable } from "./calibration-table.js";

/** Rounded so that e.g. 0.9 x 0.8 lands on 0.72 rather than 0.7200000000000001. */
export function scaleConfidence(raw: number, multiplier: number) {
  return Math.round(raw * multiplier * 1e6) / 1e6;
}

/**
 * Validates a raw submission and normalises it into a draft: assigns the id, and scales
 * the confidence by the analyzer's current multiplier.
 */
export function ingest(input: unknown, calibration: CalibrationTable, clock: Clock): AnalysisDraft {
  const parsed = submitAnalysisSchema.safeParse(input);
  if (!parsed.success) throw fromZodError(parsed.error, "Invalid analysis submission");

  const submission = parsed.data;
  const { multiplier } = calibration.lookup(submission.analyzerId);

  return {
    ...submission,
    id: randomUUID(),
    caseRef: submission.caseRef ?? null,
    calibrationMultiplier: multiplier,
    adjustedConfidence: scaleConfidence(submission.rawConfidence, multiplier),
    createdAt: clock(),
  };
}
