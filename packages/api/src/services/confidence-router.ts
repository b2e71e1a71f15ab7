import { PRIORITY, type Disposition, type VerificationMethod } from "@triage/shared";

import type { RoutingThresholds } from "../lib/config.js";
import { validationError } from "../lib/errors.js";
import type { AnalysisDraft, AnalysisResult, Decision } from "../types/domain.js";
import type { CalibrationTable } from "./calibration-table.js";

export type Routing =
  /** The result already carried a disposition; nothing was changed. */
  | { kind: "settled"; disposition: Disposition; method: VerificationMethod }
  /** High tier: AUTO_VERIFIED only if cross-validation agrees. */
  | { kind: "candidate"; disposition: "AUTO_VERIFIED"; method: "confidence_threshold" }
  | ({ kind: "final" } & Decision);

export class ConfidenceRouter {
  constructor(
    private readonly thresholds: RoutingThresholds,
    private readonly calibration: CalibrationTable
  ) {}

  route(result: AnalysisResult): Routing;
  route(result: AnalysisDraft): Exclude<Routing, { kind: "settled" }>;
  route(result: AnalysisDraft | AnalysisResult): Routing {
    if ("disposition" in result) {
      return { kind: "settled", disposition: result.disposition, method: result.verificationMethod };
    }

    const { rawConfidence, adjustedConfidence, analyzerId } = result;
    if (!Number.isFinite(adjustedConfidence) || adjustedConfidence < 0 || adjustedConfidence > 1) {
      throw validationError("adjustedConfidence must be within [0, 1]", { analyzerId, adjustedConfidence });
    }

    const { rejectThreshold, mediumReviewThreshold, autoVerifyThreshold } = this.thresholds;

    // The raw floor comes first: a failed analyzer's low-confidence output is still rejected.
    if (rawConfidence < rejectThreshold) {
      return { kind: "final", disposition: "REJECTED", method: "below_threshold", priority: null };
    }
    if (this.calibration.lookup(analyzerId).status === "FAILED") {
      return { kind: "final", disposition: "PENDING_REVIEW", method: "analyzer_failed", priority: PRIORITY.high };
    }
    if (adjustedConfidence < rejectThreshold) {
      return { kind: "final", disposition: "REJECTED", method: "below_threshold", priority: null };
    }
    if (adjustedConfidence >= autoVerifyThreshold) {
      return { kind: "candidate", disposition: "AUTO_VERIFIED", method: "confidence_threshold" };
    }
    // Captions are reviewed at low priority in every band.
    if (adjustedConfidence >= mediumReviewThreshold && result.contentType !== "caption") {
      return { kind: "final", disposition: "PENDING_REVIEW", method: "confidence_threshold", priority: PRIORITY.medium };
    }
    return { kind: "final", disposition: "PENDING_REVIEW", method: "confidence_threshold", priority: PRIORITY.low };
  }
}
