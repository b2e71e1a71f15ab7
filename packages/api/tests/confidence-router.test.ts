import { describe, expect, it } from "vitest";

import { CalibrationTable } from "../src/services/calibration-table.js";
import { ConfidenceRouter } from "../src/services/confidence-router.js";
import type { AnalysisResult } from "../src/types/domain.js";
import { T0, captionDraft, ocrDraft, piiDraft } from "./factories.js";

const thresholds = { autoVerifyThreshold: 0.85, mediumReviewThreshold: 0.6, rejectThreshold: 0.4 };

function setup() {
  const table = new CalibrationTable();
  return { table, router: new ConfidenceRouter(thresholds, table) };
}

describe("ConfidenceRouter", () => {
  it("routes each confidence band", () => {
    const { router } = setup();

    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.91 }))).toEqual({
      kind: "candidate",
      disposition: "AUTO_VERIFIED",
      method: "confidence_threshold",
    });
    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.85 })).kind).toBe("candidate");
    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.849 }))).toEqual({
      kind: "final",
      disposition: "PENDING_REVIEW",
      method: "confidence_threshold",
      priority: 2,
    });
    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.6 }))).toMatchObject({ priority: 2 });
    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.599 }))).toMatchObject({ priority: 3 });
    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.4 }))).toMatchObject({
      disposition: "PENDING_REVIEW",
      priority: 3,
    });
    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.39 }))).toEqual({
      kind: "final",
      disposition: "REJECTED",
      method: "below_threshold",
      priority: null,
    });
  });

  it("keeps captions at low priority in the medium band", () => {
    const { router } = setup();

    expect(router.route(captionDraft("a parked car", { rawConfidence: 0.849 }))).toEqual({
      kind: "final",
      disposition: "PENDING_REVIEW",
      method: "confidence_threshold",
      priority: 3,
    });
    expect(router.route(captionDraft("a parked car", { rawConfidence: 0.6 }))).toMatchObject({ priority: 3 });
    expect(router.route(captionDraft("a parked car", { rawConfidence: 0.91 })).kind).toBe("candidate");
  });

  it("routes on the adjusted confidence", () => {
    const { router } = setup();

    // Raw 0.9 under a 0.8 multiplier lands in the medium band.
    expect(
      router.route(ocrDraft("Account 12345", { rawConfidence: 0.9, adjustedConfidence: 0.72, calibrationMultiplier: 0.8 }))
    ).toMatchObject({ kind: "final", disposition: "PENDING_REVIEW", priority: 2 });

    expect(
      router.route(ocrDraft("Account 12345", { rawConfidence: 0.45, adjustedConfidence: 0.36, calibrationMultiplier: 0.8 }))
    ).toMatchObject({ disposition: "REJECTED", method: "below_threshold" });
  });

  it("sends every non-rejected result of a FAILED analyzer to high-priority review", () => {
    const { router, table } = setup();
    table.replace({ analyzerId: "tesseract@5", status: "FAILED", multiplier: 0.8, runId: "run-1", updatedAt: T0 });

    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.99, adjustedConfidence: 0.792 }))).toEqual({
      kind: "final",
      disposition: "PENDING_REVIEW",
      method: "analyzer_failed",
      priority: 1,
    });
    expect(router.route(ocrDraft("Account 12345", { rawConfidence: 0.2, adjustedConfidence: 0.16 }))).toMatchObject({
      disposition: "REJECTED",
      method: "below_threshold",
    });
    // Other analyzers are unaffected.
    expect(router.route(piiDraft("no pii here", [], { rawConfidence: 0.99 })).kind).toBe("candidate");
  });

  it("rejects adjusted confidences outside [0, 1]", () => {
    const { router } = setup();

    for (const adjustedConfidence of [Number.NaN, 1.2, -0.1]) {
      expect(() => router.route(ocrDraft("Account 12345", { rawConfidence: 0.9, adjustedConfidence }))).toThrow(
        expect.objectContaining({ code: "VALIDATION_ERROR" })
      );
    }
  });

  it("leaves a result that already has a disposition untouched", () => {
    const { router } = setup();
    const result: AnalysisResult = {
      ...ocrDraft("Account 12345", { rawConfidence: 0.2 }),
      disposition: "HUMAN_VERIFIED",
      verificationMethod: "human_review",
      entityVerdicts: null,
      crossValidation: null,
      anomalies: [],
      correctedValue: null,
      updatedAt: T0,
    };

    expect(router.route(result)).toEqual({ kind: "settled", disposition: "HUMAN_VERIFIED", method: "human_review" });
  });
});
