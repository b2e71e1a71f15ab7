import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/lib/config.js";

describe("loadConfig", () => {
  it("applies the documented defaults", () => {
    const config = loadConfig({});

    expect(config.routing).toEqual({ autoVerifyThreshold: 0.85, mediumReviewThreshold: 0.6, rejectThreshold: 0.4 });
    expect(config.crossValidation).toEqual({
      ocrSimilarityThreshold: 0.9,
      maxWer: 0.15,
      transcriptionSampleFraction: 0.1,
      captionPolicy: "review",
      timeoutMs: 10_000,
    });
    expect(config.review.leaseMs).toBe(900_000);
    expect(config.calibration).toMatchObject({
      intervalHours: 6,
      minAccuracy: 0.95,
      hardFloor: 0.5,
      degradedMultiplier: 0.8,
      targets: [],
    });
    expect(config.audit.mode).toBe("sync");
    expect(config.databaseUrl).toBeUndefined();
    expect(config.redisUrl).toBeUndefined();
  });

  it("coerces numeric environment values", () => {
    const config = loadConfig({ AUTO_VERIFY_THRESHOLD: "0.9", REVIEW_LEASE_MS: "60000", PORT: "8080" });

    expect(config.routing.autoVerifyThreshold).toBe(0.9);
    expect(config.review.leaseMs).toBe(60_000);
    expect(config.port).toBe(8080);
  });

  it("rejects thresholds out of order", () => {
    expect(() => loadConfig({ MEDIUM_REVIEW_THRESHOLD: "0.3" })).toThrow(/Invalid thresholds/);
    expect(() => loadConfig({ CALIBRATION_HARD_FLOOR: "0.96" })).toThrow(/CALIBRATION_HARD_FLOOR/);
  });

  it("rejects values outside their range", () => {
    expect(() => loadConfig({ MAX_WER: "1.5" })).toThrow();
    expect(() => loadConfig({ CAPTION_POLICY: "always" })).toThrow();
  });

  it("parses calibration targets from JSON", () => {
    const config = loadConfig({
      CALIBRATION_TARGETS: JSON.stringify([
        { analyzerId: "tesseract@5", contentType: "ocr", url: "http://ocr.internal/analyze", minAccuracy: 0.9 },
      ]),
    });

    expect(config.calibration.targets).toEqual([
      { analyzerId: "tesseract@5", contentType: "ocr", url: "http://ocr.internal/analyze", minAccuracy: 0.9 },
    ]);
    expect(() => loadConfig({ CALIBRATION_TARGETS: "not json" })).toThrow(/CALIBRATION_TARGETS/);
  });
});
