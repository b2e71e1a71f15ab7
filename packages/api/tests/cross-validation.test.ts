import { describe, expect, it } from "vitest";

import type { CrossValidationPolicy } from "../src/lib/config.js";
import { cancelled } from "../src/lib/errors.js";
import {
  CrossValidator,
  mergeDetections,
  referenceText,
  sampleWindow,
} from "../src/services/cross-validation/index.js";
import { PatternPiiDetector, detectPatterns, type SecondaryEngines } from "../src/services/engines.js";
import {
  captionDraft,
  fakeDetector,
  fakeOcr,
  fakeTranscription,
  ocrDraft,
  phoneEntity,
  piiDraft,
  transcriptionDraft,
  untilAborted,
} from "./factories.js";

const policy: CrossValidationPolicy = {
  ocrSimilarityThreshold: 0.9,
  maxWer: 0.15,
  transcriptionSampleFraction: 0.1,
  captionPolicy: "review",
  timeoutMs: 1000,
};

function validator(engines: Partial<SecondaryEngines>, overrides: Partial<CrossValidationPolicy> = {}) {
  return new CrossValidator({ ocr: null, transcription: null, pii: [], ...engines }, { ...policy, ...overrides });
}

describe("CrossValidator", () => {
  // ------------------------------------------------------------------
  // OCR
  // ------------------------------------------------------------------

  it("auto-verifies OCR when the secondary engine agrees", async () => {
    const ocr = fakeOcr(async () => "Account 12345");
    const verdict = await validator({ ocr }).validate(ocrDraft("Account 12345", { contentRef: "media:scan-7" }));

    expect(verdict).toEqual({
      disposition: "AUTO_VERIFIED",
      method: "cross_validation_agreement",
      priority: null,
      crossValidation: { strategy: "ocr", engineIds: ["ocr-secondary"], similarity: 1, secondaryText: "Account 12345" },
      entityVerdicts: null,
    });
    expect(ocr.recognize).toHaveBeenCalledWith(expect.objectContaining({ contentRef: "media:scan-7" }));
  });

  it("flags an OCR mismatch for high-priority review", async () => {
    const ocr = fakeOcr(async () => "Pas5word obc l23");
    const verdict = await validator({ ocr }).validate(ocrDraft("Password: abc123"));

    expect(verdict).toMatchObject({ disposition: "PENDING_REVIEW", method: "cross_validation_mismatch", priority: 1 });
    expect(verdict.crossValidation?.similarity).toBeLessThan(0.9);
  });

  it("routes to review when no secondary OCR engine is configured", async () => {
    const verdict = await validator({}).validate(ocrDraft("Account 12345"));

    expect(verdict).toMatchObject({
      disposition: "PENDING_REVIEW",
      method: "cross_validation_unavailable",
      priority: 2,
      crossValidation: { strategy: "ocr", engineIds: [] },
    });
  });

  it("treats a timeout as unavailable", async () => {
    const ocr = fakeOcr(({ signal }) => untilAborted(signal));
    const verdict = await validator({ ocr }, { timeoutMs: 20 }).validate(ocrDraft("Account 12345"));

    expect(verdict).toMatchObject({ disposition: "PENDING_REVIEW", method: "cross_validation_unavailable", priority: 2 });
    expect(verdict.crossValidation?.error).toBe("Engine 'ocr-secondary' unavailable: timed out after 20ms");
  });

  it("treats an engine crash as unavailable", async () => {
    const ocr = fakeOcr(async () => {
      throw new Error("connection refused");
    });
    const verdict = await validator({ ocr }).validate(ocrDraft("Account 12345"));

    expect(verdict.method).toBe("cross_validation_unavailable");
    expect(verdict.crossValidation?.error).toBe("Engine 'ocr-secondary' unavailable: connection refused");
  });

  it("rethrows an upstream cancellation instead of routing to review", async () => {
    const ocr = fakeOcr(({ signal }) => untilAborted(signal));
    const controller = new AbortController();
    const pending = validator({ ocr }).validate(ocrDraft("Account 12345"), { signal: controller.signal });
    controller.abort(cancelled("media:img-001"));

    await expect(pending).rejects.toMatchObject({ code: "CANCELLED" });
  });

  // ------------------------------------------------------------------
  // Transcription
  // ------------------------------------------------------------------

  it("picks a centred sample window", () => {
    expect(sampleWindow(100, 0.1)).toEqual({ startSeconds: 45, endSeconds: 55 });
    expect(sampleWindow(60, 0.5)).toEqual({ startSeconds: 15, endSeconds: 45 });
  });

  it("takes the reference from overlapping segments, or a proportional slice of words", () => {
    const window = { startSeconds: 45, endSeconds: 55 };
    expect(
      referenceText(
        {
          text: "unused",
          audioDurationSeconds: 100,
          segments: [
            { startSeconds: 0, endSeconds: 45, text: "opening remarks" },
            { startSeconds: 45, endSeconds: 55, text: "meet me at the dock" },
            { startSeconds: 55, endSeconds: 100, text: "closing remarks" },
          ],
        },
        window
      )
    ).toBe("meet me at the dock");

    const words = Array.from({ length: 20 }, (_, i) => `w${i}`).join(" ");
    expect(referenceText({ text: words, audioDurationSeconds: 100 }, window)).toBe("w9 w10");
  });

  it("takes only the share of a coarse segment that falls inside the window", () => {
    const words = (prefix: string) => Array.from({ length: 20 }, (_, i) => `${prefix}${i}`).join(" ");
    const value = {
      text: `${words("a")} ${words("b")}`,
      audioDurationSeconds: 100,
      segments: [
        { startSeconds: 50, endSeconds: 100, text: words("b") },
        { startSeconds: 0, endSeconds: 50, text: words("a") },
      ],
    };

    expect(referenceText(value, { startSeconds: 45, endSeconds: 55 })).toBe("a18 a19 b0 b1");
  });

  it("auto-verifies a correct resample against coarse segments and against plain text", async () => {
    const words = (prefix: string) => Array.from({ length: 20 }, (_, i) => `${prefix}${i}`).join(" ");
    const text = `${words("a")} ${words("b")}`;
    const transcription = fakeTranscription(async () => "a18 a19 b0 b1");

    const segmented = await validator({ transcription }).validate(
      transcriptionDraft({
        text,
        audioDurationSeconds: 100,
        segments: [
          { startSeconds: 0, endSeconds: 50, text: words("a") },
          { startSeconds: 50, endSeconds: 100, text: words("b") },
        ],
      })
    );
    const plain = await validator({ transcription }).validate(transcriptionDraft({ text, audioDurationSeconds: 100 }));

    expect(segmented).toMatchObject({ disposition: "AUTO_VERIFIED", crossValidation: { wer: 0 } });
    expect(plain).toMatchObject({ disposition: "AUTO_VERIFIED", crossValidation: { wer: 0 } });
  });

  it("auto-verifies a transcription whose resample agrees", async () => {
    const transcription = fakeTranscription(async () => "Meet me at the dock.");
    const verdict = await validator({ transcription }).validate(
      transcriptionDraft({
        text: "intro meet me at the dock outro",
        audioDurationSeconds: 100,
        segments: [
          { startSeconds: 0, endSeconds: 45, text: "intro" },
          { startSeconds: 45, endSeconds: 55, text: "meet me at the dock" },
          { startSeconds: 55, endSeconds: 100, text: "outro" },
        ],
      })
    );

    expect(verdict).toMatchObject({
      disposition: "AUTO_VERIFIED",
      method: "cross_validation_agreement",
      crossValidation: { strategy: "transcription", wer: 0, window: { startSeconds: 45, endSeconds: 55 } },
    });
    expect(transcription.transcribe).toHaveBeenCalledWith(
      expect.objectContaining({ contentRef: "media:img-001", startSeconds: 45, endSeconds: 55 })
    );
  });

  it("flags a high word error rate", async () => {
    const transcription = fakeTranscription(async () => "beat be at a clock");
    const verdict = await validator({ transcription }).validate(
      transcriptionDraft({
        text: "meet me at the dock",
        audioDurationSeconds: 100,
        segments: [{ startSeconds: 45, endSeconds: 55, text: "meet me at the dock" }],
      })
    );

    expect(verdict).toMatchObject({ disposition: "PENDING_REVIEW", method: "high_wer", priority: 1 });
    expect(verdict.crossValidation?.wer).toBeCloseTo(0.8, 10);
  });

  // ------------------------------------------------------------------
  // PII
  // ------------------------------------------------------------------

  it("detects phone numbers with the pattern matcher", () => {
    expect(detectPatterns("Call me at 555-123-4567")).toEqual([phoneEntity(11, "555-123-4567")]);
  });

  it("holds back an entity only one detector found", async () => {
    const ner = fakeDetector("ner-model", async () => []);
    const text = "Call me at 555-123-4567";
    const verdict = await validator({ pii: [new PatternPiiDetector(), ner] }).validate(
      piiDraft(text, [phoneEntity(11, "555-123-4567")], { analyzerId: "pattern-matcher" })
    );

    expect(verdict).toEqual({
      disposition: "PENDING_REVIEW",
      method: "single_detector",
      priority: 2,
      crossValidation: { strategy: "pii", engineIds: ["ner-model"] },
      entityVerdicts: [
        {
          ...phoneEntity(11, "555-123-4567"),
          detectors: ["pattern-matcher"],
          disposition: "PENDING_REVIEW",
          method: "single_detector",
        },
      ],
    });
    expect(ner.detect).toHaveBeenCalledWith(expect.objectContaining({ text }));
  });

  it("auto-verifies when an independent detector reports every entity", async () => {
    const verdict = await validator({ pii: [new PatternPiiDetector()] }).validate(
      piiDraft("Call me at 555-123-4567", [phoneEntity(11, "555-123-4567")], { analyzerId: "ner-model" })
    );

    expect(verdict.disposition).toBe("AUTO_VERIFIED");
    expect(verdict.method).toBe("cross_validation_agreement");
    expect(verdict.entityVerdicts).toEqual([
      { ...phoneEntity(11, "555-123-4567"), detectors: ["ner-model", "pattern-matcher"], disposition: "AUTO_VERIFIED", method: "cross_validation_agreement" },
    ]);
  });

  it("surfaces entities only a secondary detector found", async () => {
    const verdict = await validator({ pii: [new PatternPiiDetector()] }).validate(
      piiDraft("Call me at 555-123-4567 or mail jo@example.com", [phoneEntity(11, "555-123-4567")], {
        analyzerId: "ner-model",
      })
    );

    expect(verdict.disposition).toBe("PENDING_REVIEW");
    expect(verdict.entityVerdicts?.map((v) => [v.entityType, v.disposition])).toEqual([
      ["PHONE_NUMBER", "AUTO_VERIFIED"],
      ["EMAIL_ADDRESS", "PENDING_REVIEW"],
    ]);
    expect(verdict.entityVerdicts?.[1]).toMatchObject({ span: { start: 32, end: 46 }, detectors: ["pattern-matcher"] });
  });

  it("does not let the primary analyzer corroborate itself", async () => {
    const verdict = await validator({ pii: [new PatternPiiDetector()] }).validate(
      piiDraft("Call me at 555-123-4567", [phoneEntity(11, "555-123-4567")], { analyzerId: "pattern-matcher" })
    );

    expect(verdict).toMatchObject({ disposition: "PENDING_REVIEW", method: "cross_validation_unavailable" });
  });

  it("merges detections by exact type and span", () => {
    const merged = mergeDetections([
      { detectorId: "a", entities: [phoneEntity(0, "5551234567")] },
      { detectorId: "b", entities: [phoneEntity(0, "555123456")] },
    ]);

    expect(merged.map((v) => v.detectors)).toEqual([["b"], ["a"]]);
  });

  // ------------------------------------------------------------------
  // Caption
  // ------------------------------------------------------------------

  it("never auto-verifies captions under the review policy", async () => {
    expect(await validator({}).validate(captionDraft("a man holding a phone"))).toEqual({
      disposition: "PENDING_REVIEW",
      method: "caption_policy",
      priority: 3,
      crossValidation: null,
      entityVerdicts: null,
    });
  });

  it("trusts caption confidence under the confidence policy", async () => {
    const verdict = await validator({}, { captionPolicy: "confidence" }).validate(captionDraft("a man holding a phone"));
    expect(verdict).toMatchObject({ disposition: "AUTO_VERIFIED", method: "confidence_threshold" });
  });
});
