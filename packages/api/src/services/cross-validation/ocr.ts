import { PRIORITY } from "@triage/shared";

import { engineUnavailable } from "../../lib/errors.js";
import { textSimilarity } from "../../lib/text-metrics.js";
import { callEngine } from "./engine-call.js";
import type { CrossValidationStrategy } from "./types.js";

export const ocrStrategy: CrossValidationStrategy<"ocr"> = {
  contentType: "ocr",

  async validate(result, { engines, policy, signal }) {
    const engine = engines.ocr;
    if (!engine) throw engineUnavailable("ocr-secondary", "no secondary OCR engine configured");

    const secondaryText = await callEngine(engine.id, policy.timeoutMs, signal, (s) =>
      engine.recognize({ contentRef: result.contentRef, signal: s })
    );
    const similarity = textSimilarity(result.value.text, secondaryText);
    const crossValidation = { strategy: "ocr" as const, engineIds: [engine.id], similarity, secondaryText };

    if (similarity >= policy.ocrSimilarityThreshold) {
      return {
        disposition: "AUTO_VERIFIED",
        method: "cross_validation_agreement",
        priority: null,
        crossValidation,
        entityVerdicts: null,
      };
    }
    // Disagreement at high confidence is itself suspicious.
    return {
      disposition: "PENDING_REVIEW",
      method: "cross_validation_mismatch",
      priority: PRIORITY.high,
      crossValidation,
      entityVerdicts: null,
    };
  },
};
