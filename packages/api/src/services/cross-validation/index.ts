import { PRIORITY } from "@triage/shared";

import type { CrossValidationPolicy } from "../../lib/config.js";
import { isAppError } from "../../lib/errors.js";
import { createLogger } from "../../lib/logger.js";
import type { AnalysisDraft, Verdict } from "../../types/domain.js";
import type { SecondaryEngines } from "../engines.js";
import { captionStrategy } from "./caption.js";
import { ocrStrategy } from "./ocr.js";
import { piiStrategy } from "./pii.js";
import { transcriptionStrategy } from "./transcription.js";
import type { StrategyContext } from "./types.js";

export { sampleWindow, referenceText } from "./transcription.js";
export { mergeDetections, entityKey } from "./pii.js";
export type { CrossValidationStrategy, StrategyContext } from "./types.js";

const log = createLogger("cross-validator");

/**
 * Re-checks a high-tier candidate against an independent method chosen by content type.
 * An unreachable engine never lets the candidate through unverified.
 */
export class CrossValidator {
  constructor(
    private readonly engines: SecondaryEngines,
    private readonly policy: CrossValidationPolicy
  ) {}

  async validate(result: AnalysisDraft, opts: { signal?: AbortSignal } = {}): Promise<Verdict> {
    const ctx: StrategyContext = {
      engines: this.engines,
      policy: this.policy,
      signal: opts.signal ?? new AbortController().signal,
    };

    try {
      switch (result.contentType) {
        case "ocr":
          return await ocrStrategy.validate(result, ctx);
        case "transcription":
          return await transcriptionStrategy.validate(result, ctx);
        case "pii":
          return await piiStrategy.validate(result, ctx);
        case "caption":
          return await captionStrategy.validate(result, ctx);
      }
    } catch (err) {
      if (!isAppError(err, "ENGINE_UNAVAILABLE")) throw err;

      log.warn(
        { err, contentRef: result.contentRef, analyzerId: result.analyzerId, contentType: result.contentType },
        "cross-validation engine unavailable; routing to review"
      );
      return {
        disposition: "PENDING_REVIEW",
        method: "cross_validation_unavailable",
        priority: PRIORITY.medium,
        crossValidation: {
          strategy: result.contentType,
          engineIds: [],
          error: err.message,
        },
        entityVerdicts: null,
      };
    }
  }
}
