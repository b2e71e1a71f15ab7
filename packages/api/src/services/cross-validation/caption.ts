import { PRIORITY } from "@triage/shared";

import type { CrossValidationStrategy } from "./types.js";

/**
 * Caption models give no confidence signal comparable across runs, so under the default
 * `review` policy a caption is never auto-verified.
 */
export const captionStrategy: CrossValidationStrategy<"caption"> = {
  contentType: "caption",

  async validate(_result, { policy }) {
    if (policy.captionPolicy === "confidence") {
      return {
        disposition: "AUTO_VERIFIED",
        method: "confidence_threshold",
        priority: null,
        crossValidation: null,
        entityVerdicts: null,
      };
    }
    return {
      disposition: "PENDING_REVIEW",
      method: "caption_policy",
      priority: PRIORITY.low,
      crossValidation: null,
      entityVerdicts: null,
    };
  },
};
