import { PRIORITY, type PiiEntity, type PiiEntityVerdict } from "@triage/shared";

import { engineUnavailable } from "../../lib/errors.js";
import { callEngine } from "./engine-call.js";
import type { CrossValidationStrategy } from "./types.js";

export const entityKey = (e: PiiEntity) => `${e.entityType}:${e.span.start}:${e.span.end}`;

/**
 * Merges every detector's findings by exact type and span. An entity reported by two or
 * more detectors is confirmed; anything else is singly detected.
 */
export function mergeDetections(detections: ReadonlyArray<{ detectorId: string; entities: readonly PiiEntity[] }>) {
  const merged = new Map<string, { entity: PiiEntity; detectors: Set<string> }>();
  for (const { detectorId, entities } of detections) {
    for (const entity of entities) {
      const key = entityKey(entity);
      const slot = merged.get(key) ?? { entity, detectors: new Set<string>() };
      slot.detectors.add(detectorId);
      merged.set(key, slot);
    }
  }

  return [...merged.values()]
    .map(({ entity, detectors }): PiiEntityVerdict => {
      const confirmed = detectors.size >= 2;
      return {
        entityType: entity.entityType,
        span: { ...entity.span },
        text: entity.text,
        detectors: [...detectors],
        disposition: confirmed ? "AUTO_VERIFIED" : "PENDING_REVIEW",
        method: confirmed ? "cross_validation_agreement" : "single_detector",
      };
    })
    .sort(
      (a, b) =>
        a.span.start - b.span.start || a.span.end - b.span.end || a.entityType.localeCompare(b.entityType)
    );
}

export const piiStrategy: CrossValidationStrategy<"pii"> = {
  contentType: "pii",

  async validate(result, { engines, policy, signal }) {
    // The primary analyzer is one detector; it cannot corroborate itself.
    const secondaries = engines.pii.filter((d) => d.id !== result.analyzerId);
    if (secondaries.length === 0) throw engineUnavailable("pii-secondary", "no independent PII detector configured");

    const secondaryDetections = await Promise.all(
      secondaries.map(async (detector) => ({
        detectorId: detector.id,
        entities: await callEngine(detector.id, policy.timeoutMs, signal, (s) =>
          detector.detect({ text: result.value.text, signal: s })
        ),
      }))
    );

    const entityVerdicts = mergeDetections([
      { detectorId: result.analyzerId, entities: result.value.entities },
      ...secondaryDetections,
    ]);
    const crossValidation = {
      strategy: "pii" as const,
      engineIds: secondaries.map((d) => d.id),
    };

    // The result is only as trusted as its least-trusted entity.
    if (entityVerdicts.some((v) => v.disposition === "PENDING_REVIEW")) {
      return {
        disposition: "PENDING_REVIEW",
        method: "single_detector",
        priority: PRIORITY.medium,
        crossValidation,
        entityVerdicts,
      };
    }
    return {
      disposition: "AUTO_VERIFIED",
      method: "cross_validation_agreement",
      priority: null,
      crossValidation,
      entityVerdicts,
    };
  },
};
