import type { AnomalyRuleName } from "@triage/shared";

import type { AnomalyPolicy } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";
import { standardDeviation, tokenizeWords } from "../lib/text-metrics.js";
import type { AnalysisDraft } from "../types/domain.js";

const log = createLogger("anomaly-detector");

type ContentRule = {
  name: Exclude<AnomalyRuleName, "confidence_instability">;
  fires(draft: AnalysisDraft, policy: AnomalyPolicy, dictionary: ReadonlySet<string>): boolean;
};

const NUMERIC = /^\p{N}+$/u;

export function dictionaryRatio(text: string, dictionary: ReadonlySet<string>): number | null {
  const tokens = tokenizeWords(text);
  if (tokens.length === 0) return null;
  const known = tokens.filter((t) => NUMERIC.test(t) || dictionary.has(t)).length;
  return known / tokens.length;
}

const CONTENT_RULES: ContentRule[] = [
  {
    name: "high_pii_density",
    fires: (d, p) => d.contentType === "pii" && d.value.entities.length > p.maxPiiEntities,
  },
  {
    name: "transcription_length_anomaly",
    fires: (d, p) =>
      d.contentType === "transcription" &&
      Array.from(d.value.text).length > d.value.audioDurationSeconds * p.maxCharsPerSecond,
  },
  {
    name: "ocr_gibberish",
    fires: (d, p, dict) => {
      if (d.contentType !== "ocr") return false;
      const ratio = dictionaryRatio(d.value.text, dict);
      return ratio !== null && ratio < p.minDictionaryRatio;
    },
  },
];

export type InstabilityListener = (event: { analyzerId: string; contentType: string; stddev: number }) => void;

/**
 * Rule engine over single results, plus a sliding-window watch on each analyzer's
 * confidence. Instability is reported against the analyzer and never changes the
 * result being evaluated.
 */
export class AnomalyDetector {
  private readonly windows = new Map<string, number[]>();
  private readonly unstable = new Set<string>();

  constructor(
    private readonly policy: AnomalyPolicy,
    private readonly dictionary: ReadonlySet<string>,
    private readonly onInstability?: InstabilityListener
  ) {}

  /** Returns the content rules that fired, in rule order, and records the confidence sample. */
  evaluate(draft: AnalysisDraft): AnomalyRuleName[] {
    this.observe(draft);
    return CONTENT_RULES.filter((r) => r.fires(draft, this.policy, this.dictionary)).map((r) => r.name);
  }

  isUnstable(analyzerId: string, contentType: string) {
    return this.unstable.has(`${analyzerId}:${contentType}`);
  }

  private observe(draft: AnalysisDraft) {
    const key = `${draft.analyzerId}:${draft.contentType}`;
    const window = this.windows.get(key) ?? [];
    window.push(draft.rawConfidence);
    if (window.length > this.policy.instabilityWindow) window.splice(0, window.length - this.policy.instabilityWindow);
    this.windows.set(key, window);

    if (window.length < this.policy.instabilityMinSamples) return;

    const stddev = standardDeviation(window);
    if (stddev <= this.policy.instabilityStddev) {
      this.unstable.delete(key);
      return;
    }
    if (this.unstable.has(key)) return;

    this.unstable.add(key);
    log.warn(
      { rule: "confidence_instability", analyzerId: draft.analyzerId, contentType: draft.contentType, stddev, samples: window.length },
      "analyzer confidence is unstable"
    );
    this.onInstability?.({ analyzerId: draft.analyzerId, contentType: draft.contentType, stddev });
  }
}
