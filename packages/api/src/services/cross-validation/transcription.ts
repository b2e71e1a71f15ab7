import { PRIORITY, type TranscriptionValue } from "@triage/shared";

import { engineUnavailable } from "../../lib/errors.js";
import { normalizeText, wordErrorRate } from "../../lib/text-metrics.js";
import { callEngine } from "./engine-call.js";
import type { CrossValidationStrategy } from "./types.js";

export type SampleWindow = { startSeconds: number; endSeconds: number };

/** A window of `fraction` of the audio, centred in it. */
export function sampleWindow(durationSeconds: number, fraction: number): SampleWindow {
  const length = durationSeconds * fraction;
  const startSeconds = (durationSeconds - length) / 2;
  return { startSeconds, endSeconds: startSeconds + length };
}

/** The words of a span `[start, end)` that fall inside `window`, assuming even pacing. */
function wordsWithin(text: string, start: number, end: number, window: SampleWindow) {
  const words = normalizeText(text).split(" ").filter(Boolean);
  const length = end - start;
  if (length <= 0) return [];
  const from = Math.round((words.length * (Math.max(start, window.startSeconds) - start)) / length);
  const to = Math.round((words.length * (Math.min(end, window.endSeconds) - start)) / length);
  return words.slice(from, to);
}

/**
 * The part of the original transcript that covers `window`: the share of each overlapping
 * timed segment inside it when the engine produced segments, otherwise the proportional
 * slice of the whole transcript.
 */
export function referenceText(value: TranscriptionValue, window: SampleWindow) {
  const overlapping = (value.segments ?? [])
    .filter((s) => s.endSeconds > window.startSeconds && s.startSeconds < window.endSeconds)
    .sort((a, b) => a.startSeconds - b.startSeconds);
  if (overlapping.length > 0) {
    return overlapping.flatMap((s) => wordsWithin(s.text, s.startSeconds, s.endSeconds, window)).join(" ");
  }
  return wordsWithin(value.text, 0, value.audioDurationSeconds, window).join(" ");
}

export const transcriptionStrategy: CrossValidationStrategy<"transcription"> = {
  contentType: "transcription",

  async validate(result, { engines, policy, signal }) {
    const engine = engines.transcription;
    if (!engine) throw engineUnavailable("transcription-resample", "no resampling engine configured");

    const window = sampleWindow(result.value.audioDurationSeconds, policy.transcriptionSampleFraction);
    const secondaryText = await callEngine(engine.id, policy.timeoutMs, signal, (s) =>
      engine.transcribe({ contentRef: result.contentRef, ...window, signal: s })
    );
    const wer = wordErrorRate(referenceText(result.value, window), secondaryText);
    const crossValidation = { strategy: "transcription" as const, engineIds: [engine.id], wer, secondaryText, window };

    if (wer <= policy.maxWer) {
      return {
        disposition: "AUTO_VERIFIED",
        method: "cross_validation_agreement",
        priority: null,
        crossValidation,
        entityVerdicts: null,
      };
    }
    return {
      disposition: "PENDING_REVIEW",
      method: "high_wer",
      priority: PRIORITY.high,
      crossValidation,
      entityVerdicts: null,
    };
  },
};
