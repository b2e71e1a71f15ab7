import { z } from "zod";

import { piiEntitySchema } from "@triage/shared";
import type { CalibrationTargetConfig, TriageConfig } from "../lib/config.js";
import type { CalibrationTarget } from "./calibration-runner.js";
import { PatternPiiDetector, type OcrEngine, type PiiDetector, type SecondaryEngines, type TranscriptionEngine } from "./engines.js";

const textResponseSchema = z.object({ text: z.string() });
const entitiesResponseSchema = z.object({ entities: z.array(piiEntitySchema) });

async function postJson<T>(engineId: string, url: string, body: unknown, schema: z.ZodType<T>, signal: AbortSignal) {
  const res = await fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
    signal,
  });
  if (!res.ok) {
    const detail = await res.text().catch(() => "");
    throw new Error(`${engineId} responded ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`);
  }
  return schema.parse(await res.json());
}

export function httpOcrEngine(url: string, id = "ocr-secondary"): OcrEngine {
  return {
    id,
    async recognize({ contentRef, signal }) {
      const res = await postJson(id, url, { contentRef }, textResponseSchema, signal);
      return res.text;
    },
  };
}

export function httpTranscriptionEngine(url: string, id = "transcription-resample"): TranscriptionEngine {
  return {
    id,
    async transcribe({ contentRef, startSeconds, endSeconds, signal }) {
      const res = await postJson(id, url, { contentRef, startSeconds, endSeconds }, textResponseSchema, signal);
      return res.text;
    },
  };
}

export function httpPiiDetector(url: string, id = "pii-ner"): PiiDetector {
  return {
    id,
    async detect({ text, signal }) {
      const res = await postJson(id, url, { text }, entitiesResponseSchema, signal);
      return res.entities;
    },
  };
}

/** Secondary engines from configuration. Unset URLs leave that engine unavailable. */
export function enginesFromConfig(config: TriageConfig["engines"]): SecondaryEngines {
  const pii: PiiDetector[] = [new PatternPiiDetector()];
  if (config.piiNerUrl) pii.push(httpPiiDetector(config.piiNerUrl));
  return {
    ocr: config.ocrSecondaryUrl ? httpOcrEngine(config.ocrSecondaryUrl) : null,
    transcription: config.transcriptionResampleUrl ? httpTranscriptionEngine(config.transcriptionResampleUrl) : null,
    pii,
  };
}

/** An analyzer reachable over HTTP, called with `{ input }` during calibration. */
export function httpCalibrationTarget(cfg: CalibrationTargetConfig): CalibrationTarget {
  const base = { analyzerId: cfg.analyzerId, minAccuracy: cfg.minAccuracy, hardFloor: cfg.hardFloor };
  if (cfg.contentType === "pii") {
    return {
      ...base,
      contentType: "pii",
      analyze: async (input, signal) => (await postJson(cfg.analyzerId, cfg.url, { input }, entitiesResponseSchema, signal)).entities,
    };
  }
  return {
    ...base,
    contentType: cfg.contentType,
    analyze: async (input, signal) => (await postJson(cfg.analyzerId, cfg.url, { input }, textResponseSchema, signal)).text,
  };
}
