import { afterEach, describe, expect, it, vi } from "vitest";

import {
  enginesFromConfig,
  httpCalibrationTarget,
  httpOcrEngine,
  httpTranscriptionEngine,
} from "../src/services/http-engines.js";

function stubFetch(status: number, body: unknown) {
  const fetch = vi.fn(async (_url: string, _init: RequestInit) => {
    const text = typeof body === "string" ? body : JSON.stringify(body);
    return new Response(text, { status });
  });
  vi.stubGlobal("fetch", fetch);
  return fetch;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("http engines", () => {
  it("posts the content reference to the secondary OCR engine", async () => {
    const fetch = stubFetch(200, { text: "Account 12345" });
    const engine = httpOcrEngine("http://ocr.internal/recognize");

    const text = await engine.recognize({ contentRef: "media:img-001", signal: new AbortController().signal });

    expect(text).toBe("Account 12345");
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("http://ocr.internal/recognize");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"contentRef":"media:img-001"}');
  });

  it("sends the transcription window", async () => {
    const fetch = stubFetch(200, { text: "call me" });
    const engine = httpTranscriptionEngine("http://asr.internal/transcribe");

    await engine.transcribe({
      contentRef: "media:call-001",
      startSeconds: 3,
      endSeconds: 6,
      signal: new AbortController().signal,
    });

    expect(fetch.mock.calls[0]?.[1].body).toBe('{"contentRef":"media:call-001","startSeconds":3,"endSeconds":6}');
  });

  it("fails with the engine id and status on a non-2xx response", async () => {
    stubFetch(503, "model warming up");
    const engine = httpOcrEngine("http://ocr.internal/recognize");

    await expect(engine.recognize({ contentRef: "media:img-001", signal: new AbortController().signal })).rejects.toThrow(
      "ocr-secondary responded 503: model warming up"
    );
  });

  it("rejects a response that does not match the engine contract", async () => {
    stubFetch(200, { transcript: "wrong field" });
    const engine = httpOcrEngine("http://ocr.internal/recognize");

    await expect(engine.recognize({ contentRef: "media:img-001", signal: new AbortController().signal })).rejects.toThrow();
  });

  it("builds only the engines that have a URL", () => {
    const engines = enginesFromConfig({ piiNerUrl: "http://ner.internal/detect" });

    expect(engines.ocr).toBeNull();
    expect(engines.transcription).toBeNull();
    expect(engines.pii.map((d) => d.id)).toEqual(["pattern-matcher", "pii-ner"]);
  });

  it("calls PII calibration targets with the fixture input", async () => {
    const entity = { entityType: "PHONE_NUMBER", span: { start: 5, end: 17 }, text: "555-123-4567" };
    const fetch = stubFetch(200, { entities: [entity] });
    const target = httpCalibrationTarget({
      analyzerId: "ner@2",
      contentType: "pii",
      url: "http://ner.internal/analyze",
      minAccuracy: 0.9,
    });

    expect(target).toMatchObject({ analyzerId: "ner@2", contentType: "pii", minAccuracy: 0.9 });
    await expect(target.analyze("Call 555-123-4567", new AbortController().signal)).resolves.toEqual([entity]);
    expect(fetch.mock.calls[0]?.[1].body).toBe('{"input":"Call 555-123-4567"}');
  });
});
