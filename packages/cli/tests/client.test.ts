import { describe, expect, it, vi } from "vitest";

import { ApiError, createClient } from "../src/client.js";

const cfg = { apiUrl: "http://localhost:3000", actorId: "examiner-7" };

const item = {
  id: "6f1c2a34-9a0e-4d59-8d1c-2b4f7e0c9a11",
  analysisResultId: "0b7d4e52-1f3a-4c8e-9d2b-5a6c7e8f9012",
  caseRef: "case-9",
  contentType: "ocr",
  priority: 2,
  reason: "confidence_medium",
  status: "CLAIMED",
  claimedBy: "examiner-7",
  claimedAt: "2026-03-02T09:00:00.000Z",
  leaseExpiresAt: "2026-03-02T09:15:00.000Z",
  outcome: null,
  correctedValue: null,
  createdAt: "2026-03-02T08:59:00.000Z",
};

function fakeFetch(status: number, body: unknown) {
  return vi.fn(async (_url: string, _init: RequestInit) => {
    const text = typeof body === "string" ? body : JSON.stringify(body);
    return new Response(text, { status, headers: { "content-type": "application/json" } });
  });
}

describe("api client", () => {
  it("sends the examiner id and builds the pending query", async () => {
    const fetch = fakeFetch(200, { items: [item] });
    const client = createClient(cfg, fetch);

    const items = await client.listPending({ caseRef: "case-9", priority: 1, limit: 5 });

    expect(items.map((i) => i.id)).toEqual([item.id]);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:3000/api/review-queue?caseRef=case-9&priority=1&limit=5");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ "content-type": "application/json", "x-actor-id": "examiner-7" });
    expect(init?.body).toBeUndefined();
  });

  it("omits the query string when there are no filters", async () => {
    const fetch = fakeFetch(200, { items: [] });
    await createClient(cfg, fetch).listPending();
    expect(fetch.mock.calls[0]?.[0]).toBe("http://localhost:3000/api/review-queue");
  });

  it("posts resolve decisions as JSON", async () => {
    const fetch = fakeFetch(200, {
      item: { ...item, status: "RESOLVED", outcome: "corrected" },
      result: {
        id: item.analysisResultId,
        contentRef: "media:img-001",
        analyzerId: "tesseract@5",
        disposition: "HUMAN_VERIFIED",
        value: { text: "Account 12345" },
      },
    });

    const out = await createClient(cfg, fetch).resolve(item.id, { decision: "correct", correctedValue: "Account 12346" });

    expect(out.item.outcome).toBe("corrected");
    expect(out.result.disposition).toBe("HUMAN_VERIFIED");
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(`http://localhost:3000/api/review-queue/${item.id}/resolve`);
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"decision":"correct","correctedValue":"Account 12346"}');
  });

  it("turns error envelopes into ApiError", async () => {
    const fetch = fakeFetch(409, { error: { code: "CONFLICT", message: "Item is claimed by examiner-2", status: 409 } });

    const err = await createClient(cfg, fetch)
      .claim(item.id)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 409, code: "CONFLICT", message: "Item is claimed by examiner-2 (CONFLICT)" });
  });

  it("reports a non-JSON body by status", async () => {
    const fetch = fakeFetch(502, "Bad gateway");
    await expect(createClient(cfg, fetch).stats()).rejects.toThrow("Unexpected response body (HTTP 502)");
  });

  it("falls back to the HTTP status when the error has no envelope", async () => {
    const fetch = fakeFetch(500, { oops: true });
    await expect(createClient(cfg, fetch).stats()).rejects.toThrow("HTTP 500");
  });

  it("encodes analyzer ids in calibration paths", async () => {
    const fetch = fakeFetch(200, {
      analyzerId: "tesseract@5",
      status: "DEGRADED",
      multiplier: 0.8,
      tableVersion: 3,
      fixtureMissing: false,
      instabilityFlagged: false,
      history: [],
    });

    const reports = await createClient(cfg, fetch).calibrationReport("tesseract@5");

    expect(reports).toHaveLength(1);
    expect(reports[0]?.status).toBe("DEGRADED");
    expect(fetch.mock.calls[0]?.[0]).toBe("http://localhost:3000/api/calibration/tesseract%405");
  });

  it("distinguishes queued and inline calibration runs", async () => {
    const queued = await createClient(cfg, fakeFetch(202, { queued: true, jobId: "42" })).runCalibration();
    expect(queued).toEqual({ queued: true, jobId: "42" });

    const inline = await createClient(
      cfg,
      fakeFetch(200, {
        queued: false,
        outcomes: [{ analyzerId: "tesseract@5", status: "HEALTHY", multiplier: 1, fixtureMissing: false, run: null }],
      })
    ).runCalibration("tesseract@5");
    expect(inline.queued).toBe(false);
  });
});
