import { describe, expect, it } from "vitest";
import { z } from "zod";

import { createApp } from "../src/app.js";
import { MemoryFixtures, buildTestRuntime, fakeOcr, ocrFixtures, ocrSubmission, ocrTargetScoring } from "./factories.js";
import { expectError, readBody, request } from "./helpers.js";

const resultBody = z.object({
  result: z.object({ id: z.string(), disposition: z.string(), verificationMethod: z.string() }).passthrough(),
});
const itemsBody = z.object({ items: z.array(z.object({ id: z.string(), status: z.string() }).passthrough()) });

function setup() {
  const ocr = fakeOcr(async () => "Account 12345");
  const built = buildTestRuntime({
    engines: { ocr },
    targets: [ocrTargetScoring("tesseract@5", 7)],
    fixtures: new MemoryFixtures().set("tesseract@5", ocrFixtures(10)),
  });
  return { ...built, app: createApp(built.runtime) };
}

describe("HTTP API", () => {
  it("takes a submission through review to a human verdict", async () => {
    const { app } = setup();

    const submitted = await request(app, {
      method: "POST",
      path: "/api/analyses",
      actorId: "ingest-bot",
      json: ocrSubmission("Account 12345", { caseRef: "case-7" }),
    });
    expect(submitted.status).toBe(201);
    const { result } = await readBody(submitted, resultBody);
    expect(result.disposition).toBe("PENDING_REVIEW");

    const listed = await request(app, { method: "GET", path: "/api/review-queue?caseRef=case-7&priority=2" });
    expect(listed.status).toBe(200);
    const { items } = await readBody(listed, itemsBody);
    expect(items.map((i) => i.status)).toEqual(["PENDING"]);
    const itemId = items[0].id;

    await expectError(await request(app, { method: "POST", path: `/api/review-queue/${itemId}/claim` }), {
      status: 401,
      code: "UNAUTHORIZED",
    });

    const claimed = await request(app, { method: "POST", path: `/api/review-queue/${itemId}/claim`, actorId: "examiner-1" });
    expect(claimed.status).toBe(200);
    expect(await claimed.json()).toMatchObject({ item: { id: itemId, status: "CLAIMED", claimedBy: "examiner-1" } });

    const contested = await expectError(
      await request(app, { method: "POST", path: `/api/review-queue/${itemId}/claim`, actorId: "examiner-2" }),
      { status: 409, code: "ALREADY_CLAIMED" }
    );
    expect(contested.error.details).toMatchObject({ claimedBy: "examiner-1" });

    await expectError(
      await request(app, {
        method: "POST",
        path: `/api/review-queue/${itemId}/resolve`,
        actorId: "examiner-1",
        json: { decision: "correct" },
      }),
      { status: 422, code: "VALIDATION_ERROR" }
    );

    const resolved = await request(app, {
      method: "POST",
      path: `/api/review-queue/${itemId}/resolve`,
      actorId: "examiner-1",
      json: { decision: "correct", correctedValue: "Account 12346" },
    });
    expect(resolved.status).toBe(200);
    expect(await resolved.json()).toMatchObject({
      item: { status: "RESOLVED", outcome: "corrected" },
      result: { id: result.id, disposition: "HUMAN_VERIFIED", correctedValue: "Account 12346" },
    });

    await expectError(
      await request(app, {
        method: "POST",
        path: `/api/review-queue/${itemId}/resolve`,
        actorId: "examiner-1",
        json: { decision: "approve" },
      }),
      { status: 409, code: "ALREADY_RESOLVED" }
    );

    const fetched = await request(app, { method: "GET", path: `/api/analyses/${result.id}` });
    const body = await readBody(
      fetched,
      z.object({ result: z.object({ disposition: z.string() }), audit: z.array(z.object({ action: z.string(), actorId: z.string() })) })
    );
    expect(body.result.disposition).toBe("HUMAN_VERIFIED");
    expect(body.audit).toEqual([
      { action: "analysis_result.disposition_assigned", actorId: "ingest-bot" },
      { action: "analysis_result.disposition_changed", actorId: "examiner-1" },
    ]);

    const stats = await request(app, { method: "GET", path: "/api/review-queue/stats?caseRef=case-7" });
    expect(await stats.json()).toEqual({
      pendingCount: 0,
      resolvedCount: 1,
      correctionRate: 1,
      falsePositiveRate: 0,
      avgReviewLatencyMs: 0,
    });
  });

  it("releases and renews claims", async () => {
    const { app, runtime } = setup();
    const { item } = await (async () => {
      const result = await runtime.pipeline.submit(ocrSubmission("Account 12345"));
      const open = await runtime.store.findOpenItemForResult(result.id);
      if (!open) throw new Error("expected a review item");
      return { item: open };
    })();

    await request(app, { method: "POST", path: `/api/review-queue/${item.id}/claim`, actorId: "examiner-1" });
    const renewed = await request(app, { method: "POST", path: `/api/review-queue/${item.id}/renew`, actorId: "examiner-1" });
    expect(renewed.status).toBe(200);

    await expectError(
      await request(app, { method: "POST", path: `/api/review-queue/${item.id}/release`, actorId: "examiner-2" }),
      { status: 409, code: "CLAIM_NOT_HELD" }
    );
    const released = await request(app, { method: "POST", path: `/api/review-queue/${item.id}/release`, actorId: "examiner-1" });
    expect(await released.json()).toMatchObject({ item: { status: "PENDING", claimedBy: null } });
  });

  it("rejects malformed requests", async () => {
    const { app, sink } = setup();

    await expectError(await request(app, { method: "POST", path: "/api/analyses", body: "{not json" }), {
      status: 400,
      code: "BAD_REQUEST",
    });
    await expectError(
      await request(app, {
        method: "POST",
        path: "/api/analyses",
        json: { contentRef: "media:img-001", analyzerId: "tesseract@5", rawConfidence: 2, contentType: "ocr", value: { text: "x" } },
      }),
      { status: 422, code: "VALIDATION_ERROR" }
    );
    expect(sink.actions()).toEqual(["submission.rejected"]);

    await expectError(await request(app, { method: "GET", path: "/api/analyses/not-a-uuid" }), {
      status: 422,
      code: "VALIDATION_ERROR",
    });
    await expectError(
      await request(app, { method: "GET", path: "/api/analyses/00000000-0000-4000-8000-000000000000" }),
      { status: 404, code: "NOT_FOUND" }
    );
    await expectError(await request(app, { method: "GET", path: "/api/review-queue?priority=4" }), {
      status: 422,
      code: "VALIDATION_ERROR",
    });
    await expectError(await request(app, { method: "GET", path: "/api/nowhere" }), { status: 404, code: "NOT_FOUND" });
  });

  it("refuses async ingestion without a queue", async () => {
    const { app } = setup();

    await expectError(
      await request(app, { method: "POST", path: "/api/analyses/async", json: ocrSubmission("Account 12345") }),
      { status: 503, code: "SERVICE_UNAVAILABLE" }
    );
  });

  it("withdraws evidence", async () => {
    const { app } = setup();

    const res = await request(app, { method: "POST", path: `/api/evidence/${encodeURIComponent("media:img-001")}/withdraw` });
    expect(await res.json()).toEqual({ contentRef: "media:img-001", cancelled: 0 });
  });

  it("runs calibration in process and reports it", async () => {
    const { app } = setup();

    const run = await request(app, { method: "POST", path: "/api/calibration/run", json: {} });
    expect(run.status).toBe(200);
    expect(await run.json()).toMatchObject({
      queued: false,
      outcomes: [{ analyzerId: "tesseract@5", status: "DEGRADED", multiplier: 0.8 }],
    });

    const report = await request(app, { method: "GET", path: "/api/calibration/tesseract@5" });
    expect(await report.json()).toMatchObject({ analyzerId: "tesseract@5", status: "DEGRADED", history: [{ accuracy: 0.7 }] });

    const all = await request(app, { method: "GET", path: "/api/calibration" });
    expect(await all.json()).toMatchObject({ analyzers: [{ analyzerId: "tesseract@5" }] });
  });

  it("reports health", async () => {
    const { app } = setup();

    const res = await request(app, { method: "GET", path: "/api/health" });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      calibrationTableVersion: 0,
      auditMode: "sync",
      checks: { store: { status: "ok" }, redis: { status: "skipped" } },
    });
  });
});
