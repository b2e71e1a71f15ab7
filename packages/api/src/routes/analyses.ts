import { Hono, type Context } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";

import { enqueueAnalysisSubmission } from "../jobs/analysis-submit.js";
import { badRequest, notFound, serviceUnavailable } from "../lib/errors.js";
import type { TriagePipeline } from "../services/pipeline.js";
import type { TriageStore } from "../store/types.js";
import type { AppEnv } from "../types/env.js";

const analysisIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const contentRefParamsSchema = z.object({
  contentRef: z.string().min(1),
});

async function readJson(c: Context<AppEnv>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (err) {
    throw badRequest("Request body must be valid JSON", { reason: err instanceof Error ? err.message : String(err) });
  }
}

export function analysisRoutes(deps: { pipeline: TriagePipeline; store: TriageStore }) {
  return new Hono<AppEnv>()
    .post("/", async (c) => {
      // The body is validated by ingestion so that rejections are audited.
      const result = await deps.pipeline.submit(await readJson(c), { actorId: c.get("actorId") });
      return c.json({ result }, 201);
    })
    .post("/async", async (c) => {
      const jobId = await enqueueAnalysisSubmission({ submission: await readJson(c), actorId: c.get("actorId") });
      if (!jobId) throw serviceUnavailable("Asynchronous ingestion requires REDIS_URL");
      return c.json({ jobId }, 202);
    })
    .get(
      "/:id",
      zValidator("param", analysisIdParamsSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { id } = c.req.valid("param");
        const result = await deps.store.getResult(id);
        if (!result) throw notFound("analysis_result", id);
        const audit = await deps.store.listAuditEvents({ entityId: id });
        return c.json({ result, audit });
      }
    );
}

export function evidenceRoutes(pipeline: TriagePipeline) {
  return new Hono<AppEnv>().post(
    "/:contentRef/withdraw",
    zValidator("param", contentRefParamsSchema, (result) => {
      if (!result.success) throw result.error;
    }),
    async (c) => {
      const { contentRef } = c.req.valid("param");
      return c.json({ contentRef, cancelled: pipeline.withdraw(contentRef) });
    }
  );
}
