import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";

import { DEFAULT_JOB_OPTS, getCalibrationRunQueue } from "../jobs/queue.js";
import type { CalibrationRunner } from "../services/calibration-runner.js";
import type { AppEnv } from "../types/env.js";

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

const runBodySchema = z.object({
  analyzerId: z.string().min(1).optional(),
});

export function calibrationRoutes(runner: CalibrationRunner) {
  return new Hono<AppEnv>()
    .get(
      "/",
      zValidator("query", historyQuerySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { limit } = c.req.valid("query");
        return c.json({ analyzers: await runner.reportAll(limit) });
      }
    )
    .get(
      "/:analyzerId",
      zValidator("query", historyQuerySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { limit } = c.req.valid("query");
        return c.json(await runner.report(c.req.param("analyzerId"), limit));
      }
    )
    .post(
      "/run",
      zValidator("json", runBodySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { analyzerId } = c.req.valid("json");

        // With a worker fleet the run belongs on the queue; otherwise run it here.
        const queue = getCalibrationRunQueue();
        if (queue) {
          const job = await queue.add("calibration:run", { analyzerId }, DEFAULT_JOB_OPTS);
          return c.json({ queued: true, jobId: job.id ?? null }, 202);
        }

        const outcomes = analyzerId ? [await runner.runAnalyzer(analyzerId)] : await runner.runAll();
        return c.json({ queued: false, outcomes });
      }
    );
}
