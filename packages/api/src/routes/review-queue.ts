import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";

import { listPendingQuerySchema, reviewResolveSchema, statsQuerySchema } from "@triage/shared";
import { requireActor } from "../middleware/actor.js";
import type { ReviewQueueManager } from "../services/review-queue.js";
import type { AppEnv } from "../types/env.js";

const reviewIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const validId = zValidator("param", reviewIdParamsSchema, (result) => {
  if (!result.success) throw result.error;
});

export function reviewQueueRoutes(queue: ReviewQueueManager) {
  return new Hono<AppEnv>()
    .get(
      "/",
      zValidator("query", listPendingQuerySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const items = await queue.listPending(c.req.valid("query"));
        return c.json({ items });
      }
    )
    .get(
      "/stats",
      zValidator("query", statsQuerySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        return c.json(await queue.stats(c.req.valid("query")));
      }
    )
    .post("/:id/claim", validId, async (c) => {
      const item = await queue.claim(c.req.valid("param").id, requireActor(c));
      return c.json({ item });
    })
    .post("/:id/release", validId, async (c) => {
      const item = await queue.release(c.req.valid("param").id, requireActor(c));
      return c.json({ item });
    })
    .post("/:id/renew", validId, async (c) => {
      const item = await queue.renew(c.req.valid("param").id, requireActor(c));
      return c.json({ item });
    })
    .post(
      "/:id/resolve",
      validId,
      zValidator("json", reviewResolveSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { id } = c.req.valid("param");
        const body = c.req.valid("json");
        const { item, result } = await queue.resolve(id, requireActor(c), body.decision, body.correctedValue);
        return c.json({ item, result });
      }
    );
}
