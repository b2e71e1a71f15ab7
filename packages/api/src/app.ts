import { Hono } from "hono";
import { cors } from "hono/cors";
import { randomUUID } from "node:crypto";

import type { AppEnv } from "./types/env.js";
import { getRedisConnection } from "./jobs/queue.js";
import { toErrorResponse } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { withTimeout } from "./lib/timeout.js";
import { actorMiddleware } from "./middleware/actor.js";
import { analysisRoutes, evidenceRoutes } from "./routes/analyses.js";
import { calibrationRoutes } from "./routes/calibration.js";
import { reviewQueueRoutes } from "./routes/review-queue.js";
import type { Runtime } from "./runtime.js";

function parseCorsOrigins() {
  const raw = process.env.CORS_ORIGINS ?? "";
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

async function check(ping: () => Promise<unknown>) {
  const started = Date.now();
  try {
    await withTimeout(5000, () => ping());
    return { status: "ok" as const, latencyMs: Date.now() - started };
  } catch (err) {
    return {
      status: "fail" as const,
      latencyMs: Date.now() - started,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export function createApp(runtime: Runtime) {
  const base = new Hono<AppEnv>();

  base.onError((err, c) => toErrorResponse(c, err));

  base.use(
    "/api/*",
    cors({
      origin: parseCorsOrigins(),
      credentials: false,
      maxAge: 60 * 60 * 24,
    })
  );

  // RequestId + lightweight structured logging.
  base.use("/api/*", async (c, next) => {
    const requestId = randomUUID();
    c.set("requestId", requestId);
    c.header("x-request-id", requestId);

    const started = Date.now();
    try {
      await next();
    } finally {
      logger.info(
        {
          requestId,
          actorId: c.get("actorId"),
          method: c.req.method,
          url: c.req.url,
          statusCode: c.res.status,
          responseTime: Date.now() - started,
        },
        "request"
      );
    }
  });

  base.use("/api/*", actorMiddleware);

  const withRoutes = base
    .get("/api/health", async (c) => {
      const redis = getRedisConnection();
      const [store, queue] = await Promise.all([
        check(() => runtime.store.ping()),
        redis ? check(() => redis.ping()) : Promise.resolve({ status: "skipped" as const, latencyMs: 0 }),
      ]);
      const ok = store.status === "ok" && queue.status !== "fail";

      return c.json(
        {
          status: ok ? "ok" : "degraded",
          timestamp: new Date().toISOString(),
          calibrationTableVersion: runtime.calibrationTable.version,
          auditMode: runtime.audit.mode,
          checks: { store, redis: queue },
        },
        ok ? 200 : 503
      );
    })
    .route("/api/analyses", analysisRoutes(runtime))
    .route("/api/evidence", evidenceRoutes(runtime.pipeline))
    .route("/api/review-queue", reviewQueueRoutes(runtime.reviewQueue))
    .route("/api/calibration", calibrationRoutes(runtime.calibrationRunner))
    .get("/", (c) => c.json({ status: "ok" }));

  withRoutes.notFound((c) =>
    c.json(
      {
        error: {
          code: "NOT_FOUND",
          message: "Not found",
          status: 404,
          requestId: c.get("requestId"),
        },
      },
      404
    )
  );

  return withRoutes;
}

export type AppType = ReturnType<typeof createApp>;
