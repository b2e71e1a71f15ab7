import type { Context } from "hono";
import { createMiddleware } from "hono/factory";

import { unauthorized } from "../lib/errors.js";
import type { AppEnv } from "../types/env.js";

const ACTOR_ID = /^[\w.@:-]{1,128}$/;

/** Reads the caller identity set by the authenticating layer in front of this service. */
export const actorMiddleware = createMiddleware<AppEnv>(async (c, next) => {
  const raw = c.req.header("x-actor-id")?.trim();
  c.set("actorId", raw && ACTOR_ID.test(raw) ? raw : undefined);
  await next();
});

/** Reviewer operations are attributed; an anonymous caller cannot hold a claim. */
export function requireActor(c: Context<AppEnv>) {
  const actorId = c.get("actorId");
  if (!actorId) throw unauthorized("x-actor-id header is required");
  return actorId;
}
