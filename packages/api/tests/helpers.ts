import type { Hono } from "hono";
import { expect } from "vitest";
import { z } from "zod";

export async function request(
  app: Pick<Hono, "request">,
  opts: { method: "GET" | "POST"; path: string; actorId?: string; json?: unknown; body?: string }
) {
  const headers: Record<string, string> = {};
  if (opts.actorId) headers["x-actor-id"] = opts.actorId;

  let body: string | undefined = opts.body;
  if (opts.json !== undefined) body = JSON.stringify(opts.json);
  if (body !== undefined) headers["content-type"] = "application/json";

  return app.request(opts.path, { method: opts.method, headers, body });
}

const errorBodySchema = z.object({
  error: z.object({ code: z.string(), message: z.string(), status: z.number(), details: z.unknown().optional() }),
});

export async function expectError(res: Response, opts: { status: number; code?: string }) {
  expect(res.ok).toBe(false);
  expect(res.status).toBe(opts.status);
  const json = errorBodySchema.parse(await res.json());
  if (opts.code) expect(json.error.code).toBe(opts.code);
  return json;
}

/** Parses a response body with the shape the test depends on. */
export async function readBody<T extends z.ZodTypeAny>(res: Response, schema: T): Promise<z.infer<T>> {
  return schema.parse(await res.json());
}
