import { z } from "zod";

import {
  CALIBRATION_STATUSES,
  CONTENT_TYPES,
  REVIEW_OUTCOMES,
  REVIEW_STATUSES,
  type ListPendingQuery,
  type ReviewResolveInput,
} from "@triage/shared";
import type { Config } from "./config.js";

// Only the fields the CLI prints are parsed; the API may send more.
export const reviewItemSchema = z.object({
  id: z.string(),
  analysisResultId: z.string(),
  caseRef: z.string().nullable(),
  contentType: z.enum(CONTENT_TYPES),
  priority: z.number().int(),
  reason: z.string(),
  status: z.enum(REVIEW_STATUSES),
  claimedBy: z.string().nullable(),
  leaseExpiresAt: z.string().nullable(),
  outcome: z.enum(REVIEW_OUTCOMES).nullable(),
  createdAt: z.string(),
});
export type ReviewItemView = z.infer<typeof reviewItemSchema>;

export const queueStatsSchema = z.object({
  pendingCount: z.number(),
  resolvedCount: z.number(),
  correctionRate: z.number(),
  falsePositiveRate: z.number(),
  avgReviewLatencyMs: z.number().nullable(),
});
export type QueueStatsView = z.infer<typeof queueStatsSchema>;

export const analyzerReportSchema = z.object({
  analyzerId: z.string(),
  status: z.union([z.enum(CALIBRATION_STATUSES), z.literal("UNKNOWN")]),
  multiplier: z.number(),
  fixtureMissing: z.boolean(),
  instabilityFlagged: z.boolean(),
  history: z.array(
    z.object({
      accuracy: z.number(),
      f1Score: z.number().nullable(),
      sampleCount: z.number(),
      status: z.string(),
      ranAt: z.string(),
    })
  ),
});
export type AnalyzerReportView = z.infer<typeof analyzerReportSchema>;

const resultSummarySchema = z.object({
  id: z.string(),
  contentRef: z.string(),
  analyzerId: z.string(),
  disposition: z.string(),
  value: z.unknown(),
});
export type ResultSummary = z.infer<typeof resultSummarySchema>;

const errorBodySchema = z.object({
  error: z.object({ code: z.string().optional(), message: z.string().optional() }),
});

const calibrationRunResponseSchema = z.union([
  z.object({ queued: z.literal(true), jobId: z.string().nullable() }),
  z.object({
    queued: z.literal(false),
    outcomes: z.array(
      z.object({
        analyzerId: z.string(),
        status: z.string(),
        multiplier: z.number(),
        fixtureMissing: z.boolean(),
        error: z.string().optional(),
      })
    ),
  }),
]);

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly code?: string
  ) {
    super(code ? `${message} (${code})` : message);
    this.name = "ApiError";
  }
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export function createClient(cfg: Config, fetchImpl: FetchLike = fetch) {
  async function apiFetch<T>(schema: z.ZodType<T>, opts: { path: string; method?: "GET" | "POST"; body?: unknown }) {
    const url = new URL(opts.path, cfg.apiUrl).toString();
    const res = await fetchImpl(url, {
      method: opts.method ?? "GET",
      headers: {
        "content-type": "application/json",
        "x-actor-id": cfg.actorId,
      },
      body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
    });

    const text = await res.text();
    let json: unknown = null;
    if (text) {
      try {
        json = JSON.parse(text);
      } catch {
        throw new ApiError(res.status, `Unexpected response body (HTTP ${res.status})`);
      }
    }

    if (!res.ok) {
      const parsed = errorBodySchema.safeParse(json);
      const err = parsed.success ? parsed.data.error : {};
      throw new ApiError(res.status, err.message ?? `HTTP ${res.status}`, err.code);
    }

    return schema.parse(json);
  }

  const itemResponse = z.object({ item: reviewItemSchema });

  return {
    async listPending(query: ListPendingQuery = {}) {
      const params = new URLSearchParams();
      if (query.caseRef) params.set("caseRef", query.caseRef);
      if (query.contentType) params.set("contentType", query.contentType);
      if (query.priority !== undefined) params.set("priority", String(query.priority));
      if (query.limit !== undefined) params.set("limit", String(query.limit));
      const qs = params.toString();
      const res = await apiFetch(z.object({ items: z.array(reviewItemSchema) }), {
        path: `/api/review-queue${qs ? `?${qs}` : ""}`,
      });
      return res.items;
    },

    async stats(caseRef?: string) {
      const qs = caseRef ? `?${new URLSearchParams({ caseRef }).toString()}` : "";
      return apiFetch(queueStatsSchema, { path: `/api/review-queue/stats${qs}` });
    },

    async claim(itemId: string) {
      return (await apiFetch(itemResponse, { path: `/api/review-queue/${itemId}/claim`, method: "POST" })).item;
    },

    async release(itemId: string) {
      return (await apiFetch(itemResponse, { path: `/api/review-queue/${itemId}/release`, method: "POST" })).item;
    },

    async renew(itemId: string) {
      return (await apiFetch(itemResponse, { path: `/api/review-queue/${itemId}/renew`, method: "POST" })).item;
    },

    async resolve(itemId: string, body: ReviewResolveInput) {
      return apiFetch(z.object({ item: reviewItemSchema, result: resultSummarySchema }), {
        path: `/api/review-queue/${itemId}/resolve`,
        method: "POST",
        body,
      });
    },

    async getResult(resultId: string) {
      return (await apiFetch(z.object({ result: resultSummarySchema }), { path: `/api/analyses/${resultId}` })).result;
    },

    async calibrationReport(analyzerId?: string) {
      if (analyzerId) {
        return [await apiFetch(analyzerReportSchema, { path: `/api/calibration/${encodeURIComponent(analyzerId)}` })];
      }
      return (await apiFetch(z.object({ analyzers: z.array(analyzerReportSchema) }), { path: "/api/calibration" }))
        .analyzers;
    },

    async runCalibration(analyzerId?: string) {
      return apiFetch(calibrationRunResponseSchema, {
        path: "/api/calibration/run",
        method: "POST",
        body: analyzerId ? { analyzerId } : {},
      });
    },
  };
}

export type TriageClient = ReturnType<typeof createClient>;
