import { and, asc, desc, eq, lte, or, sql, type SQL } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import { analysisPayloadSchema, type AuditEvent } from "@triage/shared";
import type { Db } from "../db/index.js";
import * as schema from "../db/schema/index.js";
import { analysisResults, auditEvents, calibrationRuns, reviewQueue } from "../db/schema/index.js";
import { conflict } from "../lib/errors.js";
import type { AnalysisResult, PendingFilter, QueueCounts, ReviewQueueItem } from "../types/domain.js";
import type { TriageReader, TriageStore, TriageTx } from "./types.js";

type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
type ResultRow = typeof analysisResults.$inferSelect;

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(err: unknown): boolean {
  if (err instanceof postgres.PostgresError) return err.code === UNIQUE_VIOLATION;
  if (err instanceof Error && err.cause !== undefined) return isUniqueViolation(err.cause);
  return false;
}

function toResult(row: ResultRow): AnalysisResult {
  const { contentType, value, ...rest } = row;
  // The jsonb value is re-validated against its content type before it re-enters the domain.
  const payload = analysisPayloadSchema.parse({ contentType, value });
  return { ...rest, ...payload };
}

const open = sql`${reviewQueue.status} IN ('PENDING', 'CLAIMED')`;

function claimable(now: Date): SQL | undefined {
  return or(
    eq(reviewQueue.status, "PENDING"),
    and(eq(reviewQueue.status, "CLAIMED"), lte(reviewQueue.leaseExpiresAt, now))
  );
}

function heldBy(id: string, reviewerId: string): SQL | undefined {
  return and(eq(reviewQueue.id, id), eq(reviewQueue.status, "CLAIMED"), eq(reviewQueue.claimedBy, reviewerId));
}

function reader(db: Executor): TriageReader {
  return {
    async getResult(id) {
      const [row] = await db.select().from(analysisResults).where(eq(analysisResults.id, id)).limit(1);
      return row ? toResult(row) : null;
    },

    async getQueueItem(id) {
      const [row] = await db.select().from(reviewQueue).where(eq(reviewQueue.id, id)).limit(1);
      return row ?? null;
    },

    async findOpenItemForResult(analysisResultId) {
      const [row] = await db
        .select()
        .from(reviewQueue)
        .where(and(eq(reviewQueue.analysisResultId, analysisResultId), open))
        .limit(1);
      return row ?? null;
    },
  };
}

function txView(tx: Executor): TriageTx {
  return {
    ...reader(tx),

    async insertResult(result) {
      await tx.insert(analysisResults).values(result);
    },

    async updateResultReview(id, patch) {
      const [row] = await tx.update(analysisResults).set(patch).where(eq(analysisResults.id, id)).returning();
      return row ? toResult(row) : null;
    },

    async insertQueueItem(item) {
      try {
        await tx.insert(reviewQueue).values(item);
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw conflict("An open review item already exists for this analysis result", {
            analysisResultId: item.analysisResultId,
          });
        }
        throw err;
      }
    },

    async claimItem({ id, reviewerId, now, leaseExpiresAt }) {
      const [row] = await tx
        .update(reviewQueue)
        .set({ status: "CLAIMED", claimedBy: reviewerId, claimedAt: now, leaseExpiresAt, updatedAt: now })
        .where(and(eq(reviewQueue.id, id), claimable(now)))
        .returning();
      return row ?? null;
    },

    async releaseItem({ id, reviewerId, now }) {
      const [row] = await tx
        .update(reviewQueue)
        .set({ status: "PENDING", claimedBy: null, claimedAt: null, leaseExpiresAt: null, updatedAt: now })
        .where(heldBy(id, reviewerId))
        .returning();
      return row ?? null;
    },

    async renewItem({ id, reviewerId, now, leaseExpiresAt }) {
      const [row] = await tx
        .update(reviewQueue)
        .set({ leaseExpiresAt, updatedAt: now })
        .where(heldBy(id, reviewerId))
        .returning();
      return row ?? null;
    },

    async resolveItem({ id, reviewerId, outcome, correctedValue, now }) {
      const [row] = await tx
        .update(reviewQueue)
        .set({ status: "RESOLVED", outcome, correctedValue, resolvedBy: reviewerId, resolvedAt: now, updatedAt: now })
        .where(heldBy(id, reviewerId))
        .returning();
      return row ?? null;
    },

    async appendCalibrationRun(run) {
      await tx.insert(calibrationRuns).values(run);
    },
  };
}

export function createPostgresStore(db: Db): TriageStore {
  return {
    ...reader(db),

    transaction<T>(fn: (tx: TriageTx) => Promise<T>) {
      return db.transaction((tx) => fn(txView(tx)));
    },

    async listPending(opts: PendingFilter & { now: Date; limit: number }): Promise<ReviewQueueItem[]> {
      const where = [claimable(opts.now)];
      if (opts.caseRef !== undefined) where.push(eq(reviewQueue.caseRef, opts.caseRef));
      if (opts.contentType !== undefined) where.push(eq(reviewQueue.contentType, opts.contentType));
      if (opts.priority !== undefined) where.push(eq(reviewQueue.priority, opts.priority));

      return db
        .select()
        .from(reviewQueue)
        .where(and(...where))
        .orderBy(asc(reviewQueue.priority), asc(reviewQueue.createdAt), asc(reviewQueue.id))
        .limit(opts.limit);
    },

    async queueCounts(opts): Promise<QueueCounts> {
      const [row] = await db
        .select({
          openCount: sql<number>`count(*) filter (where ${open})`.mapWith(Number),
          resolvedCount: sql<number>`count(*) filter (where ${reviewQueue.status} = 'RESOLVED')`.mapWith(Number),
          correctedCount: sql<number>`count(*) filter (where ${reviewQueue.outcome} = 'corrected')`.mapWith(Number),
          rejectedCount: sql<number>`count(*) filter (where ${reviewQueue.outcome} = 'rejected')`.mapWith(Number),
          avgReviewLatencyMs: sql<string | null>`avg(extract(epoch from (${reviewQueue.resolvedAt} - ${reviewQueue.createdAt})) * 1000) filter (where ${reviewQueue.status} = 'RESOLVED')`,
        })
        .from(reviewQueue)
        .where(opts.caseRef === undefined ? undefined : eq(reviewQueue.caseRef, opts.caseRef));

      return {
        openCount: row?.openCount ?? 0,
        resolvedCount: row?.resolvedCount ?? 0,
        correctedCount: row?.correctedCount ?? 0,
        rejectedCount: row?.rejectedCount ?? 0,
        avgReviewLatencyMs: row?.avgReviewLatencyMs == null ? null : Number(row.avgReviewLatencyMs),
      };
    },

    async listCalibrationRuns(opts) {
      const query = db
        .select()
        .from(calibrationRuns)
        .where(opts.analyzerId === undefined ? undefined : eq(calibrationRuns.analyzerId, opts.analyzerId))
        .orderBy(desc(calibrationRuns.ranAt));
      return opts.limit === undefined ? await query : await query.limit(opts.limit);
    },

    async latestCalibrationRuns() {
      return db
        .selectDistinctOn([calibrationRuns.analyzerId])
        .from(calibrationRuns)
        .orderBy(calibrationRuns.analyzerId, desc(calibrationRuns.ranAt));
    },

    async appendAuditEvent(event: AuditEvent) {
      await db
        .insert(auditEvents)
        .values({
          id: event.id,
          entityType: event.entityType,
          entityId: event.entityId,
          action: event.action,
          actorId: event.actorId,
          occurredAt: new Date(event.timestamp),
          details: event.details,
        })
        .onConflictDoNothing({ target: auditEvents.id });
    },

    async listAuditEvents(opts) {
      const rows = await db
        .select()
        .from(auditEvents)
        .where(opts.entityId === undefined ? undefined : eq(auditEvents.entityId, opts.entityId))
        .orderBy(desc(auditEvents.occurredAt))
        .limit(opts.limit ?? 100);

      return rows.reverse().map((row) => ({
        id: row.id,
        entityType: row.entityType,
        entityId: row.entityId,
        action: row.action,
        actorId: row.actorId,
        timestamp: row.occurredAt.toISOString(),
        details: row.details,
      }));
    },

    async ping() {
      await db.execute(sql`select 1`);
    },
  };
}
