import type { AuditEvent } from "@triage/shared";

import { conflict } from "../lib/errors.js";
import type { AnalysisResult, CalibrationRun, PendingFilter, QueueCounts, ReviewQueueItem } from "../types/domain.js";
import type { TriageStore, TriageTx } from "./types.js";

type State = {
  results: Map<string, AnalysisResult>;
  items: Map<string, ReviewQueueItem>;
  runs: CalibrationRun[];
};

const isOpen = (item: ReviewQueueItem) => item.status === "PENDING" || item.status === "CLAIMED";

const leaseLapsed = (item: ReviewQueueItem, now: Date) =>
  item.status === "CLAIMED" && item.leaseExpiresAt !== null && item.leaseExpiresAt.getTime() <= now.getTime();

/**
 * Process-local store for tests and local development. Transactions are serialised
 * and roll back by restoring a snapshot, so a failed transaction leaves no partial rows.
 */
export class MemoryStore implements TriageStore {
  private state: State = { results: new Map(), items: new Map(), runs: [] };
  private audit: AuditEvent[] = [];
  private tail: Promise<unknown> = Promise.resolve();

  async getResult(id: string) {
    const row = this.state.results.get(id);
    return row ? structuredClone(row) : null;
  }

  async getQueueItem(id: string) {
    const row = this.state.items.get(id);
    return row ? structuredClone(row) : null;
  }

  async findOpenItemForResult(analysisResultId: string) {
    for (const item of this.state.items.values()) {
      if (item.analysisResultId === analysisResultId && isOpen(item)) return structuredClone(item);
    }
    return null;
  }

  transaction<T>(fn: (tx: TriageTx) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runTransaction(fn));
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(fn: (tx: TriageTx) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    try {
      return await fn(this.txView());
    } catch (err) {
      this.state = snapshot;
      throw err;
    }
  }

  private txView(): TriageTx {
    const state = () => this.state;
    const reader = this;

    return {
      getResult: (id) => reader.getResult(id),
      getQueueItem: (id) => reader.getQueueItem(id),
      findOpenItemForResult: (id) => reader.findOpenItemForResult(id),

      async insertResult(result) {
        if (state().results.has(result.id)) throw conflict("Analysis result already exists", { id: result.id });
        state().results.set(result.id, structuredClone(result));
      },

      async updateResultReview(id, patch) {
        const row = state().results.get(id);
        if (!row) return null;
        const next: AnalysisResult = { ...row, ...patch };
        state().results.set(id, next);
        return structuredClone(next);
      },

      async insertQueueItem(item) {
        for (const existing of state().items.values()) {
          if (existing.analysisResultId === item.analysisResultId && isOpen(existing)) {
            throw conflict("An open review item already exists for this analysis result", {
              analysisResultId: item.analysisResultId,
              reviewItemId: existing.id,
            });
          }
        }
        state().items.set(item.id, structuredClone(item));
      },

      async claimItem({ id, reviewerId, now, leaseExpiresAt }) {
        const item = state().items.get(id);
        if (!item || !(item.status === "PENDING" || leaseLapsed(item, now))) return null;
        const next: ReviewQueueItem = {
          ...item,
          status: "CLAIMED",
          claimedBy: reviewerId,
          claimedAt: now,
          leaseExpiresAt,
          updatedAt: now,
        };
        state().items.set(id, next);
        return structuredClone(next);
      },

      async releaseItem({ id, reviewerId, now }) {
        const item = state().items.get(id);
        if (!item || item.status !== "CLAIMED" || item.claimedBy !== reviewerId) return null;
        const next: ReviewQueueItem = {
          ...item,
          status: "PENDING",
          claimedBy: null,
          claimedAt: null,
          leaseExpiresAt: null,
          updatedAt: now,
        };
        state().items.set(id, next);
        return structuredClone(next);
      },

      async renewItem({ id, reviewerId, now, leaseExpiresAt }) {
        const item = state().items.get(id);
        if (!item || item.status !== "CLAIMED" || item.claimedBy !== reviewerId) return null;
        const next: ReviewQueueItem = { ...item, leaseExpiresAt, updatedAt: now };
        state().items.set(id, next);
        return structuredClone(next);
      },

      async resolveItem({ id, reviewerId, outcome, correctedValue, now }) {
        const item = state().items.get(id);
        if (!item || item.status !== "CLAIMED" || item.claimedBy !== reviewerId) return null;
        const next: ReviewQueueItem = {
          ...item,
          status: "RESOLVED",
          outcome,
          correctedValue,
          resolvedBy: reviewerId,
          resolvedAt: now,
          updatedAt: now,
        };
        state().items.set(id, next);
        return structuredClone(next);
      },

      async appendCalibrationRun(run) {
        state().runs.push(structuredClone(run));
      },
    };
  }

  async listPending(opts: PendingFilter & { now: Date; limit: number }) {
    return [...this.state.items.values()]
      .filter((item) => item.status === "PENDING" || leaseLapsed(item, opts.now))
      .filter((item) => opts.caseRef === undefined || item.caseRef === opts.caseRef)
      .filter((item) => opts.contentType === undefined || item.contentType === opts.contentType)
      .filter((item) => opts.priority === undefined || item.priority === opts.priority)
      .sort(
        (a, b) =>
          a.priority - b.priority ||
          a.createdAt.getTime() - b.createdAt.getTime() ||
          a.id.localeCompare(b.id)
      )
      .slice(0, opts.limit)
      .map((item) => structuredClone(item));
  }

  async queueCounts(opts: { caseRef?: string }): Promise<QueueCounts> {
    const items = [...this.state.items.values()].filter(
      (item) => opts.caseRef === undefined || item.caseRef === opts.caseRef
    );
    const resolved = items.filter((item) => item.status === "RESOLVED");
    const latencies = resolved
      .filter((item) => item.resolvedAt !== null)
      .map((item) => (item.resolvedAt?.getTime() ?? 0) - item.createdAt.getTime());

    return {
      openCount: items.filter(isOpen).length,
      resolvedCount: resolved.length,
      correctedCount: resolved.filter((item) => item.outcome === "corrected").length,
      rejectedCount: resolved.filter((item) => item.outcome === "rejected").length,
      avgReviewLatencyMs: latencies.length === 0 ? null : latencies.reduce((s, v) => s + v, 0) / latencies.length,
    };
  }

  async listCalibrationRuns(opts: { analyzerId?: string; limit?: number }) {
    const runs = this.state.runs
      .map((run, order) => ({ run, order }))
      .filter(({ run }) => opts.analyzerId === undefined || run.analyzerId === opts.analyzerId)
      .sort((a, b) => b.run.ranAt.getTime() - a.run.ranAt.getTime() || b.order - a.order)
      .map(({ run }) => structuredClone(run));
    return opts.limit === undefined ? runs : runs.slice(0, opts.limit);
  }

  async latestCalibrationRuns() {
    const latest = new Map<string, CalibrationRun>();
    for (const run of await this.listCalibrationRuns({})) {
      if (!latest.has(run.analyzerId)) latest.set(run.analyzerId, run);
    }
    return [...latest.values()];
  }

  async appendAuditEvent(event: AuditEvent) {
    if (this.audit.some((e) => e.id === event.id)) return;
    this.audit.push(structuredClone(event));
  }

  async listAuditEvents(opts: { entityId?: string; limit?: number }) {
    const events = this.audit
      .filter((e) => opts.entityId === undefined || e.entityId === opts.entityId)
      .map((e) => structuredClone(e));
    return opts.limit === undefined ? events : events.slice(-opts.limit);
  }

  async ping() {}
}

export function createMemoryStore() {
  return new MemoryStore();
}
