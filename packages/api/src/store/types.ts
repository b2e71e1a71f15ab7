import type { AuditEvent, CorrectedValue, ReviewOutcome } from "@triage/shared";

import type {
  AnalysisResult,
  CalibrationRun,
  PendingFilter,
  QueueCounts,
  QueueStats,
  ReviewQueueItem,
} from "../types/domain.js";

export type ResultReviewPatch = Pick<AnalysisResult, "disposition" | "verificationMethod" | "correctedValue" | "updatedAt">;

export interface TriageReader {
  getResult(id: string): Promise<AnalysisResult | null>;
  getQueueItem(id: string): Promise<ReviewQueueItem | null>;
  findOpenItemForResult(analysisResultId: string): Promise<ReviewQueueItem | null>;
}

/**
 * Writes happen only inside a transaction. The conditional updates (`claimItem`,
 * `releaseItem`, `renewItem`, `resolveItem`) are compare-and-swap: they return the
 * updated item, or null when the item was not in the expected state.
 */
export interface TriageTx extends TriageReader {
  insertResult(result: AnalysisResult): Promise<void>;
  updateResultReview(id: string, patch: ResultReviewPatch): Promise<AnalysisResult | null>;
  insertQueueItem(item: ReviewQueueItem): Promise<void>;
  /** PENDING, or CLAIMED with `leaseExpiresAt <= now`, becomes CLAIMED by `reviewerId`. */
  claimItem(opts: { id: string; reviewerId: string; now: Date; leaseExpiresAt: Date }): Promise<ReviewQueueItem | null>;
  /** CLAIMED by `reviewerId` becomes PENDING. */
  releaseItem(opts: { id: string; reviewerId: string; now: Date }): Promise<ReviewQueueItem | null>;
  /** CLAIMED by `reviewerId` gets a new expiry. */
  renewItem(opts: { id: string; reviewerId: string; now: Date; leaseExpiresAt: Date }): Promise<ReviewQueueItem | null>;
  /** CLAIMED by `reviewerId` becomes RESOLVED. */
  resolveItem(opts: {
    id: string;
    reviewerId: string;
    outcome: ReviewOutcome;
    correctedValue: CorrectedValue | null;
    now: Date;
  }): Promise<ReviewQueueItem | null>;
  appendCalibrationRun(run: CalibrationRun): Promise<void>;
}

export interface TriageStore extends TriageReader {
  transaction<T>(fn: (tx: TriageTx) => Promise<T>): Promise<T>;
  listPending(opts: PendingFilter & { now: Date; limit: number }): Promise<ReviewQueueItem[]>;
  queueCounts(opts: { caseRef?: string }): Promise<QueueCounts>;
  listCalibrationRuns(opts: { analyzerId?: string; limit?: number }): Promise<CalibrationRun[]>;
  /** Most recent run per analyzer. */
  latestCalibrationRuns(): Promise<CalibrationRun[]>;
  /** Audit events are appended outside any transaction; they are never rolled back. */
  appendAuditEvent(event: AuditEvent): Promise<void>;
  listAuditEvents(opts: { entityId?: string; limit?: number }): Promise<AuditEvent[]>;
  ping(): Promise<void>;
}

export function summarizeQueueStats(counts: QueueCounts): QueueStats {
  const resolved = counts.resolvedCount;
  return {
    pendingCount: counts.openCount,
    resolvedCount: resolved,
    correctionRate: resolved === 0 ? 0 : counts.correctedCount / resolved,
    falsePositiveRate: resolved === 0 ? 0 : counts.rejectedCount / resolved,
    avgReviewLatencyMs: counts.avgReviewLatencyMs,
  };
}
