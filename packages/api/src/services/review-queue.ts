import { randomUUID } from "node:crypto";

import type { CorrectedValue, Priority, ReviewDecision, ReviewOutcome } from "@triage/shared";
import {
  alreadyClaimed,
  alreadyResolved,
  claimNotHeld,
  conflict,
  notFound,
  validationError,
} from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { summarizeQueueStats, type TriageStore, type TriageTx } from "../store/types.js";
import type {
  AnalysisResult,
  Clock,
  PendingFilter,
  QueueStats,
  ReviewQueueItem,
} from "../types/domain.js";
import type { AuditTrail, Emit } from "./audit.js";

const log = createLogger("review-queue");

const OUTCOMES: Record<ReviewDecision, ReviewOutcome> = {
  approve: "approved",
  correct: "corrected",
  reject: "rejected",
};

export const DEFAULT_PENDING_LIMIT = 100;

const iso = (d: Date | null) => (d ? d.toISOString() : null);

// A resolved item is held by its resolver permanently.
const claimedForGood = (itemId: string, resolvedBy: string | null) =>
  alreadyClaimed(itemId, { status: "RESOLVED", claimedBy: resolvedBy, leaseExpiresAt: null });

/** A correction must be non-empty and shaped like the result's value: entities for pii, text otherwise. */
function checkCorrection(result: AnalysisResult, correctedValue: CorrectedValue | undefined): CorrectedValue {
  if (correctedValue === undefined) {
    throw validationError("correctedValue is required when decision is 'correct'");
  }
  if (result.contentType === "pii") {
    if (!Array.isArray(correctedValue) || correctedValue.length === 0) {
      throw validationError("correctedValue for a pii result must be a non-empty entity list");
    }
    return correctedValue;
  }
  if (typeof correctedValue !== "string" || correctedValue.trim().length === 0) {
    throw validationError(`correctedValue for a ${result.contentType} result must be non-empty text`);
  }
  return correctedValue;
}

/**
 * Human adjudication queue: PENDING -> CLAIMED -> RESOLVED, with CLAIMED -> PENDING on
 * release or lease expiry. Claims are leases checked lazily at claim time.
 */
export class ReviewQueueManager {
  constructor(
    private readonly opts: {
      store: TriageStore;
      audit: AuditTrail;
      clock: Clock;
      leaseMs: number;
    }
  ) {}

  /** Fails with CONFLICT when an open item already exists for the result. */
  async enqueue(analysisResultId: string, priority: Priority, actorId = "system:review-queue") {
    return this.opts.audit.inTransaction(async (tx, emit) => {
      const result = await tx.getResult(analysisResultId);
      if (!result) throw notFound("analysis_result", analysisResultId);
      if (result.disposition !== "PENDING_REVIEW") {
        throw conflict("Only PENDING_REVIEW results can be queued for review", {
          analysisResultId,
          disposition: result.disposition,
        });
      }
      return this.enqueueIn(tx, emit, result, priority, actorId);
    });
  }

  /** Enqueue as part of a caller's transaction, such as a submission commit. */
  async enqueueIn(tx: TriageTx, emit: Emit, result: AnalysisResult, priority: Priority, actorId: string) {
    const open = await tx.findOpenItemForResult(result.id);
    if (open) {
      throw conflict("An open review item already exists for this analysis result", {
        analysisResultId: result.id,
        reviewItemId: open.id,
      });
    }

    const now = this.opts.clock();
    const item: ReviewQueueItem = {
      id: randomUUID(),
      analysisResultId: result.id,
      caseRef: result.caseRef,
      contentType: result.contentType,
      priority,
      reason: result.verificationMethod,
      status: "PENDING",
      claimedBy: null,
      claimedAt: null,
      leaseExpiresAt: null,
      outcome: null,
      correctedValue: null,
      resolvedBy: null,
      resolvedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    await tx.insertQueueItem(item);
    emit({
      entityType: "review_queue_item",
      entityId: item.id,
      action: "review_item.enqueued",
      actorId,
      details: { analysisResultId: result.id, priority, reason: item.reason, status: "PENDING" },
    });
    return item;
  }

  async claim(itemId: string, reviewerId: string) {
    return this.opts.audit.inTransaction(async (tx, emit) => {
      const before = await tx.getQueueItem(itemId);
      if (!before) throw notFound("review_queue_item", itemId);
      if (before.status === "RESOLVED") throw claimedForGood(itemId, before.resolvedBy);

      const now = this.opts.clock();
      const claimed = await tx.claimItem({
        id: itemId,
        reviewerId,
        now,
        leaseExpiresAt: new Date(now.getTime() + this.opts.leaseMs),
      });

      if (!claimed) {
        const current = (await tx.getQueueItem(itemId)) ?? before;
        if (current.status === "RESOLVED") throw claimedForGood(itemId, current.resolvedBy);
        throw alreadyClaimed(itemId, { claimedBy: current.claimedBy, leaseExpiresAt: iso(current.leaseExpiresAt) });
      }

      // A CLAIMED item was only claimable because its lease had lapsed.
      const reclaimedFrom = before.status === "CLAIMED" ? before.claimedBy : null;
      if (reclaimedFrom) log.info({ itemId, reviewerId, reclaimedFrom }, "expired lease reclaimed");

      emit({
        entityType: "review_queue_item",
        entityId: itemId,
        action: "review_item.claimed",
        actorId: reviewerId,
        details: { from: before.status, to: "CLAIMED", leaseExpiresAt: iso(claimed.leaseExpiresAt), reclaimedFrom },
      });
      return claimed;
    });
  }

  async release(itemId: string, reviewerId: string) {
    return this.opts.audit.inTransaction(async (tx, emit) => {
      const released = await tx.releaseItem({ id: itemId, reviewerId, now: this.opts.clock() });
      if (!released) throw await this.explainNotHeld(tx, itemId, reviewerId);

      emit({
        entityType: "review_queue_item",
        entityId: itemId,
        action: "review_item.released",
        actorId: reviewerId,
        details: { from: "CLAIMED", to: "PENDING" },
      });
      return released;
    });
  }

  /** Extends the caller's lease by a full lease period from now. */
  async renew(itemId: string, reviewerId: string) {
    return this.opts.audit.inTransaction(async (tx, emit) => {
      const now = this.opts.clock();
      const renewed = await tx.renewItem({
        id: itemId,
        reviewerId,
        now,
        leaseExpiresAt: new Date(now.getTime() + this.opts.leaseMs),
      });
      if (!renewed) throw await this.explainNotHeld(tx, itemId, reviewerId);

      emit({
        entityType: "review_queue_item",
        entityId: itemId,
        action: "review_item.lease_renewed",
        actorId: reviewerId,
        details: { leaseExpiresAt: iso(renewed.leaseExpiresAt) },
      });
      return renewed;
    });
  }

  /**
   * Terminal. The caller must hold the claim; a holder whose lease lapsed may still
   * resolve as long as nobody re-claimed the item. A second resolve fails with
   * ALREADY_RESOLVED and changes nothing.
   */
  async resolve(itemId: string, reviewerId: string, decision: ReviewDecision, correctedValue?: CorrectedValue) {
    return this.opts.audit.inTransaction(async (tx, emit) => {
      const item = await tx.getQueueItem(itemId);
      if (!item) throw notFound("review_queue_item", itemId);
      if (item.status === "RESOLVED") throw alreadyResolved(itemId);
      if (item.status !== "CLAIMED" || item.claimedBy !== reviewerId) throw claimNotHeld(itemId, reviewerId);

      const result = await tx.getResult(item.analysisResultId);
      if (!result) throw notFound("analysis_result", item.analysisResultId);

      const correction = decision === "correct" ? checkCorrection(result, correctedValue) : null;
      const outcome = OUTCOMES[decision];
      const now = this.opts.clock();

      const resolved = await tx.resolveItem({ id: itemId, reviewerId, outcome, correctedValue: correction, now });
      if (!resolved) throw claimNotHeld(itemId, reviewerId);

      const disposition = decision === "reject" ? "REJECTED" : "HUMAN_VERIFIED";
      const updated = await tx.updateResultReview(result.id, {
        disposition,
        verificationMethod: "human_review",
        correctedValue: correction,
        updatedAt: now,
      });
      if (!updated) throw notFound("analysis_result", result.id);

      emit({
        entityType: "review_queue_item",
        entityId: itemId,
        action: "review_item.resolved",
        actorId: reviewerId,
        details: { from: "CLAIMED", to: "RESOLVED", decision, outcome },
      });
      emit({
        entityType: "analysis_result",
        entityId: result.id,
        action: "analysis_result.disposition_changed",
        actorId: reviewerId,
        details: {
          from: result.disposition,
          to: disposition,
          method: "human_review",
          reviewItemId: itemId,
          corrected: correction !== null,
        },
      });

      return { item: resolved, result: updated };
    });
  }

  /** Claimable items (PENDING, or CLAIMED with a lapsed lease): most urgent first, oldest first within a band. */
  async listPending(filter: PendingFilter & { limit?: number } = {}) {
    const { limit, ...rest } = filter;
    return this.opts.store.listPending({ ...rest, now: this.opts.clock(), limit: limit ?? DEFAULT_PENDING_LIMIT });
  }

  async stats(filter: { caseRef?: string } = {}): Promise<QueueStats> {
    return summarizeQueueStats(await this.opts.store.queueCounts(filter));
  }

  private async explainNotHeld(tx: TriageTx, itemId: string, reviewerId: string) {
    const item = await tx.getQueueItem(itemId);
    if (!item) return notFound("review_queue_item", itemId);
    if (item.status === "RESOLVED") return alreadyResolved(itemId);
    return claimNotHeld(itemId, reviewerId);
  }
}
