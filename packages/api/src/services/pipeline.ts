import { PRIORITY, type AnomalyRuleName } from "@triage/shared";
import { cancelled, isAppError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import type { AnalysisDraft, AnalysisResult, Clock, Verdict } from "../types/domain.js";
import type { AnomalyDetector } from "./anomaly-detector.js";
import type { AuditTrail } from "./audit.js";
import type { CalibrationTable } from "./calibration-table.js";
import type { ConfidenceRouter, Routing } from "./confidence-router.js";
import type { CrossValidator } from "./cross-validation/index.js";
import { ingest } from "./ingestion.js";
import type { ReviewQueueManager } from "./review-queue.js";

const log = createLogger("pipeline");

export type SubmitOptions = {
  /** Aborting it cancels the submission like a withdrawal would. */
  signal?: AbortSignal;
  actorId?: string;
};

function contentRefOf(input: unknown) {
  if (input !== null && typeof input === "object" && "contentRef" in input && typeof input.contentRef === "string") {
    return input.contentRef;
  }
  return "unknown";
}

function finalVerdict(routing: Exclude<Routing, { kind: "settled" | "candidate" }>): Verdict {
  return { ...routing, crossValidation: null, entityVerdicts: null };
}

/**
 * Ingestion API: route -> anomaly check -> cross-validate -> commit (+ enqueue), run
 * end-to-end by one task per result. A withdrawn submission leaves nothing behind.
 */
export class TriagePipeline {
  private readonly inFlight = new Map<string, Set<AbortController>>();
  private readonly detach = new Map<AbortController, () => void>();

  constructor(
    private readonly deps: {
      calibration: CalibrationTable;
      router: ConfidenceRouter;
      anomalies: AnomalyDetector;
      crossValidator: CrossValidator;
      reviewQueue: ReviewQueueManager;
      audit: AuditTrail;
      clock: Clock;
    }
  ) {}

  async submit(input: unknown, opts: SubmitOptions = {}): Promise<AnalysisResult> {
    const actorId = opts.actorId ?? "system:ingestion";

    let draft: AnalysisDraft;
    let routing: Exclude<Routing, { kind: "settled" }>;
    try {
      draft = ingest(input, this.deps.calibration, this.deps.clock);
      routing = this.deps.router.route(draft);
    } catch (err) {
      if (isAppError(err, "VALIDATION_ERROR")) {
        // A rejected submission is itself a recorded event.
        await this.deps.audit.emit({
          entityType: "submission",
          entityId: contentRefOf(input),
          action: "submission.rejected",
          actorId,
          details: { code: err.code, message: err.message, issues: err.details },
        });
      }
      throw err;
    }

    const controller = this.track(draft.contentRef, opts.signal);
    const { signal } = controller;
    const checkpoint = () => {
      if (signal.aborted) throw cancelled(draft.contentRef);
    };

    try {
      const anomalies = this.deps.anomalies.evaluate(draft);
      checkpoint();

      const verdict = await this.decide(draft, routing, anomalies, signal);
      checkpoint();

      const result: AnalysisResult = {
        ...draft,
        disposition: verdict.disposition,
        verificationMethod: verdict.method,
        entityVerdicts: verdict.entityVerdicts,
        crossValidation: verdict.crossValidation,
        anomalies,
        correctedValue: null,
        updatedAt: draft.createdAt,
      };

      await this.deps.audit.inTransaction(async (tx, emit) => {
        await tx.insertResult(result);
        emit({
          entityType: "analysis_result",
          entityId: result.id,
          action: "analysis_result.disposition_assigned",
          actorId,
          details: {
            contentRef: result.contentRef,
            analyzerId: result.analyzerId,
            contentType: result.contentType,
            rawConfidence: result.rawConfidence,
            adjustedConfidence: result.adjustedConfidence,
            calibrationMultiplier: result.calibrationMultiplier,
            disposition: result.disposition,
            method: result.verificationMethod,
            anomalies,
          },
        });
        if (verdict.disposition === "PENDING_REVIEW") {
          await this.deps.reviewQueue.enqueueIn(tx, emit, result, verdict.priority, actorId);
        }
        // Last chance to discard: a withdrawal during the commit rolls it back.
        checkpoint();
      });

      if (result.disposition === "REJECTED") {
        log.info(
          {
            resultId: result.id,
            contentRef: result.contentRef,
            analyzerId: result.analyzerId,
            rawConfidence: result.rawConfidence,
            adjustedConfidence: result.adjustedConfidence,
          },
          "analysis rejected below threshold"
        );
      }
      return result;
    } finally {
      this.untrack(draft.contentRef, controller);
    }
  }

  /** Cancels every in-flight submission for the content. Returns how many were signalled. */
  withdraw(contentRef: string) {
    const controllers = this.inFlight.get(contentRef);
    if (!controllers) return 0;
    for (const c of controllers) c.abort(cancelled(contentRef));
    log.info({ contentRef, submissions: controllers.size }, "evidence withdrawn; cancelling submissions");
    return controllers.size;
  }

  private async decide(
    draft: AnalysisDraft,
    routing: Exclude<Routing, { kind: "settled" }>,
    anomalies: AnomalyRuleName[],
    signal: AbortSignal
  ): Promise<Verdict> {
    // Anomalies can downgrade any disposition except a rejection, and never upgrade.
    if (routing.disposition === "REJECTED") {
      return { disposition: "REJECTED", method: routing.method, priority: null, crossValidation: null, entityVerdicts: null };
    }
    if (anomalies.length > 0) {
      return {
        disposition: "PENDING_REVIEW",
        method: `anomaly_flag:${anomalies[0]}`,
        priority: PRIORITY.high,
        crossValidation: null,
        entityVerdicts: null,
      };
    }
    if (routing.kind === "candidate") return this.deps.crossValidator.validate(draft, { signal });
    return finalVerdict(routing);
  }

  private track(contentRef: string, parent?: AbortSignal) {
    const controller = new AbortController();
    if (parent?.aborted) controller.abort(cancelled(contentRef));
    else if (parent) {
      const onAbort = () => controller.abort(cancelled(contentRef));
      parent.addEventListener("abort", onAbort, { once: true });
      // A caller's signal can outlive the submission.
      this.detach.set(controller, () => parent.removeEventListener("abort", onAbort));
    }

    const set = this.inFlight.get(contentRef) ?? new Set<AbortController>();
    set.add(controller);
    this.inFlight.set(contentRef, set);
    return controller;
  }

  private untrack(contentRef: string, controller: AbortController) {
    this.detach.get(controller)?.();
    this.detach.delete(controller);
    const set = this.inFlight.get(contentRef);
    if (!set) return;
    set.delete(controller);
    if (set.size === 0) this.inFlight.delete(contentRef);
  }
}
