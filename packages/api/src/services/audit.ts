import { randomUUID } from "node:crypto";

import type { AuditEvent, AuditMode } from "@triage/shared";
import { auditFailed } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import type { TriageStore, TriageTx } from "../store/types.js";
import type { Clock } from "../types/domain.js";

const log = createLogger("audit");

/** Chain-of-custody sink. A rejected promise is a hard failure. */
export interface AuditSink {
  record(event: AuditEvent): Promise<void>;
}

export type AuditDraft = Omit<AuditEvent, "id" | "timestamp">;

export type Emit = (event: AuditDraft) => void;

/** Hands committed events to a durable retrying channel (the audit:deliver queue). */
export type AuditDispatcher = (events: AuditEvent[]) => Promise<void>;

const SENSITIVE_KEY = /password|token|secret|api_?key/i;

export function maskDetails(details: Record<string, unknown>): Record<string, unknown> {
  const mask = (value: unknown): unknown => {
    if (Array.isArray(value)) return value.map(mask);
    if (value !== null && typeof value === "object" && !(value instanceof Date)) {
      return Object.fromEntries(
        Object.entries(value).map(([k, v]) => [k, SENSITIVE_KEY.test(k) ? "[REDACTED]" : mask(v)])
      );
    }
    return value;
  };
  return Object.fromEntries(
    Object.entries(details).map(([k, v]) => [k, SENSITIVE_KEY.test(k) ? "[REDACTED]" : mask(v)])
  );
}

/** Persists events to the audit_events table. Re-recording an event id is a no-op. */
export class StoreAuditSink implements AuditSink {
  constructor(private readonly store: Pick<TriageStore, "appendAuditEvent">) {}

  record(event: AuditEvent) {
    return this.store.appendAuditEvent(event);
  }
}

/**
 * Couples state transitions to audit emission.
 *
 * - `sync`: every event is recorded before the transaction commits; a sink failure rolls
 *   the transition back with AUDIT_FAILED.
 * - `async`: events are dispatched after commit for at-least-once delivery. If both the
 *   dispatcher and the sink fail the committed transition stands and the caller gets
 *   AUDIT_FAILED naming the undelivered events. Without a dispatcher this degrades to `sync`.
 */
export class AuditTrail {
  readonly mode: AuditMode;

  constructor(
    private readonly opts: {
      store: TriageStore;
      sink: AuditSink;
      mode: AuditMode;
      clock: Clock;
      dispatch?: AuditDispatcher;
    }
  ) {
    this.mode = opts.mode === "async" && opts.dispatch ? "async" : "sync";
    if (opts.mode === "async" && !opts.dispatch) {
      log.warn("async audit requested without a delivery queue; recording synchronously");
    }
  }

  async inTransaction<T>(fn: (tx: TriageTx, emit: Emit) => Promise<T>): Promise<T> {
    const events: AuditEvent[] = [];
    const emit: Emit = (draft) => events.push(this.build(draft));

    const out = await this.opts.store.transaction(async (tx) => {
      const value = await fn(tx, emit);
      if (this.mode === "sync") await this.recordAll(events);
      return value;
    });

    if (this.mode === "async") await this.dispatchCommitted(events);
    return out;
  }

  /** Records an event that accompanies no stored transition, such as a rejected submission. */
  async emit(draft: AuditDraft) {
    const event = this.build(draft);
    if (this.mode === "sync") await this.recordAll([event]);
    else await this.dispatchCommitted([event]);
  }

  /** Delivery path for the audit:deliver job. Throws so the queue retries. */
  deliver(event: AuditEvent) {
    return this.opts.sink.record(event);
  }

  private build(draft: AuditDraft): AuditEvent {
    return {
      ...draft,
      id: randomUUID(),
      timestamp: this.opts.clock().toISOString(),
      details: maskDetails(draft.details),
    };
  }

  private async recordAll(events: AuditEvent[]) {
    for (const event of events) {
      try {
        await this.opts.sink.record(event);
      } catch (err) {
        log.error({ err, eventId: event.id, action: event.action }, "audit sink rejected event");
        throw auditFailed(err);
      }
    }
  }

  // The transition has committed. A dispatch failure falls back to the sink; events the sink
  // also rejects are logged in full and reported with AUDIT_FAILED.
  private async dispatchCommitted(events: AuditEvent[]) {
    if (events.length === 0) return;
    const dispatch = this.opts.dispatch;
    try {
      if (!dispatch) throw new Error("no audit dispatcher");
      await dispatch(events);
      return;
    } catch (err) {
      log.error({ err, events: events.length }, "audit dispatch failed; recording directly");
    }

    const undelivered: AuditEvent[] = [];
    let lastErr: unknown;
    for (const event of events) {
      try {
        await this.opts.sink.record(event);
      } catch (err) {
        lastErr = err;
        undelivered.push(event);
        log.error({ err, event }, "audit event could not be delivered");
      }
    }
    if (undelivered.length > 0) {
      throw auditFailed(lastErr, { committed: true, eventIds: undelivered.map((e) => e.id) });
    }
  }
}
