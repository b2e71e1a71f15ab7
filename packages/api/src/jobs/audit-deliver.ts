import type { Job } from "bullmq";

import { createJobLogger } from "../lib/logger.js";
import type { AuditDispatcher, AuditTrail } from "../services/audit.js";
import { DEFAULT_JOB_OPTS, getAuditDeliverQueue, RETRY_OPTS, type AuditDeliverJob } from "./queue.js";

/**
 * Dispatcher for `async` audit mode, or undefined without Redis. The job id is the event
 * id so a redelivered dispatch does not duplicate the job.
 */
export function createAuditDispatcher(): AuditDispatcher | undefined {
  const queue = getAuditDeliverQueue();
  if (!queue) return undefined;
  return async (events) => {
    await queue.addBulk(
      events.map((event) => ({
        name: "audit:deliver",
        data: event,
        opts: { ...DEFAULT_JOB_OPTS, ...RETRY_OPTS, jobId: event.id },
      }))
    );
  };
}

export function createAuditDeliverProcessor(audit: Pick<AuditTrail, "deliver">) {
  return async function auditDeliverProcessor(job: Pick<Job<AuditDeliverJob>, "id" | "name" | "data" | "attemptsMade">) {
    const log = createJobLogger(job);
    try {
      await audit.deliver(job.data);
    } catch (err) {
      log.error({ err, eventId: job.data.id, attempt: job.attemptsMade + 1 }, "audit delivery failed");
      throw err;
    }
  };
}
