import { UnrecoverableError, type Job } from "bullmq";

import { isAppError } from "../lib/errors.js";
import { createJobLogger } from "../lib/logger.js";
import type { TriagePipeline } from "../services/pipeline.js";
import { DEFAULT_JOB_OPTS, getAnalysisSubmitQueue, RETRY_OPTS, type AnalysisSubmitJob } from "./queue.js";

/** Returns the job id, or null when no queue is configured. */
export async function enqueueAnalysisSubmission(data: AnalysisSubmitJob) {
  const queue = getAnalysisSubmitQueue();
  if (!queue) return null;
  const job = await queue.add("analysis:submit", data, { ...DEFAULT_JOB_OPTS, ...RETRY_OPTS });
  return job.id ?? null;
}

export function createAnalysisSubmitProcessor(pipeline: Pick<TriagePipeline, "submit">) {
  return async function analysisSubmitProcessor(job: Pick<Job<AnalysisSubmitJob>, "id" | "name" | "data">) {
    const log = createJobLogger(job);
    try {
      const result = await pipeline.submit(job.data.submission, { actorId: job.data.actorId });
      log.info({ resultId: result.id, disposition: result.disposition }, "analysis submitted");
      return { resultId: result.id, disposition: result.disposition };
    } catch (err) {
      // Retrying a malformed or withdrawn submission cannot succeed.
      if (isAppError(err, "VALIDATION_ERROR") || isAppError(err, "CANCELLED")) {
        log.warn({ err }, "analysis submission discarded");
        throw new UnrecoverableError(err.message);
      }
      throw err;
    }
  };
}
