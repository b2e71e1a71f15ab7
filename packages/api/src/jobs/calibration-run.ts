import type { Job } from "bullmq";

import { createJobLogger } from "../lib/logger.js";
import type { CalibrationRunner } from "../services/calibration-runner.js";
import { DEFAULT_JOB_OPTS, getCalibrationRunQueue, type CalibrationRunJob } from "./queue.js";

export const CALIBRATION_SCHEDULER_ID = "calibration:periodic";

/** Registers the repeatable calibration job. Returns false when no queue is configured. */
export async function scheduleCalibration(intervalHours: number) {
  const queue = getCalibrationRunQueue();
  if (!queue) return false;
  await queue.upsertJobScheduler(
    CALIBRATION_SCHEDULER_ID,
    { every: Math.round(intervalHours * 60 * 60 * 1000) },
    { name: "calibration:run", data: {}, opts: DEFAULT_JOB_OPTS }
  );
  // One run on start, ahead of the first interval.
  await queue.add("calibration:run", {}, DEFAULT_JOB_OPTS);
  return true;
}

export function createCalibrationRunProcessor(runner: Pick<CalibrationRunner, "runAll" | "runAnalyzer">) {
  return async function calibrationRunProcessor(job: Pick<Job<CalibrationRunJob>, "id" | "name" | "data">) {
    const log = createJobLogger(job);
    const outcomes = job.data.analyzerId ? [await runner.runAnalyzer(job.data.analyzerId)] : await runner.runAll();
    log.info(
      { analyzers: outcomes.map((o) => ({ analyzerId: o.analyzerId, status: o.status, multiplier: o.multiplier })) },
      "calibration job finished"
    );
    return outcomes.map((o) => ({ analyzerId: o.analyzerId, status: o.status, error: o.error }));
  };
}
