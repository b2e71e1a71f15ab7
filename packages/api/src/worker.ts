import { Worker } from "bullmq";

import { bootstrap } from "./bootstrap.js";
import { createAnalysisSubmitProcessor } from "./jobs/analysis-submit.js";
import { createAuditDeliverProcessor } from "./jobs/audit-deliver.js";
import { createCalibrationRunProcessor, scheduleCalibration } from "./jobs/calibration-run.js";
import { closeQueues, getRedisConnectionOrThrow, QUEUE_NAMES } from "./jobs/queue.js";
import { loadConfig } from "./lib/config.js";
import { createJobLogger, logger } from "./lib/logger.js";

const config = loadConfig();
const connection = getRedisConnectionOrThrow();
const { runtime, close } = bootstrap(config);

function wire(worker: Worker) {
  worker.on("completed", (job) => {
    createJobLogger(job).info({ queue: worker.name }, "job completed");
  });
  worker.on("failed", (job, err) => {
    if (job) createJobLogger(job).error({ queue: worker.name, err }, "job failed");
    else logger.error({ queue: worker.name, err }, "job failed");
  });
  worker.on("error", (err) => {
    logger.error({ err, queue: worker.name }, "worker error");
  });
}

await runtime.refreshCalibration();

const workers = [
  new Worker(QUEUE_NAMES.analysisSubmit, createAnalysisSubmitProcessor(runtime.pipeline), {
    connection,
    concurrency: config.concurrency,
  }),
  new Worker(QUEUE_NAMES.calibrationRun, createCalibrationRunProcessor(runtime.calibrationRunner), {
    connection,
    concurrency: 1,
  }),
  new Worker(QUEUE_NAMES.auditDeliver, createAuditDeliverProcessor(runtime.audit), {
    connection,
    concurrency: config.concurrency,
  }),
];

for (const w of workers) wire(w);

await scheduleCalibration(config.calibration.intervalHours);

// Submissions processed here must see multipliers written by the calibration worker.
const refresh = setInterval(() => {
  runtime.refreshCalibration().catch((err: unknown) => logger.error({ err }, "calibration refresh failed"));
}, config.calibration.refreshMs);
refresh.unref();

logger.info({ queues: workers.map((w) => w.name) }, "worker started");

async function shutdown(signal: string) {
  logger.info({ signal }, "worker shutting down");
  clearInterval(refresh);
  await Promise.allSettled(workers.map((w) => w.close()));
  await closeQueues();
  await close();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
