import { serve } from "@hono/node-server";

import { createApp } from "./app.js";
import { bootstrap } from "./bootstrap.js";
import { closeQueues, isRedisConfigured } from "./jobs/queue.js";
import { loadConfig } from "./lib/config.js";
import { logger } from "./lib/logger.js";

const config = loadConfig();
const { runtime, close } = bootstrap(config);

await runtime.refreshCalibration();

function runCalibrationPass() {
  runtime.calibrationRunner.runAll().catch((err: unknown) => logger.error({ err }, "calibration pass failed"));
}

// Without a worker fleet this process owns the calibration schedule; otherwise it only
// follows the runs the workers record.
const timer = isRedisConfigured()
  ? setInterval(() => {
      runtime.refreshCalibration().catch((err: unknown) => logger.error({ err }, "calibration refresh failed"));
    }, config.calibration.refreshMs)
  : setInterval(runCalibrationPass, config.calibration.intervalHours * 60 * 60 * 1000);
timer.unref();

if (!isRedisConfigured()) runCalibrationPass();

const app = createApp(runtime);

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, auditMode: runtime.audit.mode }, "api listening");
});

async function shutdown(signal: string) {
  logger.info({ signal }, "api shutting down");
  clearInterval(timer);
  server.close();
  await closeQueues();
  await close();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
