import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  // Log drains add host metadata themselves. Keep lines minimal.
  base: undefined,
});

export function createLogger(component: string) {
  return logger.child({ component });
}

export function createJobLogger(job: { id?: string | null; name: string }) {
  return logger.child({ jobId: job.id ?? undefined, jobName: job.name });
}
