import { Queue } from "bullmq";
import { Redis } from "ioredis";

import type { AuditEvent } from "@triage/shared";
import { logger } from "../lib/logger.js";

export type AnalysisSubmitJob = { submission: unknown; actorId?: string };
export type CalibrationRunJob = { analyzerId?: string };
export type AuditDeliverJob = AuditEvent;

export const QUEUE_NAMES = {
  analysisSubmit: "analysis:submit",
  calibrationRun: "calibration:run",
  auditDeliver: "audit:deliver",
} as const;

let redis: Redis | null = null;

export function isRedisConfigured(): boolean {
  return !!process.env.REDIS_URL;
}

/**
 * Returns a Redis connection, or null if REDIS_URL is not set.
 * The worker entry point should call getRedisConnectionOrThrow() instead.
 */
export function getRedisConnection(): Redis | null {
  if (redis) return redis;

  const url = process.env.REDIS_URL;
  if (!url) return null;

  redis = new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    lazyConnect: true,
  });

  return redis;
}

/** For the worker, which cannot run without Redis. */
export function getRedisConnectionOrThrow(): Redis {
  const conn = getRedisConnection();
  if (!conn) throw new Error("REDIS_URL is required for the worker process");
  return conn;
}

// Created on first use; null when REDIS_URL is unset.
function lazyQueue<T>(name: string): Queue<T> | null {
  const conn = getRedisConnection();
  if (!conn) {
    logger.warn({ queue: name }, "queue unavailable: REDIS_URL not set");
    return null;
  }
  return new Queue<T>(name, { connection: conn });
}

let _analysisSubmit: Queue<AnalysisSubmitJob> | null | undefined;
let _calibrationRun: Queue<CalibrationRunJob> | null | undefined;
let _auditDeliver: Queue<AuditDeliverJob> | null | undefined;

export function getAnalysisSubmitQueue() {
  if (_analysisSubmit === undefined) _analysisSubmit = lazyQueue(QUEUE_NAMES.analysisSubmit);
  return _analysisSubmit;
}
export function getCalibrationRunQueue() {
  if (_calibrationRun === undefined) _calibrationRun = lazyQueue(QUEUE_NAMES.calibrationRun);
  return _calibrationRun;
}
export function getAuditDeliverQueue() {
  if (_auditDeliver === undefined) _auditDeliver = lazyQueue(QUEUE_NAMES.auditDeliver);
  return _auditDeliver;
}

export async function closeQueues() {
  await Promise.allSettled([_analysisSubmit, _calibrationRun, _auditDeliver].map((q) => q?.close()));
  _analysisSubmit = _calibrationRun = _auditDeliver = undefined;
  if (redis) await redis.quit();
  redis = null;
}

export const DEFAULT_JOB_OPTS = {
  removeOnComplete: true,
  removeOnFail: 500,
} as const;

export const RETRY_OPTS = {
  attempts: 5,
  backoff: { type: "exponential", delay: 2000 },
} as const;
