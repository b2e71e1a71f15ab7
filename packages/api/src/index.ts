export { createApp, type AppType } from "./app.js";
export { bootstrap } from "./bootstrap.js";
export { createRuntime, type Runtime, type RuntimeDeps } from "./runtime.js";
export { loadConfig, type TriageConfig } from "./lib/config.js";
export { AppError, isAppError, type ErrorCode } from "./lib/errors.js";
export { createMemoryStore, MemoryStore } from "./store/memory.js";
export { createPostgresStore } from "./store/postgres.js";
export type { TriageStore, TriageTx } from "./store/types.js";
export { AuditTrail, StoreAuditSink, type AuditSink } from "./services/audit.js";
export { CalibrationTable } from "./services/calibration-table.js";
export { CalibrationRunner, type CalibrationTarget, type CalibrationOutcome } from "./services/calibration-runner.js";
export { FileFixtureSource, type FixtureSource } from "./services/calibration-fixtures.js";
export { ConfidenceRouter, type Routing } from "./services/confidence-router.js";
export { CrossValidator } from "./services/cross-validation/index.js";
export { AnomalyDetector } from "./services/anomaly-detector.js";
export { ReviewQueueManager } from "./services/review-queue.js";
export { TriagePipeline } from "./services/pipeline.js";
export { PatternPiiDetector, type OcrEngine, type PiiDetector, type SecondaryEngines, type TranscriptionEngine } from "./services/engines.js";
export type * from "./types/domain.js";
