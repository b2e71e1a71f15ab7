// src/db/schema/index.ts

export * from "./enums.js";
export * from "./analysis-results.js";
export * from "./review-queue.js";
export * from "./calibration-runs.js";
export * from "./audit-events.js";
