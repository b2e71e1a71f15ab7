/** Content types this core knows how to cross-validate. Closed set: adding one means adding a strategy. */
export const CONTENT_TYPES = ["transcription", "ocr", "pii", "caption"] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export const DISPOSITIONS = [
  "AUTO_VERIFIED",
  "PENDING_REVIEW",
  "HUMAN_VERIFIED",
  "REJECTED",
] as const;
export type Disposition = (typeof DISPOSITIONS)[number];

export const ANOMALY_RULES = [
  "high_pii_density",
  "transcription_length_anomaly",
  "ocr_gibberish",
  "confidence_instability",
] as const;
export type AnomalyRuleName = (typeof ANOMALY_RULES)[number];

export const VERIFICATION_METHODS = [
  "confidence_threshold",
  "below_threshold",
  "cross_validation_agreement",
  "cross_validation_mismatch",
  "cross_validation_unavailable",
  "single_detector",
  "high_wer",
  "caption_policy",
  "analyzer_failed",
  "human_review",
] as const;
export type VerificationMethod =
  | (typeof VERIFICATION_METHODS)[number]
  | `anomaly_flag:${AnomalyRuleName}`;

/** Lower is more urgent. */
export const PRIORITY = {
  high: 1,
  medium: 2,
  low: 3,
} as const;
export type Priority = (typeof PRIORITY)[keyof typeof PRIORITY];
export const PRIORITIES = [PRIORITY.high, PRIORITY.medium, PRIORITY.low] as const;

export const REVIEW_STATUSES = ["PENDING", "CLAIMED", "RESOLVED"] as const;
export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

export const REVIEW_DECISIONS = ["approve", "correct", "reject"] as const;
export type ReviewDecision = (typeof REVIEW_DECISIONS)[number];

/** What a RESOLVED item records, one per decision. */
export const REVIEW_OUTCOMES = ["approved", "corrected", "rejected"] as const;
export type ReviewOutcome = (typeof REVIEW_OUTCOMES)[number];

export const CALIBRATION_STATUSES = ["HEALTHY", "DEGRADED", "FAILED"] as const;
export type CalibrationStatus = (typeof CALIBRATION_STATUSES)[number];

/** Health as reported to operators; UNKNOWN means no ground-truth fixtures were found. */
export type AnalyzerHealth = CalibrationStatus | "UNKNOWN";

export const CAPTION_POLICIES = ["review", "confidence"] as const;
export type CaptionPolicy = (typeof CAPTION_POLICIES)[number];

export const AUDIT_MODES = ["sync", "async"] as const;
export type AuditMode = (typeof AUDIT_MODES)[number];

export const DEFAULT_POLICY = {
  autoVerifyThreshold: 0.85,
  mediumReviewThreshold: 0.6,
  rejectThreshold: 0.4,
  ocrSimilarityThreshold: 0.9,
  maxWer: 0.15,
  transcriptionSampleFraction: 0.1,
  captionPolicy: "review",
  crossValidationTimeoutMs: 10_000,
  maxPiiEntities: 10,
  maxCharsPerSecond: 50,
  minDictionaryRatio: 0.3,
  instabilityStddev: 0.25,
  instabilityWindow: 20,
  instabilityMinSamples: 5,
  reviewLeaseMs: 15 * 60 * 1000,
  calibrationIntervalHours: 6,
  calibrationMinAccuracy: 0.95,
  calibrationHardFloor: 0.5,
  calibrationDegradedMultiplier: 0.8,
} as const satisfies Record<string, number | CaptionPolicy>;
