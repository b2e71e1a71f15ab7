import { z } from "zod";

import { AUDIT_MODES, CAPTION_POLICIES, CONTENT_TYPES, DEFAULT_POLICY } from "@triage/shared";

const probability = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const calibrationTargetSchema = z.object({
  analyzerId: z.string().min(1),
  contentType: z.enum(CONTENT_TYPES),
  url: z.string().url(),
  minAccuracy: z.number().min(0).max(1).optional(),
  hardFloor: z.number().min(0).max(1).optional(),
});
export type CalibrationTargetConfig = z.infer<typeof calibrationTargetSchema>;

const calibrationTargetsSchema = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    if (!raw) return [];
    try {
      return z.array(calibrationTargetSchema).parse(JSON.parse(raw));
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `CALIBRATION_TARGETS must be a JSON array of targets: ${err instanceof Error ? err.message : String(err)}`,
      });
      return z.NEVER;
    }
  });

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_POOL_SIZE: positiveInt(10),
  REDIS_URL: z.string().min(1).optional(),
  PORT: positiveInt(3000),
  BULLMQ_CONCURRENCY: positiveInt(5),

  AUTO_VERIFY_THRESHOLD: probability(DEFAULT_POLICY.autoVerifyThreshold),
  MEDIUM_REVIEW_THRESHOLD: probability(DEFAULT_POLICY.mediumReviewThreshold),
  REJECT_THRESHOLD: probability(DEFAULT_POLICY.rejectThreshold),

  OCR_SIMILARITY_THRESHOLD: probability(DEFAULT_POLICY.ocrSimilarityThreshold),
  MAX_WER: probability(DEFAULT_POLICY.maxWer),
  TRANSCRIPTION_SAMPLE_FRACTION: z.coerce
    .number()
    .gt(0)
    .max(1)
    .default(DEFAULT_POLICY.transcriptionSampleFraction),
  CAPTION_POLICY: z.enum(CAPTION_POLICIES).default(DEFAULT_POLICY.captionPolicy),
  CROSS_VALIDATION_TIMEOUT_MS: positiveInt(DEFAULT_POLICY.crossValidationTimeoutMs),
  OCR_SECONDARY_URL: z.string().url().optional(),
  TRANSCRIPTION_RESAMPLE_URL: z.string().url().optional(),
  PII_NER_URL: z.string().url().optional(),

  MAX_PII_ENTITIES: positiveInt(DEFAULT_POLICY.maxPiiEntities),
  MAX_CHARS_PER_SECOND: z.coerce.number().positive().default(DEFAULT_POLICY.maxCharsPerSecond),
  MIN_DICTIONARY_RATIO: probability(DEFAULT_POLICY.minDictionaryRatio),
  DICTIONARY_PATH: z.string().min(1).optional(),
  INSTABILITY_STDDEV: z.coerce.number().positive().default(DEFAULT_POLICY.instabilityStddev),
  INSTABILITY_WINDOW: positiveInt(DEFAULT_POLICY.instabilityWindow),
  INSTABILITY_MIN_SAMPLES: z.coerce.number().int().min(2).default(DEFAULT_POLICY.instabilityMinSamples),

  REVIEW_LEASE_MS: positiveInt(DEFAULT_POLICY.reviewLeaseMs),

  CALIBRATION_INTERVAL_HOURS: z.coerce.number().positive().default(DEFAULT_POLICY.calibrationIntervalHours),
  CALIBRATION_MIN_ACCURACY: probability(DEFAULT_POLICY.calibrationMinAccuracy),
  CALIBRATION_HARD_FLOOR: probability(DEFAULT_POLICY.calibrationHardFloor),
  CALIBRATION_DEGRADED_MULTIPLIER: z.coerce
    .number()
    .gt(0)
    .max(1)
    .default(DEFAULT_POLICY.calibrationDegradedMultiplier),
  CALIBRATION_FIXTURES_DIR: z.string().min(1).default("fixtures/calibration"),
  CALIBRATION_REFRESH_MS: positiveInt(60_000),
  CALIBRATION_TARGETS: calibrationTargetsSchema,

  AUDIT_MODE: z.enum(AUDIT_MODES).default("sync"),
});

export type RoutingThresholds = {
  autoVerifyThreshold: number;
  mediumReviewThreshold: number;
  rejectThreshold: number;
};

export type CrossValidationPolicy = {
  ocrSimilarityThreshold: number;
  maxWer: number;
  transcriptionSampleFraction: number;
  captionPolicy: (typeof CAPTION_POLICIES)[number];
  timeoutMs: number;
};

export type AnomalyPolicy = {
  maxPiiEntities: number;
  maxCharsPerSecond: number;
  minDictionaryRatio: number;
  instabilityStddev: number;
  instabilityWindow: number;
  instabilityMinSamples: number;
};

export type CalibrationPolicy = {
  intervalHours: number;
  minAccuracy: number;
  hardFloor: number;
  degradedMultiplier: number;
  fixturesDir: string;
  refreshMs: number;
  targets: CalibrationTargetConfig[];
};

export type TriageConfig = {
  databaseUrl?: string;
  databasePoolSize: number;
  redisUrl?: string;
  port: number;
  concurrency: number;
  routing: RoutingThresholds;
  crossValidation: CrossValidationPolicy;
  anomaly: AnomalyPolicy;
  dictionaryPath?: string;
  review: { leaseMs: number };
  calibration: CalibrationPolicy;
  audit: { mode: (typeof AUDIT_MODES)[number] };
  engines: {
    ocrSecondaryUrl?: string;
    transcriptionResampleUrl?: string;
    piiNerUrl?: string;
  };
};

export function loadConfig(env: Record<string, string | undefined> = process.env): TriageConfig {
  const e = envSchema.parse(env);

  if (!(e.REJECT_THRESHOLD < e.MEDIUM_REVIEW_THRESHOLD && e.MEDIUM_REVIEW_THRESHOLD < e.AUTO_VERIFY_THRESHOLD)) {
    throw new Error(
      `Invalid thresholds: expected REJECT_THRESHOLD (${e.REJECT_THRESHOLD}) < MEDIUM_REVIEW_THRESHOLD (${e.MEDIUM_REVIEW_THRESHOLD}) < AUTO_VERIFY_THRESHOLD (${e.AUTO_VERIFY_THRESHOLD})`
    );
  }
  if (!(e.CALIBRATION_HARD_FLOOR < e.CALIBRATION_MIN_ACCURACY)) {
    throw new Error("Invalid calibration policy: CALIBRATION_HARD_FLOOR must be below CALIBRATION_MIN_ACCURACY");
  }

  return {
    databaseUrl: e.DATABASE_URL,
    databasePoolSize: e.DATABASE_POOL_SIZE,
    redisUrl: e.REDIS_URL,
    port: e.PORT,
    concurrency: e.BULLMQ_CONCURRENCY,
    routing: {
      autoVerifyThreshold: e.AUTO_VERIFY_THRESHOLD,
      mediumReviewThreshold: e.MEDIUM_REVIEW_THRESHOLD,
      rejectThreshold: e.REJECT_THRESHOLD,
    },
    crossValidation: {
      ocrSimilarityThreshold: e.OCR_SIMILARITY_THRESHOLD,
      maxWer: e.MAX_WER,
      transcriptionSampleFraction: e.TRANSCRIPTION_SAMPLE_FRACTION,
      captionPolicy: e.CAPTION_POLICY,
      timeoutMs: e.CROSS_VALIDATION_TIMEOUT_MS,
    },
    anomaly: {
      maxPiiEntities: e.MAX_PII_ENTITIES,
      maxCharsPerSecond: e.MAX_CHARS_PER_SECOND,
      minDictionaryRatio: e.MIN_DICTIONARY_RATIO,
      instabilityStddev: e.INSTABILITY_STDDEV,
      instabilityWindow: e.INSTABILITY_WINDOW,
      instabilityMinSamples: e.INSTABILITY_MIN_SAMPLES,
    },
    dictionaryPath: e.DICTIONARY_PATH,
    review: { leaseMs: e.REVIEW_LEASE_MS },
    calibration: {
      intervalHours: e.CALIBRATION_INTERVAL_HOURS,
      minAccuracy: e.CALIBRATION_MIN_ACCURACY,
      hardFloor: e.CALIBRATION_HARD_FLOOR,
      degradedMultiplier: e.CALIBRATION_DEGRADED_MULTIPLIER,
      fixturesDir: e.CALIBRATION_FIXTURES_DIR,
      refreshMs: e.CALIBRATION_REFRESH_MS,
      targets: e.CALIBRATION_TARGETS,
    },
    audit: { mode: e.AUDIT_MODE },
    engines: {
      ocrSecondaryUrl: e.OCR_SECONDARY_URL,
      transcriptionResampleUrl: e.TRANSCRIPTION_RESAMPLE_URL,
      piiNerUrl: e.PII_NER_URL,
    },
  };
}
