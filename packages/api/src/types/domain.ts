import type {
  AnalysisPayload,
  AnalyzerHealth,
  AnomalyRuleName,
  CalibrationStatus,
  ContentType,
  CorrectedValue,
  CrossValidationDetails,
  Disposition,
  PiiEntityVerdict,
  Priority,
  ReviewOutcome,
  ReviewStatus,
  VerificationMethod,
} from "@triage/shared";

/** An analyzer output after ingestion, before the pipeline has assigned a disposition. */
export type AnalysisDraft = AnalysisPayload & {
  id: string;
  contentRef: string;
  caseRef: string | null;
  analyzerId: string;
  rawConfidence: number;
  adjustedConfidence: number;
  calibrationMultiplier: number;
  createdAt: Date;
};

export type AnalysisDraftOf<C extends ContentType> = Extract<AnalysisDraft, { contentType: C }>;

export type AnalysisResult = AnalysisDraft & {
  disposition: Disposition;
  verificationMethod: VerificationMethod;
  entityVerdicts: PiiEntityVerdict[] | null;
  crossValidation: CrossValidationDetails | null;
  anomalies: AnomalyRuleName[];
  correctedValue: CorrectedValue | null;
  updatedAt: Date;
};

export type ReviewQueueItem = {
  id: string;
  /** Weak reference: the item annotates the result, it does not own it. */
  analysisResultId: string;
  caseRef: string | null;
  contentType: ContentType;
  priority: Priority;
  /** The verification method that sent the result to review. */
  reason: VerificationMethod;
  status: ReviewStatus;
  claimedBy: string | null;
  claimedAt: Date | null;
  leaseExpiresAt: Date | null;
  outcome: ReviewOutcome | null;
  correctedValue: CorrectedValue | null;
  resolvedBy: string | null;
  resolvedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type CalibrationRun = {
  id: string;
  analyzerId: string;
  contentType: ContentType;
  sampleCount: number;
  accuracy: number;
  f1Score: number | null;
  status: CalibrationStatus;
  /** Multiplier this run put into effect. */
  multiplier: number;
  ranAt: Date;
};

export type PendingFilter = {
  caseRef?: string;
  contentType?: ContentType;
  priority?: Priority;
};

export type QueueCounts = {
  openCount: number;
  resolvedCount: number;
  correctedCount: number;
  rejectedCount: number;
  avgReviewLatencyMs: number | null;
};

export type QueueStats = {
  pendingCount: number;
  resolvedCount: number;
  correctionRate: number;
  falsePositiveRate: number;
  avgReviewLatencyMs: number | null;
};

export type AnalyzerReport = {
  analyzerId: string;
  status: AnalyzerHealth;
  multiplier: number;
  tableVersion: number;
  fixtureMissing: boolean;
  instabilityFlagged: boolean;
  history: CalibrationRun[];
};

export type Clock = () => Date;

/** A disposition together with the reason for it. Only review-bound decisions carry a queue priority. */
export type Decision =
  | { disposition: "PENDING_REVIEW"; method: VerificationMethod; priority: Priority }
  | { disposition: "AUTO_VERIFIED" | "REJECTED" | "HUMAN_VERIFIED"; method: VerificationMethod; priority: null };

/** What cross-validation concluded, with the evidence it gathered. */
export type Verdict = Decision & {
  crossValidation: CrossValidationDetails | null;
  entityVerdicts: PiiEntityVerdict[] | null;
};
