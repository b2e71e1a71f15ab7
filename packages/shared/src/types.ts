// ============================================================
// Analysis values (the `value` JSONB on analysis_results)
// ============================================================

/** Half-open character range [start, end) into the analysed text. */
export interface Span {
  start: number;
  end: number;
}

export interface PiiEntity {
  /** e.g. PHONE_NUMBER, EMAIL_ADDRESS, PERSON. */
  entityType: string;
  span: Span;
  text: string;
}

export interface TranscriptSegment {
  startSeconds: number;
  endSeconds: number;
  text: string;
}

export interface OcrValue {
  text: string;
}

export interface CaptionValue {
  text: string;
}

export interface TranscriptionValue {
  text: string;
  audioDurationSeconds: number;
  /** Timed segments, when the engine produces them. Used to pick the resample reference. */
  segments?: TranscriptSegment[];
}

export interface PiiValue {
  /** The message text the detector ran over; secondary detectors see the same text. */
  text: string;
  entities: PiiEntity[];
}

export type AnalysisPayload =
  | { contentType: "ocr"; value: OcrValue }
  | { contentType: "caption"; value: CaptionValue }
  | { contentType: "transcription"; value: TranscriptionValue }
  | { contentType: "pii"; value: PiiValue };

// ============================================================
// Cross-validation evidence (JSONB on analysis_results)
// ============================================================

/** Sub-disposition of one PII entity; the result's disposition is the weakest of these. */
export interface PiiEntityVerdict extends PiiEntity {
  /** Every detector (primary analyzer included) that reported this exact span and type. */
  detectors: string[];
  disposition: "AUTO_VERIFIED" | "PENDING_REVIEW";
  method: "cross_validation_agreement" | "single_detector";
}

export interface CrossValidationDetails {
  strategy: "ocr" | "pii" | "transcription" | "caption";
  engineIds: string[];
  similarity?: number;
  wer?: number;
  secondaryText?: string;
  window?: { startSeconds: number; endSeconds: number };
  error?: string;
}

/** A reviewer's replacement for the machine output: text, or the corrected PII entity set. */
export type CorrectedValue = string | PiiEntity[];

// ============================================================
// Audit
// ============================================================

export type AuditEntityType = "analysis_result" | "review_queue_item" | "calibration_run" | "submission";

export interface AuditEvent {
  /** Stable per event so an at-least-once sink can de-duplicate redeliveries. */
  id: string;
  entityType: AuditEntityType;
  entityId: string;
  action: string;
  /** Reviewer id, or `system:<component>` for automated transitions. */
  actorId: string;
  timestamp: string;
  details: Record<string, unknown>;
}
