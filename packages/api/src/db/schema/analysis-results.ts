// src/db/schema/analysis-results.ts

import { pgTable, uuid, text, doublePrecision, timestamp, jsonb, index, check } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type {
  AnalysisPayload,
  AnomalyRuleName,
  CorrectedValue,
  CrossValidationDetails,
  PiiEntityVerdict,
  VerificationMethod,
} from "@triage/shared";
import { contentTypeEnum, dispositionEnum } from "./enums.js";

export const analysisResults = pgTable(
  "analysis_results",
  {
    // Assigned on ingestion, before the row exists.
    id: uuid().primaryKey(),
    // Opaque reference into the evidence store; never dereferenced here.
    contentRef: text("content_ref").notNull(),
    caseRef: text("case_ref"),
    contentType: contentTypeEnum("content_type").notNull(),
    analyzerId: text("analyzer_id").notNull(),
    value: jsonb().$type<AnalysisPayload["value"]>().notNull(),

    rawConfidence: doublePrecision("raw_confidence").notNull(),
    adjustedConfidence: doublePrecision("adjusted_confidence").notNull(),
    calibrationMultiplier: doublePrecision("calibration_multiplier").notNull().default(1),

    disposition: dispositionEnum().notNull(),
    verificationMethod: text("verification_method").$type<VerificationMethod>().notNull(),
    entityVerdicts: jsonb("entity_verdicts").$type<PiiEntityVerdict[]>(),
    crossValidation: jsonb("cross_validation").$type<CrossValidationDetails>(),
    anomalies: jsonb().$type<AnomalyRuleName[]>().notNull().default([]),

    // Set only by a reviewer's `correct` decision.
    correctedValue: jsonb("corrected_value").$type<CorrectedValue>(),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index("analysis_results_content_ref_idx").on(table.contentRef),
    index("analysis_results_case_ref_idx").on(table.caseRef),
    index("analysis_results_analyzer_created_idx").on(table.analyzerId, table.createdAt),
    check("analysis_results_raw_confidence_range", sql`raw_confidence >= 0 AND raw_confidence <= 1`),
    check("analysis_results_adjusted_confidence_range", sql`adjusted_confidence >= 0 AND adjusted_confidence <= 1`),
  ]
);
