// src/db/schema/review-queue.ts

import { pgTable, uuid, text, integer, timestamp, jsonb, index, uniqueIndex, check } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { CorrectedValue, Priority, VerificationMethod } from "@triage/shared";
import { contentTypeEnum, reviewOutcomeEnum, reviewStatusEnum } from "./enums.js";
import { analysisResults } from "./analysis-results.js";

export const reviewQueue = pgTable(
  "review_queue",
  {
    id: uuid().primaryKey().defaultRandom(),
    analysisResultId: uuid("analysis_result_id")
      .notNull()
      .references(() => analysisResults.id),
    // Denormalised from the result for queue filtering.
    caseRef: text("case_ref"),
    contentType: contentTypeEnum("content_type").notNull(),
    priority: integer().$type<Priority>().notNull(),
    reason: text().$type<VerificationMethod>().notNull(),
    status: reviewStatusEnum().notNull().default("PENDING"),

    // Lease: (owner, expiry). Expiry is evaluated lazily at claim time.
    claimedBy: text("claimed_by"),
    claimedAt: timestamp("claimed_at", { withTimezone: true }),
    leaseExpiresAt: timestamp("lease_expires_at", { withTimezone: true }),

    // How the reviewer resolved it
    outcome: reviewOutcomeEnum(),
    correctedValue: jsonb("corrected_value").$type<CorrectedValue>(),
    resolvedBy: text("resolved_by"),
    resolvedAt: timestamp("resolved_at", { withTimezone: true }),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    // The reviewer UI's primary query: open items, most urgent then oldest first
    index("review_queue_open_idx")
      .on(table.priority, table.createdAt)
      .where(sql`status <> 'RESOLVED'`),
    index("review_queue_case_ref_idx").on(table.caseRef),
    index("review_queue_resolved_idx").on(table.status, table.resolvedAt),
    // Idempotent enqueue: at most one open item per analysis result
    uniqueIndex("review_queue_open_unique_result")
      .on(table.analysisResultId)
      .where(sql`status IN ('PENDING', 'CLAIMED')`),
    check(
      "review_queue_claim_has_lease",
      sql`(status <> 'CLAIMED' OR (claimed_by IS NOT NULL AND claimed_at IS NOT NULL AND lease_expires_at IS NOT NULL))`
    ),
    check("review_queue_resolved_has_outcome", sql`(status <> 'RESOLVED' OR outcome IS NOT NULL)`),
    check("review_queue_priority_range", sql`priority BETWEEN 1 AND 3`),
  ]
);
