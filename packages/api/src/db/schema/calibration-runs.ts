// src/db/schema/calibration-runs.ts

import { pgTable, uuid, text, integer, doublePrecision, timestamp, index } from "drizzle-orm/pg-core";
import { calibrationStatusEnum, contentTypeEnum } from "./enums.js";

/** Append-only: rows are never updated after insert. */
export const calibrationRuns = pgTable(
  "calibration_runs",
  {
    id: uuid().primaryKey().defaultRandom(),
    analyzerId: text("analyzer_id").notNull(),
    contentType: contentTypeEnum("content_type").notNull(),
    sampleCount: integer("sample_count").notNull(),
    accuracy: doublePrecision().notNull(),
    f1Score: doublePrecision("f1_score"),
    status: calibrationStatusEnum().notNull(),
    multiplier: doublePrecision().notNull(),
    ranAt: timestamp("ran_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("calibration_runs_analyzer_ran_at_idx").on(table.analyzerId, table.ranAt)]
);
