// src/db/schema/enums.ts

import { pgEnum } from "drizzle-orm/pg-core";
import {
  CALIBRATION_STATUSES,
  CONTENT_TYPES,
  DISPOSITIONS,
  REVIEW_OUTCOMES,
  REVIEW_STATUSES,
} from "@triage/shared";

/** Fixed set; each value has its own cross-validation strategy. */
export const contentTypeEnum = pgEnum("content_type", CONTENT_TYPES);

/** Trust classification of an analysis result. */
export const dispositionEnum = pgEnum("disposition", DISPOSITIONS);

/** Review queue item lifecycle: PENDING -> CLAIMED -> RESOLVED. */
export const reviewStatusEnum = pgEnum("review_status", REVIEW_STATUSES);

/** The human decision recorded on a RESOLVED item. */
export const reviewOutcomeEnum = pgEnum("review_outcome", REVIEW_OUTCOMES);

/** Outcome of one calibration run. */
export const calibrationStatusEnum = pgEnum("calibration_status", CALIBRATION_STATUSES);
