import { z } from "zod";
import { CONTENT_TYPES, PRIORITIES, REVIEW_DECISIONS } from "./constants.js";

// ============================================================
// Analysis value schemas
// ============================================================

export const spanSchema = z
  .object({
    start: z.number().int().min(0),
    end: z.number().int().min(0),
  })
  .refine((s) => s.end > s.start, { message: "span.end must be greater than span.start" });

export const piiEntitySchema = z.object({
  entityType: z.string().min(1),
  span: spanSchema,
  text: z.string(),
});

export const transcriptSegmentSchema = z.object({
  startSeconds: z.number().min(0),
  endSeconds: z.number().min(0),
  text: z.string(),
});

export const ocrValueSchema = z.object({ text: z.string() });
export const captionValueSchema = z.object({ text: z.string() });
export const transcriptionValueSchema = z.object({
  text: z.string(),
  audioDurationSeconds: z.number().positive(),
  segments: z.array(transcriptSegmentSchema).optional(),
});
export const piiValueSchema = z.object({
  text: z.string(),
  entities: z.array(piiEntitySchema),
});

/** The content-type-tagged value, as stored. */
export const analysisPayloadSchema = z.discriminatedUnion("contentType", [
  z.object({ contentType: z.literal("ocr"), value: ocrValueSchema }),
  z.object({ contentType: z.literal("caption"), value: captionValueSchema }),
  z.object({ contentType: z.literal("transcription"), value: transcriptionValueSchema }),
  z.object({ contentType: z.literal("pii"), value: piiValueSchema }),
]);

// ============================================================
// Submission schema (Ingestion API)
// ============================================================

const submissionBase = z.object({
  contentRef: z.string().min(1, "contentRef cannot be empty"),
  caseRef: z.string().min(1).optional(),
  analyzerId: z.string().min(1, "analyzerId cannot be empty"),
  rawConfidence: z
    .number()
    .min(0, "rawConfidence must be within [0, 1]")
    .max(1, "rawConfidence must be within [0, 1]"),
});

export const submitAnalysisSchema = z.discriminatedUnion("contentType", [
  submissionBase.extend({ contentType: z.literal("ocr"), value: ocrValueSchema }),
  submissionBase.extend({ contentType: z.literal("caption"), value: captionValueSchema }),
  submissionBase.extend({ contentType: z.literal("transcription"), value: transcriptionValueSchema }),
  submissionBase.extend({ contentType: z.literal("pii"), value: piiValueSchema }),
]);
export type SubmitAnalysisInput = z.infer<typeof submitAnalysisSchema>;

// ============================================================
// Review API schemas
// ============================================================

export const correctedValueSchema = z.union([z.string(), z.array(piiEntitySchema)]);

export const reviewResolveSchema = z
  .object({
    decision: z.enum(REVIEW_DECISIONS),
    correctedValue: correctedValueSchema.optional(),
  })
  .superRefine((body, ctx) => {
    if (body.decision !== "correct") return;
    const v = body.correctedValue;
    const empty = v === undefined || (typeof v === "string" ? v.trim().length === 0 : v.length === 0);
    if (empty) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["correctedValue"],
        message: "correctedValue is required when decision is 'correct'",
      });
    }
  });
export type ReviewResolveInput = z.infer<typeof reviewResolveSchema>;

export const listPendingQuerySchema = z.object({
  caseRef: z.string().min(1).optional(),
  contentType: z.enum(CONTENT_TYPES).optional(),
  priority: z.coerce
    .number()
    .pipe(z.union([z.literal(PRIORITIES[0]), z.literal(PRIORITIES[1]), z.literal(PRIORITIES[2])]))
    .optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});
export type ListPendingQuery = z.infer<typeof listPendingQuerySchema>;

export const statsQuerySchema = z.object({
  caseRef: z.string().min(1).optional(),
});

// ============================================================
// Calibration fixture files
// ============================================================

export const calibrationFixtureFileSchema = z.discriminatedUnion("contentType", [
  z.object({
    contentType: z.literal("ocr"),
    samples: z.array(z.object({ input: z.string(), expected: z.string() })),
  }),
  z.object({
    contentType: z.literal("caption"),
    samples: z.array(z.object({ input: z.string(), expected: z.string() })),
  }),
  z.object({
    contentType: z.literal("transcription"),
    samples: z.array(z.object({ input: z.string(), expected: z.string() })),
  }),
  z.object({
    contentType: z.literal("pii"),
    samples: z.array(z.object({ input: z.string(), expected: z.array(piiEntitySchema) })),
  }),
]);
export type CalibrationFixtureFile = z.infer<typeof calibrationFixtureFileSchema>;
