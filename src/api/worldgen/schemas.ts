import { z } from "zod";

export const ReportEntrySchema = z.object({
  kind: z.enum(["transport", "parse", "schema", "integrity", "storage", "cancelled", "internal"]),
  severity: z.enum(["error", "warning"]),
  stage: z.string(),
  artifactId: z.string().optional(),
  message: z.string(),
});

export const GenerationReportSchema = z.object({
  status: z.enum(["completed", "aborted"]),
  storyId: z.string(),
  chapterIds: z.array(z.string()),
  entries: z.array(ReportEntrySchema),
  errorCount: z.number(),
  warningCount: z.number(),
  tokensUsed: z.number(),
  counts: z.object({
    chapters: z.number(),
    rooms: z.number(),
    quests: z.number(),
    enemies: z.number(),
    items: z.number(),
  }),
  outputPath: z.string().optional(),
  abortReason: z.string().optional(),
});

const RunStateSchema = z.enum(["idle", "running", "completed", "aborted"]);

// Start generation
// config is parsed by the generator, which fills provider defaults from the
// environment first; validating it here would apply the schema defaults instead
export const StartGenerationRequestSchema = z.object({
  config: z.record(z.unknown()),
  wait: z.boolean().optional(), // Respond with the report once the run ends instead of right away
});

export const StartGenerationResponseSchema = z.object({
  storyId: z.string(),
  state: RunStateSchema,
  report: GenerationReportSchema.optional(),
});

// Next chapter
export const NextChapterRequestSchema = z.object({
  storyId: z.string().min(1).optional(), // Defaults to the story this server generated last
  wait: z.boolean().optional(),
});

export const NextChapterResponseSchema = StartGenerationResponseSchema;

// Cancel
export const CancelGenerationResponseSchema = z.object({
  cancelled: z.boolean(),
});

// Status
export const GenerationStatusResponseSchema = z.object({
  state: RunStateSchema,
  storyId: z.string().nullable(),
  message: z.string(),
  progress: z.number(),
  tokensUsed: z.number(),
  report: GenerationReportSchema.nullable(),
});

export type StartGenerationRequest = z.infer<typeof StartGenerationRequestSchema>;
export type StartGenerationResponse = z.infer<typeof StartGenerationResponseSchema>;
export type NextChapterRequest = z.infer<typeof NextChapterRequestSchema>;
export type NextChapterResponse = z.infer<typeof NextChapterResponseSchema>;
export type CancelGenerationResponse = z.infer<typeof CancelGenerationResponseSchema>;
export type GenerationStatusResponse = z.infer<typeof GenerationStatusResponseSchema>;
