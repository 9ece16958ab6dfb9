import { z } from "zod";

// Response bodies of the control-plane API, validated before the CLI
// renders them.

const OutcomeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("added"), simulated: z.boolean().optional() }),
  z.object({ kind: z.literal("already_present") }),
  z.object({ kind: z.literal("skipped"), reason: z.string() }),
  z.object({ kind: z.literal("failed"), reason: z.string() }),
]);

const StageCountsSchema = z.object({
  attempted: z.number(),
  added: z.number(),
  alreadyPresent: z.number(),
  skipped: z.number(),
  failed: z.number(),
});

const ItemStageSchema = z.enum(["blocklists", "whitelist", "regexPatterns"]);

export const ReportSchema = z.object({
  profile: z.string(),
  target: z.string(),
  dryRun: z.boolean(),
  overallSuccess: z.boolean(),
  abortReason: z.string().optional(),
  warnings: z.array(z.string()),
  stages: z.object({
    blocklists: StageCountsSchema,
    whitelist: StageCountsSchema,
    regexPatterns: StageCountsSchema,
  }),
  rebuild: z.object({ executed: z.boolean(), outcome: OutcomeSchema.optional() }),
  items: z.array(
    z.object({ stage: ItemStageSchema, subject: z.string(), label: z.string(), outcome: OutcomeSchema }),
  ),
  startedAt: z.string(),
  durationMs: z.number(),
});

const CheckResultSchema = z.object({
  checkName: z.string(),
  status: z.enum(["pass", "fail"]),
  detail: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
});

export const AggregateHealthSchema = z.object({
  status: z.enum(["healthy", "degraded", "unhealthy"]),
  timestamp: z.string(),
  checks: z.record(CheckResultSchema),
  errors: z.array(z.string()),
});

export const ReadinessSchema = z.object({
  ready: z.boolean(),
  timestamp: z.string(),
});

export const ProfileListSchema = z.object({
  profiles: z.array(z.string()),
});

export const ErrorBodySchema = z
  .object({
    statusCode: z.number(),
    message: z.union([z.string(), z.array(z.string())]),
    available: z.array(z.string()).optional(),
    issues: z.array(z.string()).optional(),
  })
  .passthrough();

export type ErrorBody = z.infer<typeof ErrorBodySchema>;
export type Readiness = z.infer<typeof ReadinessSchema>;
