import { z } from 'zod';
import { tierRatiosSchema } from './config.js';
import { isValidTimezone } from './scheduling/timezone.js';

// Shapes shared by request validation and by the JSON columns read back from SQLite.

export const tierSchema = z.enum(['tier1', 'tier2', 'tier3']);

export const platformSchema = z.enum(['instagram', 'tiktok', 'twitter', 'onlyfans']);

export const accountStatusSchema = z.enum(['active', 'suspended', 'shadowbanned', 'rate_limited', 'disconnected']);

export const scheduledPostStatusSchema = z.enum(['pending', 'published', 'failed', 'cancelled']);

export const timezoneSchema = z
  .string()
  .min(1)
  .refine(isValidTimezone, { message: 'Unknown IANA timezone' });

export const MAX_BATCH_SIZE = 200;

export const generationParamsSchema = z
  .object({
    size: z.enum(['1024x1024', '1024x1792', '1792x1024']).optional(),
    quality: z.enum(['standard', 'hd']).optional(),
  })
  .strict();

export const autoScheduleSchema = z.object({
  accountId: z.string().min(1),
  startTime: z.coerce.date().optional(),
  useJitter: z.boolean().optional(),
});

export const generationJobSchema = z.object({
  count: z.number().int().min(1).max(MAX_BATCH_SIZE),
  platform: platformSchema,
  nicheHint: z.string().min(1).max(100).optional(),
  subjectPrompt: z.string().min(1).max(1000).optional(),
  tierRatios: tierRatiosSchema,
  caption: z.boolean(),
  moderate: z.boolean(),
  upload: z.boolean(),
  customPrompts: z.array(z.string().min(1).max(1000)).max(MAX_BATCH_SIZE).optional(),
  customTiers: z.array(tierSchema).optional(),
  generationParams: generationParamsSchema.optional(),
  seed: z.number().int().optional(),
  autoSchedule: autoScheduleSchema.optional(),
});

export const moderationVerdictSchema = z.object({
  rating: z.enum(['safe', 'suggestive', 'borderline', 'rejected']),
  tier: tierSchema.optional(),
  scores: z.record(z.number()),
  flaggedCategories: z.array(z.string()),
  reason: z.string().optional(),
});

export const stageReportSchema = z.object({
  stage: z.enum(['select', 'generate', 'caption', 'moderate', 'store', 'persist']),
  skipped: z.boolean(),
  durationMs: z.number(),
  inputCount: z.number(),
  survivors: z.number(),
  failures: z.number(),
});

const costBreakdownSchema = z.object({
  generation: z.number(),
  captions: z.number(),
  moderation: z.number(),
  storage: z.number(),
  total: z.number(),
});

export const generationStatsSchema = z.object({
  version: z.literal(1),
  requested: z.number(),
  generated: z.number(),
  rejected: z.number(),
  failedToStore: z.number(),
  persisted: z.number(),
  tierDistribution: z.object({ tier1: z.number(), tier2: z.number(), tier3: z.number() }),
  moderationDistribution: z.object({
    safe: z.number(),
    suggestive: z.number(),
    borderline: z.number(),
    rejected: z.number(),
    unchecked: z.number(),
  }),
  cost: costBreakdownSchema,
  totalDurationMs: z.number(),
  contentItemIds: z.array(z.string()),
  scheduledPostIds: z.array(z.string()),
});

export const retryStateSchema = z.object({
  version: z.literal(1),
  retryCount: z.number().int().min(0),
  lastAttemptAt: z.coerce.date().optional(),
});

export const stringListSchema = z.array(z.string());

/** A TEXT column holding JSON, decoded and then checked against `schema`. */
export const jsonColumn = <T extends z.ZodTypeAny>(schema: T) =>
  z
    .string()
    .transform((raw, ctx) => {
      try {
        const value: unknown = JSON.parse(raw);
        return value;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid JSON column' });
        return z.NEVER;
      }
    })
    .pipe(schema);
