import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { tierRatiosSchema } from '../config.js';
import {
  MAX_BATCH_SIZE,
  accountStatusSchema,
  generationJobSchema,
  platformSchema,
  timezoneSchema,
} from '../schemas.js';

/** Validates `req.body` and replaces it with the parsed (defaulted, coerced) value. */
export function validate(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        error: 'Validation failed',
        details: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}

export const createBatchSchema = generationJobSchema
  .extend({
    tierRatios: tierRatiosSchema.optional(),
    caption: z.boolean().default(true),
    moderate: z.boolean().default(true),
    upload: z.boolean().default(true),
  })
  .superRefine((body, ctx) => {
    if (body.customTiers && !body.customPrompts) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['customTiers'],
        message: 'customTiers requires customPrompts',
      });
    }
    if (body.customTiers && body.customPrompts && body.customTiers.length !== body.customPrompts.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['customTiers'],
        message: 'customTiers must have one entry per custom prompt',
      });
    }
  });

export type CreateBatchBody = z.output<typeof createBatchSchema>;

export const createAccountSchema = z.object({
  platform: platformSchema,
  username: z.string().min(1, 'Username is required').max(100),
  platformUserId: z.string().min(1, 'Platform user id is required'),
  accessToken: z.string().min(1, 'Access token is required'),
  accessSecret: z.string().min(1).optional(),
  timezone: timezoneSchema.default('UTC'),
  status: accountStatusSchema.optional(),
  healthScore: z.number().int().min(0).max(100).optional(),
});

export type CreateAccountBody = z.output<typeof createAccountSchema>;

export const scheduleItemsSchema = z.object({
  contentItemIds: z.array(z.string().min(1)).min(1, 'At least one content item is required').max(MAX_BATCH_SIZE),
  startTime: z.coerce.date().optional(),
  useJitter: z.boolean().optional(),
});

export type ScheduleItemsBody = z.output<typeof scheduleItemsSchema>;
