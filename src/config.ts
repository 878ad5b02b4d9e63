import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { PLATFORMS, type Platform, type TierRatios } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '..');

export interface AppConfig {
  port: number;
  dbPath: string;
  concurrencyLimit: number;
  tierRatios: TierRatios;
  optimalHoursByPlatform: Record<Platform, number[]>;
  minIntervalHoursByPlatform: Record<Platform, number>;
  dailyCapByPlatform: Record<Platform, number>;
  useJitter: boolean;
  maxRetries: number;
  baseBackoffHours: number;
  sweepIntervalSeconds: number;
  dispatchBatchSize: number;
  generationPollSeconds: number;
  costs: CostRates;
  openai: { apiKey?: string; imageModel: string; chatModel: string };
  blob: { dir: string; publicBaseUrl: string };
  twitter: { appKey?: string; appSecret?: string };
  slack: { botToken?: string; alertChannel?: string };
}

export interface CostRates {
  imageUsd: number;
  captionUsd: number;
  moderationUsd: number;
  uploadUsd: number;
}

export const DEFAULT_TIER_RATIOS: TierRatios = { tier1: 0.6, tier2: 0.3, tier3: 0.1 };

// Hours are local to the account's timezone.
export const DEFAULT_OPTIMAL_HOURS: Record<Platform, number[]> = {
  instagram: [13, 14, 15, 17, 18, 19],
  tiktok: [14, 15, 16, 18, 19, 20, 21],
  twitter: [12, 13, 17, 18],
  onlyfans: [20, 21, 22, 23],
};

export const DEFAULT_MIN_INTERVAL_HOURS: Record<Platform, number> = {
  instagram: 4,
  tiktok: 3,
  twitter: 1,
  onlyfans: 6,
};

export const DEFAULT_DAILY_CAP: Record<Platform, number> = {
  instagram: 3,
  tiktok: 5,
  twitter: 10,
  onlyfans: 2,
};

export const DEFAULT_COST_RATES: CostRates = {
  imageUsd: 0.01,
  captionUsd: 0.003,
  moderationUsd: 0.0001,
  uploadUsd: 0.001,
};

const RATIO_TOLERANCE = 1e-6;

export const tierRatiosSchema = z
  .object({
    tier1: z.number().min(0).max(1),
    tier2: z.number().min(0).max(1),
    tier3: z.number().min(0).max(1),
  })
  .refine(
    (r) => Math.abs(r.tier1 + r.tier2 + r.tier3 - 1) <= RATIO_TOLERANCE,
    { message: 'Tier ratios must sum to 1.0' }
  );

const hourSchema = z.number().int().min(0).max(23);

const platformRulesSchema = z
  .object({
    optimalHours: z.array(hourSchema).min(1).optional(),
    minIntervalHours: z.number().positive().optional(),
    dailyCap: z.number().int().positive().optional(),
  })
  .strict();

const schedulingFileSchema = z
  .object({
    instagram: platformRulesSchema.optional(),
    tiktok: platformRulesSchema.optional(),
    twitter: platformRulesSchema.optional(),
    onlyfans: platformRulesSchema.optional(),
  })
  .strict();

export type SchedulingOverrides = z.infer<typeof schedulingFileSchema>;

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const tierRatiosFromEnv = z
  .string()
  .transform((raw, ctx) => {
    const parts = raw.split(',').map((p) => Number(p.trim()));
    if (parts.length !== 3 || parts.some((n) => Number.isNaN(n))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'TIER_RATIOS must be three comma-separated numbers' });
      return z.NEVER;
    }
    return { tier1: parts[0], tier2: parts[1], tier3: parts[2] };
  })
  .pipe(tierRatiosSchema);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DB_PATH: z.string().min(1).optional(),
  CONCURRENCY_LIMIT: z.coerce.number().int().positive().default(5),
  TIER_RATIOS: tierRatiosFromEnv.optional(),
  USE_JITTER: booleanFromEnv.default('true'),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  BASE_BACKOFF_HOURS: z.coerce.number().positive().default(2),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  DISPATCH_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  GENERATION_POLL_SECONDS: z.coerce.number().int().positive().default(5),
  SCHEDULING_CONFIG_PATH: z.string().min(1).optional(),
  IMAGE_COST_USD: z.coerce.number().nonnegative().default(DEFAULT_COST_RATES.imageUsd),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_IMAGE_MODEL: z.string().default('dall-e-3'),
  OPENAI_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  BLOB_DIR: z.string().optional(),
  BLOB_PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000/media'),
  X_API_KEY: z.string().optional(),
  X_API_SECRET: z.string().optional(),
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_ALERT_CHANNEL: z.string().optional(),
});

export function parseSchedulingOverrides(raw: unknown): SchedulingOverrides {
  return schedulingFileSchema.parse(raw);
}

function readSchedulingOverrides(filePath: string): SchedulingOverrides {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseSchedulingOverrides(raw);
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Builds the application config from environment variables and the optional
 * scheduling rules file. Throws a ZodError when anything is out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(emptyToUndefined(env));
  const overrides = parsed.SCHEDULING_CONFIG_PATH
    ? readSchedulingOverrides(path.resolve(parsed.SCHEDULING_CONFIG_PATH))
    : {};

  const optimalHoursByPlatform = { ...DEFAULT_OPTIMAL_HOURS };
  const minIntervalHoursByPlatform = { ...DEFAULT_MIN_INTERVAL_HOURS };
  const dailyCapByPlatform = { ...DEFAULT_DAILY_CAP };

  for (const platform of PLATFORMS) {
    const rules = overrides[platform];
    if (!rules) continue;
    if (rules.optimalHours) {
      optimalHoursByPlatform[platform] = [...new Set(rules.optimalHours)].sort((a, b) => a - b);
    }
    if (rules.minIntervalHours !== undefined) minIntervalHoursByPlatform[platform] = rules.minIntervalHours;
    if (rules.dailyCap !== undefined) dailyCapByPlatform[platform] = rules.dailyCap;
  }

  return {
    port: parsed.PORT,
    dbPath: parsed.DB_PATH ?? path.join(projectRoot, 'data', 'studio.db'),
    concurrencyLimit: parsed.CONCURRENCY_LIMIT,
    tierRatios: parsed.TIER_RATIOS ?? DEFAULT_TIER_RATIOS,
    optimalHoursByPlatform,
    minIntervalHoursByPlatform,
    dailyCapByPlatform,
    useJitter: parsed.USE_JITTER,
    maxRetries: parsed.MAX_RETRIES,
    baseBackoffHours: parsed.BASE_BACKOFF_HOURS,
    sweepIntervalSeconds: parsed.SWEEP_INTERVAL_SECONDS,
    dispatchBatchSize: parsed.DISPATCH_BATCH_SIZE,
    generationPollSeconds: parsed.GENERATION_POLL_SECONDS,
    costs: { ...DEFAULT_COST_RATES, imageUsd: parsed.IMAGE_COST_USD },
    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      imageModel: parsed.OPENAI_IMAGE_MODEL,
      chatModel: parsed.OPENAI_CHAT_MODEL,
    },
    blob: {
      dir: parsed.BLOB_DIR ?? path.join(projectRoot, 'data', 'media'),
      publicBaseUrl: parsed.BLOB_PUBLIC_BASE_URL,
    },
    twitter: { appKey: parsed.X_API_KEY, appSecret: parsed.X_API_SECRET },
    slack: { botToken: parsed.SLACK_BOT_TOKEN, alertChannel: parsed.SLACK_ALERT_CHANNEL },
  };
}
