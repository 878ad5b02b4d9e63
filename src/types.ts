export type Tier = 'tier1' | 'tier2' | 'tier3';

export const TIERS: readonly Tier[] = ['tier1', 'tier2', 'tier3'];

export type Platform = 'instagram' | 'tiktok' | 'twitter' | 'onlyfans';

export const PLATFORMS: readonly Platform[] = ['instagram', 'tiktok', 'twitter', 'onlyfans'];

export type TierRatios = Record<Tier, number>;

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface Template {
  id: string;
  category: string;
  tier: Tier;
  promptFragment: string;
  tags: string[];
}

export interface GenerationParams {
  size?: '1024x1024' | '1024x1792' | '1792x1024';
  quality?: 'standard' | 'hd';
}

export interface AutoScheduleOptions {
  accountId: string;
  startTime?: Date;
  useJitter?: boolean;
}

export interface GenerationJob {
  count: number;
  platform: Platform;
  nicheHint?: string;
  subjectPrompt?: string;
  tierRatios: TierRatios;
  caption: boolean;
  moderate: boolean;
  upload: boolean;
  customPrompts?: string[];
  customTiers?: Tier[];
  generationParams?: GenerationParams;
  seed?: number;
  autoSchedule?: AutoScheduleOptions;
}

export type ModerationRating = 'safe' | 'suggestive' | 'borderline' | 'rejected';

export interface ModerationVerdict {
  rating: ModerationRating;
  tier?: Tier;
  scores: Record<string, number>;
  flaggedCategories: string[];
  reason?: string;
}

export type StageName = 'select' | 'generate' | 'caption' | 'moderate' | 'store' | 'persist';

export interface GenerationItem {
  index: number;
  prompt: string;
  templateId?: string;
  tier: Tier;
  assetRef?: string;
  mediaUrl?: string;
  stored: boolean;
  caption?: string;
  hashtags: string[];
  moderation?: ModerationVerdict;
  cost: number;
  durationSeconds: number;
  warnings: string[];
}

export interface ContentItem extends GenerationItem {
  id: string;
  jobId: string;
  createdAt: Date;
}

export type AccountStatus = 'active' | 'suspended' | 'shadowbanned' | 'rate_limited' | 'disconnected';

export interface SocialAccount {
  id: string;
  platform: Platform;
  username: string;
  platformUserId: string;
  accessToken: string;
  accessSecret?: string;
  timezone: string;
  status: AccountStatus;
  healthScore: number;
}

export type ScheduledPostStatus = 'pending' | 'published' | 'failed' | 'cancelled';

export interface RetryState {
  version: 1;
  retryCount: number;
  lastAttemptAt?: Date;
}

export interface ScheduledPost {
  id: string;
  accountId: string;
  contentItemId: string;
  scheduledTime: Date;
  timezone: string;
  status: ScheduledPostStatus;
  caption?: string;
  hashtags: string[];
  mediaUrl: string;
  retry: RetryState;
  platformPostId?: string;
  platformUrl?: string;
  publishedAt?: Date;
  errorMessage?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CostBreakdown {
  generation: number;
  captions: number;
  moderation: number;
  storage: number;
  total: number;
}

export interface StageReport {
  stage: StageName;
  skipped: boolean;
  durationMs: number;
  inputCount: number;
  survivors: number;
  failures: number;
}

export interface DroppedItem {
  index: number;
  prompt: string;
  stage: StageName;
  reason: string;
}

export interface BatchResult {
  jobId: string;
  requested: number;
  generated: number;
  rejected: number;
  failedToStore: number;
  persisted: number;
  items: ContentItem[];
  dropped: DroppedItem[];
  warnings: string[];
  tierDistribution: Record<Tier, number>;
  moderationDistribution: Record<ModerationRating | 'unchecked', number>;
  cost: CostBreakdown;
  stages: StageReport[];
  totalDurationMs: number;
  averageGenerationSeconds: number;
}

// Summary persisted on the job-status record; bump `version` when the shape changes.
export interface GenerationStats {
  version: 1;
  requested: number;
  generated: number;
  rejected: number;
  failedToStore: number;
  persisted: number;
  tierDistribution: Record<Tier, number>;
  moderationDistribution: Record<ModerationRating | 'unchecked', number>;
  cost: CostBreakdown;
  totalDurationMs: number;
  contentItemIds: string[];
  scheduledPostIds: string[];
}
