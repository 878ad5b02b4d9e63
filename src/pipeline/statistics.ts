import type { CostRates } from '../config.js';
import type {
  BatchResult,
  ContentItem,
  CostBreakdown,
  GenerationStats,
  ModerationRating,
  Tier,
} from '../types.js';

export interface StageTally {
  generationCost: number;
  captions: number;
  moderationChecks: number;
  uploads: number;
}

export function emptyTally(): StageTally {
  return { generationCost: 0, captions: 0, moderationChecks: 0, uploads: 0 };
}

const roundUsd = (value: number): number => Math.round(value * 1e6) / 1e6;

export function computeCost(tally: StageTally, rates: CostRates): CostBreakdown {
  const generation = roundUsd(tally.generationCost);
  const captions = roundUsd(tally.captions * rates.captionUsd);
  const moderation = roundUsd(tally.moderationChecks * rates.moderationUsd);
  const storage = roundUsd(tally.uploads * rates.uploadUsd);
  return {
    generation,
    captions,
    moderation,
    storage,
    total: roundUsd(generation + captions + moderation + storage),
  };
}

export function tierDistribution(items: ContentItem[]): Record<Tier, number> {
  const counts: Record<Tier, number> = { tier1: 0, tier2: 0, tier3: 0 };
  for (const item of items) {
    counts[item.tier]++;
  }
  return counts;
}

export function moderationDistribution(items: ContentItem[]): Record<ModerationRating | 'unchecked', number> {
  const counts: Record<ModerationRating | 'unchecked', number> = {
    safe: 0,
    suggestive: 0,
    borderline: 0,
    rejected: 0,
    unchecked: 0,
  };
  for (const item of items) {
    counts[item.moderation?.rating ?? 'unchecked']++;
  }
  return counts;
}

export function averageGenerationSeconds(items: ContentItem[]): number {
  if (items.length === 0) return 0;
  const total = items.reduce((sum, item) => sum + item.durationSeconds, 0);
  return total / items.length;
}

export function toGenerationStats(result: BatchResult, scheduledPostIds: string[] = []): GenerationStats {
  return {
    version: 1,
    requested: result.requested,
    generated: result.generated,
    rejected: result.rejected,
    failedToStore: result.failedToStore,
    persisted: result.persisted,
    tierDistribution: result.tierDistribution,
    moderationDistribution: result.moderationDistribution,
    cost: result.cost,
    totalDurationMs: result.totalDurationMs,
    contentItemIds: result.items.map((item) => item.id),
    scheduledPostIds,
  };
}
