import type OpenAI from 'openai';
import type { Moderator } from '../capabilities/index.js';
import type { CircuitBreaker } from '../circuit-breaker/index.js';
import type { ModerationVerdict, Tier } from '../types.js';
import { toProviderError } from './openai.js';

// A score strictly above its threshold rejects the item outright.
export const REJECTION_THRESHOLDS: Record<string, number> = {
  sexual: 0.9,
  violence: 0.7,
  hate: 0.5,
  'self-harm': 0.5,
  harassment: 0.6,
};

const DEFAULT_REJECTION_THRESHOLD = 0.5;

interface TierLimits {
  sexual: number;
  violence: number;
  hate: number;
}

const TIER_LIMITS: Array<{ tier: Tier; rating: ModerationVerdict['rating']; limits: TierLimits }> = [
  { tier: 'tier1', rating: 'safe', limits: { sexual: 0.2, violence: 0.1, hate: 0.05 } },
  { tier: 'tier2', rating: 'suggestive', limits: { sexual: 0.6, violence: 0.3, hate: 0.1 } },
  { tier: 'tier3', rating: 'borderline', limits: { sexual: 0.9, violence: 0.5, hate: 0.2 } },
];

/**
 * Turns raw category scores into a verdict. Rejection is checked first over
 * every category; otherwise the first tier whose sexual, violence and hate
 * limits all hold wins. Anything past tier3's limits but under rejection is
 * still tier3/borderline.
 */
export function classifyScores(scores: Record<string, number>): ModerationVerdict {
  const flaggedCategories = Object.keys(scores).filter(
    (category) => scores[category] > (REJECTION_THRESHOLDS[category] ?? DEFAULT_REJECTION_THRESHOLD)
  );

  if (flaggedCategories.length > 0) {
    const details = flaggedCategories.map((c) => `${c} ${scores[c].toFixed(2)}`).join(', ');
    return { rating: 'rejected', scores, flaggedCategories, reason: `Rejected by moderation: ${details}` };
  }

  const sexual = scores.sexual ?? 0;
  const violence = scores.violence ?? 0;
  const hate = scores.hate ?? 0;

  const match = TIER_LIMITS.find(
    ({ limits }) => sexual <= limits.sexual && violence <= limits.violence && hate <= limits.hate
  );

  return {
    rating: match?.rating ?? 'borderline',
    tier: match?.tier ?? 'tier3',
    scores,
    flaggedCategories: [],
  };
}

export class OpenAIModerator implements Moderator {
  constructor(
    private readonly client: OpenAI,
    private readonly circuit: CircuitBreaker,
    private readonly model = 'omni-moderation-latest'
  ) {}

  async classify(text: string, assetRef?: string): Promise<ModerationVerdict> {
    const input: OpenAI.ModerationMultiModalInput[] = [{ type: 'text', text }];
    if (assetRef && /^https?:\/\//.test(assetRef)) {
      input.push({ type: 'image_url', image_url: { url: assetRef } });
    }

    return this.circuit.execute(async () => {
      try {
        const response = await this.client.moderations.create({ model: this.model, input });
        const result = response.results[0];
        if (!result) {
          throw new Error('Moderation returned no results');
        }

        const s = result.category_scores;
        return classifyScores({
          sexual: s.sexual,
          'sexual/minors': s['sexual/minors'],
          violence: s.violence,
          hate: s.hate,
          'self-harm': s['self-harm'],
          harassment: s.harassment,
        });
      } catch (error) {
        throw toProviderError('moderation', error);
      }
    });
  }
}
