import { vi } from 'vitest';
import type {
  AccountHealth,
  BlobStore,
  Caption,
  CaptionContext,
  Copywriter,
  GeneratedAsset,
  Generator,
  Moderator,
  Notifier,
  PublishPayload,
  PublishReceipt,
  Publisher,
  TemplateCatalog,
} from '@/capabilities/index.js';
import { DEFAULT_COST_RATES } from '@/config.js';
import type { GenerationJob, GenerationParams, ModerationVerdict, ScheduledPost, SocialAccount, Template } from '@/types.js';

export class StaticCatalog implements TemplateCatalog {
  constructor(private readonly templates: Template[]) {}

  list(): Template[] {
    return this.templates;
  }
}

/** Succeeds for every prompt unless it contains one of `failOn`. */
export class FakeGenerator implements Generator {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly options: { delayMs?: number; failOn?: string[]; cost?: number } = {}
  ) {}

  async generate(prompt: string, _params: GenerationParams): Promise<GeneratedAsset> {
    this.calls.push(prompt);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.options.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
      }
      if (this.options.failOn?.some((needle) => prompt.includes(needle))) {
        throw new Error(`generation failed for "${prompt}"`);
      }
      return {
        assetRef: `https://assets.test/${this.calls.length}.png`,
        cost: this.options.cost ?? DEFAULT_COST_RATES.imageUsd,
        durationSeconds: 2,
      };
    } finally {
      this.inFlight--;
    }
  }
}

export class FakeCopywriter implements Copywriter {
  readonly caption = vi.fn(async (context: CaptionContext): Promise<Caption> => ({
    text: `Caption for ${context.prompt}`,
    hashtags: ['avatar', context.platform],
  }));
}

export class FakeModerator implements Moderator {
  readonly classify = vi.fn(async (_text: string, _assetRef?: string): Promise<ModerationVerdict> => ({
    rating: 'safe',
    tier: 'tier1',
    scores: { sexual: 0.01, violence: 0, hate: 0 },
    flaggedCategories: [],
  }));
}

export class FakeBlobStore implements BlobStore {
  readonly put = vi.fn(async (_assetRef: string, path: string): Promise<string> => `https://media.test/${path}`);
}

export class FakePublisher implements Publisher {
  readonly publish = vi.fn(
    async (_account: SocialAccount, _payload: PublishPayload): Promise<PublishReceipt> => ({
      postId: 'platform-post-1',
      url: 'https://social.test/p/platform-post-1',
    })
  );

  readonly checkHealth = vi.fn(
    async (account: SocialAccount): Promise<AccountHealth> => ({ healthy: true, score: account.healthScore })
  );
}

export class FakeNotifier implements Notifier {
  readonly publishFailed = vi.fn(
    async (_post: ScheduledPost, _account: SocialAccount | null, _message: string): Promise<void> => {}
  );
}

export function makeJob(overrides: Partial<GenerationJob> = {}): GenerationJob {
  return {
    count: 5,
    platform: 'instagram',
    tierRatios: { tier1: 0.6, tier2: 0.3, tier3: 0.1 },
    caption: true,
    moderate: true,
    upload: true,
    seed: 42,
    ...overrides,
  };
}
