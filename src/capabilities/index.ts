import type {
  ContentItem,
  GenerationItem,
  GenerationParams,
  ModerationVerdict,
  Platform,
  ScheduledPost,
  SocialAccount,
  Template,
  Tier,
} from '../types.js';

// Contracts for everything the pipeline and scheduler talk to. Concrete adapters
// live under src/llm, src/integrations and src/storage; tests supply fakes.

export interface GeneratedAsset {
  assetRef: string;
  cost: number;
  durationSeconds: number;
}

export interface Generator {
  generate(prompt: string, params: GenerationParams): Promise<GeneratedAsset>;
}

export interface CaptionContext {
  prompt: string;
  platform: Platform;
  tier: Tier;
  templateId?: string;
  nicheHint?: string;
}

export interface Caption {
  text: string;
  hashtags: string[];
}

export interface Copywriter {
  caption(context: CaptionContext): Promise<Caption>;
}

export interface Moderator {
  classify(text: string, assetRef?: string): Promise<ModerationVerdict>;
}

export interface BlobStore {
  put(assetRef: string, path: string): Promise<string>;
}

export interface TemplateCatalog {
  list(): Template[];
}

export interface Repository {
  saveContentItem(jobId: string, item: GenerationItem): ContentItem;
  getContentItems(ids: string[]): ContentItem[];
  getAccount(id: string): SocialAccount | null;
  saveScheduledPost(post: ScheduledPost): void;
  updateScheduledPost(post: ScheduledPost): void;
  getScheduledPost(id: string): ScheduledPost | null;
  /** Pending posts due at `now`, earliest first, leaving out the given accounts. */
  loadDuePosts(now: Date, limit: number, excludeAccountIds?: readonly string[]): ScheduledPost[];
  /** Most recent scheduled time among the account's pending and published posts. */
  lastScheduledTime(accountId: string): Date | null;
  /** Pending posts of the account whose scheduled time falls in [from, to). */
  countPendingBetween(accountId: string, from: Date, to: Date): number;
}

export interface PublishPayload {
  mediaUrl: string;
  caption?: string;
  hashtags: string[];
}

export interface PublishReceipt {
  postId: string;
  url: string;
}

export interface AccountHealth {
  healthy: boolean;
  score: number;
}

export interface Publisher {
  publish(account: SocialAccount, payload: PublishPayload): Promise<PublishReceipt>;
  checkHealth(account: SocialAccount): Promise<AccountHealth>;
}

export interface PublisherRegistry {
  forPlatform(platform: Platform): Publisher;
}

export interface Notifier {
  publishFailed(post: ScheduledPost, account: SocialAccount | null, message: string): Promise<void>;
}
