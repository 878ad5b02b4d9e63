import { z } from 'zod';
import type { AccountHealth, PublishPayload, PublishReceipt, Publisher } from '../capabilities/index.js';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { FatalError, TransientError } from '../errors/index.js';
import type { SocialAccount } from '../types.js';
import { formatCaption } from './format.js';
import { requestJson } from './http.js';

export const TIKTOK_API_URL = 'https://open.tiktokapis.com/v2';

const MAX_TITLE_LENGTH = 90;
const MAX_DESCRIPTION_LENGTH = 4000;

const initResponse = z.object({ data: z.object({ publish_id: z.string() }) });

const statusResponse = z.object({
  data: z.object({
    status: z.string(),
    fail_reason: z.string().optional(),
  }),
});

const userResponse = z.object({ data: z.object({ user: z.object({ open_id: z.string() }) }) });

function jsonInit(account: SocialAccount, body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${account.accessToken}`,
      'Content-Type': 'application/json; charset=UTF-8',
    },
    body: JSON.stringify(body),
  };
}

/**
 * Photo posts through the Content Posting API: TikTok pulls the image from
 * `mediaUrl`, then the publish status is read back once.
 */
export class TikTokPublisher implements Publisher {
  private readonly circuit = new CircuitBreaker({
    serviceName: 'tiktok',
    failureThreshold: 3,
    resetTimeoutMs: 60_000,
    successThreshold: 1,
    isFailure: (error) => error instanceof TransientError,
  });

  constructor(private readonly baseUrl: string = TIKTOK_API_URL) {}

  async publish(account: SocialAccount, payload: PublishPayload): Promise<PublishReceipt> {
    return this.circuit.execute(async () => {
      const init = await requestJson(
        'TikTok',
        `${this.baseUrl}/post/publish/content/init/`,
        jsonInit(account, {
          post_info: {
            title: (payload.caption?.trim() ?? '').slice(0, MAX_TITLE_LENGTH),
            description: formatCaption(payload).slice(0, MAX_DESCRIPTION_LENGTH),
            privacy_level: 'PUBLIC_TO_EVERYONE',
            disable_comment: false,
          },
          source_info: {
            source: 'PULL_FROM_URL',
            photo_cover_index: 0,
            photo_images: [payload.mediaUrl],
          },
          post_mode: 'DIRECT_POST',
          media_type: 'PHOTO',
        }),
        initResponse
      );

      const publishId = init.data.publish_id;
      const status = await requestJson(
        'TikTok',
        `${this.baseUrl}/post/publish/status/fetch/`,
        jsonInit(account, { publish_id: publishId }),
        statusResponse
      );

      if (status.data.status === 'FAILED') {
        throw new FatalError(`TikTok rejected the post: ${status.data.fail_reason ?? 'unknown reason'}`);
      }

      // Processing continues on TikTok's side; the publish id identifies the post until then
      return { postId: publishId, url: `https://www.tiktok.com/@${account.username}` };
    });
  }

  async checkHealth(account: SocialAccount): Promise<AccountHealth> {
    try {
      await requestJson(
        'TikTok',
        `${this.baseUrl}/user/info/?fields=open_id`,
        { method: 'GET', headers: { Authorization: `Bearer ${account.accessToken}` } },
        userResponse
      );
      return { healthy: true, score: account.healthScore };
    } catch (error) {
      if (error instanceof FatalError) {
        return { healthy: false, score: 0 };
      }
      throw error;
    }
  }
}
