import { z } from 'zod';
import type { AccountHealth, PublishPayload, PublishReceipt, Publisher } from '../capabilities/index.js';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { FatalError, TransientError } from '../errors/index.js';
import type { SocialAccount } from '../types.js';
import { formatCaption } from './format.js';
import { requestJson } from './http.js';

export const INSTAGRAM_GRAPH_URL = 'https://graph.instagram.com/v19.0';

const idResponse = z.object({ id: z.string() });

/**
 * Publishes single-image posts through the Graph API: create a media
 * container for the image URL, then publish that container.
 */
export class InstagramPublisher implements Publisher {
  private readonly circuit = new CircuitBreaker({
    serviceName: 'instagram',
    failureThreshold: 3,
    resetTimeoutMs: 60_000,
    successThreshold: 1,
    isFailure: (error) => error instanceof TransientError,
  });

  constructor(private readonly baseUrl: string = INSTAGRAM_GRAPH_URL) {}

  async publish(account: SocialAccount, payload: PublishPayload): Promise<PublishReceipt> {
    return this.circuit.execute(async () => {
      const container = await requestJson(
        'Instagram',
        `${this.baseUrl}/${account.platformUserId}/media`,
        {
          method: 'POST',
          body: new URLSearchParams({
            image_url: payload.mediaUrl,
            caption: formatCaption(payload),
            access_token: account.accessToken,
          }),
        },
        idResponse
      );

      const published = await requestJson(
        'Instagram',
        `${this.baseUrl}/${account.platformUserId}/media_publish`,
        {
          method: 'POST',
          body: new URLSearchParams({ creation_id: container.id, access_token: account.accessToken }),
        },
        idResponse
      );

      return { postId: published.id, url: `https://www.instagram.com/p/${published.id}/` };
    });
  }

  async checkHealth(account: SocialAccount): Promise<AccountHealth> {
    const query = new URLSearchParams({ fields: 'id,username', access_token: account.accessToken });
    try {
      await requestJson('Instagram', `${this.baseUrl}/me?${query.toString()}`, { method: 'GET' }, idResponse);
      return { healthy: true, score: account.healthScore };
    } catch (error) {
      // Expired or revoked tokens come back as 4xx
      if (error instanceof FatalError) {
        return { healthy: false, score: 0 };
      }
      throw error;
    }
  }
}
