import { ApiRequestError, ApiResponseError, TwitterApi } from 'twitter-api-v2';
import type { AccountHealth, PublishPayload, PublishReceipt, Publisher } from '../capabilities/index.js';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { FatalError, TransientError, classifyHttpFailure, toError } from '../errors/index.js';
import type { SocialAccount } from '../types.js';
import { formatCaption } from './format.js';
import { downloadMedia } from './http.js';

export interface TwitterAppCredentials {
  appKey?: string;
  appSecret?: string;
}

const UNHEALTHY_STATUSES = new Set([401, 403]);

function toTwitterError(error: unknown): Error {
  if (error instanceof TransientError || error instanceof FatalError) {
    return error;
  }
  if (error instanceof ApiResponseError) {
    if (error.code === 403 && JSON.stringify(error.data).includes('duplicate')) {
      return new FatalError('This tweet appears to be a duplicate.', { cause: error });
    }
    return classifyHttpFailure(error.code, `Twitter API error: ${error.code}`, error);
  }
  if (error instanceof ApiRequestError) {
    return new TransientError(`Twitter request failed: ${error.message}`, { cause: error });
  }
  const err = toError(error);
  return new TransientError(`Twitter publish failed: ${err.message}`, { cause: err });
}

export class TwitterPublisher implements Publisher {
  private readonly circuit = new CircuitBreaker({
    serviceName: 'twitter',
    failureThreshold: 3,
    resetTimeoutMs: 60_000, // 1 minute
    successThreshold: 1,
    isFailure: (error) => error instanceof TransientError,
  });

  constructor(private readonly credentials: TwitterAppCredentials) {}

  private clientFor(account: SocialAccount): TwitterApi {
    const { appKey, appSecret } = this.credentials;
    if (!appKey || !appSecret) {
      throw new FatalError('Twitter API credentials are not configured');
    }
    if (!account.accessSecret) {
      throw new FatalError(`Account ${account.id} has no access secret`);
    }

    return new TwitterApi({
      appKey,
      appSecret,
      accessToken: account.accessToken,
      accessSecret: account.accessSecret,
    });
  }

  async publish(account: SocialAccount, payload: PublishPayload): Promise<PublishReceipt> {
    return this.circuit.execute(async () => {
      try {
        const client = this.clientFor(account);
        const media = await downloadMedia('Twitter', payload.mediaUrl);
        const mediaId = await client.v1.uploadMedia(media.data, { mimeType: media.contentType });

        const tweet = await client.v2.tweet({
          text: formatCaption(payload),
          media: { media_ids: [mediaId] },
        });

        if (!tweet.data?.id) {
          throw new TransientError('Tweet posted but no ID returned');
        }

        return {
          postId: tweet.data.id,
          url: `https://x.com/${account.username}/status/${tweet.data.id}`,
        };
      } catch (error) {
        throw toTwitterError(error);
      }
    });
  }

  async checkHealth(account: SocialAccount): Promise<AccountHealth> {
    try {
      await this.clientFor(account).v2.me();
      return { healthy: true, score: account.healthScore };
    } catch (error) {
      if (error instanceof ApiResponseError && UNHEALTHY_STATUSES.has(error.code)) {
        return { healthy: false, score: 0 };
      }
      if (error instanceof ApiResponseError && error.code === 429) {
        return { healthy: false, score: account.healthScore };
      }
      throw toTwitterError(error);
    }
  }
}
