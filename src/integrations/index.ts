import type { Notifier, Publisher, PublisherRegistry } from '../capabilities/index.js';
import type { AppConfig } from '../config.js';
import { FatalError } from '../errors/index.js';
import type { Platform } from '../types.js';
import { InstagramPublisher } from './instagram.js';
import { SlackNotifier } from './slack.js';
import { TikTokPublisher } from './tiktok.js';
import { TwitterPublisher } from './twitter.js';

export class MapPublisherRegistry implements PublisherRegistry {
  constructor(private readonly publishers: Partial<Record<Platform, Publisher>>) {}

  forPlatform(platform: Platform): Publisher {
    const publisher = this.publishers[platform];
    if (!publisher) {
      throw new FatalError(`Publishing to ${platform} is not supported`);
    }
    return publisher;
  }
}

export function createPublisherRegistry(config: Pick<AppConfig, 'twitter'>): PublisherRegistry {
  return new MapPublisherRegistry({
    twitter: new TwitterPublisher(config.twitter),
    instagram: new InstagramPublisher(),
    tiktok: new TikTokPublisher(),
  });
}

/** Slack alerts when both a token and a channel are configured; otherwise none. */
export function createNotifier(config: Pick<AppConfig, 'slack'>): Notifier | undefined {
  const { botToken, alertChannel } = config.slack;
  if (!botToken || !alertChannel) {
    console.log('[Server] Slack alerts disabled: SLACK_BOT_TOKEN or SLACK_ALERT_CHANNEL not set');
    return undefined;
  }
  return new SlackNotifier({ botToken, channel: alertChannel });
}
