import { WebClient } from '@slack/web-api';
import type { Notifier } from '../capabilities/index.js';
import type { ScheduledPost, SocialAccount } from '../types.js';

export interface SlackNotifierConfig {
  botToken: string;
  channel: string;
}

/** Posts terminal publish failures to an operations channel. */
export class SlackNotifier implements Notifier {
  private readonly client: WebClient;

  constructor(private readonly config: SlackNotifierConfig, client?: WebClient) {
    this.client = client ?? new WebClient(config.botToken);
  }

  async publishFailed(post: ScheduledPost, account: SocialAccount | null, message: string): Promise<void> {
    const target = account ? `${account.platform} @${account.username}` : `unknown account ${post.accountId}`;

    try {
      await this.client.chat.postMessage({
        channel: this.config.channel,
        text: `Scheduled post ${post.id} failed on ${target}`,
        blocks: [
          {
            type: 'section',
            text: {
              type: 'mrkdwn',
              text: `*Scheduled post failed* on ${target}\n\n${message}`,
            },
          },
          {
            type: 'context',
            elements: [
              {
                type: 'mrkdwn',
                text: `Post \`${post.id}\` · scheduled ${post.scheduledTime.toISOString()} · retries ${post.retry.retryCount}`,
              },
            ],
          },
        ],
      });
    } catch (error) {
      console.error('Slack send error:', error);
      throw new Error('Failed to send Slack failure alert');
    }
  }
}
