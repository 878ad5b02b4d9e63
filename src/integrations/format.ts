import type { PublishPayload } from '../capabilities/index.js';

/** Caption followed by a blank line and the hashtags, each prefixed with '#'. */
export function formatCaption(payload: Pick<PublishPayload, 'caption' | 'hashtags'>): string {
  const caption = payload.caption?.trim() ?? '';
  const tags = payload.hashtags.map((tag) => `#${tag.replace(/^#+/, '')}`).join(' ');
  if (!tags) return caption;
  return caption ? `${caption}\n\n${tags}` : tags;
}
