import { describe, it, expect } from 'vitest';
import { buildCaptionPrompt, normalizeHashtags, parseCaption } from '@/llm/openai.js';
import { formatCaption } from '@/integrations/format.js';
import { FatalError } from '@/errors/index.js';

// ─── normalizeHashtags ───────────────────────────────────────────────────────

describe('normalizeHashtags', () => {
  it('strips leading #, inner whitespace and duplicates', () => {
    expect(normalizeHashtags(['#fit', 'fit', ' sun set ', '##beach', '', '#'])).toEqual(['fit', 'sunset', 'beach']);
  });

  it('keeps at most 15 tags', () => {
    const tags = Array.from({ length: 20 }, (_, i) => `tag${i}`);
    expect(normalizeHashtags(tags)).toEqual(tags.slice(0, 15));
  });
});

// ─── parseCaption ────────────────────────────────────────────────────────────

describe('parseCaption', () => {
  it('reads the caption and normalized hashtags from JSON', () => {
    expect(parseCaption('{"caption":"  Golden hour  ","hashtags":["#sunset","travel"]}')).toEqual({
      text: 'Golden hour',
      hashtags: ['sunset', 'travel'],
    });
  });

  it('defaults hashtags to an empty list', () => {
    expect(parseCaption('{"caption":"Hello"}')).toEqual({ text: 'Hello', hashtags: [] });
  });

  it('throws FatalError for invalid JSON', () => {
    expect(() => parseCaption('not json')).toThrow(FatalError);
    expect(() => parseCaption('not json')).toThrow('Caption response was not valid JSON');
  });

  it('throws FatalError when the caption is missing', () => {
    expect(() => parseCaption('{"hashtags":[]}')).toThrow(FatalError);
  });
});

// ─── buildCaptionPrompt ──────────────────────────────────────────────────────

describe('buildCaptionPrompt', () => {
  it('includes the image description, tier and niche', () => {
    const prompt = buildCaptionPrompt({
      prompt: 'yoga on a sunny deck',
      platform: 'instagram',
      tier: 'tier1',
      nicheHint: 'fitness',
    });

    expect(prompt).toContain('Write a instagram caption for an image described as: yoga on a sunny deck');
    expect(prompt).toContain('- Niche: fitness');
    expect(prompt).toContain('- Content tier: tier1');
  });

  it('omits the niche line without a hint', () => {
    const prompt = buildCaptionPrompt({ prompt: 'x', platform: 'twitter', tier: 'tier2' });
    expect(prompt).not.toContain('Niche:');
  });
});

// ─── formatCaption ───────────────────────────────────────────────────────────

describe('formatCaption', () => {
  it('puts hashtags after a blank line', () => {
    expect(formatCaption({ caption: 'Hello', hashtags: ['a', '#b'] })).toBe('Hello\n\n#a #b');
  });

  it('returns just the caption without hashtags', () => {
    expect(formatCaption({ caption: ' Hello ', hashtags: [] })).toBe('Hello');
  });

  it('returns just the hashtags without a caption', () => {
    expect(formatCaption({ hashtags: ['a'] })).toBe('#a');
  });
});
