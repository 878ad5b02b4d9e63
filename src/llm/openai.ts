import OpenAI from 'openai';
import { z } from 'zod';
import type {
  Caption,
  CaptionContext,
  Copywriter,
  GeneratedAsset,
  Generator,
} from '../capabilities/index.js';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import {
  FatalError,
  TransientError,
  classifyHttpFailure,
  toError,
} from '../errors/index.js';
import type { GenerationParams, Platform } from '../types.js';

/**
 * Maps anything an OpenAI call throws onto the transient/fatal split. API
 * errors go by HTTP status; connection failures carry no status and are
 * transient.
 */
export function toProviderError(operation: string, error: unknown): Error {
  if (error instanceof TransientError || error instanceof FatalError) {
    return error;
  }
  if (error instanceof OpenAI.APIError) {
    return classifyHttpFailure(error.status, `OpenAI ${operation} failed: ${error.message}`, error);
  }
  const err = toError(error);
  return new TransientError(`OpenAI ${operation} failed: ${err.message}`, { cause: err });
}

// Only transient failures say anything about provider availability.
export function createOpenAICircuit(): CircuitBreaker {
  return new CircuitBreaker({
    serviceName: 'openai',
    failureThreshold: 3,
    resetTimeoutMs: 120_000, // 2 minutes, LLM outages recover slower
    successThreshold: 2,
    isFailure: (error) => error instanceof TransientError,
  });
}

export interface OpenAIImageGeneratorOptions {
  model: string;
  costPerImageUsd: number;
}

export class OpenAIImageGenerator implements Generator {
  constructor(
    private readonly client: OpenAI,
    private readonly circuit: CircuitBreaker,
    private readonly options: OpenAIImageGeneratorOptions
  ) {}

  async generate(prompt: string, params: GenerationParams): Promise<GeneratedAsset> {
    return this.circuit.execute(async () => {
      const started = Date.now();
      try {
        const response = await this.client.images.generate({
          model: this.options.model,
          prompt,
          n: 1,
          size: params.size ?? '1024x1024',
          quality: params.quality ?? 'standard',
          response_format: 'url',
        });

        const url = response.data?.[0]?.url;
        if (!url) {
          throw new TransientError('Image generated but no URL returned');
        }

        return {
          assetRef: url,
          cost: this.options.costPerImageUsd,
          durationSeconds: (Date.now() - started) / 1000,
        };
      } catch (error) {
        throw toProviderError('image generation', error);
      }
    });
  }
}

const PLATFORM_CAPTION_LIMITS: Record<Platform, number> = {
  instagram: 2200,
  tiktok: 2200,
  twitter: 280,
  onlyfans: 1000,
};

const MAX_HASHTAGS = 15;

const captionResponseSchema = z.object({
  caption: z.string().min(1),
  hashtags: z.array(z.string()).default([]),
});

export function normalizeHashtags(tags: string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const cleaned = tag.trim().replace(/^#+/, '').replace(/\s+/g, '');
    if (cleaned) seen.add(cleaned);
  }
  return [...seen].slice(0, MAX_HASHTAGS);
}

export function buildCaptionPrompt(context: CaptionContext): string {
  const limit = PLATFORM_CAPTION_LIMITS[context.platform];
  const niche = context.nicheHint ? `\n- Niche: ${context.nicheHint}` : '';

  return `Write a ${context.platform} caption for an image described as: ${context.prompt}

Requirements:
- Maximum ${limit} characters including hashtags${niche}
- Content tier: ${context.tier} (tier1 is safe for all audiences)
- First line must hook the reader
- Up to ${MAX_HASHTAGS} relevant hashtags, without the # sign
- Respond with JSON only: {"caption": string, "hashtags": string[]}`;
}

export class OpenAICopywriter implements Copywriter {
  constructor(
    private readonly client: OpenAI,
    private readonly circuit: CircuitBreaker,
    private readonly model: string
  ) {}

  async caption(context: CaptionContext): Promise<Caption> {
    return this.circuit.execute(async () => {
      try {
        const response = await this.client.chat.completions.create({
          model: this.model,
          messages: [
            {
              role: 'system',
              content: 'You are a social media copywriter for a virtual creator. Captions are short, on-brand and never mention being AI-generated.',
            },
            { role: 'user', content: buildCaptionPrompt(context) },
          ],
          response_format: { type: 'json_object' },
          max_tokens: 500,
          temperature: 0.8,
        });

        const content = response.choices[0]?.message?.content;
        if (!content) {
          throw new TransientError('No caption generated from OpenAI');
        }

        return parseCaption(content);
      } catch (error) {
        throw toProviderError('caption', error);
      }
    });
  }
}

export function parseCaption(content: string): Caption {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new FatalError('Caption response was not valid JSON', { cause: error });
  }

  const parsed = captionResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FatalError(`Caption response had an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  return { text: parsed.data.caption.trim(), hashtags: normalizeHashtags(parsed.data.hashtags) };
}
