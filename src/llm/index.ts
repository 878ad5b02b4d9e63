import OpenAI from 'openai';
import type { Copywriter, Generator, Moderator } from '../capabilities/index.js';
import type { AppConfig } from '../config.js';
import { OpenAIModerator } from './moderation.js';
import { OpenAICopywriter, OpenAIImageGenerator, createOpenAICircuit } from './openai.js';

export interface ContentCapabilities {
  generator: Generator;
  copywriter: Copywriter;
  moderator: Moderator;
}

/**
 * OpenAI-backed generator, copywriter and moderator. They share one client and
 * one circuit so an outage trips all three together.
 */
export function createOpenAICapabilities(config: Pick<AppConfig, 'openai' | 'costs'>): ContentCapabilities {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY environment variable is required');
  }

  const client = new OpenAI({ apiKey });
  const circuit = createOpenAICircuit();

  return {
    generator: new OpenAIImageGenerator(client, circuit, {
      model: config.openai.imageModel,
      costPerImageUsd: config.costs.imageUsd,
    }),
    copywriter: new OpenAICopywriter(client, circuit, config.openai.chatModel),
    moderator: new OpenAIModerator(client, circuit),
  };
}

