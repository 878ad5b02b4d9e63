import type { z } from 'zod';
import { TransientError, classifyHttpFailure, toError } from '../errors/index.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface MediaDownload {
  data: Buffer;
  contentType: string;
}

async function send(service: string, url: string, init: RequestInit): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: AbortSignal.timeout(DEFAULT_TIMEOUT_MS) });
  } catch (error) {
    const err = toError(error);
    throw new TransientError(`${service} request failed: ${err.message}`, { cause: err });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    console.error(`[${service}] API error: ${response.status} ${body.slice(0, 200)}`);
    throw classifyHttpFailure(response.status, `${service} API error: ${response.status}`);
  }

  return response;
}

/** Sends a request and validates the JSON body against `schema`. */
export async function requestJson<T extends z.ZodTypeAny>(
  service: string,
  url: string,
  init: RequestInit,
  schema: T
): Promise<z.output<T>> {
  const response = await send(service, url, init);
  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TransientError(`${service} returned an unexpected response`);
  }
  return parsed.data;
}

export async function downloadMedia(service: string, url: string): Promise<MediaDownload> {
  const response = await send(service, url, { method: 'GET' });
  return {
    data: Buffer.from(await response.arrayBuffer()),
    contentType: response.headers.get('content-type') ?? 'image/png',
  };
}
