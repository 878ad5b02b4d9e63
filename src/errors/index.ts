// Retryable: rate limits, timeouts, temporary platform outages.
export class TransientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientError';
  }
}

// Terminal: invalid credentials, banned accounts, policy violations.
export class FatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalError';
  }
}

// Raised when the select stage cannot produce a single candidate. The only
// failure that aborts a whole batch.
export class SelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SelectionError';
  }
}

export class SchedulingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchedulingError';
  }
}

export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

/**
 * Maps an HTTP status from a provider into the transient/fatal taxonomy.
 * Unknown statuses are treated as transient so the retry path gets a chance.
 */
export function classifyHttpFailure(status: number | undefined, message: string, cause?: unknown): Error {
  if (status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500) {
    return new TransientError(message, { cause });
  }
  if (status >= 400) {
    return new FatalError(message, { cause });
  }
  return new TransientError(message, { cause });
}
