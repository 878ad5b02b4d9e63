import { TransientError } from '../errors/index.js';

// An open circuit is a temporary outage from the caller's point of view, so the
// dispatcher reschedules instead of failing the post.
export class CircuitOpenError extends TransientError {
  constructor(serviceName: string) {
    super(`Circuit is OPEN for service "${serviceName}"; request rejected until the service recovers`);
    this.name = 'CircuitOpenError';
  }
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  serviceName: string;
  /** Consecutive failures before tripping OPEN */
  failureThreshold: number;
  /** Milliseconds to wait in OPEN before probing (HALF_OPEN) */
  resetTimeoutMs: number;
  /** Consecutive successes in HALF_OPEN before returning to CLOSED */
  successThreshold: number;
  /**
   * Decides whether an error counts against the circuit. Defaults to every error;
   * adapters pass a predicate so that e.g. a content-policy rejection of one
   * prompt does not trip the breaker for the whole provider.
   */
  isFailure?: (error: unknown) => boolean;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;

  constructor(private readonly config: CircuitBreakerConfig) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = Date.now() - (this.lastFailureTime ?? 0);
      if (elapsed >= this.config.resetTimeoutMs) {
        this.state = 'HALF_OPEN';
        this.successCount = 0;
        console.log(`[CircuitBreaker] ${this.config.serviceName}: OPEN → HALF_OPEN`);
      } else {
        throw new CircuitOpenError(this.config.serviceName);
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      const counts = this.config.isFailure ? this.config.isFailure(error) : true;
      if (counts) {
        this.onFailure();
      } else {
        this.onSuccess();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;
    if (this.state === 'HALF_OPEN') {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = 'CLOSED';
        this.successCount = 0;
        console.log(`[CircuitBreaker] ${this.config.serviceName}: HALF_OPEN → CLOSED`);
      }
    }
  }

  private onFailure(): void {
    this.lastFailureTime = Date.now();
    this.successCount = 0;

    if (this.state === 'HALF_OPEN') {
      this.state = 'OPEN';
      console.log(`[CircuitBreaker] ${this.config.serviceName}: HALF_OPEN → OPEN`);
      return;
    }

    this.failureCount++;
    if (this.failureCount >= this.config.failureThreshold) {
      this.state = 'OPEN';
      console.log(
        `[CircuitBreaker] ${this.config.serviceName}: CLOSED → OPEN` +
        ` (${this.failureCount} consecutive failures)`
      );
    }
  }

  getState(): CircuitState {
    return this.state;
  }
}
