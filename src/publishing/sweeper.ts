import type { PublishDispatcher } from './dispatcher.js';

const DEFAULT_SWEEP_INTERVAL_SECONDS = 60;

/** Runs the dispatcher on a fixed interval until stopped. */
export class PublishSweeper {
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly dispatcher: PublishDispatcher,
    private readonly intervalSeconds: number = DEFAULT_SWEEP_INTERVAL_SECONDS
  ) {}

  get isStarted(): boolean {
    return this.intervalId !== null;
  }

  async tick(now: Date = new Date()): Promise<void> {
    const results = await this.dispatcher.sweep(now);
    if (results.length > 0) {
      const published = results.filter((r) => r.outcome === 'published').length;
      console.log(`[Sweeper] Sweep finished: ${published}/${results.length} published`);
    }
  }

  start(): void {
    if (this.intervalId) return;

    this.intervalId = setInterval(() => {
      this.tick().catch((err) => {
        console.error('[Sweeper] Unexpected error in tick:', err);
      });
    }, this.intervalSeconds * 1000);

    console.log(`[Sweeper] Started, sweeping every ${this.intervalSeconds}s`);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    console.log('[Sweeper] Stopped');
  }
}
