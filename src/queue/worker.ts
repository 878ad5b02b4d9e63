import type { Repository } from '../capabilities/index.js';
import { toError } from '../errors/index.js';
import type { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import { toGenerationStats } from '../pipeline/statistics.js';
import type { SchedulingEngine } from '../scheduling/engine.js';
import type { BatchResult } from '../types.js';
import type { GenerationQueue } from './index.js';
import type { JobRecord } from './types.js';

const DEFAULT_POLL_SECONDS = 5;

export interface GenerationWorkerDeps {
  queue: GenerationQueue;
  orchestrator: PipelineOrchestrator;
  scheduler: SchedulingEngine;
  repository: Pick<Repository, 'getAccount'>;
  pollSeconds?: number;
}

interface AutoScheduleOutcome {
  postIds: string[];
  error?: string;
}

export class GenerationWorker {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private busy = false;

  constructor(private readonly deps: GenerationWorkerDeps) {}

  /** Claims and runs at most one pending job. Returns its final record. */
  async tick(): Promise<JobRecord | null> {
    if (this.busy) return null;

    const { queue, orchestrator } = this.deps;
    const job = queue.dequeueNext();
    if (!job) return null;

    this.busy = true;
    console.log(`[Worker] Processing job ${job.id} (${job.spec.count} x ${job.spec.platform})`);

    try {
      const result = await orchestrator.run(job.spec, {
        jobId: job.id,
        onStage: (report) => queue.recordStage(job.id, report),
      });

      const scheduled = await this.autoSchedule(job, result);
      queue.markCompleted(job.id, toGenerationStats(result, scheduled.postIds), scheduled.error);
      console.log(`[Worker] Job ${job.id} completed`);
    } catch (error: unknown) {
      const err = toError(error);
      queue.markFailed(job.id, err);
      console.error(`[Worker] Job ${job.id} failed: ${err.message}`);
    } finally {
      this.busy = false;
    }

    return queue.get(job.id);
  }

  // Scheduling problems never undo a finished batch: the items stay persisted
  // and the problem is recorded on the job.
  private async autoSchedule(job: JobRecord, result: BatchResult): Promise<AutoScheduleOutcome> {
    const options = job.spec.autoSchedule;
    if (!options || result.items.length === 0) {
      return { postIds: [] };
    }

    const account = this.deps.repository.getAccount(options.accountId);
    if (!account) {
      return { postIds: [], error: `Auto-scheduling skipped: account ${options.accountId} not found` };
    }
    if (account.platform !== job.spec.platform) {
      return {
        postIds: [],
        error: `Auto-scheduling skipped: account ${account.id} is on ${account.platform}, batch targets ${job.spec.platform}`,
      };
    }

    try {
      const posts = await this.deps.scheduler.scheduleBatch(account, result.items, {
        startTime: options.startTime,
        useJitter: options.useJitter,
      });
      return { postIds: posts.map((p) => p.id) };
    } catch (error) {
      const err = toError(error);
      console.error(`[Worker] Auto-scheduling for job ${job.id} failed: ${err.message}`);
      return { postIds: [], error: `Auto-scheduling failed: ${err.message}` };
    }
  }

  start(): void {
    if (this.intervalId) return;

    const recovered = this.deps.queue.resetStuck();
    if (recovered > 0) {
      console.log(`[Worker] Marked ${recovered} interrupted job(s) as failed`);
    }

    const pollSeconds = this.deps.pollSeconds ?? DEFAULT_POLL_SECONDS;
    this.intervalId = setInterval(() => {
      this.tick().catch((err) => {
        console.error('[Worker] Unexpected error in tick:', err);
      });
    }, pollSeconds * 1000);

    console.log(`[Worker] Started, polling every ${pollSeconds}s`);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    console.log('[Worker] Stopped');
  }
}
