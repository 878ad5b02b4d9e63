import { z } from 'zod';
import { generateUUID, type DatabaseHandle } from '../db.js';
import { generationJobSchema, generationStatsSchema, jsonColumn, stageReportSchema } from '../schemas.js';
import type { GenerationJob, GenerationStats, StageReport } from '../types.js';
import type { JobRecord } from './types.js';

// Jobs left in 'running' longer than this are assumed crashed and marked failed.
const STUCK_THRESHOLD_MINUTES = 30;

const jobRowSchema = z.object({
  id: z.string(),
  spec: jsonColumn(generationJobSchema),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  current_stage: stageReportSchema.shape.stage.nullable(),
  stage_reports: jsonColumn(z.array(stageReportSchema)),
  stats: jsonColumn(generationStatsSchema).nullable(),
  last_error: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

function toRecord(row: unknown): JobRecord {
  const parsed = jobRowSchema.parse(row);
  return {
    id: parsed.id,
    spec: parsed.spec,
    status: parsed.status,
    currentStage: parsed.current_stage,
    stageReports: parsed.stage_reports,
    stats: parsed.stats,
    lastError: parsed.last_error,
    createdAt: new Date(parsed.created_at),
    updatedAt: new Date(parsed.updated_at),
  };
}

/**
 * Durable status store for generation jobs. A job moves
 * pending → running → completed | failed and is never retried automatically:
 * per-item failures are already absorbed inside the batch.
 */
export class GenerationQueue {
  constructor(private readonly db: DatabaseHandle) {}

  enqueue(job: GenerationJob): string {
    const id = generateUUID();
    const now = new Date().toISOString();

    this.db.prepare(`
      INSERT INTO generation_jobs (id, spec, status, stage_reports, created_at, updated_at)
      VALUES (?, ?, 'pending', '[]', ?, ?)
    `).run(id, JSON.stringify(job), now, now);

    return id;
  }

  // Atomically claims the oldest pending job. A single UPDATE...RETURNING
  // statement, so two workers sharing the database never claim the same job.
  dequeueNext(): JobRecord | null {
    const row: unknown = this.db.prepare(`
      UPDATE generation_jobs
      SET status = 'running', updated_at = @now
      WHERE id = (
        SELECT id FROM generation_jobs
        WHERE status = 'pending'
        ORDER BY created_at ASC, rowid ASC
        LIMIT 1
      )
      RETURNING *
    `).get({ now: new Date().toISOString() });

    return row === undefined ? null : toRecord(row);
  }

  get(id: string): JobRecord | null {
    const row: unknown = this.db.prepare('SELECT * FROM generation_jobs WHERE id = ?').get(id);
    return row === undefined ? null : toRecord(row);
  }

  recordStage(id: string, report: StageReport): void {
    const job = this.get(id);
    if (!job) return;

    this.db.prepare(`
      UPDATE generation_jobs
      SET current_stage = ?, stage_reports = ?, updated_at = ?
      WHERE id = ?
    `).run(report.stage, JSON.stringify([...job.stageReports, report]), new Date().toISOString(), id);
  }

  // `note` records a non-fatal problem, e.g. a failed auto-schedule.
  markCompleted(id: string, stats: GenerationStats, note?: string): void {
    this.db.prepare(`
      UPDATE generation_jobs
      SET status = 'completed', stats = ?, last_error = ?, updated_at = ?
      WHERE id = ?
    `).run(JSON.stringify(stats), note ?? null, new Date().toISOString(), id);
  }

  markFailed(id: string, error: Error): void {
    this.db.prepare(`
      UPDATE generation_jobs
      SET status = 'failed', last_error = ?, updated_at = ?
      WHERE id = ?
    `).run(error.message, new Date().toISOString(), id);

    console.log(`[Queue] Job ${id} failed: ${error.message}`);
  }

  countByStatus(): Record<string, number> {
    const rows = z
      .array(z.object({ status: z.string(), count: z.number() }))
      .parse(this.db.prepare('SELECT status, COUNT(*) AS count FROM generation_jobs GROUP BY status').all());

    return Object.fromEntries(rows.map((r) => [r.status, r.count]));
  }

  // Called on worker startup. A batch interrupted mid-run cannot resume, so
  // stale running jobs are closed out as failed.
  resetStuck(now: Date = new Date()): number {
    const cutoff = new Date(now.getTime() - STUCK_THRESHOLD_MINUTES * 60 * 1000).toISOString();

    const result = this.db.prepare(`
      UPDATE generation_jobs
      SET status = 'failed', last_error = 'Interrupted before completion', updated_at = ?
      WHERE status = 'running' AND updated_at < ?
    `).run(now.toISOString(), cutoff);

    return result.changes;
  }
}
