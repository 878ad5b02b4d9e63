import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PipelineOrchestrator } from '@/pipeline/orchestrator.js';
import { ConcurrencyLimiter } from '@/concurrency/limiter.js';
import { DEFAULT_COST_RATES } from '@/config.js';
import { SelectionError } from '@/errors/index.js';
import type { StageReport } from '@/types.js';
import { createTestDb, TEST_TEMPLATES } from '../fixtures/db.js';
import {
  FakeBlobStore,
  FakeCopywriter,
  FakeGenerator,
  FakeModerator,
  StaticCatalog,
  makeJob,
} from '../fixtures/fakes.js';
import type { SqliteRepository } from '@/repository/sqlite.js';

let repository: SqliteRepository;
let copywriter: FakeCopywriter;
let moderator: FakeModerator;
let blobStore: FakeBlobStore;

beforeEach(() => {
  repository = createTestDb().repository;
  copywriter = new FakeCopywriter();
  moderator = new FakeModerator();
  blobStore = new FakeBlobStore();
});

afterEach(() => {
  vi.useRealTimers();
});

function makeOrchestrator(generator = new FakeGenerator(), limit = 5, templates = TEST_TEMPLATES) {
  return new PipelineOrchestrator({
    catalog: new StaticCatalog(templates),
    generator,
    copywriter,
    moderator,
    blobStore,
    repository,
    limiter: new ConcurrencyLimiter(limit),
    costs: DEFAULT_COST_RATES,
  });
}

// ─── happy path ──────────────────────────────────────────────────────────────

describe('PipelineOrchestrator.run', () => {
  it('takes every item through all six stages', async () => {
    const result = await makeOrchestrator().run(makeJob(), { jobId: 'job-1' });

    expect(result.jobId).toBe('job-1');
    expect(result.requested).toBe(5);
    expect(result.generated).toBe(5);
    expect(result.persisted).toBe(5);
    expect(result.rejected).toBe(0);
    expect(result.dropped).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.stages.map((s) => s.stage)).toEqual(['select', 'generate', 'caption', 'moderate', 'store', 'persist']);
    expect(result.stages.every((s) => !s.skipped && s.failures === 0)).toBe(true);
    expect(result.averageGenerationSeconds).toBe(2);
  });

  it('persists captioned, moderated and stored items in index order', async () => {
    const result = await makeOrchestrator().run(makeJob(), { jobId: 'job-1' });

    expect(result.items.map((i) => i.index)).toEqual([0, 1, 2, 3, 4]);
    const first = result.items[0];
    expect(first.jobId).toBe('job-1');
    expect(first.stored).toBe(true);
    expect(first.mediaUrl).toBe('https://media.test/content/job-1/0.png');
    expect(first.caption).toBe(`Caption for ${first.prompt}`);
    expect(first.hashtags).toEqual(['avatar', 'instagram']);
    expect(first.moderation?.rating).toBe('safe');

    expect(repository.getContentItemsForJob('job-1').map((i) => i.id)).toEqual(result.items.map((i) => i.id));
  });

  it('adds up the cost of every stage', async () => {
    const result = await makeOrchestrator().run(makeJob());

    expect(result.cost.generation).toBeCloseTo(0.05, 6);
    expect(result.cost.captions).toBeCloseTo(0.015, 6);
    expect(result.cost.moderation).toBeCloseTo(0.0005, 6);
    expect(result.cost.storage).toBeCloseTo(0.005, 6);
    expect(result.cost.total).toBeCloseTo(0.0705, 6);
  });

  it('keeps the requested tier split for a large batch', async () => {
    const result = await makeOrchestrator().run(
      makeJob({ count: 50, caption: false, moderate: false, upload: false })
    );

    expect(result.persisted).toBe(50);
    expect(result.tierDistribution).toEqual({ tier1: 30, tier2: 15, tier3: 5 });
    expect(result.moderationDistribution.unchecked).toBe(50);
  });

  it('reports disabled stages as skipped and passes items through', async () => {
    const result = await makeOrchestrator().run(makeJob({ caption: false, moderate: false, upload: false }));

    const skipped = result.stages.filter((s) => s.skipped).map((s) => s.stage);
    expect(skipped).toEqual(['caption', 'moderate', 'store']);
    expect(copywriter.caption).not.toHaveBeenCalled();
    expect(moderator.classify).not.toHaveBeenCalled();
    expect(blobStore.put).not.toHaveBeenCalled();
    expect(result.items.every((i) => !i.stored && i.mediaUrl === i.assetRef)).toBe(true);
    expect(result.cost.total).toBeCloseTo(0.05, 6);
  });

  it('notifies a stage listener and survives one that throws', async () => {
    const reports: StageReport[] = [];
    const result = await makeOrchestrator().run(makeJob(), {
      onStage: (report) => {
        reports.push(report);
        if (report.stage === 'generate') throw new Error('listener broke');
      },
    });

    expect(reports.map((r) => r.stage)).toEqual(['select', 'generate', 'caption', 'moderate', 'store', 'persist']);
    expect(result.persisted).toBe(5);
  });
});

// ─── selection ───────────────────────────────────────────────────────────────

describe('select stage', () => {
  it('throws SelectionError for an empty catalog', async () => {
    await expect(makeOrchestrator(new FakeGenerator(), 5, []).run(makeJob())).rejects.toBeInstanceOf(SelectionError);
  });

  it('uses custom prompts with the subject prefix and custom tiers', async () => {
    const result = await makeOrchestrator().run(
      makeJob({
        subjectPrompt: 'Mia, 25',
        customPrompts: ['at the gym', 'on the beach'],
        customTiers: ['tier2', 'tier3'],
        moderate: false,
      })
    );

    expect(result.requested).toBe(2);
    expect(result.items.map((i) => i.prompt)).toEqual(['Mia, 25, at the gym', 'Mia, 25, on the beach']);
    expect(result.items.map((i) => i.tier)).toEqual(['tier2', 'tier3']);
    expect(result.items.every((i) => i.templateId === undefined)).toBe(true);
  });

  it('produces the same prompts for the same seed', async () => {
    const a = await makeOrchestrator().run(makeJob({ count: 8, seed: 11 }));
    const b = await makeOrchestrator().run(makeJob({ count: 8, seed: 11 }));
    expect(a.items.map((i) => i.templateId)).toEqual(b.items.map((i) => i.templateId));
  });
});

// ─── generation ──────────────────────────────────────────────────────────────

describe('generate stage', () => {
  it('drops a failed generation and keeps the rest', async () => {
    const generator = new FakeGenerator({ failOn: ['a cafe'] });
    const result = await makeOrchestrator(generator).run(
      makeJob({ customPrompts: ['a sunrise', 'a cafe', 'a beach'] })
    );

    expect(result.generated).toBe(2);
    expect(result.persisted).toBe(2);
    expect(result.items.map((i) => i.index)).toEqual([0, 2]);
    expect(result.dropped).toEqual([
      { index: 1, prompt: 'a cafe', stage: 'generate', reason: 'generation failed for "a cafe"' },
    ]);
    const generate = result.stages.find((s) => s.stage === 'generate');
    expect(generate).toMatchObject({ inputCount: 3, survivors: 2, failures: 1 });
  });

  it('never runs more generations at once than the limit', async () => {
    const generator = new FakeGenerator({ delayMs: 5 });
    const result = await makeOrchestrator(generator, 3).run(
      makeJob({ count: 12, caption: false, moderate: false, upload: false })
    );

    expect(result.generated).toBe(12);
    expect(generator.maxInFlight).toBe(3);
  });

  it('takes two waves of the per-image latency for twice the limit', async () => {
    vi.useFakeTimers();
    const generator = new FakeGenerator({ delayMs: 1000 });
    const pending = makeOrchestrator(generator, 5).run(
      makeJob({ count: 10, caption: false, moderate: false, upload: false })
    );

    await vi.advanceTimersByTimeAsync(2000);
    const result = await pending;

    expect(result.generated).toBe(10);
    expect(result.stages.find((s) => s.stage === 'generate')?.durationMs).toBe(2000);
  });
});

// ─── caption / moderate / store ──────────────────────────────────────────────

describe('caption stage', () => {
  it('keeps an item whose caption failed, with a warning', async () => {
    copywriter.caption.mockRejectedValueOnce(new Error('rate limited'));
    const result = await makeOrchestrator().run(makeJob({ count: 3 }));

    expect(result.persisted).toBe(3);
    expect(result.items[0].caption).toBeUndefined();
    expect(result.items[0].warnings).toEqual(['caption failed: rate limited']);
    expect(result.warnings).toEqual(['item 0: caption failed: rate limited']);
    expect(result.cost.captions).toBeCloseTo(0.006, 6);
  });
});

describe('moderate stage', () => {
  it('drops rejected items and counts them', async () => {
    moderator.classify.mockResolvedValueOnce({
      rating: 'rejected',
      scores: { sexual: 0.95 },
      flaggedCategories: ['sexual'],
      reason: 'Rejected by moderation: sexual 0.95',
    });
    const result = await makeOrchestrator().run(makeJob({ count: 3 }));

    expect(result.rejected).toBe(1);
    expect(result.persisted).toBe(2);
    expect(result.dropped).toEqual([
      {
        index: 0,
        prompt: expect.any(String),
        stage: 'moderate',
        reason: 'Rejected by moderation: sexual 0.95',
      },
    ]);
    expect(blobStore.put).toHaveBeenCalledTimes(2);
  });

  it('treats a moderator error as a rejection', async () => {
    moderator.classify.mockRejectedValueOnce(new Error('timeout'));
    const result = await makeOrchestrator().run(makeJob({ count: 2 }));

    expect(result.rejected).toBe(1);
    expect(result.dropped[0].reason).toBe('moderation check failed: timeout');
    expect(result.cost.moderation).toBeCloseTo(0.0001, 6);
  });

  it('re-tiers items by the verdict', async () => {
    moderator.classify.mockResolvedValue({
      rating: 'suggestive',
      tier: 'tier2',
      scores: { sexual: 0.4 },
      flaggedCategories: [],
    });
    const result = await makeOrchestrator().run(makeJob({ count: 4 }));

    expect(result.tierDistribution).toEqual({ tier1: 0, tier2: 4, tier3: 0 });
    expect(result.moderationDistribution.suggestive).toBe(4);
  });
});

describe('store stage', () => {
  it('keeps the original asset when an upload fails', async () => {
    blobStore.put.mockRejectedValueOnce(new Error('disk full'));
    const result = await makeOrchestrator().run(makeJob({ count: 2 }));

    expect(result.persisted).toBe(2);
    expect(result.failedToStore).toBe(1);
    expect(result.items[0].stored).toBe(false);
    expect(result.items[0].mediaUrl).toBe(result.items[0].assetRef);
    expect(result.items[0].warnings).toEqual(['upload failed, keeping original asset: disk full']);
    expect(result.items[1].stored).toBe(true);
    expect(result.cost.storage).toBeCloseTo(0.001, 6);
  });
});
