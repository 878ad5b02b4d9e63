import type {
  BlobStore,
  Copywriter,
  Generator,
  Moderator,
  Repository,
  TemplateCatalog,
} from '../capabilities/index.js';
import { ConcurrencyLimiter, settle } from '../concurrency/limiter.js';
import type { CostRates } from '../config.js';
import { generateUUID } from '../db.js';
import { SelectionError } from '../errors/index.js';
import type {
  BatchResult,
  ContentItem,
  DroppedItem,
  GenerationItem,
  GenerationJob,
  StageName,
  StageReport,
} from '../types.js';
import { createSeededRng, defaultRng, type Rng } from './random.js';
import {
  averageGenerationSeconds,
  computeCost,
  emptyTally,
  moderationDistribution,
  tierDistribution,
  type StageTally,
} from './statistics.js';
import { TemplateSelector } from './template-selector.js';

export interface OrchestratorDeps {
  catalog: TemplateCatalog;
  generator: Generator;
  copywriter: Copywriter;
  moderator: Moderator;
  blobStore: BlobStore;
  repository: Repository;
  limiter: ConcurrencyLimiter;
  costs: CostRates;
  rng?: Rng;
}

export interface RunOptions {
  jobId?: string;
  onStage?: (report: StageReport) => void;
}

interface StageOutput {
  survivors: GenerationItem[];
  failures: number;
}

// Mutable bookkeeping for one run; never shared between runs.
interface RunContext {
  jobId: string;
  job: GenerationJob;
  dropped: DroppedItem[];
  warnings: string[];
  tally: StageTally;
  rejected: number;
  failedToStore: number;
  generated: number;
  persisted: ContentItem[];
  stages: StageReport[];
  onStage?: (report: StageReport) => void;
}

const errorMessage = (error: Error): string => error.message || error.name;

/**
 * Drives one batch through select → generate → caption → moderate → store → persist.
 * Stages run strictly one after another over the whole working set; only the
 * generate stage fans out, bounded by the limiter. Per-item failures are recorded
 * and the batch carries on. The only thing that throws is a select stage that
 * yields no candidates.
 */
export class PipelineOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(job: GenerationJob, options: RunOptions = {}): Promise<BatchResult> {
    const ctx: RunContext = {
      jobId: options.jobId ?? generateUUID(),
      job,
      dropped: [],
      warnings: [],
      tally: emptyTally(),
      rejected: 0,
      failedToStore: 0,
      generated: 0,
      persisted: [],
      stages: [],
      onStage: options.onStage,
    };
    const started = Date.now();

    console.log(`[Pipeline] Job ${ctx.jobId}: starting batch of ${this.requestedCount(job)} for ${job.platform}`);

    let items = await this.runStage(ctx, 'select', [], async () => ({
      survivors: this.selectCandidates(job),
      failures: 0,
    }));

    items = await this.runStage(ctx, 'generate', items, (input) => this.generate(ctx, input));
    items = await this.runStage(ctx, 'caption', items, job.caption ? (input) => this.caption(ctx, input) : null);
    items = await this.runStage(ctx, 'moderate', items, job.moderate ? (input) => this.moderate(ctx, input) : null);
    items = await this.runStage(ctx, 'store', items, job.upload ? (input) => this.store(ctx, input) : null);
    await this.runStage(ctx, 'persist', items, async (input) => this.persist(ctx, input));

    const result: BatchResult = {
      jobId: ctx.jobId,
      requested: this.requestedCount(job),
      generated: ctx.generated,
      rejected: ctx.rejected,
      failedToStore: ctx.failedToStore,
      persisted: ctx.persisted.length,
      items: ctx.persisted,
      dropped: ctx.dropped,
      warnings: ctx.warnings,
      tierDistribution: tierDistribution(ctx.persisted),
      moderationDistribution: moderationDistribution(ctx.persisted),
      cost: computeCost(ctx.tally, this.deps.costs),
      stages: ctx.stages,
      totalDurationMs: Date.now() - started,
      averageGenerationSeconds: averageGenerationSeconds(ctx.persisted),
    };

    console.log(
      `[Pipeline] Job ${ctx.jobId}: persisted ${result.persisted}/${result.requested}` +
      ` (rejected ${result.rejected}, dropped ${result.dropped.length}) cost $${result.cost.total}`
    );

    return result;
  }

  private requestedCount(job: GenerationJob): number {
    return job.customPrompts && job.customPrompts.length > 0 ? job.customPrompts.length : job.count;
  }

  private async runStage(
    ctx: RunContext,
    stage: StageName,
    input: GenerationItem[],
    step: ((items: GenerationItem[]) => Promise<StageOutput>) | null
  ): Promise<GenerationItem[]> {
    const started = Date.now();
    const output: StageOutput = step ? await step(input) : { survivors: input, failures: 0 };

    const report: StageReport = {
      stage,
      skipped: step === null,
      durationMs: Date.now() - started,
      inputCount: input.length,
      survivors: output.survivors.length,
      failures: output.failures,
    };
    ctx.stages.push(report);

    if (ctx.onStage) {
      try {
        ctx.onStage(report);
      } catch (error) {
        console.warn(`[Pipeline] Job ${ctx.jobId}: stage listener failed for ${stage}:`, error);
      }
    }

    return output.survivors;
  }

  private selectCandidates(job: GenerationJob): GenerationItem[] {
    const candidates: Array<Pick<GenerationItem, 'prompt' | 'tier' | 'templateId'>> = [];

    if (job.customPrompts && job.customPrompts.length > 0) {
      job.customPrompts.forEach((prompt, i) => {
        candidates.push({ prompt: this.composePrompt(job.subjectPrompt, prompt), tier: job.customTiers?.[i] ?? 'tier1' });
      });
    } else {
      const rng = job.seed !== undefined ? createSeededRng(job.seed) : this.deps.rng ?? defaultRng;
      const selector = new TemplateSelector(this.deps.catalog, rng);
      for (const template of selector.select(job.nicheHint, job.count, job.tierRatios)) {
        candidates.push({
          prompt: this.composePrompt(job.subjectPrompt, template.promptFragment),
          tier: template.tier,
          templateId: template.id,
        });
      }
    }

    if (candidates.length === 0) {
      throw new SelectionError('Select stage produced no candidates');
    }

    return candidates.map((candidate, index) => ({
      ...candidate,
      index,
      stored: false,
      hashtags: [],
      cost: 0,
      durationSeconds: 0,
      warnings: [],
    }));
  }

  private composePrompt(subject: string | undefined, fragment: string): string {
    return [subject?.trim(), fragment.trim()].filter((part) => part).join(', ');
  }

  private drop(ctx: RunContext, item: GenerationItem, stage: StageName, reason: string): void {
    ctx.dropped.push({ index: item.index, prompt: item.prompt, stage, reason });
    console.warn(`[Pipeline] Job ${ctx.jobId}: item ${item.index} dropped at ${stage}: ${reason}`);
  }

  private warn(ctx: RunContext, item: GenerationItem, message: string): GenerationItem {
    ctx.warnings.push(`item ${item.index}: ${message}`);
    console.warn(`[Pipeline] Job ${ctx.jobId}: item ${item.index}: ${message}`);
    return { ...item, warnings: [...item.warnings, message] };
  }

  private async generate(ctx: RunContext, items: GenerationItem[]): Promise<StageOutput> {
    const params = ctx.job.generationParams ?? {};
    const results = await this.deps.limiter.run(
      items.map((item) => () => this.deps.generator.generate(item.prompt, params))
    );

    const survivors: GenerationItem[] = [];
    let failures = 0;

    results.forEach((result, i) => {
      const item = items[i];
      if (!result.ok) {
        failures++;
        this.drop(ctx, item, 'generate', errorMessage(result.error));
        return;
      }
      ctx.tally.generationCost += result.value.cost;
      survivors.push({
        ...item,
        assetRef: result.value.assetRef,
        mediaUrl: result.value.assetRef,
        cost: result.value.cost,
        durationSeconds: result.value.durationSeconds,
      });
    });

    ctx.generated = survivors.length;
    return { survivors, failures };
  }

  private async caption(ctx: RunContext, items: GenerationItem[]): Promise<StageOutput> {
    const survivors: GenerationItem[] = [];
    let failures = 0;

    for (const item of items) {
      const result = await settle(() =>
        this.deps.copywriter.caption({
          prompt: item.prompt,
          platform: ctx.job.platform,
          tier: item.tier,
          templateId: item.templateId,
          nicheHint: ctx.job.nicheHint,
        })
      );

      if (result.ok) {
        ctx.tally.captions++;
        survivors.push({ ...item, caption: result.value.text, hashtags: result.value.hashtags });
      } else {
        failures++;
        survivors.push(this.warn(ctx, item, `caption failed: ${errorMessage(result.error)}`));
      }
    }

    return { survivors, failures };
  }

  private async moderate(ctx: RunContext, items: GenerationItem[]): Promise<StageOutput> {
    const survivors: GenerationItem[] = [];
    let failures = 0;

    for (const item of items) {
      const text = [item.prompt, item.caption].filter((part) => part).join('\n');
      const result = await settle(() => this.deps.moderator.classify(text, item.assetRef));

      if (!result.ok) {
        // An unverifiable item is treated as rejected
        failures++;
        ctx.rejected++;
        this.drop(ctx, item, 'moderate', `moderation check failed: ${errorMessage(result.error)}`);
        continue;
      }

      ctx.tally.moderationChecks++;
      const verdict = result.value;
      if (verdict.rating === 'rejected') {
        failures++;
        ctx.rejected++;
        const reason = verdict.reason ?? `flagged: ${verdict.flaggedCategories.join(', ') || 'unspecified'}`;
        this.drop(ctx, item, 'moderate', reason);
        continue;
      }

      survivors.push({ ...item, moderation: verdict, tier: verdict.tier ?? item.tier });
    }

    return { survivors, failures };
  }

  private async store(ctx: RunContext, items: GenerationItem[]): Promise<StageOutput> {
    const survivors: GenerationItem[] = [];
    let failures = 0;

    for (const item of items) {
      if (!item.assetRef) {
        survivors.push(item);
        continue;
      }

      const assetRef = item.assetRef;
      const result = await settle(() =>
        this.deps.blobStore.put(assetRef, `content/${ctx.jobId}/${item.index}.png`)
      );

      if (result.ok) {
        ctx.tally.uploads++;
        survivors.push({ ...item, mediaUrl: result.value, stored: true });
      } else {
        failures++;
        ctx.failedToStore++;
        survivors.push(this.warn(ctx, item, `upload failed, keeping original asset: ${errorMessage(result.error)}`));
      }
    }

    return { survivors, failures };
  }

  private persist(ctx: RunContext, items: GenerationItem[]): StageOutput {
    const survivors: GenerationItem[] = [];
    let failures = 0;

    for (const item of items) {
      try {
        const saved = this.deps.repository.saveContentItem(ctx.jobId, item);
        ctx.persisted.push(saved);
        survivors.push(saved);
      } catch (error) {
        failures++;
        const message = error instanceof Error ? error.message : String(error);
        this.drop(ctx, item, 'persist', `save failed: ${message}`);
      }
    }

    return { survivors, failures };
  }
}
