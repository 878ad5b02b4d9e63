import dotenv from 'dotenv';
import { createApp } from './app.js';
import { ConcurrencyLimiter } from './concurrency/limiter.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { createNotifier, createPublisherRegistry } from './integrations/index.js';
import { createOpenAICapabilities } from './llm/index.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { PublishDispatcher } from './publishing/dispatcher.js';
import { PublishSweeper } from './publishing/sweeper.js';
import { GenerationQueue } from './queue/index.js';
import { GenerationWorker } from './queue/worker.js';
import { SqliteRepository } from './repository/sqlite.js';
import { SchedulingEngine, platformRulesFromConfig } from './scheduling/engine.js';
import { seedTemplates } from './seeds/index.js';
import { RetryCoordinator } from './scheduling/retry.js';
import { LocalBlobStore } from './storage/local-blob-store.js';

dotenv.config();

const config = loadConfig();
const db = openDatabase(config.dbPath);
const repository = new SqliteRepository(db);
const queue = new GenerationQueue(db);

if (repository.list().length === 0) {
  seedTemplates(db);
}

const { generator, copywriter, moderator } = createOpenAICapabilities(config);

const orchestrator = new PipelineOrchestrator({
  catalog: repository,
  generator,
  copywriter,
  moderator,
  blobStore: new LocalBlobStore(config.blob),
  repository,
  limiter: new ConcurrencyLimiter(config.concurrencyLimit),
  costs: config.costs,
});

const scheduler = new SchedulingEngine({
  repository,
  rules: platformRulesFromConfig(config),
  useJitterByDefault: config.useJitter,
});

const worker = new GenerationWorker({
  queue,
  orchestrator,
  scheduler,
  repository,
  pollSeconds: config.generationPollSeconds,
});

const sweeper = new PublishSweeper(
  new PublishDispatcher({
    repository,
    publishers: createPublisherRegistry(config),
    retry: new RetryCoordinator({ maxRetries: config.maxRetries, baseBackoffHours: config.baseBackoffHours }),
    notifier: createNotifier(config),
    batchSize: config.dispatchBatchSize,
  }),
  config.sweepIntervalSeconds
);

const app = createApp({ config, queue, repository, scheduler });

const server = app.listen(config.port, () => {
  console.log(`[Server] Listening on http://localhost:${config.port}`);
  worker.start();
  sweeper.start();
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down gracefully`);
  worker.stop();
  sweeper.stop();
  server.close(() => {
    db.close();
    console.log('[Server] HTTP server closed');
    process.exit(0);
  });
  // Force exit if server hasn't closed within 10 seconds
  setTimeout(() => {
    console.error('[Server] Forced exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
