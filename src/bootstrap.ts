import { ConvexHttpClient } from 'convex/browser';
import type { AppConfig } from './config.js';
import { ConfigError } from './errors.js';
import { createModelProvider } from './services/providers/registry.js';
import type { ModelProvider } from './services/providers/schema.js';
import { createDiffDecomposer } from './services/review/decomposer.js';
import { createFindingFilter } from './services/review/finding-filter.js';
import { createGitHubIntegration, createOctokitFactory } from './services/review/github-integration.js';
import { createReviewPipeline, type ReviewPipeline } from './services/review/index.js';
import { createModelGateway } from './services/review/model-gateway.js';
import { createReviewPublisher } from './services/review/publisher.js';
import type { CommentPoster, DiffSource } from './services/review/types.js';
import { createPubSubPublisher, DurableQueue } from './services/queue/durable-queue.js';
import { EmbeddedQueue } from './services/queue/embedded-queue.js';
import { createJobProcessor, type JobProcessor } from './services/queue/job-processor.js';
import type { JobQueue } from './services/queue/job-queue.js';
import { SynchronousQueue } from './services/queue/synchronous-queue.js';
import { ConvexStateStore } from './services/state/convex-store.js';
import { createIdempotencyGuard, type IdempotencyGuard } from './services/state/idempotency-guard.js';
import { MemoryStateStore } from './services/state/memory-store.js';
import { closeDatabase, openDatabase, type SqliteDatabase } from './services/state/sqlite-database.js';
import { SqliteStateStore } from './services/state/sqlite-store.js';
import type { StateStore } from './services/state/state-store.js';
import type { Logger } from './utils/logger.js';

export interface Services {
  store: StateStore;
  guard: IdempotencyGuard;
  pipeline: ReviewPipeline;
  queue: JobQueue;
  jobProcessor?: JobProcessor;
  close(): Promise<void>;
}

/** Collaborators replaced in tests; production builds them from config. */
export interface ServiceOverrides {
  diffSource?: DiffSource;
  poster?: CommentPoster;
  provider?: ModelProvider;
  store?: StateStore;
}

function createStore(config: AppConfig, logger: Logger): { store: StateStore; db?: SqliteDatabase } {
  switch (config.queue.mode) {
    case 'durable': {
      if (!config.queue.convexUrl) throw new ConfigError(['CONVEX_URL: required when QUEUE_MODE=durable']);
      return { store: new ConvexStateStore(new ConvexHttpClient(config.queue.convexUrl), logger) };
    }
    case 'embedded': {
      const db = openDatabase(config.queue.embedded.path, logger);
      return { store: new SqliteStateStore(db), db };
    }
    case 'synchronous':
      return { store: new MemoryStateStore() };
  }
}

export function createServices(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Services {
  const github =
    overrides.diffSource && overrides.poster
      ? undefined
      : createGitHubIntegration({
          octokitFor: createOctokitFactory(config.github),
          logger: logger.child({ component: 'github' }),
          retry: config.publisher.retry,
          timeoutMs: config.publisher.timeoutMs,
        });
  const diffSource = overrides.diffSource ?? github;
  const poster = overrides.poster ?? github;
  if (!diffSource || !poster) {
    throw new ConfigError(['GitHub integration could not be created']);
  }

  const created = overrides.store ? { store: overrides.store } : createStore(config, logger);
  const { store } = created;
  const db = 'db' in created ? created.db : undefined;

  const guard = createIdempotencyGuard({ store, logger: logger.child({ component: 'guard' }) });
  const pipeline = createReviewPipeline({
    store,
    guard,
    decomposer: createDiffDecomposer({
      diffSource,
      config: config.decomposer,
      logger: logger.child({ component: 'decomposer' }),
    }),
    gateway: createModelGateway({
      provider: overrides.provider ?? createModelProvider(config.model),
      config: config.model,
      logger: logger.child({ component: 'model' }),
    }),
    filter: createFindingFilter({
      poster,
      store,
      config: config.publisher,
      logger: logger.child({ component: 'filter' }),
    }),
    publisher: createReviewPublisher({
      poster,
      store,
      isActive: guard.isActive,
      config: config.publisher,
      logger: logger.child({ component: 'publisher' }),
    }),
    modelConcurrency: config.model.concurrency,
    supersededCommentPolicy: config.publisher.supersededCommentPolicy,
    logger: logger.child({ component: 'pipeline' }),
  });

  const queueLogger = logger.child({ component: 'queue' });
  let queue: JobQueue;
  let jobProcessor: JobProcessor | undefined;

  switch (config.queue.mode) {
    case 'durable': {
      const { pubsub } = config.queue;
      if (!pubsub) throw new ConfigError(['PUBSUB_PROJECT_ID, PUBSUB_TOPIC: required when QUEUE_MODE=durable']);
      queue = new DurableQueue(
        createPubSubPublisher({ projectId: pubsub.projectId, topicName: pubsub.topic }, queueLogger),
        queueLogger
      );
      jobProcessor = createJobProcessor({
        pipeline,
        maxDeliveryAttempts: pubsub.maxDeliveryAttempts,
        logger: queueLogger,
      });
      break;
    }
    case 'embedded': {
      if (!db) throw new ConfigError(['EMBEDDED_QUEUE_PATH: the embedded queue needs the SQLite store']);
      queue = new EmbeddedQueue(
        db,
        pipeline,
        { ...config.queue.embedded, workerConcurrency: config.queue.workerConcurrency },
        queueLogger
      );
      break;
    }
    case 'synchronous':
      queue = new SynchronousQueue(pipeline, queueLogger);
      break;
  }

  return {
    store,
    guard,
    pipeline,
    queue,
    jobProcessor,
    async close() {
      await queue.stop();
      if (db) closeDatabase(db, logger);
    },
  };
}
