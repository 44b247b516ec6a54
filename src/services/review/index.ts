import pLimit from 'p-limit';
import type { SupersededCommentPolicy } from '../../config.js';
import { DiffUnavailableError, ModelExhaustedError, SupersededJobError } from '../../errors.js';
import {
  isTerminalStatus,
  pullRequestKey,
  type ActiveJobStatus,
  type ChunkReview,
  type DiffChunk,
  type DiffChunkRecord,
  type GlobalContext,
  type JobStatus,
  type ReviewJob,
} from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import type { IdempotencyGuard } from '../state/idempotency-guard.js';
import type { StateStore } from '../state/state-store.js';
import type { DiffDecomposer } from './decomposer.js';
import type { FindingFilter } from './finding-filter.js';
import type { ModelGateway } from './model-gateway.js';
import type { PostResult, ReviewPublisher } from './publisher.js';

/**
 * Review Pipeline
 *
 * Runs one admitted job end to end:
 * - decomposer.ts: diff retrieval and chunking under token budgets
 * - model-gateway.ts: provider calls with budgets, retries and the circuit breaker
 * - finding-filter.ts: drops non-actionable and already-posted findings
 * - publisher.ts: position mapping and comment posting
 *
 * Every status change is conditional on the job still being live, so a job
 * that was superseded or cancelled stops at its next checkpoint.
 */

export interface ExecuteResult {
  jobId: string;
  /** Status after this run; null when the job does not exist. */
  status: JobStatus | null;
  postResult?: PostResult;
}

export interface ReviewPipeline {
  execute(job: ReviewJob): Promise<ExecuteResult>;
  /** Fails a job the queue gave up on after repeated delivery failures. */
  abandon(job: ReviewJob, reason: string): Promise<void>;
}

function toRecord(chunk: DiffChunk): DiffChunkRecord {
  return {
    chunkId: chunk.chunkId,
    jobId: chunk.jobId,
    ordinal: chunk.ordinal,
    filePath: chunk.filePath,
    hunkRange: chunk.hunkRange,
    tokenEstimate: chunk.tokenEstimate,
  };
}

export function createReviewPipeline(deps: {
  store: StateStore;
  guard: IdempotencyGuard;
  decomposer: DiffDecomposer;
  gateway: ModelGateway;
  filter: FindingFilter;
  publisher: ReviewPublisher;
  modelConcurrency: number;
  supersededCommentPolicy: SupersededCommentPolicy;
  logger: Logger;
}): ReviewPipeline {
  const { store, guard, decomposer, gateway, filter, publisher, logger } = deps;

  async function checkpoint(jobId: string, status: ActiveJobStatus): Promise<void> {
    if (!(await store.updateJobStatus(jobId, status))) {
      throw new SupersededJobError(jobId);
    }
  }

  async function cleanUp(jobId: string): Promise<JobStatus | null> {
    const latest = await store.getJob(jobId);
    if (latest && isTerminalStatus(latest.status)) {
      await guard.release(latest);
      await store.discardArtifacts(jobId);
    }
    return latest?.status ?? null;
  }

  async function reviewChunks(
    job: ReviewJob,
    chunks: DiffChunk[],
    log: Logger
  ): Promise<{ context: GlobalContext; reviews: ChunkReview[] }> {
    const [summaryChunk, ...fileChunks] = chunks;

    await checkpoint(job.jobId, 'summarizing');
    const context = await gateway.summarize(summaryChunk);

    await checkpoint(job.jobId, 'reviewing');
    const limit = pLimit(Math.max(1, deps.modelConcurrency));
    const results = await Promise.all(
      fileChunks.map((chunk) =>
        limit(async () => {
          if (!(await guard.isActive(job.jobId))) return null;
          return gateway.review(chunk, context);
        })
      )
    );

    const reviews = results.filter((review): review is ChunkReview => review !== null);
    if (reviews.length < results.length || !(await guard.isActive(job.jobId))) {
      throw new SupersededJobError(job.jobId);
    }
    reviews.sort((a, b) => a.ordinal - b.ordinal);

    if (context.outcome === 'failed' && reviews.every((review) => review.outcome === 'failed')) {
      throw new ModelExhaustedError(`All ${reviews.length + 1} model calls failed`);
    }

    const degraded = reviews.filter((review) => review.outcome !== 'ok').map((review) => review.chunkId);
    log.info('Reviewed all chunks', {
      chunks: reviews.length,
      summaryOutcome: context.outcome,
      notOk: degraded,
    });

    await checkpoint(job.jobId, 'posting');
    return { context, reviews };
  }

  async function execute(job: ReviewJob): Promise<ExecuteResult> {
    const current = await store.getJob(job.jobId);
    if (!current) {
      logger.warn('Job not found, nothing to execute', { jobId: job.jobId });
      return { jobId: job.jobId, status: null };
    }
    if (isTerminalStatus(current.status)) {
      logger.info('Job already terminal, skipping', { jobId: job.jobId, status: current.status });
      return { jobId: job.jobId, status: await cleanUp(job.jobId) };
    }

    const log = logger.child({ jobId: current.jobId, pullRequest: pullRequestKey(current) });
    let postResult: PostResult | undefined;

    try {
      const attempt = await store.incrementAttempt(current.jobId);
      log.info('Starting review', { attempt, headCommitSha: current.headCommitSha.substring(0, 7) });
      await checkpoint(current.jobId, 'running');

      const decomposition = await decomposer.decompose(current);
      const chunks = [...decomposition];
      await store.saveChunks(chunks.map(toRecord));

      if (chunks.length === 1) {
        log.info('No reviewable changes', { skipped: decomposition.skipped.length });
      } else {
        const { context, reviews } = await reviewChunks(current, chunks, log);
        const filtered = await filter.apply(current, reviews);
        postResult = await publisher.publish(current, filtered.reviews, { context, skipped: decomposition.skipped });
        if (postResult.interrupted) {
          throw new SupersededJobError(current.jobId);
        }
      }

      if (!(await store.finalizeJob(current.jobId, 'completed'))) {
        throw new SupersededJobError(current.jobId);
      }
      log.info('Review completed', { posted: postResult?.posted ?? 0, failed: postResult?.failed ?? 0 });
    } catch (error) {
      if (error instanceof SupersededJobError) {
        const latest = await store.getJob(current.jobId);
        log.info('Job stopped: no longer active', { status: latest?.status });
        if (latest?.status === 'superseded' && deps.supersededCommentPolicy === 'retract') {
          await publisher.retract(current);
        }
      } else if (error instanceof DiffUnavailableError || error instanceof ModelExhaustedError) {
        log.error('Review failed', { error: errorMessage(error) });
        await store.finalizeJob(current.jobId, 'failed', errorMessage(error));
      } else {
        log.error('Review attempt failed unexpectedly', { error: errorMessage(error) });
        throw error;
      }
    } finally {
      await cleanUp(current.jobId);
    }

    return { jobId: current.jobId, status: (await store.getJob(current.jobId))?.status ?? null, postResult };
  }

  async function abandon(job: ReviewJob, reason: string): Promise<void> {
    if (await store.finalizeJob(job.jobId, 'failed', reason)) {
      logger.error('Abandoned job after repeated delivery failures', { jobId: job.jobId, reason });
    }
    await cleanUp(job.jobId);
  }

  return { execute, abandon };
}
