import type { ConvexHttpClient } from 'convex/browser';
import { api, type ConvexComment, type ConvexJob } from '../../convex/api.js';
import {
  isJobStatus,
  pullRequestKey,
  type ActiveJobStatus,
  type DiffChunkRecord,
  type PostStatus,
  type PullRequestKey,
  type ReviewComment,
  type ReviewJob,
  type TerminalJobStatus,
} from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import type { StateStore } from './state-store.js';

export type ConvexClient = Pick<ConvexHttpClient, 'query' | 'mutation'>;

function fromJob(job: ReviewJob): ConvexJob {
  return {
    jobId: job.jobId,
    deliveryId: job.deliveryId,
    repositoryId: job.repositoryId,
    pullRequestNumber: job.pullRequestNumber,
    headCommitSha: job.headCommitSha,
    baseCommitSha: job.baseCommitSha ?? null,
    installationId: job.installationId ?? null,
    status: job.status,
    createdAt: job.createdAt,
    attemptCount: job.attemptCount,
    error: job.error ?? null,
  };
}

function toJob(row: ConvexJob): ReviewJob {
  if (!isJobStatus(row.status)) {
    throw new Error(`Unknown job status "${row.status}" for job ${row.jobId}`);
  }
  return {
    ...row,
    status: row.status,
    baseCommitSha: row.baseCommitSha ?? undefined,
    installationId: row.installationId ?? undefined,
    error: row.error ?? undefined,
  };
}

const POST_STATUSES: readonly PostStatus[] = ['pending', 'posted', 'failed'];

function toComment(row: ConvexComment): ReviewComment {
  const postStatus = POST_STATUSES.find((status) => status === row.postStatus);
  if (!postStatus) {
    throw new Error(`Unknown post status "${row.postStatus}" for ${row.jobId}/${row.findingRef}`);
  }
  return { ...row, postStatus, error: row.error ?? undefined };
}

/**
 * Durable-mode store backed by Convex. Each mutation is a transaction on the
 * deployment, which makes `swapActiveJob` atomic across worker instances.
 */
export class ConvexStateStore implements StateStore {
  constructor(
    private readonly convex: ConvexClient,
    private readonly logger: Logger
  ) {}

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error('Convex call failed', { operation, error: errorMessage(error) });
      throw error;
    }
  }

  claimDelivery(deliveryId: string): Promise<boolean> {
    return this.call('claimDelivery', () =>
      this.convex.mutation(api.reviewState.claimDelivery, { deliveryId, claimedAt: new Date().toISOString() })
    );
  }

  async releaseDelivery(deliveryId: string): Promise<void> {
    await this.call('releaseDelivery', () => this.convex.mutation(api.reviewState.releaseDelivery, { deliveryId }));
  }

  async getActiveJob(key: PullRequestKey): Promise<ReviewJob | null> {
    const row = await this.call('getActiveJob', () =>
      this.convex.query(api.reviewState.getActiveJob, { prKey: pullRequestKey(key) })
    );
    return row ? toJob(row) : null;
  }

  swapActiveJob(key: PullRequestKey, expectedJobId: string | null, job: ReviewJob): Promise<boolean> {
    return this.call('swapActiveJob', () =>
      this.convex.mutation(api.reviewState.swapActiveJob, {
        prKey: pullRequestKey(key),
        expectedJobId,
        job: fromJob(job),
      })
    );
  }

  clearActiveJob(key: PullRequestKey, jobId: string): Promise<boolean> {
    return this.call('clearActiveJob', () =>
      this.convex.mutation(api.reviewState.clearActiveJob, { prKey: pullRequestKey(key), jobId })
    );
  }

  async getJob(jobId: string): Promise<ReviewJob | null> {
    const row = await this.call('getJob', () => this.convex.query(api.reviewState.getJob, { jobId }));
    return row ? toJob(row) : null;
  }

  updateJobStatus(jobId: string, status: ActiveJobStatus): Promise<boolean> {
    return this.call('updateJobStatus', () =>
      this.convex.mutation(api.reviewState.updateJobStatus, { jobId, status })
    );
  }

  incrementAttempt(jobId: string): Promise<number> {
    return this.call('incrementAttempt', () => this.convex.mutation(api.reviewState.incrementAttempt, { jobId }));
  }

  finalizeJob(jobId: string, status: TerminalJobStatus, error?: string): Promise<boolean> {
    return this.call('finalizeJob', () =>
      this.convex.mutation(api.reviewState.finalizeJob, { jobId, status, error: error ?? null })
    );
  }

  async saveChunks(chunks: DiffChunkRecord[]): Promise<void> {
    await this.call('saveChunks', () => this.convex.mutation(api.reviewState.saveChunks, { chunks }));
  }

  listChunks(jobId: string): Promise<DiffChunkRecord[]> {
    return this.call('listChunks', () => this.convex.query(api.reviewState.listChunks, { jobId }));
  }

  async getComment(jobId: string, findingRef: string): Promise<ReviewComment | null> {
    const row = await this.call('getComment', () =>
      this.convex.query(api.reviewState.getComment, { jobId, findingRef })
    );
    return row ? toComment(row) : null;
  }

  async saveComment(comment: ReviewComment): Promise<void> {
    await this.call('saveComment', () =>
      this.convex.mutation(api.reviewState.saveComment, {
        comment: { ...comment, error: comment.error ?? null },
      })
    );
  }

  async listComments(jobId: string): Promise<ReviewComment[]> {
    const rows = await this.call('listComments', () => this.convex.query(api.reviewState.listComments, { jobId }));
    return rows.map(toComment);
  }

  async discardArtifacts(jobId: string): Promise<void> {
    await this.call('discardArtifacts', () => this.convex.mutation(api.reviewState.discardArtifacts, { jobId }));
  }
}
