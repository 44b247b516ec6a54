import {
  isTerminalStatus,
  pullRequestKey,
  type ActiveJobStatus,
  type DiffChunkRecord,
  type PullRequestKey,
  type ReviewComment,
  type ReviewJob,
  type TerminalJobStatus,
} from '../../types.js';
import type { StateStore } from './state-store.js';

/**
 * Process-local store for synchronous mode and tests. Nothing survives a
 * restart.
 */
export class MemoryStateStore implements StateStore {
  private readonly deliveries = new Set<string>();
  private readonly jobs = new Map<string, ReviewJob>();
  private readonly active = new Map<string, string>();
  private readonly chunks = new Map<string, DiffChunkRecord[]>();
  private readonly comments = new Map<string, Map<string, ReviewComment>>();

  async claimDelivery(deliveryId: string): Promise<boolean> {
    if (this.deliveries.has(deliveryId)) return false;
    this.deliveries.add(deliveryId);
    return true;
  }

  async releaseDelivery(deliveryId: string): Promise<void> {
    this.deliveries.delete(deliveryId);
  }

  async getActiveJob(key: PullRequestKey): Promise<ReviewJob | null> {
    const jobId = this.active.get(pullRequestKey(key));
    return jobId === undefined ? null : this.getJob(jobId);
  }

  async swapActiveJob(key: PullRequestKey, expectedJobId: string | null, job: ReviewJob): Promise<boolean> {
    const mapKey = pullRequestKey(key);
    const current = this.active.get(mapKey) ?? null;
    if (current !== expectedJobId) return false;

    if (current !== null) {
      const previous = this.jobs.get(current);
      if (previous && !isTerminalStatus(previous.status)) {
        this.jobs.set(current, { ...previous, status: 'superseded' });
      }
    }
    this.jobs.set(job.jobId, { ...job });
    this.active.set(mapKey, job.jobId);
    return true;
  }

  async clearActiveJob(key: PullRequestKey, jobId: string): Promise<boolean> {
    const mapKey = pullRequestKey(key);
    if (this.active.get(mapKey) !== jobId) return false;
    this.active.delete(mapKey);
    return true;
  }

  async getJob(jobId: string): Promise<ReviewJob | null> {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  async updateJobStatus(jobId: string, status: ActiveJobStatus): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) return false;
    this.jobs.set(jobId, { ...job, status });
    return true;
  }

  async incrementAttempt(jobId: string): Promise<number> {
    const job = this.jobs.get(jobId);
    if (!job) return 0;
    const attemptCount = job.attemptCount + 1;
    this.jobs.set(jobId, { ...job, attemptCount });
    return attemptCount;
  }

  async finalizeJob(jobId: string, status: TerminalJobStatus, error?: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) return false;
    this.jobs.set(jobId, { ...job, status, error });
    return true;
  }

  async saveChunks(chunks: DiffChunkRecord[]): Promise<void> {
    for (const chunk of chunks) {
      const existing = (this.chunks.get(chunk.jobId) ?? []).filter((c) => c.chunkId !== chunk.chunkId);
      this.chunks.set(chunk.jobId, [...existing, { ...chunk }].sort((a, b) => a.ordinal - b.ordinal));
    }
  }

  async listChunks(jobId: string): Promise<DiffChunkRecord[]> {
    return (this.chunks.get(jobId) ?? []).map((chunk) => ({ ...chunk }));
  }

  async getComment(jobId: string, findingRef: string): Promise<ReviewComment | null> {
    const comment = this.comments.get(jobId)?.get(findingRef);
    return comment ? { ...comment } : null;
  }

  async saveComment(comment: ReviewComment): Promise<void> {
    let byRef = this.comments.get(comment.jobId);
    if (!byRef) {
      byRef = new Map();
      this.comments.set(comment.jobId, byRef);
    }
    byRef.set(comment.findingRef, { ...comment });
  }

  async listComments(jobId: string): Promise<ReviewComment[]> {
    return [...(this.comments.get(jobId)?.values() ?? [])].map((comment) => ({ ...comment }));
  }

  async discardArtifacts(jobId: string): Promise<void> {
    this.chunks.delete(jobId);
    this.comments.delete(jobId);
  }
}
