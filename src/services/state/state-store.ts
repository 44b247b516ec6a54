import type {
  ActiveJobStatus,
  DiffChunkRecord,
  PullRequestKey,
  ReviewComment,
  ReviewJob,
  TerminalJobStatus,
} from '../../types.js';

/**
 * Persistence behind the idempotency guard, the pipeline and the publisher.
 *
 * Status writes are conditional: neither `updateJobStatus` nor `finalizeJob`
 * changes a job that is already terminal, so a terminal status is written
 * exactly once.
 */
export interface StateStore {
  /** Records a delivery id; false when it was seen before. */
  claimDelivery(deliveryId: string): Promise<boolean>;

  /** Forgets a claimed delivery so a redelivery is admitted again. */
  releaseDelivery(deliveryId: string): Promise<void>;

  /** The job the pull request currently maps to, terminal or not. */
  getActiveJob(key: PullRequestKey): Promise<ReviewJob | null>;

  /**
   * Compare-and-set on the pull request mapping. When it still points at
   * `expectedJobId` (or nothing, for null) the previous job is marked
   * superseded if it was not terminal, `job` is stored and becomes the mapping.
   */
  swapActiveJob(key: PullRequestKey, expectedJobId: string | null, job: ReviewJob): Promise<boolean>;

  /** Removes the mapping only while it still points at `jobId`. */
  clearActiveJob(key: PullRequestKey, jobId: string): Promise<boolean>;

  getJob(jobId: string): Promise<ReviewJob | null>;
  updateJobStatus(jobId: string, status: ActiveJobStatus): Promise<boolean>;
  incrementAttempt(jobId: string): Promise<number>;
  finalizeJob(jobId: string, status: TerminalJobStatus, error?: string): Promise<boolean>;

  saveChunks(chunks: DiffChunkRecord[]): Promise<void>;
  listChunks(jobId: string): Promise<DiffChunkRecord[]>;

  getComment(jobId: string, findingRef: string): Promise<ReviewComment | null>;
  saveComment(comment: ReviewComment): Promise<void>;
  listComments(jobId: string): Promise<ReviewComment[]>;

  /** Drops chunk and comment records of a job that reached a terminal state. */
  discardArtifacts(jobId: string): Promise<void>;
}
