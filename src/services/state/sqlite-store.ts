import type { Statement, Transaction } from 'better-sqlite3';
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
import type { SqliteDatabase } from './sqlite-database.js';
import type { StateStore } from './state-store.js';

interface JobRow {
  job_id: string;
  delivery_id: string;
  repository_id: string;
  pull_request_number: number;
  head_commit_sha: string;
  base_commit_sha: string | null;
  installation_id: number | null;
  status: string;
  created_at: string;
  attempt_count: number;
  error: string | null;
}

interface ChunkRow {
  chunk_id: string;
  job_id: string;
  ordinal: number;
  file_path: string | null;
  hunk_first: number | null;
  hunk_last: number | null;
  token_estimate: number;
}

interface CommentRow {
  job_id: string;
  finding_ref: string;
  external_comment_id: string | null;
  post_status: string;
  error: string | null;
}

const POST_STATUSES: readonly PostStatus[] = ['pending', 'posted', 'failed'];

function toJob(row: JobRow): ReviewJob {
  if (!isJobStatus(row.status)) {
    throw new Error(`Unknown job status "${row.status}" for job ${row.job_id}`);
  }
  return {
    jobId: row.job_id,
    deliveryId: row.delivery_id,
    repositoryId: row.repository_id,
    pullRequestNumber: row.pull_request_number,
    headCommitSha: row.head_commit_sha,
    baseCommitSha: row.base_commit_sha ?? undefined,
    installationId: row.installation_id ?? undefined,
    status: row.status,
    createdAt: row.created_at,
    attemptCount: row.attempt_count,
    error: row.error ?? undefined,
  };
}

function toChunk(row: ChunkRow): DiffChunkRecord {
  return {
    chunkId: row.chunk_id,
    jobId: row.job_id,
    ordinal: row.ordinal,
    filePath: row.file_path,
    hunkRange:
      row.hunk_first === null || row.hunk_last === null ? null : { first: row.hunk_first, last: row.hunk_last },
    tokenEstimate: row.token_estimate,
  };
}

function toComment(row: CommentRow): ReviewComment {
  const postStatus = POST_STATUSES.find((status) => status === row.post_status);
  if (!postStatus) {
    throw new Error(`Unknown post status "${row.post_status}" for ${row.job_id}/${row.finding_ref}`);
  }
  return {
    jobId: row.job_id,
    findingRef: row.finding_ref,
    externalCommentId: row.external_comment_id,
    postStatus,
    error: row.error ?? undefined,
  };
}

type JobParams = [
  string,
  string,
  string,
  number,
  string,
  string | null,
  number | null,
  string,
  string,
  number,
  string | null,
];

/**
 * Embedded-mode store on better-sqlite3. Multi-step writes run in one
 * transaction, so processes sharing the file see the compare-and-set atomically.
 */
export class SqliteStateStore implements StateStore {
  private readonly insertDelivery: Statement<[string, string]>;
  private readonly deleteDelivery: Statement<[string]>;
  private readonly selectJob: Statement<[string], JobRow>;
  private readonly selectActiveId: Statement<[string], { job_id: string }>;
  private readonly insertJob: Statement<JobParams>;
  private readonly supersedeJob: Statement<[string]>;
  private readonly upsertActive: Statement<[string, string]>;
  private readonly deleteActive: Statement<[string, string]>;
  private readonly setStatus: Statement<[string, string]>;
  private readonly finalize: Statement<[string, string | null, string]>;
  private readonly bumpAttempt: Statement<[string]>;
  private readonly selectAttempt: Statement<[string], { attempt_count: number }>;
  private readonly upsertChunk: Statement<[string, string, number, string | null, number | null, number | null, number]>;
  private readonly selectChunks: Statement<[string], ChunkRow>;
  private readonly selectComment: Statement<[string, string], CommentRow>;
  private readonly upsertComment: Statement<[string, string, string | null, string, string | null]>;
  private readonly selectComments: Statement<[string], CommentRow>;
  private readonly deleteChunks: Statement<[string]>;
  private readonly deleteComments: Statement<[string]>;
  private readonly swap: Transaction<(mapKey: string, expectedJobId: string | null, job: ReviewJob) => boolean>;

  constructor(private readonly db: SqliteDatabase) {
    this.insertDelivery = db.prepare<[string, string]>('INSERT OR IGNORE INTO deliveries (delivery_id, claimed_at) VALUES (?, ?)');
    this.deleteDelivery = db.prepare<[string]>('DELETE FROM deliveries WHERE delivery_id = ?');
    this.selectJob = db.prepare<[string], JobRow>('SELECT * FROM review_jobs WHERE job_id = ?');
    this.selectActiveId = db.prepare<[string], { job_id: string }>('SELECT job_id FROM active_jobs WHERE pr_key = ?');
    this.insertJob = db.prepare<JobParams>(
      `INSERT INTO review_jobs (job_id, delivery_id, repository_id, pull_request_number, head_commit_sha,
         base_commit_sha, installation_id, status, created_at, attempt_count, error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    this.supersedeJob = db.prepare<[string]>(
      `UPDATE review_jobs SET status = 'superseded'
       WHERE job_id = ? AND status NOT IN ('completed', 'failed', 'superseded', 'cancelled')`
    );
    this.upsertActive = db.prepare<[string, string]>(
      'INSERT INTO active_jobs (pr_key, job_id) VALUES (?, ?) ON CONFLICT (pr_key) DO UPDATE SET job_id = excluded.job_id'
    );
    this.deleteActive = db.prepare<[string, string]>('DELETE FROM active_jobs WHERE pr_key = ? AND job_id = ?');
    this.setStatus = db.prepare<[string, string]>(
      `UPDATE review_jobs SET status = ?
       WHERE job_id = ? AND status NOT IN ('completed', 'failed', 'superseded', 'cancelled')`
    );
    this.finalize = db.prepare<[string, string | null, string]>(
      `UPDATE review_jobs SET status = ?, error = ?
       WHERE job_id = ? AND status NOT IN ('completed', 'failed', 'superseded', 'cancelled')`
    );
    this.bumpAttempt = db.prepare<[string]>('UPDATE review_jobs SET attempt_count = attempt_count + 1 WHERE job_id = ?');
    this.selectAttempt = db.prepare<[string], { attempt_count: number }>('SELECT attempt_count FROM review_jobs WHERE job_id = ?');
    this.upsertChunk = db.prepare<[string, string, number, string | null, number | null, number | null, number]>(
      `INSERT INTO diff_chunks (chunk_id, job_id, ordinal, file_path, hunk_first, hunk_last, token_estimate)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (chunk_id) DO UPDATE SET
         ordinal = excluded.ordinal, file_path = excluded.file_path, hunk_first = excluded.hunk_first,
         hunk_last = excluded.hunk_last, token_estimate = excluded.token_estimate`
    );
    this.selectChunks = db.prepare<[string], ChunkRow>('SELECT * FROM diff_chunks WHERE job_id = ? ORDER BY ordinal');
    this.selectComment = db.prepare<[string, string], CommentRow>('SELECT * FROM review_comments WHERE job_id = ? AND finding_ref = ?');
    this.upsertComment = db.prepare<[string, string, string | null, string, string | null]>(
      `INSERT INTO review_comments (job_id, finding_ref, external_comment_id, post_status, error)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT (job_id, finding_ref) DO UPDATE SET
         external_comment_id = excluded.external_comment_id, post_status = excluded.post_status, error = excluded.error`
    );
    this.selectComments = db.prepare<[string], CommentRow>('SELECT * FROM review_comments WHERE job_id = ? ORDER BY finding_ref');
    this.deleteChunks = db.prepare<[string]>('DELETE FROM diff_chunks WHERE job_id = ?');
    this.deleteComments = db.prepare<[string]>('DELETE FROM review_comments WHERE job_id = ?');

    this.swap = db.transaction((mapKey: string, expectedJobId: string | null, job: ReviewJob): boolean => {
      const current = this.selectActiveId.get(mapKey)?.job_id ?? null;
      if (current !== expectedJobId) return false;
      if (current !== null) this.supersedeJob.run(current);
      this.insertJob.run(
        job.jobId,
        job.deliveryId,
        job.repositoryId,
        job.pullRequestNumber,
        job.headCommitSha,
        job.baseCommitSha ?? null,
        job.installationId ?? null,
        job.status,
        job.createdAt,
        job.attemptCount,
        job.error ?? null
      );
      this.upsertActive.run(mapKey, job.jobId);
      return true;
    });
  }

  async claimDelivery(deliveryId: string): Promise<boolean> {
    return this.insertDelivery.run(deliveryId, new Date().toISOString()).changes === 1;
  }

  async releaseDelivery(deliveryId: string): Promise<void> {
    this.deleteDelivery.run(deliveryId);
  }

  async getActiveJob(key: PullRequestKey): Promise<ReviewJob | null> {
    const active = this.selectActiveId.get(pullRequestKey(key));
    return active ? this.getJob(active.job_id) : null;
  }

  async swapActiveJob(key: PullRequestKey, expectedJobId: string | null, job: ReviewJob): Promise<boolean> {
    return this.swap.immediate(pullRequestKey(key), expectedJobId, job);
  }

  async clearActiveJob(key: PullRequestKey, jobId: string): Promise<boolean> {
    return this.deleteActive.run(pullRequestKey(key), jobId).changes === 1;
  }

  async getJob(jobId: string): Promise<ReviewJob | null> {
    const row = this.selectJob.get(jobId);
    return row ? toJob(row) : null;
  }

  async updateJobStatus(jobId: string, status: ActiveJobStatus): Promise<boolean> {
    return this.setStatus.run(status, jobId).changes === 1;
  }

  async incrementAttempt(jobId: string): Promise<number> {
    this.bumpAttempt.run(jobId);
    return this.selectAttempt.get(jobId)?.attempt_count ?? 0;
  }

  async finalizeJob(jobId: string, status: TerminalJobStatus, error?: string): Promise<boolean> {
    return this.finalize.run(status, error ?? null, jobId).changes === 1;
  }

  async saveChunks(chunks: DiffChunkRecord[]): Promise<void> {
    const saveAll = this.db.transaction((records: DiffChunkRecord[]) => {
      for (const chunk of records) {
        this.upsertChunk.run(
          chunk.chunkId,
          chunk.jobId,
          chunk.ordinal,
          chunk.filePath,
          chunk.hunkRange?.first ?? null,
          chunk.hunkRange?.last ?? null,
          chunk.tokenEstimate
        );
      }
    });
    saveAll(chunks);
  }

  async listChunks(jobId: string): Promise<DiffChunkRecord[]> {
    return this.selectChunks.all(jobId).map(toChunk);
  }

  async getComment(jobId: string, findingRef: string): Promise<ReviewComment | null> {
    const row = this.selectComment.get(jobId, findingRef);
    return row ? toComment(row) : null;
  }

  async saveComment(comment: ReviewComment): Promise<void> {
    this.upsertComment.run(
      comment.jobId,
      comment.findingRef,
      comment.externalCommentId,
      comment.postStatus,
      comment.error ?? null
    );
  }

  async listComments(jobId: string): Promise<ReviewComment[]> {
    return this.selectComments.all(jobId).map(toComment);
  }

  async discardArtifacts(jobId: string): Promise<void> {
    const discard = this.db.transaction((id: string) => {
      this.deleteChunks.run(id);
      this.deleteComments.run(id);
    });
    discard(jobId);
  }
}
