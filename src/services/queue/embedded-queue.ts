import { setTimeout as sleep } from 'node:timers/promises';
import type { Statement, Transaction } from 'better-sqlite3';
import type { QueueConfig } from '../../config.js';
import type { ReviewJob } from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import type { ReviewPipeline } from '../review/index.js';
import type { SqliteDatabase } from '../state/sqlite-database.js';
import { decodeJob, encodeJob, type EnqueueAck, type JobQueue } from './job-queue.js';

interface QueueRow {
  job_id: string;
  payload: string;
  deliveries: number;
}

export interface ClaimedJob {
  jobId: string;
  payload: string;
  deliveries: number;
}

/**
 * Queue table in the embedded database. Workers claim rows under a lease;
 * a row whose lease expired (its worker died) is claimed again.
 */
export class EmbeddedQueue implements JobQueue {
  readonly mode = 'embedded' as const;

  private readonly insert: Statement<[string, string, number]>;
  private readonly selectReady: Statement<[number], QueueRow>;
  private readonly lease: Statement<[number, string]>;
  private readonly renew: Statement<[number, string]>;
  private readonly remove: Statement<[string]>;
  private readonly release: Statement<[number, string, string]>;
  private readonly bury: Statement<[string, string]>;
  private readonly claimTx: Transaction<(now: number) => ClaimedJob | null>;

  private running = false;
  private workers: Promise<void>[] = [];
  private abort = new AbortController();

  constructor(
    private readonly db: SqliteDatabase,
    private readonly pipeline: ReviewPipeline,
    private readonly config: QueueConfig['embedded'] & { workerConcurrency: number },
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {
    this.insert = db.prepare<[string, string, number]>(
      'INSERT OR IGNORE INTO queued_jobs (job_id, payload, enqueued_at) VALUES (?, ?, ?)'
    );
    this.selectReady = db.prepare<[number], QueueRow>(
      `SELECT job_id, payload, deliveries FROM queued_jobs
       WHERE dead = 0 AND (lease_until IS NULL OR lease_until <= ?)
       ORDER BY enqueued_at, job_id LIMIT 1`
    );
    this.lease = db.prepare<[number, string]>(
      'UPDATE queued_jobs SET lease_until = ?, deliveries = deliveries + 1 WHERE job_id = ?'
    );
    this.renew = db.prepare<[number, string]>('UPDATE queued_jobs SET lease_until = ? WHERE job_id = ?');
    this.remove = db.prepare<[string]>('DELETE FROM queued_jobs WHERE job_id = ?');
    this.release = db.prepare<[number, string, string]>(
      'UPDATE queued_jobs SET lease_until = ?, last_error = ? WHERE job_id = ?'
    );
    this.bury = db.prepare<[string, string]>('UPDATE queued_jobs SET dead = 1, last_error = ? WHERE job_id = ?');

    this.claimTx = db.transaction((now: number): ClaimedJob | null => {
      const row = this.selectReady.get(now);
      if (!row) return null;
      this.lease.run(now + this.config.leaseMs, row.job_id);
      return { jobId: row.job_id, payload: row.payload, deliveries: row.deliveries + 1 };
    });
  }

  async enqueue(job: ReviewJob): Promise<EnqueueAck> {
    this.insert.run(job.jobId, encodeJob(job), this.now());
    this.logger.info('Enqueued job', { jobId: job.jobId });
    return { jobId: job.jobId, mode: this.mode };
  }

  /** Claims and executes at most one job; false when none was ready. */
  async runOnce(): Promise<boolean> {
    const claimed = this.claimTx.immediate(this.now());
    if (!claimed) return false;

    let job: ReviewJob;
    try {
      job = decodeJob(claimed.payload);
    } catch (error) {
      this.logger.error('Discarding malformed queue row', { jobId: claimed.jobId, error: errorMessage(error) });
      this.bury.run(errorMessage(error), claimed.jobId);
      return true;
    }

    // Keep the lease while the job runs; only the claim counts as a delivery
    const heartbeat = setInterval(
      () => this.renew.run(this.now() + this.config.leaseMs, claimed.jobId),
      Math.max(1, Math.floor(this.config.leaseMs / 2))
    );
    heartbeat.unref();

    try {
      await this.pipeline.execute(job);
      this.remove.run(claimed.jobId);
    } catch (error) {
      const message = errorMessage(error);
      if (claimed.deliveries >= this.config.maxDeliveries) {
        this.logger.error('Job exhausted its deliveries', {
          jobId: claimed.jobId,
          deliveries: claimed.deliveries,
          error: message,
        });
        await this.pipeline.abandon(job, message);
        this.bury.run(message, claimed.jobId);
      } else {
        const retryAt = this.now() + this.config.pollIntervalMs * 2 ** (claimed.deliveries - 1);
        this.logger.warn('Job failed, will be redelivered', {
          jobId: claimed.jobId,
          deliveries: claimed.deliveries,
          error: message,
        });
        this.release.run(retryAt, message, claimed.jobId);
      }
    } finally {
      clearInterval(heartbeat);
    }
    return true;
  }

  private async work(index: number): Promise<void> {
    while (this.running) {
      let worked = false;
      try {
        worked = await this.runOnce();
      } catch (error) {
        this.logger.error('Queue worker error', { worker: index, error: errorMessage(error) });
      }
      if (!worked && this.running) {
        const { signal } = this.abort;
        await sleep(this.config.pollIntervalMs, undefined, { signal }).catch((error: unknown) => {
          if (!signal.aborted) throw error;
        });
      }
    }
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    const count = Math.max(1, this.config.workerConcurrency);
    this.workers = Array.from({ length: count }, (_, index) => this.work(index));
    this.logger.info('Embedded queue started', { workers: count });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.abort.abort();
    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info('Embedded queue stopped');
  }
}
