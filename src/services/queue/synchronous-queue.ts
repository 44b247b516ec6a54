import type { ReviewJob } from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import type { ReviewPipeline } from '../review/index.js';
import type { EnqueueAck, JobQueue } from './job-queue.js';

/**
 * Runs each job inline inside `enqueue`. Nothing is persisted: a crash loses
 * the job, and an unexpected error fails it since there is no redelivery.
 */
export class SynchronousQueue implements JobQueue {
  readonly mode = 'synchronous' as const;
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(
    private readonly pipeline: ReviewPipeline,
    private readonly logger: Logger
  ) {}

  async enqueue(job: ReviewJob): Promise<EnqueueAck> {
    const run = this.run(job);
    this.inFlight.add(run);
    try {
      return await run;
    } finally {
      this.inFlight.delete(run);
    }
  }

  private async run(job: ReviewJob): Promise<EnqueueAck> {
    try {
      const result = await this.pipeline.execute(job);
      return { jobId: job.jobId, mode: this.mode, status: result.status };
    } catch (error) {
      this.logger.error('Inline execution failed', { jobId: job.jobId, error: errorMessage(error) });
      await this.pipeline.abandon(job, errorMessage(error));
      return { jobId: job.jobId, mode: this.mode, status: 'failed' };
    }
  }

  async start(): Promise<void> {}

  async stop(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }
}
