import { z } from 'zod';
import type { QueueMode } from '../../config.js';
import type { JobStatus, ReviewJob } from '../../types.js';

export interface EnqueueAck {
  jobId: string;
  mode: QueueMode;
  /** Broker message id in durable mode. */
  messageId?: string;
  /** Final status when the job already ran inline (synchronous mode). */
  status?: JobStatus | null;
}

/**
 * Hands admitted jobs to `ReviewPipeline.execute`. Delivery is at least once
 * in durable and embedded modes; execution is idempotent per job.
 */
export interface JobQueue {
  readonly mode: QueueMode;
  enqueue(job: ReviewJob): Promise<EnqueueAck>;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const reviewJobSchema = z.object({
  jobId: z.string().min(1),
  deliveryId: z.string().min(1),
  repositoryId: z.string().min(1),
  pullRequestNumber: z.number().int().positive(),
  headCommitSha: z.string().min(1),
  baseCommitSha: z.string().min(1).optional(),
  installationId: z.number().int().optional(),
  status: z.enum([
    'queued',
    'running',
    'summarizing',
    'reviewing',
    'posting',
    'completed',
    'failed',
    'superseded',
    'cancelled',
  ]),
  createdAt: z.string(),
  attemptCount: z.number().int().nonnegative(),
  error: z.string().optional(),
}) satisfies z.ZodType<ReviewJob>;

export function encodeJob(job: ReviewJob): string {
  return JSON.stringify(job);
}

export function decodeJob(payload: string): ReviewJob {
  return reviewJobSchema.parse(JSON.parse(payload));
}
