import { z } from 'zod';
import type { ReviewJob } from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import type { ReviewPipeline } from '../review/index.js';
import { decodeJob } from './job-queue.js';

const pushEnvelopeSchema = z.object({
  message: z.object({
    data: z.string().min(1),
    messageId: z.string().optional(),
    attributes: z.record(z.string()).optional(),
  }),
  subscription: z.string().optional(),
  deliveryAttempt: z.number().int().positive().optional(),
});

/** HTTP status the push endpoint answers with; 5xx asks Pub/Sub to redeliver. */
export type PushOutcome = { status: 204 } | { status: 400; error: string } | { status: 500; error: string };

/**
 * Processes review jobs delivered by a Pub/Sub push subscription
 */
export function createJobProcessor(deps: {
  pipeline: ReviewPipeline;
  maxDeliveryAttempts: number;
  logger: Logger;
}) {
  const { pipeline, maxDeliveryAttempts, logger } = deps;

  async function processJob(job: ReviewJob, deliveryAttempt: number): Promise<PushOutcome> {
    try {
      const result = await pipeline.execute(job);
      logger.info('Finished job processing', { jobId: job.jobId, status: result.status });
      return { status: 204 };
    } catch (error) {
      if (deliveryAttempt >= maxDeliveryAttempts) {
        await pipeline.abandon(job, errorMessage(error));
        // Acknowledge so the message is not delivered again
        return { status: 204 };
      }
      logger.error('Error processing job', { jobId: job.jobId, deliveryAttempt, error: errorMessage(error) });
      return { status: 500, error: 'Job processing failed' };
    }
  }

  async function handlePush(body: unknown): Promise<PushOutcome> {
    const envelope = pushEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      logger.error('Invalid Pub/Sub message format received', { issues: envelope.error.message });
      return { status: 400, error: 'Invalid Pub/Sub message format' };
    }

    let job: ReviewJob;
    try {
      job = decodeJob(Buffer.from(envelope.data.message.data, 'base64').toString('utf-8'));
    } catch (error) {
      logger.error('Failed to decode Pub/Sub message data', { error: errorMessage(error) });
      return { status: 400, error: 'Invalid message data format' };
    }

    const deliveryAttempt = envelope.data.deliveryAttempt ?? 1;
    logger.info('Starting job processing', {
      jobId: job.jobId,
      messageId: envelope.data.message.messageId,
      deliveryAttempt,
    });
    return processJob(job, deliveryAttempt);
  }

  return { handlePush, processJob };
}

export type JobProcessor = ReturnType<typeof createJobProcessor>;
