import { PubSub } from '@google-cloud/pubsub';
import type { ReviewJob } from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { encodeJob, type EnqueueAck, type JobQueue } from './job-queue.js';

interface PubSubPublisherConfig {
  projectId: string;
  topicName: string; // Only the topic ID (e.g., 'review-jobs')
}

export interface MessagePublisher {
  publishMessage(data: string, attributes?: Record<string, string>): Promise<string>;
}

/**
 * Handles publishing messages to Google Pub/Sub.
 * Assumes the topic already exists.
 */
export function createPubSubPublisher(config: PubSubPublisherConfig, logger: Logger): MessagePublisher {
  const { projectId, topicName } = config;
  const fullTopicName = `projects/${projectId}/topics/${topicName}`;

  // projectId might be inferred if running on GCP
  const pubsub = new PubSub({ projectId });
  const topic = pubsub.topic(fullTopicName);

  async function publishMessage(data: string, attributes?: Record<string, string>): Promise<string> {
    try {
      const messageId = await topic.publishMessage({ data: Buffer.from(data), attributes });
      logger.info(`Message ${messageId} published to ${fullTopicName}`);
      return messageId;
    } catch (error) {
      logger.error(`Error publishing message to ${fullTopicName}`, { error: errorMessage(error) });
      throw new Error(`Failed to publish message: ${errorMessage(error)}`, { cause: error });
    }
  }

  return { publishMessage };
}

/**
 * Durable mode: jobs are published to a Pub/Sub topic whose push
 * subscription targets this service's `/pubsub-push-handler`.
 */
export class DurableQueue implements JobQueue {
  readonly mode = 'durable' as const;

  constructor(
    private readonly publisher: MessagePublisher,
    private readonly logger: Logger
  ) {}

  async enqueue(job: ReviewJob): Promise<EnqueueAck> {
    const messageId = await this.publisher.publishMessage(encodeJob(job), { jobId: job.jobId });
    this.logger.info('Enqueued job', { jobId: job.jobId, messageId });
    return { jobId: job.jobId, mode: this.mode, messageId };
  }

  // Deliveries arrive over HTTP; there is no local worker to run
  async start(): Promise<void> {}

  async stop(): Promise<void> {}
}
