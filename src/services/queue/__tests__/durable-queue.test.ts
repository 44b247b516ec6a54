import { describe, expect, it, vi } from 'vitest';
import { makeJob, testLogger } from '../../../__tests__/helpers.js';
import { DurableQueue, type MessagePublisher } from '../durable-queue.js';
import { decodeJob } from '../job-queue.js';

describe('DurableQueue', () => {
  it('publishes the encoded job with its id as an attribute', async () => {
    const publisher = {
      publishMessage: vi.fn<MessagePublisher['publishMessage']>(async () => 'msg-42'),
    } satisfies MessagePublisher;
    const queue = new DurableQueue(publisher, testLogger);
    const job = makeJob({ status: 'queued' });

    const ack = await queue.enqueue(job);

    expect(ack).toEqual({ jobId: 'job-1', mode: 'durable', messageId: 'msg-42' });
    const [data, attributes] = publisher.publishMessage.mock.calls[0];
    expect(decodeJob(data)).toEqual(job);
    expect(attributes).toEqual({ jobId: 'job-1' });
  });

  it('surfaces publish failures to the caller', async () => {
    const publisher = {
      publishMessage: vi.fn<MessagePublisher['publishMessage']>(async () => {
        throw new Error('Failed to publish message: topic not found');
      }),
    } satisfies MessagePublisher;
    const queue = new DurableQueue(publisher, testLogger);

    await expect(queue.enqueue(makeJob())).rejects.toThrow('Failed to publish message: topic not found');
  });
});
