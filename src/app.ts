import { Hono } from 'hono';
import { z } from 'zod';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggerMiddleware } from './middleware/logger.js';
import { createWebhookSignatureMiddleware, type WebhookVariables } from './middleware/webhook-signature.js';
import type { JobQueue } from './services/queue/job-queue.js';
import type { JobProcessor } from './services/queue/job-processor.js';
import type { IdempotencyGuard } from './services/state/idempotency-guard.js';
import type { ReviewEvent, ReviewJob } from './types.js';
import { errorMessage, type Logger } from './utils/logger.js';

export const REVIEWED_ACTIONS: ReadonlySet<string> = new Set([
  'opened',
  'synchronize',
  'reopened',
  'ready_for_review',
]);

const pullRequestEventSchema = z.object({
  action: z.string(),
  pull_request: z.object({
    number: z.number().int().positive(),
    draft: z.boolean().optional(),
    head: z.object({ sha: z.string().min(1) }),
    base: z.object({ sha: z.string().min(1) }),
  }),
  repository: z.object({ full_name: z.string().min(1) }),
  installation: z.object({ id: z.number().int() }).optional(),
});

export interface AppDeps {
  guard: IdempotencyGuard;
  queue: JobQueue;
  webhookSecret: string;
  reviewDraftPullRequests: boolean;
  /** Fails a job that could not be handed to the queue. */
  abandon: (job: ReviewJob, reason: string) => Promise<void>;
  /** Present when this process receives durable-mode push deliveries. */
  jobProcessor?: JobProcessor;
  logger: Logger;
  now?: () => Date;
}

export function createApp(deps: AppDeps) {
  const { guard, queue, logger } = deps;
  const now = deps.now ?? (() => new Date());

  const app = new Hono<{ Variables: WebhookVariables }>();

  app.onError(createErrorHandler(logger));
  app.use('*', createLoggerMiddleware(logger));

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      queueMode: queue.mode,
    });
  });

  app.post('/webhooks/github', createWebhookSignatureMiddleware(deps.webhookSecret, logger), async (c) => {
    const eventName = c.req.header('x-github-event');
    const deliveryId = c.req.header('x-github-delivery');

    if (eventName === 'ping') {
      return c.json({ status: 'ok' });
    }
    if (!deliveryId) {
      return c.json({ status: 'Failed', error: 'Missing X-GitHub-Delivery header' }, 400);
    }
    if (eventName !== 'pull_request') {
      return c.json({ status: 'Ignored', reason: `event ${eventName ?? 'unknown'}` }, 202);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(c.get('rawBody'));
    } catch (error) {
      logger.error('Failed to parse webhook payload', { deliveryId, error: errorMessage(error) });
      return c.json({ status: 'Failed', error: 'Invalid JSON' }, 400);
    }

    const parsed = pullRequestEventSchema.safeParse(payload);
    if (!parsed.success) {
      logger.error('Unexpected pull_request payload', { deliveryId, issues: parsed.error.message });
      return c.json({ status: 'Failed', error: 'Invalid pull_request payload' }, 400);
    }
    const { action, pull_request: pr, repository, installation } = parsed.data;
    const key = { repositoryId: repository.full_name, pullRequestNumber: pr.number };

    if (action === 'closed') {
      const cancelled = await guard.cancel(key);
      return c.json({ status: 'Cancelled', jobId: cancelled?.jobId ?? null });
    }
    if (!REVIEWED_ACTIONS.has(action)) {
      return c.json({ status: 'Ignored', reason: `action ${action}` }, 202);
    }
    if (pr.draft && !deps.reviewDraftPullRequests) {
      return c.json({ status: 'Ignored', reason: 'draft pull request' }, 202);
    }

    const event: ReviewEvent = {
      deliveryId,
      ...key,
      headCommitSha: pr.head.sha,
      baseCommitSha: pr.base.sha,
      installationId: installation?.id,
      action,
      receivedAt: now().toISOString(),
    };

    const decision = await guard.admit(event);
    if (decision.kind === 'drop') {
      return c.json({ status: 'Dropped', reason: decision.reason });
    }

    try {
      const ack = await queue.enqueue(decision.job);
      return c.json(
        {
          status: 'Queued',
          jobId: ack.jobId,
          supersededJobId: decision.kind === 'supersede' ? decision.oldJobId : null,
          messageId: ack.messageId ?? null,
          jobStatus: ack.status ?? null,
        },
        202
      );
    } catch (error) {
      logger.error('Failed to enqueue review job', { jobId: decision.job.jobId, error: errorMessage(error) });
      try {
        await deps.abandon(decision.job, `Enqueue failed: ${errorMessage(error)}`);
      } finally {
        await guard.releaseDelivery(decision.job.deliveryId);
      }
      return c.json({ status: 'Failed', error: 'Failed to queue review job' }, 500);
    }
  });

  const { jobProcessor } = deps;
  if (jobProcessor) {
    app.post('/pubsub-push-handler', async (c) => {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return c.text('Bad Request: body is not JSON', 400);
      }

      const outcome = await jobProcessor.handlePush(body);
      if (outcome.status === 204) {
        return c.body(null, 204);
      }
      return c.text(outcome.error, outcome.status);
    });
  }

  // Method not allowed for other methods on root path
  app.all('/', (c) => c.text('Method Not Allowed', 405));

  return app;
}

export type App = ReturnType<typeof createApp>;
