import { createHmac, timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { createMiddleware } from 'hono/factory';
import type { Logger } from '../utils/logger.js';

export type WebhookVariables = {
  rawBody: string;
};

export function signPayload(payload: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;
}

export function verifySignature(payload: string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;
  const expected = Buffer.from(signPayload(payload, secret));
  const received = Buffer.from(signature);
  return expected.length === received.length && timingSafeEqual(expected, received);
}

/**
 * Verifies `X-Hub-Signature-256` against the raw body and exposes the body as
 * `rawBody` to the handler.
 */
export const createWebhookSignatureMiddleware = (
  secret: string,
  logger: Logger
): MiddlewareHandler<{ Variables: WebhookVariables }> => {
  return createMiddleware<{ Variables: WebhookVariables }>(async (c, next) => {
    // Consumes the stream; handlers read `rawBody` instead
    const bodyText = await c.req.text();

    if (!verifySignature(bodyText, c.req.header('x-hub-signature-256'), secret)) {
      logger.error('Invalid webhook signature', { deliveryId: c.req.header('x-github-delivery') });
      return c.json({ status: 'Failed', error: 'Invalid signature' }, 401);
    }

    c.set('rawBody', bodyText);
    await next();
  });
};
