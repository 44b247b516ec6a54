import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ReviewRelayError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

const ERROR_STATUSES = [400, 401, 403, 404, 409, 502, 503] as const;

function statusOf(error: Error): ContentfulStatusCode {
  if (!(error instanceof ReviewRelayError)) return 500;
  return ERROR_STATUSES.find((status) => status === error.status) ?? 500;
}

export const createErrorHandler = (logger: Logger): ErrorHandler => {
  return (error, c) => {
    logger.error('Unhandled error', {
      message: error.message,
      stack: error.stack,
    });

    return c.json(
      {
        status: 'Failed',
        error: error.message || 'Internal Server Error',
      },
      statusOf(error)
    );
  };
};
