import type { MiddlewareHandler } from 'hono';
import { logger as honoLogger } from 'hono/logger';
import type { Logger } from '../utils/logger.js';

export const createLoggerMiddleware = (logger: Logger): MiddlewareHandler => {
  // Route Hono's request lines through the service logger
  const printFunc = (str: string, ...rest: string[]) => {
    logger.info(str + (rest.length > 0 ? ' ' + rest.join(' ') : ''));
  };

  return honoLogger(printFunc);
};
