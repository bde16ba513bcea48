import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { CoreError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';

/**
 * Error handler for the admin surface
 *
 * Core errors keep their code and status; anything else becomes a 500 whose
 * message is hidden in production.
 */
export function coreErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    if (err instanceof CoreError) {
      if (err.statusCode >= 500) {
        logger.error({ err, path: c.req.path }, 'admin request failed');
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    logger.error({ err, path: c.req.path }, 'unexpected error in admin request');

    const serverError = CoreError.serverError(
      process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message
    );
    return c.json(serverError.toJSON(), serverError.statusCode);
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();

    await next();

    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
      },
      'admin request'
    );
  };
}
