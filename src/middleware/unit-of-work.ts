import type { MiddlewareHandler } from 'hono';
import type { UnitOfWorkManager } from '../storage/unit-of-work.js';

/**
 * Run the rest of the request inside one unit of work
 *
 * Hono turns handler errors into a response before control returns here, so a
 * failed request is detected through `c.error` and rolled back explicitly.
 */
export function unitOfWork(manager: UnitOfWorkManager): MiddlewareHandler {
  return async (c, next) => {
    await manager.runScoped(async (session) => {
      await next();
      if (c.error) {
        await session.rollback();
      }
    });
  };
}
