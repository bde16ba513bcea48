import { Hono } from 'hono';
import type { UnitOfWorkManager } from './storage/unit-of-work.js';
import type { TokenLifecycleService } from './services/token-lifecycle-service.js';
import { coreErrorHandler, requestLogger } from './middleware/error-handler.js';
import { unitOfWork } from './middleware/unit-of-work.js';
import { createAdminRoutes, type AdminAuthOptions } from './routes/admin/index.js';
import { CoreError } from './errors/index.js';
import { getConfig } from './config/index.js';
import { getLogger, type Logger } from './logging/logger.js';

export interface AdminAppOptions {
  unitOfWork: UnitOfWorkManager;
  lifecycle: TokenLifecycleService;
  /** Defaults to the ADMIN_API_KEY setting */
  auth?: AdminAuthOptions;
  logger?: Logger;
  enableLogging?: boolean;
}

/**
 * Create the admin HTTP application for token records
 */
export function createAdminApp(options: AdminAppOptions): Hono {
  const { lifecycle, enableLogging = true } = options;
  const auth = options.auth ?? { apiKey: getConfig().admin.apiKey };
  const logger = options.logger ?? getLogger();

  const app = new Hono();

  // Global error handler
  app.onError(coreErrorHandler(logger));

  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  // Every request is one unit of work
  app.use('*', unitOfWork(options.unitOfWork));

  app.route('/', createAdminRoutes({ lifecycle, auth }));

  app.notFound((c) => {
    const error = CoreError.notFound(`No route for ${c.req.method} ${c.req.path}`);
    return c.json(error.toJSON(), error.statusCode);
  });

  return app;
}
