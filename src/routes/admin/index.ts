import { Hono } from 'hono';
import type { TokenLifecycleService } from '../../services/token-lifecycle-service.js';
import { adminAuth, type AdminAuthOptions } from './middleware.js';
import { createTokenRoutes } from './tokens.js';

export interface AdminRoutesOptions {
  lifecycle: TokenLifecycleService;
  auth?: AdminAuthOptions;
}

/**
 * Create the admin API routes
 * Mount at /_admin prefix
 */
export function createAdminRoutes(options: AdminRoutesOptions) {
  const { lifecycle, auth } = options;
  const app = new Hono();

  // Apply authentication middleware
  app.use('*', adminAuth(auth));

  // Token routes
  app.route('/', createTokenRoutes({ lifecycle }));

  return app;
}

export { adminAuth } from './middleware.js';
export type { AdminAuthOptions } from './middleware.js';
export { toSummary } from './tokens.js';
