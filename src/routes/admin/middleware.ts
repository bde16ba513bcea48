import type { Context, MiddlewareHandler } from 'hono';
import { DEFAULT_ADMIN_API_KEY_HEADER } from '../../config/constants.js';
import { secretsEqual } from '../../crypto/index.js';

export interface AdminAuthOptions {
  /** Key every admin request must present; no key leaves the routes open */
  apiKey?: string;
  headerName?: string;
}

const BEARER_PREFIX = /^Bearer\s+/i;

function presentedKey(c: Context, headerName: string): string | undefined {
  const fromHeader = c.req.header(headerName);
  if (fromHeader) return fromHeader;

  const authorization = c.req.header('Authorization');
  if (authorization && BEARER_PREFIX.test(authorization)) {
    return authorization.replace(BEARER_PREFIX, '');
  }
  return undefined;
}

/**
 * API key check for the admin routes. The key is read from `headerName` or
 * from a Bearer Authorization header.
 */
export function adminAuth(options: AdminAuthOptions = {}): MiddlewareHandler {
  const { apiKey, headerName = DEFAULT_ADMIN_API_KEY_HEADER } = options;

  return async (c, next) => {
    if (!apiKey) {
      return next();
    }

    const provided = presentedKey(c, headerName);
    if (!provided) {
      return c.json({ error: 'unauthorized', error_description: 'API key required' }, 401);
    }
    if (!secretsEqual(provided, apiKey)) {
      return c.json({ error: 'forbidden', error_description: 'Invalid API key' }, 403);
    }

    return next();
  };
}
