import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { TokenRecord, TokenRecordSummary } from '../../types/token.js';
import { isTokenExpired, type TokenLifecycleService } from '../../services/token-lifecycle-service.js';
import { CoreError } from '../../errors/index.js';

export interface TokenRoutesOptions {
  lifecycle: TokenLifecycleService;
}

const listQuerySchema = z.object({
  includeRevoked: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value !== 'false'),
});

/**
 * Drop credential material before a record leaves the process
 */
export function toSummary(record: TokenRecord, now: Date): TokenRecordSummary & { isExpired: boolean } {
  const { accessToken: _accessToken, refreshToken, ...rest } = record;
  return {
    ...rest,
    hasRefreshToken: refreshToken !== undefined,
    isExpired: isTokenExpired(record, now),
  };
}

export function createTokenRoutes(options: TokenRoutesOptions) {
  const { lifecycle } = options;
  const app = new Hono();

  // List token records for an identity
  app.get(
    '/identities/:identity/tokens',
    zValidator('query', listQuerySchema, (result) => {
      if (!result.success) {
        throw CoreError.invalidRequest('includeRevoked must be "true" or "false"');
      }
    }),
    async (c) => {
      const identity = c.req.param('identity');
      const { includeRevoked } = c.req.valid('query');
      const now = new Date();

      const records = await lifecycle.list(identity);
      const data = records
        .filter((record) => includeRevoked || !record.isRevoked)
        .map((record) => toSummary(record, now));

      return c.json({ data, total: data.length });
    }
  );

  // Current record for an identity
  app.get('/identities/:identity/tokens/current', async (c) => {
    const identity = c.req.param('identity');
    const record = await lifecycle.current(identity);
    if (!record) {
      throw CoreError.notFound(`No current token for ${identity}`);
    }
    return c.json(toSummary(record, new Date()));
  });

  // Revoke all tokens of an identity
  app.post('/identities/:identity/tokens/revoke', async (c) => {
    const revokedCount = await lifecycle.revoke(c.req.param('identity'));
    return c.json({ revokedCount });
  });

  // Delete all tokens of an identity
  app.delete('/identities/:identity/tokens', async (c) => {
    const deletedCount = await lifecycle.deleteForIdentity(c.req.param('identity'));
    return c.json({ deletedCount });
  });

  // Purge revoked and expired tokens
  app.post('/tokens/purge', async (c) => {
    const purgedCount = await lifecycle.purgeExpired();
    return c.json({ purgedCount });
  });

  // Revoke a specific token
  app.post('/tokens/:id/revoke', async (c) => {
    const found = await lifecycle.revokeById(c.req.param('id'));
    if (!found) {
      throw CoreError.notFound('Token not found');
    }
    return c.body(null, 204);
  });

  // Delete a specific token
  app.delete('/tokens/:id', async (c) => {
    const found = await lifecycle.delete(c.req.param('id'));
    if (!found) {
      throw CoreError.notFound('Token not found');
    }
    return c.body(null, 204);
  });

  return app;
}
