import { describe, it, expect, vi } from 'vitest';
import { Hono } from 'hono';
import { IdentityClient } from '../services/identity-client.js';
import { AuthRejectedError, NetworkError } from '../errors/index.js';
import { createIdentityServer, fetchFrom, silentLogger, TEST_SECRET } from './test-setup.js';

function clientFor(app: Hono, probeUrl?: string) {
  return new IdentityClient({
    tokenUrl: 'http://identity.test/token',
    probeUrl,
    clientId: 'test-client',
    fetch: fetchFrom(app),
    logger: silentLogger,
  });
}

describe('IdentityClient', () => {
  describe('requestPasswordGrant', () => {
    it('should post a form-encoded password grant', async () => {
      const server = createIdentityServer();
      const client = new IdentityClient({
        tokenUrl: server.tokenUrl,
        clientId: 'test-client',
        fetch: server.fetch,
        logger: silentLogger,
      });

      await client.requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET, otp: '123456' });

      expect(server.grants).toEqual([
        {
          username: 'alice',
          password: TEST_SECRET,
          grant_type: 'password',
          client_id: 'test-client',
          totp: '123456',
        },
      ]);
    });

    it('should omit totp when no one-time code is given', async () => {
      const server = createIdentityServer();
      const client = new IdentityClient({ tokenUrl: server.tokenUrl, fetch: server.fetch, logger: silentLogger });

      await client.requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET });

      expect(server.grants[0]).not.toHaveProperty('totp');
    });

    it('should send an empty one-time code as given', async () => {
      const server = createIdentityServer();
      const client = new IdentityClient({ tokenUrl: server.tokenUrl, fetch: server.fetch, logger: silentLogger });

      await client.requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET, otp: '' });

      expect(server.grants[0]).toHaveProperty('totp', '');
    });

    it('should parse the token response', async () => {
      const server = createIdentityServer();
      const client = new IdentityClient({ tokenUrl: server.tokenUrl, fetch: server.fetch, logger: silentLogger });

      const grant = await client.requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET });

      expect(grant).toEqual({
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        tokenType: 'Bearer',
        scope: 'openid',
        expiresIn: 300,
      });
    });

    it('should treat a null expires_in as absent', async () => {
      const server = createIdentityServer({ expiresIn: null });
      const client = new IdentityClient({ tokenUrl: server.tokenUrl, fetch: server.fetch, logger: silentLogger });

      const grant = await client.requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET });

      expect(grant.expiresIn).toBeUndefined();
    });

    it('should round a fractional expires_in up to whole seconds', async () => {
      const server = createIdentityServer({ expiresIn: 3599.5 });
      const client = new IdentityClient({ tokenUrl: server.tokenUrl, fetch: server.fetch, logger: silentLogger });

      const grant = await client.requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET });

      expect(grant.expiresIn).toBe(3600);
    });

    it('should refuse an expires_in too large to store', async () => {
      const server = createIdentityServer({ expiresIn: 1e20 });
      const client = new IdentityClient({ tokenUrl: server.tokenUrl, fetch: server.fetch, logger: silentLogger });

      const error = await client
        .requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ description: 'Identity endpoint returned a malformed token response' });
    });

    it('should raise AuthRejectedError with the remote error on refused credentials', async () => {
      const server = createIdentityServer();
      const client = new IdentityClient({ tokenUrl: server.tokenUrl, fetch: server.fetch, logger: silentLogger });

      const error = await client
        .requestPasswordGrant({ identity: 'alice', secret: 'wrong-secret' })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthRejectedError);
      expect(error).toMatchObject({
        code: 'auth_rejected',
        remoteStatus: 401,
        remoteError: 'invalid_grant',
        description: 'Invalid user credentials',
      });
    });

    it('should raise AuthRejectedError on 400 even without a JSON body', async () => {
      const app = new Hono();
      app.post('/token', (c) => c.text('bad request', 400));

      const error = await clientFor(app)
        .requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthRejectedError);
      expect(error).toMatchObject({ remoteStatus: 400, remoteError: undefined });
    });

    it('should raise NetworkError on a server error', async () => {
      const app = new Hono();
      app.post('/token', (c) => c.json({ error: 'temporarily_unavailable' }, 503));

      const error = await clientFor(app)
        .requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ code: 'network_error', remoteStatus: 503 });
    });

    it('should raise NetworkError on a malformed body', async () => {
      const app = new Hono();
      app.post('/token', (c) => c.json({ token: 'not-an-access-token' }));

      await expect(
        clientFor(app).requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET })
      ).rejects.toThrow('Identity endpoint returned a malformed token response');
    });

    it('should raise NetworkError on a transport failure', async () => {
      const failure = new TypeError('fetch failed');
      const client = new IdentityClient({
        tokenUrl: 'http://identity.test/token',
        fetch: vi.fn(async () => {
          throw failure;
        }),
        logger: silentLogger,
      });

      const error = await client
        .requestPasswordGrant({ identity: 'alice', secret: TEST_SECRET })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ description: 'fetch failed', cause: failure });
    });
  });

  describe('probe', () => {
    it('should send the token as a bearer credential', async () => {
      const seen: Array<string | undefined> = [];
      const app = new Hono();
      app.get('/probe', (c) => {
        seen.push(c.req.header('Authorization'));
        return c.body(null, 204);
      });

      const result = await clientFor(app, 'http://identity.test/probe').probe('access-1');

      expect(result).toEqual({ outcome: 'accepted', status: 204 });
      expect(seen).toEqual(['Bearer access-1']);
    });

    it('should report rejection on 401 and 403', async () => {
      const server = createIdentityServer();
      server.reject('access-1');
      const client = new IdentityClient({
        tokenUrl: server.tokenUrl,
        probeUrl: server.probeUrl,
        fetch: server.fetch,
        logger: silentLogger,
      });

      expect(await client.probe('access-1')).toEqual({ outcome: 'rejected', status: 401 });

      server.setProbeStatus(403);
      expect(await client.probe('access-2')).toEqual({ outcome: 'rejected', status: 403 });
    });

    it('should report other error statuses as inconclusive', async () => {
      const server = createIdentityServer({ probeStatus: 500 });
      const client = new IdentityClient({
        tokenUrl: server.tokenUrl,
        probeUrl: server.probeUrl,
        fetch: server.fetch,
        logger: silentLogger,
      });

      expect(await client.probe('access-1')).toEqual({ outcome: 'inconclusive', status: 500 });

      server.setProbeStatus(404);
      expect(await client.probe('access-1')).toEqual({ outcome: 'inconclusive', status: 404 });
    });

    it('should report transport failures as inconclusive', async () => {
      const failure = new TypeError('fetch failed');
      const client = new IdentityClient({
        tokenUrl: 'http://identity.test/token',
        probeUrl: 'http://identity.test/probe',
        fetch: vi.fn(async () => {
          throw failure;
        }),
        logger: silentLogger,
      });

      expect(await client.probe('access-1')).toEqual({ outcome: 'inconclusive', error: failure });
    });

    it('should be inconclusive without a probe URL and make no request', async () => {
      const fetch = vi.fn(async () => new Response(null, { status: 200 }));
      const client = new IdentityClient({ tokenUrl: 'http://identity.test/token', fetch, logger: silentLogger });

      expect(await client.probe('access-1')).toEqual({ outcome: 'inconclusive' });
      expect(fetch).not.toHaveBeenCalled();
    });

    it('should probe an explicit URL when given', async () => {
      const app = new Hono();
      app.get('/files', (c) => c.text('ok'));

      const result = await clientFor(app).probe('access-1', 'http://identity.test/files');

      expect(result).toEqual({ outcome: 'accepted', status: 200 });
    });
  });
});
