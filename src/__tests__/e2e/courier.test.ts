import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Courier } from '../../courier.js';
import { createMemoryStore, type MemoryStore } from '../../storage/memory/index.js';
import { AuthRejectedError } from '../../errors/index.js';
import { createClock, createIdentityServer, createSleep, createTempDir, silentLogger, TEST_SECRET } from '../test-setup.js';

const FILE_URL = 'http://files.test/files/data.bin';
const CONTENT = 'granule payload';

describe('Courier', () => {
  let server: ReturnType<typeof createIdentityServer>;
  let store: MemoryStore;
  let courier: Courier;
  let fileRequests: Array<string | undefined>;
  let temp: { dir: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    temp = await createTempDir();
    fileRequests = [];
    server = createIdentityServer();
    server.app.get('/files/data.bin', (c) => {
      const authorization = c.req.header('Authorization');
      fileRequests.push(authorization);
      if (authorization !== 'Bearer access-1' && authorization !== 'Bearer access-2') {
        return c.body(null, 401);
      }
      return c.body(CONTENT, 200, { 'Content-Length': String(CONTENT.length) });
    });

    const clock = createClock();
    store = createMemoryStore({ now: clock.now });
    courier = new Courier({
      store,
      identity: { tokenUrl: server.tokenUrl, probeUrl: server.probeUrl },
      transfer: { sleep: createSleep() },
      fetch: server.fetch,
      logger: silentLogger,
      now: clock.now,
    });
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should issue a token and download with it', async () => {
    const dest = join(temp.dir, 'out', 'data.bin');

    const result = await courier.download({ identity: 'alice', secret: TEST_SECRET }, FILE_URL, dest);

    expect(result.path).toBe(dest);
    expect(result.token.accessToken).toBe('access-1');
    expect(await readFile(dest, 'utf-8')).toBe(CONTENT);
    expect(fileRequests).toEqual(['Bearer access-1']);
    expect(store.size).toBe(1);
  });

  it('should reuse the stored token while the server accepts it', async () => {
    const credentials = { identity: 'alice', secret: TEST_SECRET };

    const first = await courier.download(credentials, FILE_URL, join(temp.dir, 'a.bin'));
    const second = await courier.download(credentials, FILE_URL, join(temp.dir, 'b.bin'));

    expect(second.token.id).toBe(first.token.id);
    expect(server.grants).toHaveLength(1);
  });

  it('should reissue when the server rejects the stored token', async () => {
    const credentials = { identity: 'alice', secret: TEST_SECRET };
    await courier.download(credentials, FILE_URL, join(temp.dir, 'a.bin'));
    server.reject('access-1');

    const second = await courier.download(credentials, FILE_URL, join(temp.dir, 'b.bin'));

    expect(second.token.accessToken).toBe('access-2');
    expect(fileRequests).toEqual(['Bearer access-1', 'Bearer access-2']);
    expect(store.size).toBe(2);
  });

  it('should not touch the file source when the credentials are refused', async () => {
    await expect(
      courier.download({ identity: 'alice', secret: 'wrong-secret' }, FILE_URL, join(temp.dir, 'a.bin'))
    ).rejects.toBeInstanceOf(AuthRejectedError);

    expect(fileRequests).toEqual([]);
    expect(store.size).toBe(0);
  });
});
