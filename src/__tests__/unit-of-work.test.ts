import { describe, it, expect, vi } from 'vitest';
import { UnitOfWorkManager } from '../storage/unit-of-work.js';
import { createMemoryStore } from '../storage/memory/index.js';
import type { IStoreConnector } from '../storage/interfaces/index.js';
import type { CreateTokenRecordInput } from '../types/token.js';
import { StoreUnavailableError } from '../errors/index.js';
import { silentLogger, trackSessions } from './test-setup.js';

const input = (identity: string): CreateTokenRecordInput => ({
  identity,
  accessToken: `access-${identity}`,
  issuedAt: new Date('2026-01-01T00:00:00.000Z'),
  expiresAt: new Date('2026-01-01T01:00:00.000Z'),
});

function setup() {
  const store = createMemoryStore();
  const tracked = trackSessions(store);
  const manager = new UnitOfWorkManager({ connector: tracked.connector, logger: silentLogger });
  return { store, manager, sessions: tracked.sessions };
}

describe('Memory store sessions', () => {
  it('should hide uncommitted writes from other sessions', async () => {
    const store = createMemoryStore();
    const writer = await store.connect();
    await writer.tokens.create(input('alice'));

    const reader = await store.connect();
    expect(await reader.tokens.list()).toEqual([]);

    await writer.commit();
    const later = await store.connect();
    expect(await later.tokens.list()).toHaveLength(1);
  });

  it('should discard writes on rollback', async () => {
    const store = createMemoryStore();
    const session = await store.connect();
    await session.tokens.create(input('alice'));
    await session.rollback();
    await session.commit();

    expect(store.size).toBe(0);
  });

  it('should keep the writes of overlapping sessions', async () => {
    const store = createMemoryStore();
    const seed = await store.connect();
    const doomed = await seed.tokens.create(input('carol'));
    await seed.commit();

    const first = await store.connect();
    const second = await store.connect();
    await first.tokens.create(input('alice'));
    await second.tokens.create(input('bob'));
    await second.tokens.delete(doomed.id);
    await first.commit();
    await second.commit();

    const reader = await store.connect();
    expect((await reader.tokens.list()).map((record) => record.identity).sort()).toEqual(['alice', 'bob']);
  });

  it('should refuse work after close', async () => {
    const store = createMemoryStore();
    const session = await store.connect();
    await session.close();
    await session.close();

    expect(session.isClosed).toBe(true);
    await expect(session.tokens.list()).rejects.toThrow('is closed');
  });
});

describe('UnitOfWorkManager', () => {
  describe('runScoped', () => {
    it('should commit when the body resolves', async () => {
      const { store, manager } = setup();

      const record = await manager.runScoped((session) => session.tokens.create(input('alice')));

      expect(store.size).toBe(1);
      const found = await manager.runScoped((session) => session.tokens.findById(record.id));
      expect(found?.identity).toBe('alice');
    });

    it('should roll back, re-throw the original error and unbind when the body throws', async () => {
      const { store, manager, sessions } = setup();
      const failure = new Error('body failed');

      await expect(
        manager.runScoped(async (session) => {
          await session.tokens.create(input('alice'));
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(store.size).toBe(0);
      expect(manager.current()).toBeUndefined();
      expect(sessions[0]?.isClosed).toBe(true);
    });

    it('should reuse the outer session in nested scopes and commit once', async () => {
      const { store, manager, sessions } = setup();

      await manager.runScoped(async (outer) => {
        await manager.runScoped(async (inner) => {
          expect(inner).toBe(outer);
          await inner.tokens.create(input('alice'));
        });
        // Inner scope must not have committed
        expect(store.size).toBe(0);
        await outer.tokens.create(input('bob'));
      });

      expect(sessions).toHaveLength(1);
      expect(store.size).toBe(2);
    });

    it('should commit exactly once for nested scopes', async () => {
      const store = createMemoryStore();
      const commits: string[] = [];
      const connector: IStoreConnector = {
        connect: async () => {
          const session = await store.connect();
          const commit = session.commit.bind(session);
          vi.spyOn(session, 'commit').mockImplementation(async () => {
            commits.push(session.id);
            await commit();
          });
          return session;
        },
      };
      const manager = new UnitOfWorkManager({ connector, logger: silentLogger });

      await manager.runScoped(async () => {
        await manager.runScoped(async () => {
          await manager.runScoped(async (session) => {
            await session.tokens.create(input('alice'));
          });
        });
      });

      expect(commits).toHaveLength(1);
    });

    it('should roll back the whole scope when a nested body throws', async () => {
      const { store, manager } = setup();

      await expect(
        manager.runScoped(async (outer) => {
          await outer.tokens.create(input('alice'));
          await manager.runScoped(async () => {
            throw new Error('nested failure');
          });
        })
      ).rejects.toThrow('nested failure');

      expect(store.size).toBe(0);
    });

    it('should give concurrent scopes separate sessions and commit both', async () => {
      const { store, manager, sessions } = setup();
      const seen: string[] = [];

      await Promise.all(
        ['alice', 'bob'].map((identity) =>
          manager.runScoped(async (session) => {
            await new Promise((resolve) => setTimeout(resolve, 5));
            seen.push(session.id);
            await session.tokens.create(input(identity));
          })
        )
      );

      expect(sessions).toHaveLength(2);
      expect(new Set(seen).size).toBe(2);
      expect(store.size).toBe(2);
    });

    it('should fail with StoreUnavailableError when the store cannot be reached', async () => {
      const connector: IStoreConnector = {
        connect: async () => {
          throw new Error('connection refused');
        },
      };
      const manager = new UnitOfWorkManager({ connector, logger: silentLogger });
      const body = vi.fn(async () => 'unreachable');

      const error = await manager.runScoped(body).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StoreUnavailableError);
      expect(error).toMatchObject({ code: 'store_unavailable', statusCode: 503 });
      expect(body).not.toHaveBeenCalled();
    });

    it('should propagate a commit failure and still close the session', async () => {
      const store = createMemoryStore();
      const { connector, sessions } = trackSessions({
        connect: async () => {
          const session = await store.connect();
          vi.spyOn(session, 'commit').mockRejectedValue(new Error('commit failed'));
          return session;
        },
      });
      const manager = new UnitOfWorkManager({ connector, logger: silentLogger });

      await expect(manager.runScoped((session) => session.tokens.create(input('alice')))).rejects.toThrow(
        'commit failed'
      );

      expect(sessions[0]?.isClosed).toBe(true);
      expect(manager.current()).toBeUndefined();
      expect(store.size).toBe(0);
    });

    it('should keep the body error when rollback also fails', async () => {
      const store = createMemoryStore();
      const connector: IStoreConnector = {
        connect: async () => {
          const session = await store.connect();
          vi.spyOn(session, 'rollback').mockRejectedValue(new Error('rollback failed'));
          return session;
        },
      };
      const manager = new UnitOfWorkManager({ connector, logger: silentLogger });

      await expect(
        manager.runScoped(async () => {
          throw new Error('body failed');
        })
      ).rejects.toThrow('body failed');
    });
  });

  describe('acquire / commit / rollback / close', () => {
    it('should bind one session to the calling context', async () => {
      const { manager, sessions } = setup();

      const first = await manager.acquire();
      const second = await manager.acquire();

      expect(second).toBe(first);
      expect(manager.current()).toBe(first);
      expect(sessions).toHaveLength(1);

      await manager.close();
      expect(manager.current()).toBeUndefined();
      expect(first.isClosed).toBe(true);
    });

    it('should make close idempotent and a no-op when nothing is bound', async () => {
      const { manager } = setup();

      await manager.close();
      await manager.acquire();
      await manager.close();
      await manager.close();

      expect(manager.current()).toBeUndefined();
    });

    it('should commit the bound session', async () => {
      const { store, manager } = setup();

      const session = await manager.acquire();
      await session.tokens.create(input('alice'));
      await manager.commit();
      await manager.close();

      expect(store.size).toBe(1);
    });

    it('should roll back the bound session', async () => {
      const { store, manager } = setup();

      const session = await manager.acquire();
      await session.tokens.create(input('alice'));
      await manager.rollback();
      await manager.close();

      expect(store.size).toBe(0);
    });

    it('should open a fresh session after the previous one was closed', async () => {
      const { manager, sessions } = setup();

      const first = await manager.acquire();
      await manager.close();
      const second = await manager.acquire();

      expect(second).not.toBe(first);
      expect(sessions).toHaveLength(2);
      await manager.close();
    });
  });
});
