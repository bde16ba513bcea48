import { AsyncLocalStorage } from 'node:async_hooks';
import type { IStoreConnector, IStoreSession } from './interfaces/index.js';
import { StoreUnavailableError } from '../errors/index.js';
import { getLogger, type Logger } from '../logging/logger.js';

/**
 * Per-context binding. Mutable so that a session opened lazily deep inside a
 * scope becomes visible to everything else running in that scope.
 */
interface SessionSlot {
  session?: IStoreSession;
  pending?: Promise<IStoreSession>;
}

export interface UnitOfWorkOptions {
  connector: IStoreConnector;
  logger?: Logger;
}

/**
 * Unit-of-work manager
 *
 * Binds at most one store session to each async context. Concurrent tasks
 * started from different contexts never share a session; nested scopes in
 * one context reuse the outer one and only the outermost scope commits.
 */
export class UnitOfWorkManager {
  private readonly storage = new AsyncLocalStorage<SessionSlot>();
  private readonly connector: IStoreConnector;
  private readonly logger: Logger;

  constructor(options: UnitOfWorkOptions) {
    this.connector = options.connector;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Session bound to the calling context, if any. Never opens one.
   */
  current(): IStoreSession | undefined {
    const session = this.storage.getStore()?.session;
    return session && !session.isClosed ? session : undefined;
  }

  /**
   * Return the session bound to the calling context, opening and binding one
   * when there is none.
   */
  async acquire(): Promise<IStoreSession> {
    const existing = this.current();
    if (existing) return existing;

    let slot = this.storage.getStore();
    if (!slot) {
      slot = {};
      this.storage.enterWith(slot);
    }

    if (!slot.pending) {
      slot.pending = this.open();
    }

    const pending = slot.pending;
    try {
      const session = await pending;
      slot.session = session;
      return session;
    } finally {
      if (slot.pending === pending) {
        slot.pending = undefined;
      }
    }
  }

  /**
   * Run `body` inside one unit of work.
   *
   * Commits when the body resolves; rolls back and re-throws the body's error
   * otherwise. The session is always closed and unbound. When a session is
   * already bound the body simply runs on it.
   */
  async runScoped<T>(body: (session: IStoreSession) => Promise<T>): Promise<T> {
    const outer = this.current();
    if (outer) {
      return body(outer);
    }

    const slot: SessionSlot = {};
    return this.storage.run(slot, async () => {
      const session = await this.acquire();

      let result: T;
      try {
        result = await body(session);
        await session.commit();
      } catch (error) {
        await this.rollbackQuietly(session);
        await this.closeSlot(slot, true);
        throw error;
      }

      await this.closeSlot(slot, false);
      return result;
    });
  }

  /**
   * Commit the session bound to the calling context
   */
  async commit(): Promise<void> {
    const session = await this.acquire();
    await session.commit();
  }

  /**
   * Roll back the session bound to the calling context
   */
  async rollback(): Promise<void> {
    const session = await this.acquire();
    await session.rollback();
  }

  /**
   * Close and unbind the session bound to the calling context. No-op when
   * nothing is bound; safe to call repeatedly.
   */
  async close(): Promise<void> {
    const slot = this.storage.getStore();
    if (!slot?.session) return;
    await this.closeSlot(slot, false);
  }

  private async open(): Promise<IStoreSession> {
    try {
      const session = await this.connector.connect();
      this.logger.debug({ sessionId: session.id }, 'store session opened');
      return session;
    } catch (error) {
      throw new StoreUnavailableError(error);
    }
  }

  private async rollbackQuietly(session: IStoreSession): Promise<void> {
    try {
      await session.rollback();
    } catch (rollbackError) {
      this.logger.error({ err: rollbackError, sessionId: session.id }, 'rollback failed');
    }
  }

  private async closeSlot(slot: SessionSlot, failed: boolean): Promise<void> {
    const session = slot.session;
    slot.session = undefined;
    if (!session) return;

    try {
      await session.close();
    } catch (closeError) {
      // An earlier failure is already on its way to the caller
      if (!failed) throw closeError;
      this.logger.error({ err: closeError, sessionId: session.id }, 'closing store session failed');
    }
  }
}
