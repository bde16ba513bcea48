import type { IStoreConnector, IStoreSession } from '../interfaces/index.js';
import { CoreError } from '../../errors/index.js';
import { generateId } from '../../crypto/index.js';
import { MemoryTokenRecordStorage, type MemoryTokenRow } from './token-storage.js';

export { MemoryTokenRecordStorage, type MemoryTokenRow } from './token-storage.js';

export interface MemoryStoreOptions {
  /** Clock used for createdAt/updatedAt stamps */
  now?: () => Date;
}

/**
 * In-memory store session
 *
 * Takes a private copy of the committed rows on first access and remembers
 * which ids it writes. Commit applies only those rows to the committed map, so
 * overlapping sessions keep each other's writes; rollback drops the copy.
 */
export class MemoryStoreSession implements IStoreSession {
  readonly id = generateId();
  readonly tokens: MemoryTokenRecordStorage;
  private working: Map<string, MemoryTokenRow> | undefined;
  private readonly touched = new Set<string>();
  private closed = false;

  constructor(private readonly store: MemoryStore, now: () => Date) {
    this.tokens = new MemoryTokenRecordStorage({
      rows: () => this.rows(),
      nextSequence: () => store.nextSequence(),
      touch: (id) => this.touched.add(id),
      now,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async commit(): Promise<void> {
    this.assertOpen();
    if (this.working) {
      this.store.apply(this.working, this.touched);
    }
    this.discard();
  }

  async rollback(): Promise<void> {
    this.assertOpen();
    this.discard();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.discard();
    this.closed = true;
  }

  private rows(): Map<string, MemoryTokenRow> {
    this.assertOpen();
    if (!this.working) {
      this.working = this.store.snapshot();
    }
    return this.working;
  }

  private discard(): void {
    this.working = undefined;
    this.touched.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw CoreError.serverError(`Store session ${this.id} is closed`);
    }
  }
}

/**
 * In-memory transactional store
 */
export class MemoryStore implements IStoreConnector {
  private readonly committed = new Map<string, MemoryTokenRow>();
  private sequence = 0;
  private readonly now: () => Date;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async connect(): Promise<IStoreSession> {
    return new MemoryStoreSession(this, this.now);
  }

  /** Number of committed records */
  get size(): number {
    return this.committed.size;
  }

  snapshot(): Map<string, MemoryTokenRow> {
    return new Map(this.committed);
  }

  /**
   * Copy the given ids from a session's working rows onto the committed map.
   * An id missing from `rows` was deleted by that session.
   */
  apply(rows: Map<string, MemoryTokenRow>, ids: Iterable<string>): void {
    for (const id of ids) {
      const row = rows.get(id);
      if (row) {
        this.committed.set(id, row);
      } else {
        this.committed.delete(id);
      }
    }
  }

  nextSequence(): number {
    return ++this.sequence;
  }

  /**
   * Clear all records (useful for testing)
   */
  clear(): void {
    this.committed.clear();
  }
}

/**
 * Create an in-memory store
 */
export function createMemoryStore(options?: MemoryStoreOptions): MemoryStore {
  return new MemoryStore(options);
}
