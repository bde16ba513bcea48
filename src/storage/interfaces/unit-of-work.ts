import type { ITokenRecordStorage } from './token-storage.js';

/**
 * One logical transaction against the backing store
 */
export interface IStoreSession {
  /** Identifier of the owning context, used in logs */
  readonly id: string;

  readonly tokens: ITokenRecordStorage;

  readonly isClosed: boolean;

  commit(): Promise<void>;

  rollback(): Promise<void>;

  /**
   * Release the underlying connection. Uncommitted work is rolled back.
   * Safe to call more than once.
   */
  close(): Promise<void>;
}

/**
 * Opens store sessions
 */
export interface IStoreConnector {
  /**
   * Open a new session. Rejects when the store cannot be reached.
   */
  connect(): Promise<IStoreSession>;
}
