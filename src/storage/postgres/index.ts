import { readFile } from 'node:fs/promises';
import pg, { type Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { IStoreConnector, IStoreSession } from '../interfaces/index.js';
import { CoreError } from '../../errors/index.js';
import { generateId } from '../../crypto/index.js';
import { PostgresTokenRecordStorage } from './repositories/token-repository.js';
import { initializePool } from './client.js';

export { initializePool, getPool, closePool } from './client.js';
export { PostgresTokenRecordStorage, type SessionQuery } from './repositories/token-repository.js';

const SCHEMA_URL = new URL('../../../sql/token_records.sql', import.meta.url);

/**
 * Store session bound to one pooled connection
 *
 * BEGIN is sent with the first statement, so a session that never touches the
 * store never opens a transaction.
 */
export class PostgresStoreSession implements IStoreSession {
  readonly id = generateId();
  readonly tokens: PostgresTokenRecordStorage;
  private inTransaction = false;
  private closed = false;

  constructor(private readonly client: PoolClient, now?: () => Date) {
    this.tokens = new PostgresTokenRecordStorage((text, values) => this.query(text, values), now);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async commit(): Promise<void> {
    this.assertOpen();
    if (!this.inTransaction) return;
    this.inTransaction = false;
    await this.client.query('COMMIT');
  }

  async rollback(): Promise<void> {
    this.assertOpen();
    if (!this.inTransaction) return;
    this.inTransaction = false;
    await this.client.query('ROLLBACK');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (!this.inTransaction) {
      this.client.release();
      return;
    }

    this.inTransaction = false;
    try {
      await this.client.query('ROLLBACK');
      this.client.release();
    } catch (error) {
      // Discard the connection instead of returning it mid-transaction
      this.client.release(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  private async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    this.assertOpen();
    if (!this.inTransaction) {
      await this.client.query('BEGIN');
      this.inTransaction = true;
    }
    return this.client.query<R>(text, values);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw CoreError.serverError(`Store session ${this.id} is closed`);
    }
  }
}

export interface PostgresStoreOptions {
  /** Existing pool; when omitted one is created from `connectionString` */
  pool?: Pool;
  connectionString?: string;
  /** Clock used for createdAt/updatedAt stamps */
  now?: () => Date;
}

/**
 * PostgreSQL-backed store connector
 */
export class PostgresStore implements IStoreConnector {
  readonly pool: Pool;
  private readonly now: (() => Date) | undefined;

  constructor(options: PostgresStoreOptions) {
    if (options.pool) {
      this.pool = options.pool;
    } else if (options.connectionString) {
      this.pool = new pg.Pool({ connectionString: options.connectionString });
    } else {
      throw new Error('PostgresStore needs a pool or a connection string');
    }
    this.now = options.now;
  }

  async connect(): Promise<IStoreSession> {
    const client = await this.pool.connect();
    return new PostgresStoreSession(client, this.now);
  }

  /**
   * Create the token_records table and its index if missing
   */
  async migrate(): Promise<void> {
    const sql = await readFile(SCHEMA_URL, 'utf-8');
    const statements = sql
      .split(';')
      .map((statement) => statement.trim())
      .filter((statement) => statement.length > 0);
    for (const statement of statements) {
      await this.pool.query(statement);
    }
  }

  /**
   * Check connectivity
   */
  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Create a PostgreSQL store on the shared pool
 */
export function createPostgresStore(options: Omit<PostgresStoreOptions, 'pool'> = {}): PostgresStore {
  return new PostgresStore({ pool: initializePool(options.connectionString), now: options.now });
}
