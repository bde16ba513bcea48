import type { QueryResult, QueryResultRow } from 'pg';
import type { TokenRecord, CreateTokenRecordInput } from '../../../types/token.js';
import type { ITokenRecordStorage } from '../../interfaces/token-storage.js';
import { generateId } from '../../../crypto/index.js';

/**
 * Runs one statement inside the owning session's transaction
 */
export type SessionQuery = <R extends QueryResultRow>(
  text: string,
  values?: unknown[]
) => Promise<QueryResult<R>>;

interface TokenRecordRow {
  id: string;
  identity: string;
  access_token: string;
  refresh_token: string | null;
  token_type: string | null;
  scope: string | null;
  expires_in: number | null;
  issued_at: Date | string;
  expires_at: Date | string | null;
  is_revoked: boolean;
  created_at: Date | string;
  updated_at: Date | string;
}

interface IdRow {
  id: string;
}

const COLUMNS =
  'id, identity, access_token, refresh_token, token_type, scope, expires_in, issued_at, expires_at, is_revoked, created_at, updated_at';

const toDate = (value: Date | string): Date => (value instanceof Date ? value : new Date(value));

function rowToTokenRecord(row: TokenRecordRow): TokenRecord {
  return {
    id: row.id,
    identity: row.identity,
    accessToken: row.access_token,
    refreshToken: row.refresh_token ?? undefined,
    tokenType: row.token_type ?? undefined,
    scope: row.scope ?? undefined,
    expiresIn: row.expires_in ?? undefined,
    issuedAt: toDate(row.issued_at),
    expiresAt: row.expires_at === null ? null : toDate(row.expires_at),
    isRevoked: row.is_revoked,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

/**
 * PostgreSQL token record storage implementation
 */
export class PostgresTokenRecordStorage implements ITokenRecordStorage {
  constructor(
    private readonly query: SessionQuery,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(input: CreateTokenRecordInput): Promise<TokenRecord> {
    const now = this.now().toISOString();
    const result = await this.query<TokenRecordRow>(
      `INSERT INTO token_records (${COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8::timestamptz, $9::timestamptz, FALSE, $10::timestamptz, $11::timestamptz)
       RETURNING ${COLUMNS}`,
      [
        generateId(),
        input.identity,
        input.accessToken,
        input.refreshToken ?? null,
        input.tokenType ?? null,
        input.scope ?? null,
        input.expiresIn ?? null,
        input.issuedAt.toISOString(),
        input.expiresAt?.toISOString() ?? null,
        now,
        now,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Token record insert returned no row');
    }
    return rowToTokenRecord(row);
  }

  async findById(id: string): Promise<TokenRecord | null> {
    const result = await this.query<TokenRecordRow>(
      `SELECT ${COLUMNS} FROM token_records WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? rowToTokenRecord(row) : null;
  }

  async findCurrent(identity: string): Promise<TokenRecord | null> {
    const result = await this.query<TokenRecordRow>(
      `SELECT ${COLUMNS} FROM token_records
       WHERE identity = $1 AND is_revoked = FALSE
       ORDER BY issued_at DESC, created_at DESC
       LIMIT 1`,
      [identity]
    );
    const row = result.rows[0];
    return row ? rowToTokenRecord(row) : null;
  }

  async list(identity?: string): Promise<TokenRecord[]> {
    const result =
      identity === undefined
        ? await this.query<TokenRecordRow>(
            `SELECT ${COLUMNS} FROM token_records ORDER BY issued_at DESC, created_at DESC`
          )
        : await this.query<TokenRecordRow>(
            `SELECT ${COLUMNS} FROM token_records WHERE identity = $1 ORDER BY issued_at DESC, created_at DESC`,
            [identity]
          );
    return result.rows.map(rowToTokenRecord);
  }

  async revoke(id: string, at: Date): Promise<boolean> {
    const updated = await this.query<IdRow>(
      'UPDATE token_records SET is_revoked = TRUE, updated_at = $2::timestamptz WHERE id = $1 AND is_revoked = FALSE RETURNING id',
      [id, at.toISOString()]
    );
    if (updated.rows.length > 0) return true;

    // Already revoked still counts as success
    const existing = await this.query<IdRow>('SELECT id FROM token_records WHERE id = $1', [id]);
    return existing.rows.length > 0;
  }

  async revokeByIdentity(identity: string, at: Date): Promise<number> {
    const result = await this.query<IdRow>(
      'UPDATE token_records SET is_revoked = TRUE, updated_at = $2::timestamptz WHERE identity = $1 AND is_revoked = FALSE RETURNING id',
      [identity, at.toISOString()]
    );
    return result.rows.length;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.query<IdRow>('DELETE FROM token_records WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }

  async deleteByIdentity(identity: string): Promise<number> {
    const result = await this.query<IdRow>(
      'DELETE FROM token_records WHERE identity = $1 RETURNING id',
      [identity]
    );
    return result.rows.length;
  }

  async deleteExpired(now: Date): Promise<number> {
    const result = await this.query<IdRow>(
      `DELETE FROM token_records
       WHERE is_revoked = TRUE OR (expires_at IS NOT NULL AND expires_at <= $1::timestamptz)
       RETURNING id`,
      [now.toISOString()]
    );
    return result.rows.length;
  }
}
