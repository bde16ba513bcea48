import type { TokenRecord, CreateTokenRecordInput } from '../../types/token.js';
import type { ITokenRecordStorage } from '../interfaces/token-storage.js';
import { generateId } from '../../crypto/index.js';

/**
 * Stored row: the record plus its insertion order, used to break issuedAt ties
 */
export interface MemoryTokenRow {
  record: TokenRecord;
  sequence: number;
}

export interface MemoryTokenRecordStorageOptions {
  rows: () => Map<string, MemoryTokenRow>;
  nextSequence: () => number;
  /** Marks a row as written by the owning session */
  touch: (id: string) => void;
  now: () => Date;
}

const copy = (record: TokenRecord): TokenRecord => ({ ...record });

const newestFirst = (a: MemoryTokenRow, b: MemoryTokenRow): number =>
  b.record.issuedAt.getTime() - a.record.issuedAt.getTime() || b.sequence - a.sequence;

/**
 * In-memory token record storage implementation
 *
 * Reads and writes go to whatever row map the owning session hands out, which
 * is its private working copy until commit.
 */
export class MemoryTokenRecordStorage implements ITokenRecordStorage {
  constructor(private readonly options: MemoryTokenRecordStorageOptions) {}

  async create(input: CreateTokenRecordInput): Promise<TokenRecord> {
    const now = this.options.now();
    const record: TokenRecord = {
      id: generateId(),
      identity: input.identity,
      accessToken: input.accessToken,
      refreshToken: input.refreshToken,
      tokenType: input.tokenType,
      scope: input.scope,
      expiresIn: input.expiresIn,
      issuedAt: input.issuedAt,
      expiresAt: input.expiresAt,
      isRevoked: false,
      createdAt: now,
      updatedAt: now,
    };

    this.options.rows().set(record.id, { record, sequence: this.options.nextSequence() });
    this.options.touch(record.id);
    return copy(record);
  }

  async findById(id: string): Promise<TokenRecord | null> {
    const row = this.options.rows().get(id);
    return row ? copy(row.record) : null;
  }

  async findCurrent(identity: string): Promise<TokenRecord | null> {
    const candidates = [...this.options.rows().values()]
      .filter((row) => row.record.identity === identity && !row.record.isRevoked)
      .sort(newestFirst);

    const first = candidates[0];
    return first ? copy(first.record) : null;
  }

  async list(identity?: string): Promise<TokenRecord[]> {
    return [...this.options.rows().values()]
      .filter((row) => identity === undefined || row.record.identity === identity)
      .sort(newestFirst)
      .map((row) => copy(row.record));
  }

  async revoke(id: string, at: Date): Promise<boolean> {
    const rows = this.options.rows();
    const row = rows.get(id);
    if (!row) return false;

    if (!row.record.isRevoked) {
      rows.set(id, { ...row, record: { ...row.record, isRevoked: true, updatedAt: at } });
      this.options.touch(id);
    }
    return true;
  }

  async revokeByIdentity(identity: string, at: Date): Promise<number> {
    const rows = this.options.rows();
    let count = 0;

    for (const [id, row] of rows) {
      if (row.record.identity === identity && !row.record.isRevoked) {
        rows.set(id, { ...row, record: { ...row.record, isRevoked: true, updatedAt: at } });
        this.options.touch(id);
        count++;
      }
    }

    return count;
  }

  async delete(id: string): Promise<boolean> {
    const deleted = this.options.rows().delete(id);
    if (deleted) this.options.touch(id);
    return deleted;
  }

  async deleteByIdentity(identity: string): Promise<number> {
    const rows = this.options.rows();
    let count = 0;

    for (const [id, row] of rows) {
      if (row.record.identity === identity) {
        rows.delete(id);
        this.options.touch(id);
        count++;
      }
    }

    return count;
  }

  async deleteExpired(now: Date): Promise<number> {
    const rows = this.options.rows();
    let count = 0;

    for (const [id, { record }] of rows) {
      if (record.isRevoked || (record.expiresAt !== null && record.expiresAt.getTime() <= now.getTime())) {
        rows.delete(id);
        this.options.touch(id);
        count++;
      }
    }

    return count;
  }
}
