import type { TokenRecord, CreateTokenRecordInput } from '../../types/token.js';

/**
 * Storage interface for token records
 *
 * Every method runs on the store session it belongs to; writes are visible to
 * other sessions only once that session commits.
 */
export interface ITokenRecordStorage {
  /**
   * Create a new token record
   */
  create(input: CreateTokenRecordInput): Promise<TokenRecord>;

  /**
   * Find a token record by ID
   */
  findById(id: string): Promise<TokenRecord | null>;

  /**
   * Most recently issued non-revoked record for an identity, expired or not
   */
  findCurrent(identity: string): Promise<TokenRecord | null>;

  /**
   * List records, newest first, optionally for one identity
   */
  list(identity?: string): Promise<TokenRecord[]>;

  /**
   * Mark a record revoked. Returns false when the record does not exist.
   * Revoking an already revoked record leaves `updatedAt` untouched.
   */
  revoke(id: string, at: Date): Promise<boolean>;

  /**
   * Revoke every non-revoked record of an identity
   */
  revokeByIdentity(identity: string, at: Date): Promise<number>;

  /**
   * Delete a record by ID
   */
  delete(id: string): Promise<boolean>;

  /**
   * Delete every record of an identity
   */
  deleteByIdentity(identity: string): Promise<number>;

  /**
   * Delete revoked records and records whose expiry has passed (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;
}
