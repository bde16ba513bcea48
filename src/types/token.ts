/**
 * Token record (stored)
 *
 * One row per successful grant. Only `isRevoked` and `updatedAt` change after
 * creation; a refresh is a new record plus a revoke of the superseded one.
 */
export interface TokenRecord {
  id: string;
  identity: string; // Login the grant was issued for
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  scope?: string;
  expiresIn?: number; // TTL reported by the identity endpoint, in seconds
  issuedAt: Date;
  expiresAt: Date | null; // null: never expires
  isRevoked: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Token record creation input
 */
export interface CreateTokenRecordInput {
  identity: string;
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  scope?: string;
  expiresIn?: number;
  issuedAt: Date;
  expiresAt: Date | null;
}

/**
 * Token record without the credential material, for listings
 */
export type TokenRecordSummary = Omit<TokenRecord, 'accessToken' | 'refreshToken'> & {
  hasRefreshToken: boolean;
};

/**
 * Password grant input
 */
export interface PasswordCredentials {
  identity: string;
  secret: string;
  otp?: string; // One-time code, when the account requires one
}

/**
 * Why a new grant was requested
 */
export type IssueReason = 'missing' | 'expired' | 'rejected' | 'explicit';
