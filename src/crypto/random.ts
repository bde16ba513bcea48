import { randomBytes } from 'node:crypto';

/**
 * Generate a unique ID for database records and store sessions
 */
export function generateId(): string {
  return randomBytes(16).toString('base64url');
}
