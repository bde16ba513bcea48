import type { IssueReason, PasswordCredentials, TokenRecord } from '../types/token.js';
import type { UnitOfWorkManager } from '../storage/unit-of-work.js';
import type { IdentityClient, TokenGrant } from './identity-client.js';
import { getLogger, type Logger } from '../logging/logger.js';

/**
 * The part of the identity client the lifecycle service talks to
 */
export type IdentityGateway = Pick<IdentityClient, 'requestPasswordGrant' | 'probe'>;

export interface TokenLifecycleOptions {
  unitOfWork: UnitOfWorkManager;
  identityClient: IdentityGateway;
  logger?: Logger;
  now?: () => Date;
}

export interface EnsureValidOptions {
  /** Probe the token against the server before reusing it. Defaults to true. */
  validateRemote?: boolean;
  /** Probe this URL instead of the client's configured one */
  probeUrl?: string;
}

/**
 * Revoked, or past its expiry instant
 */
export function isTokenExpired(record: TokenRecord, now: Date): boolean {
  if (record.isRevoked) return true;
  return record.expiresAt !== null && now.getTime() >= record.expiresAt.getTime();
}

/**
 * Issues, caches, validates and discards credentials per identity.
 *
 * Identity endpoint calls are made before a unit of work opens, so no store
 * transaction is held across the network.
 */
export class TokenLifecycleService {
  private readonly unitOfWork: UnitOfWorkManager;
  private readonly identityClient: IdentityGateway;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TokenLifecycleOptions) {
    this.unitOfWork = options.unitOfWork;
    this.identityClient = options.identityClient;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Obtain a new grant and store it. Existing records are left alone.
   */
  async issue(credentials: PasswordCredentials): Promise<TokenRecord> {
    const grant = await this.identityClient.requestPasswordGrant(credentials);
    return this.persist(credentials.identity, grant, 'explicit');
  }

  /**
   * Most recently issued non-revoked record, whether or not it has expired
   */
  async current(identity: string): Promise<TokenRecord | null> {
    return this.unitOfWork.runScoped((session) => session.tokens.findCurrent(identity));
  }

  isExpired(record: TokenRecord): boolean {
    return isTokenExpired(record, this.now());
  }

  /**
   * Return a usable record for the identity, issuing a new one when there is
   * none, it has expired, or the server refuses it. An inconclusive probe
   * keeps the cached record.
   */
  async ensureValid(credentials: PasswordCredentials, options: EnsureValidOptions = {}): Promise<TokenRecord> {
    const { validateRemote = true } = options;
    const cached = await this.current(credentials.identity);

    let reason: IssueReason | undefined;
    if (!cached) {
      reason = 'missing';
    } else if (this.isExpired(cached)) {
      reason = 'expired';
    } else if (validateRemote) {
      const probe = await this.identityClient.probe(cached.accessToken, options.probeUrl);
      if (probe.outcome === 'rejected') {
        reason = 'rejected';
      } else if (probe.outcome === 'inconclusive') {
        this.logger.warn(
          { identity: credentials.identity, recordId: cached.id, status: probe.status, err: probe.error },
          'token probe inconclusive, keeping cached token'
        );
      }
    }

    if (cached && reason === undefined) {
      return cached;
    }

    const grant = await this.identityClient.requestPasswordGrant(credentials);
    return this.persist(credentials.identity, grant, reason ?? 'missing', cached ?? undefined);
  }

  /**
   * Revoke every live record of an identity
   */
  async revoke(identity: string): Promise<number> {
    const count = await this.unitOfWork.runScoped((session) =>
      session.tokens.revokeByIdentity(identity, this.now())
    );
    this.logger.info({ identity, count }, 'tokens revoked');
    return count;
  }

  /**
   * Revoke one record. False when it does not exist.
   */
  async revokeById(id: string): Promise<boolean> {
    const found = await this.unitOfWork.runScoped((session) => session.tokens.revoke(id, this.now()));
    if (found) {
      this.logger.info({ recordId: id }, 'token revoked');
    }
    return found;
  }

  /**
   * Delete revoked records and records past their expiry
   */
  async purgeExpired(): Promise<number> {
    const count = await this.unitOfWork.runScoped((session) => session.tokens.deleteExpired(this.now()));
    this.logger.info({ count }, 'expired tokens purged');
    return count;
  }

  async findById(id: string): Promise<TokenRecord | null> {
    return this.unitOfWork.runScoped((session) => session.tokens.findById(id));
  }

  async list(identity?: string): Promise<TokenRecord[]> {
    return this.unitOfWork.runScoped((session) => session.tokens.list(identity));
  }

  async delete(id: string): Promise<boolean> {
    return this.unitOfWork.runScoped((session) => session.tokens.delete(id));
  }

  async deleteForIdentity(identity: string): Promise<number> {
    const count = await this.unitOfWork.runScoped((session) => session.tokens.deleteByIdentity(identity));
    this.logger.info({ identity, count }, 'tokens deleted');
    return count;
  }

  private async persist(
    identity: string,
    grant: TokenGrant,
    reason: IssueReason,
    supersedes?: TokenRecord
  ): Promise<TokenRecord> {
    const issuedAt = this.now();
    const expiresAt =
      grant.expiresIn === undefined ? null : new Date(issuedAt.getTime() + grant.expiresIn * 1000);

    const record = await this.unitOfWork.runScoped(async (session) => {
      const created = await session.tokens.create({
        identity,
        accessToken: grant.accessToken,
        refreshToken: grant.refreshToken,
        tokenType: grant.tokenType,
        scope: grant.scope,
        expiresIn: grant.expiresIn,
        issuedAt,
        expiresAt,
      });

      if (supersedes) {
        await session.tokens.revoke(supersedes.id, issuedAt);
      }

      return created;
    });

    this.logger.info(
      { identity, recordId: record.id, reason, expiresAt, supersedes: supersedes?.id },
      supersedes ? 'token reissued' : 'token issued'
    );
    return record;
  }
}
