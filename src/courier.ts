import type { IStoreConnector } from './storage/interfaces/index.js';
import type { PasswordCredentials, TokenRecord } from './types/token.js';
import type { FetchLike } from './types/http.js';
import { getConfig } from './config/index.js';
import { UnitOfWorkManager } from './storage/unit-of-work.js';
import { createMemoryStore } from './storage/memory/index.js';
import { createPostgresStore } from './storage/postgres/index.js';
import { IdentityClient, type IdentityClientOptions } from './services/identity-client.js';
import { TokenLifecycleService, type EnsureValidOptions } from './services/token-lifecycle-service.js';
import { TransferClient, type TransferClientOptions, type TransferOptions } from './transfer/transfer-client.js';
import { getLogger, type Logger } from './logging/logger.js';

export interface CourierOptions {
  /** Backing store; defaults to PostgreSQL when DATABASE_URL is set, memory otherwise */
  store?: IStoreConnector;
  identity?: IdentityClientOptions;
  transfer?: TransferClientOptions;
  /** Shared transport for the identity and transfer clients */
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

export interface DownloadOptions extends TransferOptions {
  validateRemote?: EnsureValidOptions['validateRemote'];
}

/**
 * Credential lifecycle and transfer client wired to one store
 */
export class Courier {
  readonly unitOfWork: UnitOfWorkManager;
  readonly identityClient: IdentityClient;
  readonly lifecycle: TokenLifecycleService;
  readonly transfer: TransferClient;

  constructor(options: CourierOptions = {}) {
    const logger = options.logger ?? getLogger();
    const store = options.store ?? defaultStore();

    this.unitOfWork = new UnitOfWorkManager({ connector: store, logger });
    this.identityClient = new IdentityClient({ fetch: options.fetch, logger, ...options.identity });
    this.lifecycle = new TokenLifecycleService({
      unitOfWork: this.unitOfWork,
      identityClient: this.identityClient,
      logger,
      now: options.now,
    });
    this.transfer = new TransferClient({ fetch: options.fetch, logger, ...options.transfer });
  }

  /**
   * Make sure `credentials` hold a usable token, then download `url` with it
   */
  async download(
    credentials: PasswordCredentials,
    url: string,
    destinationPath: string,
    options: DownloadOptions = {}
  ): Promise<{ path: string; token: TokenRecord }> {
    const { validateRemote, ...transferOptions } = options;
    const token = await this.lifecycle.ensureValid(credentials, { validateRemote });
    const path = await this.transfer.fetch(url, destinationPath, token.accessToken, transferOptions);
    return { path, token };
  }
}

function defaultStore(): IStoreConnector {
  return getConfig().database.url ? createPostgresStore() : createMemoryStore();
}

export function createCourier(options?: CourierOptions): Courier {
  return new Courier(options);
}
