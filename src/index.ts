// Wiring
export { Courier, createCourier, type CourierOptions, type DownloadOptions } from './courier.js';
export { createAdminApp, type AdminAppOptions } from './app.js';

// Credential lifecycle
export {
  TokenLifecycleService,
  isTokenExpired,
  type TokenLifecycleOptions,
  type EnsureValidOptions,
  type IdentityGateway,
} from './services/token-lifecycle-service.js';
export { IdentityClient, type IdentityClientOptions, type TokenGrant } from './services/identity-client.js';

// Transfers
export {
  TransferClient,
  type TransferClientOptions,
  type TransferOptions,
  type TransferProgress,
  type TransferTimeouts,
} from './transfer/transfer-client.js';
export {
  RetryBudget,
  parseRetryAfter,
  resolveRetryPolicy,
  type FailurePhase,
  type RetryPolicyOptions,
} from './transfer/retry-policy.js';

// Storage and unit of work
export * from './storage/index.js';

// Admin routes
export { createAdminRoutes, adminAuth, type AdminAuthOptions } from './routes/admin/index.js';

// Errors, config, logging, types
export * from './errors/index.js';
export { loadConfig, getConfig, resetConfig, constants, type Config } from './config/index.js';
export { createLogger, getLogger, type Logger, type LogLevel } from './logging/logger.js';
export type * from './types/index.js';
