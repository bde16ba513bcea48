export * from './interfaces/index.js';
export { UnitOfWorkManager, type UnitOfWorkOptions } from './unit-of-work.js';
export { MemoryStore, MemoryStoreSession, createMemoryStore, type MemoryStoreOptions } from './memory/index.js';
export {
  PostgresStore,
  PostgresStoreSession,
  createPostgresStore,
  initializePool,
  getPool,
  closePool,
  type PostgresStoreOptions,
} from './postgres/index.js';
