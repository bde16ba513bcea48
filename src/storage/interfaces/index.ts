export * from './token-storage.js';
export * from './unit-of-work.js';
