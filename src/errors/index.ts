export * from './error-codes.js';
export * from './core-error.js';
