// Probe outcomes
export * from './oauth.js';

// Token record types
export * from './token.js';

// Transport seams
export * from './http.js';
