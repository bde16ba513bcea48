/**
 * Core error codes
 */

// Credential errors
export const ERROR_AUTH_REJECTED = 'auth_rejected' as const;
export const ERROR_NETWORK = 'network_error' as const;

// Transfer errors
export const ERROR_TRANSFER_FAILED = 'transfer_failed' as const;
export const ERROR_FILESYSTEM = 'filesystem_error' as const;
export const ERROR_HTTP_STATUS = 'http_status' as const;

// Store errors
export const ERROR_STORE_UNAVAILABLE = 'store_unavailable' as const;

// Admin surface errors
export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All core error codes
 */
export type CoreErrorCode =
  | typeof ERROR_AUTH_REJECTED
  | typeof ERROR_NETWORK
  | typeof ERROR_TRANSFER_FAILED
  | typeof ERROR_FILESYSTEM
  | typeof ERROR_HTTP_STATUS
  | typeof ERROR_STORE_UNAVAILABLE
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_SERVER_ERROR;

/**
 * HTTP statuses the admin surface answers errors with
 */
export type CoreErrorStatus = 400 | 401 | 403 | 404 | 500 | 502 | 503;

/**
 * HTTP status codes reported by the admin surface
 */
export const ERROR_STATUS_CODES: Record<CoreErrorCode, CoreErrorStatus> = {
  [ERROR_AUTH_REJECTED]: 401,
  [ERROR_NETWORK]: 502,
  [ERROR_TRANSFER_FAILED]: 502,
  [ERROR_FILESYSTEM]: 500,
  [ERROR_HTTP_STATUS]: 502,
  [ERROR_STORE_UNAVAILABLE]: 503,
  [ERROR_NOT_FOUND]: 404,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<CoreErrorCode, string> = {
  [ERROR_AUTH_REJECTED]: 'The identity endpoint refused the supplied credentials.',
  [ERROR_NETWORK]: 'The identity endpoint could not be reached or returned an unusable response.',
  [ERROR_TRANSFER_FAILED]: 'The transfer did not complete within its retry budget.',
  [ERROR_FILESYSTEM]: 'The destination path cannot be created or written.',
  [ERROR_HTTP_STATUS]: 'The remote server answered with an unexpected HTTP status.',
  [ERROR_STORE_UNAVAILABLE]: 'The backing store cannot be reached.',
  [ERROR_NOT_FOUND]: 'The requested resource does not exist.',
  [ERROR_INVALID_REQUEST]: 'The request is malformed.',
  [ERROR_SERVER_ERROR]: 'An unexpected condition prevented the request from completing.',
};
