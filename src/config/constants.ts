/**
 * Credential and transfer constants
 */

// Grant type sent to the identity endpoint
export const GRANT_TYPE_PASSWORD = 'password' as const;

// Form fields of the password grant
export const FIELD_USERNAME = 'username';
export const FIELD_PASSWORD = 'password';
export const FIELD_GRANT_TYPE = 'grant_type';
export const FIELD_CLIENT_ID = 'client_id';
export const FIELD_TOTP = 'totp';

// Default identity client settings
export const DEFAULT_IDENTITY_CLIENT_ID = 'public-client';
export const DEFAULT_IDENTITY_TIMEOUT_MS = 60_000; // 1 minute
export const DEFAULT_PROBE_TIMEOUT_MS = 20_000; // 20 seconds

// Largest expires_in stored; the INTEGER column limit, about 68 years
export const MAX_EXPIRES_IN_SECONDS = 2_147_483_647;

// Probe statuses that mean the server refused the token
export const PROBE_REJECTED_STATUSES = [401, 403] as const;

// Transfer retry policy defaults
export const DEFAULT_MAX_RETRIES = 8;
export const DEFAULT_MAX_CONNECT_RETRIES = 5;
export const DEFAULT_MAX_READ_RETRIES = 5;
export const DEFAULT_MAX_STATUS_RETRIES = 5;
export const DEFAULT_BACKOFF_FACTOR_MS = 500;
export const DEFAULT_BACKOFF_MAX_MS = 120_000; // 2 minutes
export const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504] as const;

// Transfer timeouts
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000; // 10 seconds
export const DEFAULT_READ_TIMEOUT_MS = 600_000; // 10 minutes

// Suffix of the sibling file a download streams into
export const PARTIAL_FILE_SUFFIX = '.part';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_ACCEPT = 'Accept';
export const HEADER_ACCEPT_ENCODING = 'Accept-Encoding';
export const HEADER_ACCEPT_RANGES = 'Accept-Ranges';
export const HEADER_CONTENT_LENGTH = 'Content-Length';
export const HEADER_CONTENT_RANGE = 'Content-Range';
export const HEADER_RANGE = 'Range';
export const HEADER_RETRY_AFTER = 'Retry-After';

// Content types
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Byte counts must stay exact for resumption
export const ACCEPT_ENCODING_IDENTITY = 'identity';

// Admin API defaults
export const DEFAULT_ADMIN_API_KEY_HEADER = 'x-api-key';
