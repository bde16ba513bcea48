import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const filePath = process.env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Could not read secret ${envVar} from ${filePath}: ${message}`);
    }
  }

  return process.env[envVar];
}

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const configSchema = z.object({
  nodeEnv: z.string().default('development'),
  database: z.object({
    url: z.string().min(1).optional(),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  identity: z.object({
    tokenUrl: z.string().url().optional(),
    probeUrl: z.string().url().optional(),
    clientId: z.string().min(1).default(constants.DEFAULT_IDENTITY_CLIENT_ID),
    timeoutMs: intFromEnv(constants.DEFAULT_IDENTITY_TIMEOUT_MS),
    probeTimeoutMs: intFromEnv(constants.DEFAULT_PROBE_TIMEOUT_MS),
  }),
  transfer: z.object({
    connectTimeoutMs: intFromEnv(constants.DEFAULT_CONNECT_TIMEOUT_MS),
    readTimeoutMs: intFromEnv(constants.DEFAULT_READ_TIMEOUT_MS),
    maxRetries: intFromEnv(constants.DEFAULT_MAX_RETRIES),
    backoffFactorMs: intFromEnv(constants.DEFAULT_BACKOFF_FACTOR_MS),
  }),
  admin: z.object({
    apiKey: z.string().min(1).optional(),
  }),
});

/**
 * Application configuration loaded from environment
 */
export type Config = z.infer<typeof configSchema>;

// Empty variables count as unset
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return configSchema.parse({
    nodeEnv: env('NODE_ENV'),
    database: {
      url: readSecret('DATABASE_URL') || undefined,
    },
    logging: {
      level: env('LOG_LEVEL'),
    },
    identity: {
      tokenUrl: env('IDENTITY_TOKEN_URL'),
      probeUrl: env('IDENTITY_PROBE_URL'),
      clientId: env('IDENTITY_CLIENT_ID'),
      timeoutMs: env('IDENTITY_TIMEOUT_MS'),
      probeTimeoutMs: env('IDENTITY_PROBE_TIMEOUT_MS'),
    },
    transfer: {
      connectTimeoutMs: env('TRANSFER_CONNECT_TIMEOUT_MS'),
      readTimeoutMs: env('TRANSFER_READ_TIMEOUT_MS'),
      maxRetries: env('TRANSFER_MAX_RETRIES'),
      backoffFactorMs: env('TRANSFER_BACKOFF_MS'),
    },
    admin: {
      apiKey: readSecret('ADMIN_API_KEY') || undefined,
    },
  });
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
