import { z } from 'zod';
import type { FetchLike } from '../types/http.js';
import type { ProbeResult } from '../types/oauth.js';
import type { PasswordCredentials } from '../types/token.js';
import { getConfig } from '../config/index.js';
import {
  ACCEPT_ENCODING_IDENTITY,
  CONTENT_TYPE_FORM,
  CONTENT_TYPE_JSON,
  FIELD_CLIENT_ID,
  FIELD_GRANT_TYPE,
  FIELD_PASSWORD,
  FIELD_TOTP,
  FIELD_USERNAME,
  GRANT_TYPE_PASSWORD,
  HEADER_ACCEPT,
  HEADER_ACCEPT_ENCODING,
  HEADER_AUTHORIZATION,
  HEADER_CONTENT_TYPE,
  MAX_EXPIRES_IN_SECONDS,
  PROBE_REJECTED_STATUSES,
} from '../config/constants.js';
import { AuthRejectedError, NetworkError } from '../errors/index.js';
import { getLogger, type Logger } from '../logging/logger.js';

// Statuses of the token endpoint that mean "wrong credentials", not "server trouble"
const REJECTED_GRANT_STATUSES: readonly number[] = [400, 401, 403];

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().nullish(),
  // Fractional lifetimes round up to whole seconds
  expires_in: z.coerce
    .number()
    .nonnegative()
    .max(MAX_EXPIRES_IN_SECONDS)
    .transform((seconds) => Math.ceil(seconds))
    .nullish(),
  refresh_token: z.string().nullish(),
  scope: z.string().nullish(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Parsed, validated password grant
 */
export interface TokenGrant {
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  scope?: string;
  expiresIn?: number;
}

export interface IdentityClientOptions {
  tokenUrl?: string;
  probeUrl?: string;
  clientId?: string;
  timeoutMs?: number;
  probeTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * HTTP adapter for the identity endpoint: password grant and token probe
 */
export class IdentityClient {
  private readonly tokenUrl: string;
  private readonly probeUrl: string | undefined;
  private readonly clientId: string;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: IdentityClientOptions = {}) {
    const config = getConfig().identity;
    const tokenUrl = options.tokenUrl ?? config.tokenUrl;
    if (!tokenUrl) {
      throw new Error('IDENTITY_TOKEN_URL must be set to request grants');
    }

    this.tokenUrl = tokenUrl;
    this.probeUrl = options.probeUrl ?? config.probeUrl;
    this.clientId = options.clientId ?? config.clientId;
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
    this.probeTimeoutMs = options.probeTimeoutMs ?? config.probeTimeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Exchange credentials for a token (RFC 6749 Section 4.3)
   */
  async requestPasswordGrant(credentials: PasswordCredentials): Promise<TokenGrant> {
    const params = new URLSearchParams();
    params.set(FIELD_USERNAME, credentials.identity);
    params.set(FIELD_PASSWORD, credentials.secret);
    params.set(FIELD_GRANT_TYPE, GRANT_TYPE_PASSWORD);
    params.set(FIELD_CLIENT_ID, this.clientId);
    if (credentials.otp !== undefined) {
      params.set(FIELD_TOTP, credentials.otp);
    }

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(this.tokenUrl, {
        method: 'POST',
        headers: {
          [HEADER_CONTENT_TYPE]: CONTENT_TYPE_FORM,
          [HEADER_ACCEPT]: CONTENT_TYPE_JSON,
        },
        body: params.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      if (isTimeout(error)) {
        throw new NetworkError(`Identity endpoint did not answer within ${this.timeoutMs}ms`, { cause: error });
      }
      throw NetworkError.fromError(error);
    }

    if (REJECTED_GRANT_STATUSES.includes(response.status)) {
      const parsed = errorResponseSchema.safeParse(parseJson(body));
      const remote = parsed.success ? parsed.data : undefined;
      this.logger.warn(
        { identity: credentials.identity, status: response.status, remoteError: remote?.error },
        'identity endpoint rejected credentials'
      );
      throw new AuthRejectedError(response.status, remote?.error, remote?.error_description);
    }

    if (!response.ok) {
      throw new NetworkError(`Identity endpoint answered HTTP ${response.status}`, {
        remoteStatus: response.status,
      });
    }

    const parsed = tokenResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      throw new NetworkError('Identity endpoint returned a malformed token response', {
        cause: parsed.error,
        remoteStatus: response.status,
      });
    }

    const data = parsed.data;
    return {
      accessToken: data.access_token,
      refreshToken: data.refresh_token ?? undefined,
      tokenType: data.token_type ?? undefined,
      scope: data.scope ?? undefined,
      expiresIn: data.expires_in ?? undefined,
    };
  }

  /**
   * Make one authenticated request to see whether the server still honours
   * the token. Only 401/403 count as a rejection.
   */
  async probe(accessToken: string, url: string | undefined = this.probeUrl): Promise<ProbeResult> {
    if (!url) {
      return { outcome: 'inconclusive' };
    }

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          [HEADER_AUTHORIZATION]: `Bearer ${accessToken}`,
          [HEADER_ACCEPT_ENCODING]: ACCEPT_ENCODING_IDENTITY,
        },
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      // Only the status matters
      await response.body?.cancel();

      if (response.status < 400) {
        return { outcome: 'accepted', status: response.status };
      }
      if (PROBE_REJECTED_STATUSES.some((status) => status === response.status)) {
        return { outcome: 'rejected', status: response.status };
      }
      return { outcome: 'inconclusive', status: response.status };
    } catch (error) {
      return { outcome: 'inconclusive', error };
    }
  }
}
