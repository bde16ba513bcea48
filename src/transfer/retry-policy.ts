import {
  DEFAULT_BACKOFF_FACTOR_MS,
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_MAX_CONNECT_RETRIES,
  DEFAULT_MAX_READ_RETRIES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_STATUS_RETRIES,
  RETRYABLE_STATUS_CODES,
} from '../config/constants.js';

/**
 * Where an attempt failed
 *
 * - connect: before response headers arrived
 * - read: while streaming the body
 * - status: the server answered with a retryable status
 */
export type FailurePhase = 'connect' | 'read' | 'status';

export interface RetryPolicyOptions {
  total?: number;
  connect?: number;
  read?: number;
  status?: number;
  backoffFactorMs?: number;
  backoffMaxMs?: number;
  retryableStatuses?: readonly number[];
}

export type ResolvedRetryPolicy = Required<RetryPolicyOptions>;

export function resolveRetryPolicy(options: RetryPolicyOptions = {}): ResolvedRetryPolicy {
  return {
    total: options.total ?? DEFAULT_MAX_RETRIES,
    connect: options.connect ?? DEFAULT_MAX_CONNECT_RETRIES,
    read: options.read ?? DEFAULT_MAX_READ_RETRIES,
    status: options.status ?? DEFAULT_MAX_STATUS_RETRIES,
    backoffFactorMs: options.backoffFactorMs ?? DEFAULT_BACKOFF_FACTOR_MS,
    backoffMaxMs: options.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS,
    retryableStatuses: options.retryableStatuses ?? RETRYABLE_STATUS_CODES,
  };
}

/**
 * Retry allowance of one transfer
 *
 * Every retry draws from the total budget and from the budget of its phase;
 * the transfer gives up as soon as either is overdrawn.
 */
export class RetryBudget {
  private readonly policy: ResolvedRetryPolicy;
  private remaining: Record<FailurePhase | 'total', number>;
  private retries = 0;

  constructor(options: RetryPolicyOptions = {}) {
    this.policy = resolveRetryPolicy(options);
    this.remaining = {
      total: this.policy.total,
      connect: this.policy.connect,
      read: this.policy.read,
      status: this.policy.status,
    };
  }

  /** Retries consumed so far */
  get used(): number {
    return this.retries;
  }

  isRetryableStatus(status: number): boolean {
    return this.policy.retryableStatuses.includes(status);
  }

  /**
   * Take one retry for `phase`. False when the transfer must give up.
   */
  consume(phase: FailurePhase): boolean {
    this.remaining.total--;
    this.remaining[phase]--;
    this.retries++;
    return this.remaining.total >= 0 && this.remaining[phase] >= 0;
  }

  /**
   * Delay before the retry just consumed: factor * 2^(n-1), capped. A
   * server-supplied Retry-After replaces the computed value but is capped too.
   */
  backoffMs(retryAfterMs?: number): number {
    if (retryAfterMs !== undefined) {
      return Math.min(Math.max(retryAfterMs, 0), this.policy.backoffMaxMs);
    }
    if (this.retries === 0) return 0;
    const delay = this.policy.backoffFactorMs * 2 ** (this.retries - 1);
    return Math.min(delay, this.policy.backoffMaxMs);
  }
}

/**
 * Parse a Retry-After header: delta seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, now: Date = new Date()): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(at - now.getTime(), 0);
}
