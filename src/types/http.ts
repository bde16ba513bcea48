/**
 * Minimal fetch signature, so callers and tests can supply their own transport
 */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Awaitable delay; injected to make backoff deterministic. Rejects when
 * `signal` aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
