import { mkdir, open, rename, rm, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { FetchLike, SleepFn } from '../types/http.js';
import { getConfig } from '../config/index.js';
import {
  ACCEPT_ENCODING_IDENTITY,
  HEADER_ACCEPT_ENCODING,
  HEADER_ACCEPT_RANGES,
  HEADER_AUTHORIZATION,
  HEADER_CONTENT_LENGTH,
  HEADER_CONTENT_RANGE,
  HEADER_RANGE,
  HEADER_RETRY_AFTER,
  PARTIAL_FILE_SUFFIX,
} from '../config/constants.js';
import { FilesystemError, HttpStatusError, TransferFailedError } from '../errors/index.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { RetryBudget, parseRetryAfter, type FailurePhase, type RetryPolicyOptions } from './retry-policy.js';

export interface TransferTimeouts {
  /** Time allowed until response headers arrive */
  connectMs?: number;
  /** Longest pause allowed between two body chunks */
  readMs?: number;
}

export interface TransferProgress {
  bytesTransferred: number;
  totalBytes?: number;
}

export interface TransferOptions {
  timeouts?: TransferTimeouts;
  onProgress?: (progress: TransferProgress) => void;
  signal?: AbortSignal;
}

export interface TransferClientOptions {
  fetch?: FetchLike;
  sleep?: SleepFn;
  logger?: Logger;
  retry?: RetryPolicyOptions;
  timeouts?: TransferTimeouts;
}

/** Bytes on disk that a later attempt may continue from */
interface PartialState {
  written: number;
  resumable: boolean;
}

type AttemptOutcome =
  | { kind: 'done'; written: number }
  | { kind: 'retry'; phase: FailurePhase; error: unknown; retryAfterMs?: number; state?: PartialState }
  | { kind: 'fatal'; error: unknown };

interface AttemptContext {
  url: string;
  partPath: string;
  token: string;
  offset: number;
  connectMs: number;
  readMs: number;
  budget: RetryBudget;
  options: TransferOptions;
}

const CONTENT_RANGE_PATTERN = /^bytes (\d+)-(\d+)\/(\d+|\*)$/;

function timeoutError(message: string): Error {
  const error = new Error(message);
  error.name = 'TimeoutError';
  return error;
}

function parseLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) return undefined;
  return Number(value.trim());
}

/**
 * Downloads one resource to disk with bounded retries.
 *
 * Bytes land in `<destination>.part` next to the destination and are renamed
 * onto it only once the body has been read completely, so the destination
 * either holds the whole payload or does not exist.
 */
export class TransferClient {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;
  private readonly retry: RetryPolicyOptions;
  private readonly timeouts: Required<TransferTimeouts>;

  constructor(options: TransferClientOptions = {}) {
    const config = getConfig().transfer;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
    this.logger = options.logger ?? getLogger();
    this.retry = {
      total: config.maxRetries,
      backoffFactorMs: config.backoffFactorMs,
      ...options.retry,
    };
    this.timeouts = {
      connectMs: options.timeouts?.connectMs ?? config.connectTimeoutMs,
      readMs: options.timeouts?.readMs ?? config.readTimeoutMs,
    };
  }

  /**
   * Download `url` to `destinationPath` using `token` as bearer credential.
   * Resolves with the destination path.
   */
  async fetch(url: string, destinationPath: string, token: string, options: TransferOptions = {}): Promise<string> {
    const partPath = `${destinationPath}${PARTIAL_FILE_SUFFIX}`;
    const directory = dirname(destinationPath);

    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new FilesystemError(directory, error);
    }

    const budget = new RetryBudget(this.retry);
    const ctx: AttemptContext = {
      url,
      partPath,
      token,
      offset: 0,
      connectMs: options.timeouts?.connectMs ?? this.timeouts.connectMs,
      readMs: options.timeouts?.readMs ?? this.timeouts.readMs,
      budget,
      options,
    };

    let attempts = 0;
    let state: PartialState = { written: 0, resumable: false };

    try {
      for (;;) {
        if (options.signal?.aborted) {
          throw new TransferFailedError(url, attempts, options.signal.reason);
        }

        attempts++;
        ctx.offset = state.resumable ? state.written : 0;
        if (ctx.offset > 0) {
          this.logger.info({ url, offset: ctx.offset, attempt: attempts }, 'resuming transfer');
        }

        const outcome = await this.attempt(ctx);

        if (outcome.kind === 'done') {
          this.logger.info({ url, destinationPath, bytes: outcome.written, attempts }, 'transfer complete');
          break;
        }

        if (outcome.kind === 'fatal') {
          if (outcome.error instanceof FilesystemError) throw outcome.error;
          throw new TransferFailedError(url, attempts, outcome.error);
        }

        if (outcome.state) {
          state = outcome.state;
        }

        if (!budget.consume(outcome.phase)) {
          this.logger.error({ url, phase: outcome.phase, attempts, err: outcome.error }, 'transfer retries exhausted');
          throw new TransferFailedError(url, attempts, outcome.error);
        }

        const delayMs = budget.backoffMs(outcome.retryAfterMs);
        this.logger.warn(
          { url, phase: outcome.phase, attempt: attempts, delayMs, err: outcome.error },
          'transfer attempt failed, retrying'
        );
        try {
          await this.sleep(delayMs, options.signal);
        } catch (error) {
          if (options.signal?.aborted) {
            throw new TransferFailedError(url, attempts, options.signal.reason);
          }
          throw error;
        }
      }
    } catch (error) {
      await rm(partPath, { force: true });
      throw error;
    }

    try {
      await rename(partPath, destinationPath);
    } catch (error) {
      await rm(partPath, { force: true });
      throw new FilesystemError(destinationPath, error);
    }

    return destinationPath;
  }

  private async attempt(ctx: AttemptContext): Promise<AttemptOutcome> {
    const { url, token, offset, options } = ctx;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    // Rejects once the attempt is aborted, whether or not the transport honours the signal
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    void aborted.catch(() => undefined);

    const callerAborted = () => options.signal?.aborted === true;

    try {
      const headers: Record<string, string> = {
        [HEADER_AUTHORIZATION]: `Bearer ${token}`,
        [HEADER_ACCEPT_ENCODING]: ACCEPT_ENCODING_IDENTITY,
      };
      if (offset > 0) {
        headers[HEADER_RANGE] = `bytes=${offset}-`;
      }

      let response: Response;
      const connectTimer = setTimeout(
        () => controller.abort(timeoutError(`No response headers within ${ctx.connectMs}ms`)),
        ctx.connectMs
      );
      try {
        response = await Promise.race([
          this.fetchImpl(url, { method: 'GET', headers, signal: controller.signal }),
          aborted,
        ]);
      } catch (error) {
        if (callerAborted()) return { kind: 'fatal', error };
        return { kind: 'retry', phase: 'connect', error };
      } finally {
        clearTimeout(connectTimer);
      }

      return await this.receive(ctx, response, controller, aborted, callerAborted);
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async receive(
    ctx: AttemptContext,
    response: Response,
    controller: AbortController,
    aborted: Promise<never>,
    callerAborted: () => boolean
  ): Promise<AttemptOutcome> {
    const { url, offset, budget } = ctx;
    const acceptRanges = response.headers.get(HEADER_ACCEPT_RANGES)?.trim().toLowerCase() === 'bytes';

    if (budget.isRetryableStatus(response.status)) {
      await response.body?.cancel();
      return {
        kind: 'retry',
        phase: 'status',
        error: new HttpStatusError(response.status, url, response.statusText),
        retryAfterMs: parseRetryAfter(response.headers.get(HEADER_RETRY_AFTER)),
      };
    }

    if (response.status === 416 && offset > 0) {
      await response.body?.cancel();
      return {
        kind: 'retry',
        phase: 'status',
        error: new HttpStatusError(response.status, url, response.statusText),
        state: { written: 0, resumable: false },
      };
    }

    if (response.status < 200 || response.status >= 300) {
      await response.body?.cancel();
      return { kind: 'fatal', error: new HttpStatusError(response.status, url, response.statusText) };
    }

    let append = false;
    let totalBytes = parseLength(response.headers.get(HEADER_CONTENT_LENGTH));

    if (response.status === 206) {
      const match = CONTENT_RANGE_PATTERN.exec(response.headers.get(HEADER_CONTENT_RANGE) ?? '');
      const start = match ? Number(match[1]) : undefined;
      if (start !== offset) {
        await response.body?.cancel();
        return {
          kind: 'retry',
          phase: 'status',
          error: new Error(`Content-Range does not start at byte ${offset}`),
          state: { written: 0, resumable: false },
        };
      }
      append = offset > 0;
      const total = match?.[3];
      totalBytes = total !== undefined && total !== '*' ? Number(total) : undefined;
    }

    let handle: FileHandle;
    try {
      handle = await open(ctx.partPath, append ? 'a' : 'w');
    } catch (error) {
      await response.body?.cancel();
      return { kind: 'fatal', error: new FilesystemError(ctx.partPath, error) };
    }

    let written = append ? offset : 0;
    let finished = false;
    const reader = response.body?.getReader();
    const readChunk = async () => {
      try {
        if (!reader) return { ok: true as const, done: true as const };
        const result = await Promise.race([reader.read(), aborted]);
        return result.done
          ? { ok: true as const, done: true as const }
          : { ok: true as const, done: false as const, value: result.value };
      } catch (error) {
        return { ok: false as const, error };
      }
    };

    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(
        () => controller.abort(timeoutError(`No data received for ${ctx.readMs}ms`)),
        ctx.readMs
      );
    };

    try {
      armIdleTimer();
      for (;;) {
        const step = await readChunk();
        if (!step.ok) {
          if (callerAborted()) return { kind: 'fatal', error: step.error };
          return {
            kind: 'retry',
            phase: 'read',
            error: step.error,
            state: { written, resumable: acceptRanges && written > 0 },
          };
        }
        if (step.done) break;

        try {
          await handle.write(step.value);
        } catch (error) {
          return { kind: 'fatal', error: new FilesystemError(ctx.partPath, error) };
        }
        written += step.value.byteLength;
        armIdleTimer();
        ctx.options.onProgress?.({ bytesTransferred: written, totalBytes });
      }
      finished = true;

      if (totalBytes !== undefined && written < totalBytes) {
        return {
          kind: 'retry',
          phase: 'read',
          error: new Error(`Body ended after ${written} of ${totalBytes} bytes`),
          state: { written, resumable: acceptRanges && written > 0 },
        };
      }

      return { kind: 'done', written };
    } finally {
      clearTimeout(idleTimer);
      if (reader && !finished) {
        await reader.cancel(controller.signal.reason).catch(() => undefined);
      }
      await handle.close();
    }
  }
}
