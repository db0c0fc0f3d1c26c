import { classifyError, RateLimitError, RunCancelledError } from '../agents/errors';
import type { Lane, LaneLimiter } from './limiter';

export interface RetryOptions {
  tries?: number;
  baseMs?: number;
  maxMs?: number;
  label?: string;
  signal?: AbortSignal;
  /** Rate-limit backoff is applied to this lane so every caller waits. */
  limiter?: LaneLimiter;
  lane?: Lane;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  const jitter = Math.floor(Math.random() * Math.min(250, baseMs));
  return Math.min(maxMs, baseMs * Math.pow(2, attempt - 1) + jitter);
}

export function sleep(ms: number, signal?: AbortSignal, label = 'backoff'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError(label));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError(label));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` up to `tries` times. Only transient failures are retried; the
 * last error is rethrown unchanged so callers can wrap it.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const tries = opts?.tries ?? 3;
  const baseMs = opts?.baseMs ?? 1000;
  const maxMs = opts?.maxMs ?? 60000;
  const label = opts?.label ?? 'request';
  let lastErr: unknown;

  for (let attempt = 1; attempt <= tries; attempt++) {
    if (opts?.signal?.aborted) {
      throw new RunCancelledError(label);
    }
    try {
      return await fn(attempt);
    } catch (e) {
      lastErr = e;
      if (classifyError(e) === 'permanent' || attempt === tries) {
        throw e;
      }

      const delay = backoffDelay(attempt, baseMs, maxMs);
      opts?.onRetry?.({ attempt, delayMs: delay, error: e });

      if (e instanceof RateLimitError && opts?.limiter && opts.lane) {
        opts.limiter.pause(opts.lane, e.retryAfterMs ?? delay);
        await opts.limiter.waitForResume(opts.lane, opts.signal);
      } else {
        await sleep(delay, opts?.signal, label);
      }
    }
  }
  throw lastErr;
}
