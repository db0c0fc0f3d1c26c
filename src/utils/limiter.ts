import { sleep } from './retry';

export type Lane = 'documents' | 'text_generation';

export type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  documents: 4,
  text_generation: 2,
};

/**
 * Bounded concurrency per lane. A lane can also be paused, which holds back
 * every task that has not started yet until the pause expires; the rate-limit
 * backoff uses this so one 429 slows all in-flight callers, not just the one
 * that saw it.
 */
export class LaneLimiter {
  private queues: Map<Lane, Array<() => void>> = new Map();
  private running: Map<Lane, number> = new Map();
  private pausedUntil: Map<Lane, number> = new Map();
  private config: LimiterConfig;

  constructor(config?: Partial<LimiterConfig>) {
    this.config = { ...defaultConfig, ...config };
    for (const lane of Object.keys(this.config) as Lane[]) {
      if (this.config[lane] < 1) {
        throw new Error(`Limiter lane ${lane} needs a concurrency of at least 1`);
      }
      this.queues.set(lane, []);
      this.running.set(lane, 0);
    }
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(lane);
    try {
      await this.waitForResume(lane, signal);
      return await fn();
    } finally {
      this.release(lane);
    }
  }

  pause(lane: Lane, ms: number): void {
    const until = Date.now() + ms;
    if (until > (this.pausedUntil.get(lane) ?? 0)) {
      this.pausedUntil.set(lane, until);
    }
  }

  /**
   * Resolves once any pause on the lane has expired. Rejects with
   * RunCancelledError as soon as `signal` aborts.
   */
  async waitForResume(lane: Lane, signal?: AbortSignal): Promise<void> {
    let remaining = (this.pausedUntil.get(lane) ?? 0) - Date.now();
    while (remaining > 0) {
      await sleep(remaining, signal, `${lane} pause`);
      remaining = (this.pausedUntil.get(lane) ?? 0) - Date.now();
    }
  }

  activeCount(lane: Lane): number {
    return this.running.get(lane) ?? 0;
  }

  private acquire(lane: Lane): Promise<void> {
    const running = this.running.get(lane) ?? 0;
    if (running < this.config[lane]) {
      this.running.set(lane, running + 1);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.queue(lane).push(() => {
        this.running.set(lane, (this.running.get(lane) ?? 0) + 1);
        resolve();
      });
    });
  }

  private release(lane: Lane): void {
    this.running.set(lane, Math.max(0, (this.running.get(lane) ?? 1) - 1));
    const next = this.queue(lane).shift();
    if (next) {
      next();
    }
  }

  private queue(lane: Lane): Array<() => void> {
    let queue = this.queues.get(lane);
    if (!queue) {
      queue = [];
      this.queues.set(lane, queue);
    }
    return queue;
  }
}

export function createLimiter(config?: Partial<LimiterConfig>): LaneLimiter {
  return new LaneLimiter(config);
}
