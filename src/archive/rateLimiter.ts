import { setTimeout as delay } from "node:timers/promises";

import { CancellationError, QuotaExceededError } from "./errors";

export type Clock = {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancellationError("Cancelled while waiting for the rate limiter");
      }
      throw error;
    }
  }
};

export type RateLimitConfig = {
  /** Minimum time between two consecutive grants. */
  minSpacingMs: number;
  /** Length of the trailing window the payload budget applies to. */
  windowMs: number;
  /** Cap on the sum of granted payload sizes inside any trailing window. */
  maxWindowBytes: number;
};

export type RateLimitGrant = {
  readonly grantedAt: number;
  readonly bytes: number;
  /**
  * Records the payload size observed after the request. The recorded size only ever
  * grows, so an underestimate tightens the budget for later callers.
  */
  settle(actualBytes: number): void;
  /** Returns the bytes of a grant that was never used for a request. Spacing still applies. */
  release(): void;
};

type GrantRecord = {
  at: number;
  bytes: number;
};

function assertPositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`);
  }
}

/**
* Process-wide throttle shared by every fetch, whichever series issues it.
*
* Callers are served strictly in arrival order: each `acquire` waits for the previous one
* to be granted before it starts waiting itself.
*/
export class RateLimiter {
  readonly config: RateLimitConfig;
  readonly #clock: Clock;
  #queue: Promise<void> = Promise.resolve();
  #lastGrantAt: number | null = null;
  #grants: GrantRecord[] = [];

  constructor(config: RateLimitConfig, clock: Clock = systemClock) {
    assertPositive(config.windowMs, "rateLimit.windowMs");
    assertPositive(config.maxWindowBytes, "rateLimit.maxWindowBytes");
    if (!Number.isFinite(config.minSpacingMs) || config.minSpacingMs < 0) {
      throw new Error(`rateLimit.minSpacingMs must be >= 0, got ${config.minSpacingMs}`);
    }

    this.config = { ...config };
    this.#clock = clock;
  }

  acquire(estimatedBytes: number, signal?: AbortSignal): Promise<RateLimitGrant> {
    if (!Number.isFinite(estimatedBytes) || estimatedBytes < 0) {
      return Promise.reject(new Error(`Invalid payload estimate: ${estimatedBytes}`));
    }
    if (estimatedBytes > this.config.maxWindowBytes) {
      return Promise.reject(new QuotaExceededError(estimatedBytes, this.config.maxWindowBytes));
    }

    const turn = this.#queue.then(() => this.#grant(estimatedBytes, signal));
    this.#queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  async #grant(bytes: number, signal: AbortSignal | undefined): Promise<RateLimitGrant> {
    for (;;) {
      if (signal?.aborted) {
        throw new CancellationError("Cancelled while waiting for the rate limiter");
      }

      const now = this.#clock.now();
      const readyAt = this.#readyAt(bytes, now);
      if (readyAt <= now) {
        const record: GrantRecord = { at: now, bytes };
        this.#grants.push(record);
        this.#lastGrantAt = now;
        return {
          grantedAt: now,
          bytes,
          settle(actualBytes: number) {
            if (Number.isFinite(actualBytes) && actualBytes > record.bytes) {
              record.bytes = actualBytes;
            }
          },
          release: () => {
            this.#grants = this.#grants.filter((g) => g !== record);
          }
        };
      }

      await this.#clock.sleep(readyAt - now, signal);
    }
  }

  #readyAt(bytes: number, now: number): number {
    const { minSpacingMs, windowMs, maxWindowBytes } = this.config;
    let readyAt = this.#lastGrantAt === null ? now : Math.max(now, this.#lastGrantAt + minSpacingMs);

    // A grant at `at` stops counting once the clock reaches `at + windowMs`.
    this.#grants = this.#grants.filter((g) => g.at > now - windowMs);
    let used = this.#grants.reduce((sum, g) => sum + g.bytes, 0);
    for (const g of this.#grants) {
      if (used + bytes <= maxWindowBytes) {
        break;
      }
      used -= g.bytes;
      readyAt = Math.max(readyAt, g.at + windowMs);
    }

    return readyAt;
  }
}
