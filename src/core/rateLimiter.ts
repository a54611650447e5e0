import { setTimeout as sleep } from "timers/promises";
import scale from "../config/scale";

export interface RateLimiterOptions {
  requestsPerSecond?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Spaces requests to the same host at least `1000 / requestsPerSecond` ms
 * apart. The slot is claimed before waiting, so concurrent callers queue up
 * behind each other instead of firing together.
 */
export class HostRateLimiter {
  readonly minIntervalMs: number;
  private readonly lastRequestAt = new Map<string, number>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(options: RateLimiterOptions = {}) {
    const rps = options.requestsPerSecond ?? scale.fetching.requestsPerSecond;
    if (!(rps > 0)) throw new RangeError("requestsPerSecond must be positive");

    this.minIntervalMs = 1000 / rps;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async acquire(host: string): Promise<void> {
    const now = this.now();
    const last = this.lastRequestAt.get(host);
    const startAt = last === undefined ? now : Math.max(now, last + this.minIntervalMs);

    this.lastRequestAt.set(host, startAt);

    const wait = startAt - now;
    if (wait > 0) await this.sleep(wait);
  }
}
