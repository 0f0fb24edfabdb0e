/**
 * Pricewise — Rate Limiter
 *
 * Sliding-window limiter keyed by client id. A request is admitted when
 * fewer than `limit` admitted requests from that client fall inside the
 * trailing window. Rejected requests are not recorded.
 */

export interface RateLimiterOptions {
  /** Requests allowed per window (default 10). */
  limit?: number;
  /** Window length in ms (default 60000). */
  windowMs?: number;
  /** Clock in epoch ms. */
  now?: () => number;
}

export class RateLimiter {
  readonly limit: number;
  readonly windowMs: number;

  private readonly windows = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.limit = options.limit ?? 10;
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Admit or reject one request. Admitting records its timestamp.
   */
  allow(clientId: string): boolean {
    const now = this.now();
    const timestamps = this.prune(clientId, now);

    if (timestamps.length >= this.limit) {
      return false;
    }

    timestamps.push(now);
    this.windows.set(clientId, timestamps);
    return true;
  }

  remainingFor(clientId: string): number {
    return Math.max(0, this.limit - this.prune(clientId, this.now()).length);
  }

  /**
   * Epoch ms at which the client's oldest counted request leaves the
   * window, or null when nothing is counted.
   */
  resetTimeFor(clientId: string): number | null {
    const timestamps = this.prune(clientId, this.now());
    return timestamps.length > 0 ? timestamps[0] + this.windowMs : null;
  }

  /**
   * Whole seconds until the client may be admitted again; 0 when it may be now.
   */
  retryAfterSeconds(clientId: string): number {
    const now = this.now();
    const timestamps = this.prune(clientId, now);
    if (timestamps.length < this.limit) return 0;
    return Math.max(1, Math.ceil((timestamps[0] + this.windowMs - now) / 1000));
  }

  /**
   * Forget clients with no requests left in the window.
   * Returns how many were removed.
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;

    for (const clientId of [...this.windows.keys()]) {
      if (this.prune(clientId, now).length === 0) {
        this.windows.delete(clientId);
        removed++;
      }
    }

    return removed;
  }

  clientCount(): number {
    return this.windows.size;
  }

  private prune(clientId: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    const timestamps = (this.windows.get(clientId) ?? []).filter(ts => ts > cutoff);

    if (this.windows.has(clientId)) {
      this.windows.set(clientId, timestamps);
    }
    return timestamps;
  }
}
