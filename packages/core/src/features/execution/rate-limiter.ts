// ============================================================
// RateLimiter: fixed-window request ceiling with a FIFO queue.
// Callers over the ceiling wait for the next window; nothing
// is ever dropped.
// ============================================================

import type { RateLimitConfig } from '../../shared/config.js';

export class RateLimiter {
  private readonly maxRequests: number;
  private readonly intervalMs: number;
  private tokens: number;
  private windowStart: number;
  private queue: Array<() => void> = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(config: RateLimitConfig) {
    this.maxRequests = config.maxRequests;
    this.intervalMs = config.intervalMs;
    this.tokens = config.maxRequests;
    this.windowStart = Date.now();
  }

  /**
   * Run `task` once a request slot is available.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        Promise.resolve().then(task).then(resolve, reject);
      });
      this.drain();
    });
  }

  /**
   * Number of requests waiting for a slot.
   */
  pending(): number {
    return this.queue.length;
  }

  /**
   * Stop the refill timer. Queued tasks stay queued.
   */
  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private drain(): void {
    this.refill();

    while (this.queue.length > 0 && this.tokens > 0) {
      this.tokens--;
      const next = this.queue.shift();
      next?.();
    }

    if (this.queue.length > 0 && !this.timer) {
      const wait = Math.max(0, this.windowStart + this.intervalMs - Date.now());
      this.timer = setTimeout(() => {
        this.timer = null;
        this.drain();
      }, wait);
    }
  }

  private refill(): void {
    const now = Date.now();
    if (now - this.windowStart >= this.intervalMs) {
      this.tokens = this.maxRequests;
      this.windowStart = now;
    }
  }
}
