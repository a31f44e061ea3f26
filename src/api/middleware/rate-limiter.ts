/**
 * Rate Limiting Middleware - fixed window per client
 */

import { RateLimitInfo } from '../../types/api';
import { RateLimitSettings } from '../../types/config';

/** Client rate limit state */
interface ClientWindow {
  requests: number;
  windowStart: number;
}

/** Rate limit result */
export interface RateLimitResult {
  allowed: boolean;
  info: RateLimitInfo;
  retryAfterMs?: number;
}

/** Default rate limit settings */
const DEFAULT_SETTINGS: RateLimitSettings = {
  maxRequests: 100,
  windowMs: 60000
};

/**
 * Rate Limiter implementation
 */
export class RateLimiter {
  private settings: RateLimitSettings;
  private clients: Map<string, ClientWindow> = new Map();
  private now: () => number;
  private lastPrunedAt: number;

  constructor(settings?: Partial<RateLimitSettings>, clock: () => number = Date.now) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
    this.now = clock;
    this.lastPrunedAt = clock();
  }

  /**
   * Count a request against the client's window
   */
  checkLimit(clientId: string): RateLimitResult {
    const now = this.now();
    // At most one sweep per window length
    if (now - this.lastPrunedAt >= this.settings.windowMs) {
      this.pruneExpired(now);
    }

    const window = this.currentWindow(clientId, now);
    const windowEnd = window.windowStart + this.settings.windowMs;
    const resetAt = new Date(windowEnd);

    if (window.requests >= this.settings.maxRequests) {
      return {
        allowed: false,
        info: { limit: this.settings.maxRequests, remaining: 0, resetAt },
        retryAfterMs: windowEnd - now
      };
    }

    window.requests++;

    return {
      allowed: true,
      info: {
        limit: this.settings.maxRequests,
        remaining: this.settings.maxRequests - window.requests,
        resetAt
      }
    };
  }

  /**
   * Get current rate limit info for a client (without counting)
   */
  getInfo(clientId: string): RateLimitInfo {
    const now = this.now();
    const window = this.clients.get(clientId);

    if (!window || this.isExpired(window, now)) {
      return {
        limit: this.settings.maxRequests,
        remaining: this.settings.maxRequests,
        resetAt: new Date(now + this.settings.windowMs)
      };
    }

    return {
      limit: this.settings.maxRequests,
      remaining: Math.max(0, this.settings.maxRequests - window.requests),
      resetAt: new Date(window.windowStart + this.settings.windowMs)
    };
  }

  /**
   * Drop windows that have expired
   */
  prune(): number {
    return this.pruneExpired(this.now());
  }

  /**
   * Number of clients with a tracked window
   */
  size(): number {
    return this.clients.size;
  }

  private pruneExpired(now: number): number {
    this.lastPrunedAt = now;
    let removed = 0;
    for (const [clientId, window] of this.clients) {
      if (this.isExpired(window, now)) {
        this.clients.delete(clientId);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Reset rate limit for a client
   */
  reset(clientId: string): void {
    this.clients.delete(clientId);
  }

  /**
   * Replace the settings; existing windows are kept
   */
  updateSettings(settings: Partial<RateLimitSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  getSettings(): RateLimitSettings {
    return { ...this.settings };
  }

  private currentWindow(clientId: string, now: number): ClientWindow {
    const existing = this.clients.get(clientId);
    if (existing && !this.isExpired(existing, now)) {
      return existing;
    }
    const fresh: ClientWindow = { requests: 0, windowStart: now };
    this.clients.set(clientId, fresh);
    return fresh;
  }

  private isExpired(window: ClientWindow, now: number): boolean {
    return now - window.windowStart >= this.settings.windowMs;
  }
}

/**
 * Create rate limiter instance
 */
export function createRateLimiter(settings?: Partial<RateLimitSettings>, clock?: () => number): RateLimiter {
  return new RateLimiter(settings, clock);
}
