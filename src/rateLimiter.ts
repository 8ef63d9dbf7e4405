import crypto from 'node:crypto';
import type { RateLimitRule } from './config.js';
import { RateLimitedError } from './errors.js';

export type RateLimitResult = {
  allowed: boolean;
  /** 0 when allowed; otherwise ms until the subject's window resets. */
  retryAfterMs: number;
};

type WindowCounter = {
  windowStart: number;
  count: number;
};

/**
 * Fixed-window counters keyed by subject. Each subject's window starts at its
 * first request after the previous window elapsed, not on a shared clock tick.
 */
export class FixedWindowRateLimiter {
  private readonly counters = new Map<string, WindowCounter>();

  constructor(private readonly now: () => number = Date.now) {}

  allow(subjectKey: string, rule: RateLimitRule): RateLimitResult {
    const nowMs = this.now();
    const existing = this.counters.get(subjectKey);

    if (!existing || nowMs >= existing.windowStart + rule.windowMs) {
      this.counters.set(subjectKey, { windowStart: nowMs, count: 1 });
      return { allowed: true, retryAfterMs: 0 };
    }

    existing.count += 1;
    if (existing.count <= rule.max) {
      return { allowed: true, retryAfterMs: 0 };
    }
    return { allowed: false, retryAfterMs: existing.windowStart + rule.windowMs - nowMs };
  }

  cleanup(windowMs: number): void {
    const nowMs = this.now();
    for (const [key, counter] of this.counters) {
      if (counter.windowStart + windowMs <= nowMs) {
        this.counters.delete(key);
      }
    }
  }

  get size(): number {
    return this.counters.size;
  }
}

export function apiKeySubject(apiKey: string): string {
  // Counters never hold the raw secret.
  const digest = crypto.createHash('sha256').update(apiKey).digest('hex').slice(0, 16);
  return `apikey:${digest}`;
}

export function userSubject(userId: string): string {
  return `user:${userId}`;
}

export type InternalRateLimits = {
  perKey: RateLimitRule;
  perUser: RateLimitRule;
};

/**
 * Admission for internal calls. Both dimensions are counted on every request
 * and the request proceeds only when both allow it.
 */
export class InternalRequestLimiter {
  constructor(
    private readonly limiter: FixedWindowRateLimiter,
    private readonly limits: InternalRateLimits,
  ) {}

  admit(subject: { apiKey: string; userId?: string }): void {
    const results = [this.limiter.allow(apiKeySubject(subject.apiKey), this.limits.perKey)];
    if (subject.userId !== undefined) {
      results.push(this.limiter.allow(userSubject(subject.userId), this.limits.perUser));
    }
    const denied = results.filter((result) => !result.allowed);
    if (denied.length > 0) {
      throw new RateLimitedError(Math.max(...denied.map((result) => result.retryAfterMs)));
    }
  }

  cleanup(): void {
    this.limiter.cleanup(Math.max(this.limits.perKey.windowMs, this.limits.perUser.windowMs));
  }
}
