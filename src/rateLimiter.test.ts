import { describe, expect, it } from 'vitest';
import { RateLimitedError } from './errors.js';
import {
  FixedWindowRateLimiter,
  InternalRequestLimiter,
  apiKeySubject,
  userSubject,
} from './rateLimiter.js';

function clock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

const RULE = { max: 3, windowMs: 60_000 };

describe('FixedWindowRateLimiter', () => {
  it('allows max requests per window, then reports time until reset', () => {
    const time = clock();
    const limiter = new FixedWindowRateLimiter(time.now);

    for (let i = 0; i < 3; i += 1) {
      expect(limiter.allow('subject', RULE)).toEqual({ allowed: true, retryAfterMs: 0 });
      time.advance(1_000);
    }

    expect(limiter.allow('subject', RULE)).toEqual({ allowed: false, retryAfterMs: 57_000 });
  });

  it('resets the counter once the window has elapsed', () => {
    const time = clock();
    const limiter = new FixedWindowRateLimiter(time.now);
    for (let i = 0; i < 4; i += 1) {
      limiter.allow('subject', RULE);
    }

    time.advance(59_999);
    expect(limiter.allow('subject', RULE).allowed).toBe(false);
    time.advance(1);
    expect(limiter.allow('subject', RULE)).toEqual({ allowed: true, retryAfterMs: 0 });
  });

  it('keeps subjects independent', () => {
    const limiter = new FixedWindowRateLimiter(clock().now);
    for (let i = 0; i < 3; i += 1) {
      limiter.allow('a', RULE);
    }
    expect(limiter.allow('a', RULE).allowed).toBe(false);
    expect(limiter.allow('b', RULE).allowed).toBe(true);
  });

  it('drops counters whose window has passed', () => {
    const time = clock();
    const limiter = new FixedWindowRateLimiter(time.now);
    limiter.allow('a', RULE);
    time.advance(30_000);
    limiter.allow('b', RULE);
    time.advance(30_000);

    limiter.cleanup(RULE.windowMs);
    expect(limiter.size).toBe(1);
  });
});

describe('subjects', () => {
  it('never embeds the raw api key', () => {
    const subject = apiKeySubject('test-internal-key-0001');
    expect(subject).toMatch(/^apikey:[0-9a-f]{16}$/);
    expect(subject).not.toContain('test-internal-key');
    expect(apiKeySubject('test-internal-key-0001')).toBe(subject);
  });

  it('prefixes user subjects', () => {
    expect(userSubject('user-1')).toBe('user:user-1');
  });
});

describe('InternalRequestLimiter', () => {
  it('denies when the per-user budget is spent even though the key has room', () => {
    const time = clock();
    const limiter = new InternalRequestLimiter(new FixedWindowRateLimiter(time.now), {
      perKey: { max: 10, windowMs: 60_000 },
      perUser: { max: 2, windowMs: 60_000 },
    });

    limiter.admit({ apiKey: 'test-key', userId: 'user-1' });
    limiter.admit({ apiKey: 'test-key', userId: 'user-1' });
    time.advance(5_000);

    let denied: unknown;
    try {
      limiter.admit({ apiKey: 'test-key', userId: 'user-1' });
    } catch (error) {
      denied = error;
    }
    expect(denied).toBeInstanceOf(RateLimitedError);
    expect(denied instanceof RateLimitedError && denied.retryAfterMs).toBe(55_000);
    expect(denied instanceof RateLimitedError && denied.retryAfterSeconds).toBe(55);

    expect(() => limiter.admit({ apiKey: 'test-key', userId: 'user-2' })).not.toThrow();
  });

  it('denies every user once the key budget is spent', () => {
    const limiter = new InternalRequestLimiter(new FixedWindowRateLimiter(clock().now), {
      perKey: { max: 2, windowMs: 60_000 },
      perUser: { max: 10, windowMs: 60_000 },
    });

    limiter.admit({ apiKey: 'test-key', userId: 'user-1' });
    limiter.admit({ apiKey: 'test-key' });
    expect(() => limiter.admit({ apiKey: 'test-key', userId: 'user-2' })).toThrow(RateLimitedError);
    expect(() => limiter.admit({ apiKey: 'other-test-key', userId: 'user-3' })).not.toThrow();
  });
});
