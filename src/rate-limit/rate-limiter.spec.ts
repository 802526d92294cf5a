import { RateLimiter } from './rate-limiter';

describe('RateLimiter', () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = 1_700_000_000_000;
    limiter = new RateLimiter({ windowSeconds: 3600, clock: () => now });
  });

  it('should create a full bucket on first use', () => {
    expect(limiter.allow('token:abc', 5)).toBe(true);
    expect(limiter.remaining('token:abc')).toBe(4);
  });

  it('should deny the call after the ceiling is consumed', () => {
    for (let i = 0; i < 3; i++) {
      expect(limiter.allow('token:abc', 3)).toBe(true);
    }

    expect(limiter.allow('token:abc', 3)).toBe(false);
    expect(limiter.remaining('token:abc')).toBe(0);
  });

  it('should admit again after a full refill window', () => {
    for (let i = 0; i < 3; i++) {
      limiter.allow('token:abc', 3);
    }
    expect(limiter.allow('token:abc', 3)).toBe(false);

    now += 3600 * 1000;

    expect(limiter.allow('token:abc', 3)).toBe(true);
    expect(limiter.remaining('token:abc')).toBe(2);
  });

  it('should refill continuously with fractional tokens', () => {
    // 3600 per hour = 1 token per second
    for (let i = 0; i < 3600; i++) {
      limiter.allow('ip:10.0.0.1', 3600);
    }
    expect(limiter.allow('ip:10.0.0.1', 3600)).toBe(false);

    now += 500;
    expect(limiter.allow('ip:10.0.0.1', 3600)).toBe(false);

    now += 600;
    expect(limiter.allow('ip:10.0.0.1', 3600)).toBe(true);
  });

  it('should never refill beyond the ceiling', () => {
    limiter.allow('token:abc', 2);
    now += 10 * 3600 * 1000;

    limiter.allow('token:abc', 2);

    expect(limiter.remaining('token:abc')).toBe(1);
  });

  it('should keep keys independent', () => {
    limiter.allow('token:a', 1);

    expect(limiter.allow('token:a', 1)).toBe(false);
    expect(limiter.allow('token:b', 1)).toBe(true);
    expect(limiter.remaining('token:b')).toBe(0);
  });

  it('should report zero remaining for unknown keys', () => {
    expect(limiter.remaining('token:never-seen')).toBe(0);
  });

  it('should compute retry-after from the refill rate', () => {
    // ceiling 60 per hour = one token per minute
    limiter.allow('token:abc', 1);
    expect(limiter.allow('token:abc', 60)).toBe(false);

    // bucket ceiling is now 60 with ~0 tokens: one token needs 60 seconds
    expect(limiter.retryAfterSeconds('token:abc')).toBe(60);

    now += 30 * 1000;
    limiter.allow('token:abc', 60);
    expect(limiter.retryAfterSeconds('token:abc')).toBe(30);
  });

  it('should sweep buckets idle past the retention window', () => {
    limiter.allow('token:old', 10);
    now += 20 * 60 * 1000;
    limiter.allow('token:fresh', 10);

    const removed = limiter.sweep(10 * 60 * 1000);

    expect(removed).toBe(1);
    expect(limiter.size).toBe(1);
    expect(limiter.remaining('token:old')).toBe(0);
    expect(limiter.remaining('token:fresh')).toBe(9);
  });

  it('should reject a non-positive window', () => {
    expect(() => new RateLimiter({ windowSeconds: 0 })).toThrow(
      'Rate limit window must be positive',
    );
  });
});
