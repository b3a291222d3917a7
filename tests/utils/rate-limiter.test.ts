import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RateLimiter, MinIntervalPolicy, delay, type RateLimitPolicy } from '../../src/utils/rate-limiter.js';
import { Logger } from '../../src/utils/logger.js';

describe('MinIntervalPolicy', () => {
  it('should not wait before the first request', () => {
    const policy = new MinIntervalPolicy(1000);

    expect(policy.getWaitTime({ requests: 0, lastRequestAt: null }, 5000)).toBe(0);
  });

  it('should wait out the rest of the interval', () => {
    const policy = new MinIntervalPolicy(1000);

    expect(policy.getWaitTime({ requests: 1, lastRequestAt: 5000 }, 5300)).toBe(700);
  });

  it('should not wait once the interval has passed', () => {
    const policy = new MinIntervalPolicy(500);

    expect(policy.getWaitTime({ requests: 1, lastRequestAt: 5000 }, 6000)).toBe(0);
  });

  it('should reject negative intervals', () => {
    expect(() => new MinIntervalPolicy(-1)).toThrow(RangeError);
  });
});

describe('RateLimiter', () => {
  let rateLimiter: RateLimiter;

  beforeEach(() => {
    const logger = new Logger('test');
    logger.setEmitter(vi.fn());
    rateLimiter = new RateLimiter(logger);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('canRequest', () => {
    it('should return true when no policy is configured', () => {
      expect(rateLimiter.canRequest('unknown-source')).toBe(true);
    });

    it('should return false inside the interval', () => {
      rateLimiter.configure('hmdb', new MinIntervalPolicy(1000));

      rateLimiter.recordRequest('hmdb');

      expect(rateLimiter.canRequest('hmdb')).toBe(false);
    });

    it('should keep sources independent', () => {
      rateLimiter.configure('hmdb', new MinIntervalPolicy(1000));
      rateLimiter.configure('kegg', new MinIntervalPolicy(500));

      rateLimiter.recordRequest('hmdb');

      expect(rateLimiter.canRequest('hmdb')).toBe(false);
      expect(rateLimiter.canRequest('kegg')).toBe(true);
    });
  });

  describe('getWaitTime', () => {
    it('should measure from the last recorded request', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
      rateLimiter.configure('hmdb', new MinIntervalPolicy(1000));

      rateLimiter.recordRequest('hmdb');
      vi.setSystemTime(new Date('2024-01-01T00:00:00.400Z'));

      expect(rateLimiter.getWaitTime('hmdb')).toBe(600);
    });

    it('should delegate to a custom policy', () => {
      const policy: RateLimitPolicy = {
        getWaitTime: (state) => state.requests * 100,
      };
      rateLimiter.configure('kegg', policy);

      rateLimiter.recordRequest('kegg');
      rateLimiter.recordRequest('kegg');

      expect(rateLimiter.getWaitTime('kegg')).toBe(200);
      expect(rateLimiter.getRequestCount('kegg')).toBe(2);
    });
  });

  describe('waitForSlot', () => {
    it('should resolve immediately for the first request', async () => {
      rateLimiter.configure('hmdb', new MinIntervalPolicy(1000));

      const start = Date.now();
      await rateLimiter.waitForSlot('hmdb');

      expect(Date.now() - start).toBeLessThan(50);
    });

    it('should hold the next request until the interval has passed', async () => {
      vi.useFakeTimers();
      rateLimiter.configure('kegg', new MinIntervalPolicy(500));
      rateLimiter.recordRequest('kegg');

      let released = false;
      const waiting = rateLimiter.waitForSlot('kegg').then(() => {
        released = true;
      });

      await vi.advanceTimersByTimeAsync(499);
      expect(released).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await waiting;
      expect(released).toBe(true);
    });
  });
});

describe('delay', () => {
  it('should delay for the given milliseconds', async () => {
    const start = Date.now();
    await delay(100);
    const duration = Date.now() - start;

    expect(duration).toBeGreaterThanOrEqual(95);
    expect(duration).toBeLessThan(200);
  });
});
