import type { ComponentLogger, Logger } from './logger.js';

export interface RateLimitState {
  requests: number;
  // Completion time of the previous request, null before the first one
  lastRequestAt: number | null;
}

/**
 * Decides how long a source must wait before its next request.
 * Swap the policy to change pacing without touching the sources.
 */
export interface RateLimitPolicy {
  getWaitTime(state: RateLimitState, now: number): number;
}

/**
 * Fixed politeness delay: consecutive requests are spaced by at least
 * `intervalMs`, measured from the end of the previous request.
 */
export class MinIntervalPolicy implements RateLimitPolicy {
  readonly intervalMs: number;

  constructor(intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`Invalid rate limit interval: ${intervalMs}`);
    }
    this.intervalMs = intervalMs;
  }

  getWaitTime(state: RateLimitState, now: number): number {
    if (state.lastRequestAt === null) return 0;
    return Math.max(0, state.lastRequestAt + this.intervalMs - now);
  }
}

/**
 * Per-source request pacing
 */
export class RateLimiter {
  private states: Map<string, RateLimitState> = new Map();
  private policies: Map<string, RateLimitPolicy> = new Map();
  private logger: ComponentLogger;

  constructor(logger: Logger) {
    this.logger = logger.child('rate-limiter');
  }

  configure(source: string, policy: RateLimitPolicy): void {
    this.policies.set(source, policy);
    this.states.set(source, { requests: 0, lastRequestAt: null });
  }

  canRequest(source: string): boolean {
    return this.getWaitTime(source) === 0;
  }

  /**
   * Mark a request as finished; the next wait is measured from now
   */
  recordRequest(source: string): void {
    const state = this.states.get(source);
    if (state) {
      state.requests++;
      state.lastRequestAt = Date.now();
    }
  }

  getRequestCount(source: string): number {
    return this.states.get(source)?.requests ?? 0;
  }

  getWaitTime(source: string): number {
    const policy = this.policies.get(source);
    const state = this.states.get(source);

    if (!policy || !state) return 0; // No limit configured

    return policy.getWaitTime(state, Date.now());
  }

  async waitForSlot(source: string): Promise<void> {
    const waitMs = this.getWaitTime(source);
    if (waitMs <= 0) return;

    this.logger.debug({
      action: 'waiting',
      source,
      wait_ms: waitMs,
    });
    await delay(waitMs);
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
