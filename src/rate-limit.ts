/**
 * Per-host rate limiting for the article render API
 * Budgets renderer calls by hostname; cache hits do not count against it.
 */

import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { RateLimitError } from './errors.js';

export interface HostRateLimiter {
  consume(url: string): Promise<void>;
}

class MemoryHostRateLimiter implements HostRateLimiter {
  private readonly limiter: RateLimiterMemory;

  constructor(requestsPerMinute: number) {
    this.limiter = new RateLimiterMemory({
      points: requestsPerMinute,
      duration: 60, // per minute
    });
  }

  async consume(url: string): Promise<void> {
    const hostname = new URL(url).hostname;
    try {
      await this.limiter.consume(hostname);
    } catch (rejection) {
      if (rejection instanceof RateLimiterRes) {
        const secs = Math.round(rejection.msBeforeNext / 1000) || 1;
        throw new RateLimitError(hostname, secs);
      }
      throw rejection;
    }
  }
}

const unlimited: HostRateLimiter = {
  consume: async () => undefined,
};

/**
 * `requestsPerMinute` of 0 turns limiting off.
 */
export function createHostRateLimiter(requestsPerMinute: number): HostRateLimiter {
  return requestsPerMinute > 0 ? new MemoryHostRateLimiter(requestsPerMinute) : unlimited;
}
