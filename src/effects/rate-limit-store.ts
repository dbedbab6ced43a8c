import { checkRateLimit, type RateLimitEntry, type RateLimitResult } from '../modules/rate-limiter.js';

/** In-memory rate limit store, keyed by userId across every guild */
export class RateLimitStore {
  private entries = new Map<string, RateLimitEntry>();

  /**
   * Get the rate limit record for a specified user
   * @param userId - Discord user ID
   * @returns The rate limit record, or undefined if not found
   */
  getEntry(userId: string): RateLimitEntry | undefined {
    return this.entries.get(userId);
  }

  /**
   * Check the user's last attempt and, when allowed, record `now` as the new one
   * @param userId - Discord user ID
   * @param durationMs - Minimum interval between attempts
   * @param now - Current timestamp in milliseconds
   */
  check(userId: string, durationMs: number, now = Date.now()): RateLimitResult {
    const result = checkRateLimit(this.entries.get(userId), durationMs, now);
    if (result.allowed) {
      this.entries.set(userId, { lastAttemptAt: now });
    }
    return result;
  }
}
