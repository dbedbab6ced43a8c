/** Last verification attempt recorded for one user */
export interface RateLimitEntry {
  lastAttemptAt: number;
}

/** Rate limit check result */
export interface RateLimitResult {
  allowed: boolean;
  /** Remaining wait in milliseconds, 0 when allowed */
  retryAfterMs: number;
}

/**
 * Check whether a user may submit another verification attempt
 * @param entry - User's last attempt (undefined means no record)
 * @param durationMs - Minimum interval between attempts
 * @param now - Current timestamp in milliseconds
 * @returns Whether the attempt is allowed and how long to wait otherwise
 */
export function checkRateLimit(
  entry: RateLimitEntry | undefined,
  durationMs: number,
  now: number,
): RateLimitResult {
  if (!entry) {
    return { allowed: true, retryAfterMs: 0 };
  }

  const elapsed = now - entry.lastAttemptAt;
  if (elapsed >= durationMs) {
    return { allowed: true, retryAfterMs: 0 };
  }

  return { allowed: false, retryAfterMs: durationMs - elapsed };
}

/**
 * Whole minutes to tell the user to wait, rounded up so it is never 0 while blocked
 * @param retryAfterMs - Remaining wait in milliseconds
 */
export function retryAfterMinutes(retryAfterMs: number): number {
  return Math.max(1, Math.ceil(retryAfterMs / 60_000));
}
