/**
 * In-memory per-user message rate limiter.
 *
 * Three windows per user: a minimum gap between two messages, a rolling
 * hourly cap and a rolling daily cap (config.rateLimit).
 *
 * Follows the validateBody()/isAuthError() call pattern:
 *   const rl = checkMessageRateLimit(userId);
 *   if (!rl.ok) return rateLimitResponse(rl);
 *
 * Limitations:
 * - In-memory: resets on restart, not shared across instances
 */

import { NextResponse } from "next/server";
import { config } from "@/lib/config";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/** userId -> accepted message timestamps within the last day, oldest first */
const history = new Map<number, number[]>();

// Periodic cleanup to prevent memory leaks (every 10 min)
if (typeof setInterval !== "undefined") {
  setInterval(() => {
    const cutoff = Date.now() - DAY_MS;
    for (const [userId, stamps] of history) {
      const kept = stamps.filter((t) => t > cutoff);
      if (kept.length === 0) history.delete(userId);
      else history.set(userId, kept);
    }
  }, 10 * 60_000).unref?.();
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export type RateLimitReason = "too_fast" | "hourly_limit" | "daily_limit";

type RateLimitOk = { ok: true };
export type RateLimitBlocked = { ok: false; reason: RateLimitReason; retryAfter: number };

const REASON_TEXT: Record<RateLimitReason, string> = {
  too_fast: "You are sending messages too quickly. Please wait a few seconds.",
  hourly_limit: "You have reached the hourly message limit. Please try again later.",
  daily_limit: "You have reached the daily message limit. Please try again tomorrow.",
};

export function describeRateLimit(reason: RateLimitReason): string {
  return REASON_TEXT[reason];
}

/**
 * Check and record one message for a user.
 * Blocked messages are not recorded.
 */
export function checkMessageRateLimit(userId: number, now = Date.now()): RateLimitOk | RateLimitBlocked {
  const stamps = (history.get(userId) ?? []).filter((t) => t > now - DAY_MS);
  const { minIntervalMs, perHour, perDay } = config.rateLimit;

  const last = stamps[stamps.length - 1];
  if (last !== undefined && now - last < minIntervalMs) {
    return blocked("too_fast", last + minIntervalMs - now);
  }

  const lastHour = stamps.filter((t) => t > now - HOUR_MS);
  if (lastHour.length >= perHour) {
    return blocked("hourly_limit", lastHour[0] + HOUR_MS - now);
  }

  if (stamps.length >= perDay) {
    return blocked("daily_limit", stamps[0] + DAY_MS - now);
  }

  stamps.push(now);
  history.set(userId, stamps);
  return { ok: true };
}

function blocked(reason: RateLimitReason, retryAfterMs: number): RateLimitBlocked {
  return { ok: false, reason, retryAfter: Math.max(1, Math.ceil(retryAfterMs / 1000)) };
}

/** 429 with Retry-After for API callers */
export function rateLimitResponse(result: RateLimitBlocked): NextResponse {
  return NextResponse.json(
    { ok: false, error: describeRateLimit(result.reason), reason: result.reason },
    {
      status: 429,
      headers: { "Retry-After": String(result.retryAfter) },
    },
  );
}

/**
 * Forget a user's history (e.g. after an admin unblock).
 */
export function resetRateLimit(userId: number): void {
  history.delete(userId);
}

/** Visible for testing */
export function _clearAllForTesting(): void {
  history.clear();
}
