import type { RateLimitingConfig } from "../schemas/policy.js";
import type { Clock, SessionState, SessionTracker } from "./sessionTracker.js";

export type RateWindow = "minute" | "hour" | "day";

export const WINDOW_MS: Record<RateWindow, number> = {
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

const WINDOWS: readonly RateWindow[] = ["minute", "hour", "day"];

export type RateLimitResult =
  | { allowed: true }
  | { allowed: false; window: RateWindow | "burst"; retryAfterSeconds: number; reason: string };

export type WindowCounts = Record<RateWindow, number>;

/**
 * Rolling-window limiter. Each session keeps one ascending list of admitted
 * call timestamps pruned to the day window; minute and hour counts are read
 * off its tail. Only admitted calls are recorded.
 */
export class RateLimiter {
  private readonly limits: Record<RateWindow, number>;
  private readonly minIntervalMs: number;

  constructor(
    config: RateLimitingConfig,
    private readonly sessions: SessionTracker,
    private readonly now: Clock = Date.now
  ) {
    this.limits = {
      minute: config.max_calls_per_minute,
      hour: config.max_calls_per_hour,
      day: config.max_calls_per_day,
    };
    this.minIntervalMs = config.min_request_interval_seconds * 1000;
  }

  check(sessionId: string): RateLimitResult {
    return this.checkSession(this.sessions.getOrCreate(sessionId));
  }

  checkSession(session: SessionState): RateLimitResult {
    const now = this.now();
    prune(session, now);

    let blockedWindow: RateWindow | null = null;
    let waitMs = 0;
    for (const window of WINDOWS) {
      const inWindow = callsInWindow(session, window, now);
      const limit = this.limits[window];
      if (inWindow.length >= limit) {
        // Enough entries must age out to leave room for one more call.
        const expiring = inWindow[inWindow.length - limit];
        const wait = expiring + WINDOW_MS[window] - now;
        if (blockedWindow === null || wait > waitMs) {
          blockedWindow = window;
          waitMs = wait;
        }
      }
    }
    if (blockedWindow !== null) {
      return {
        allowed: false,
        window: blockedWindow,
        retryAfterSeconds: toRetrySeconds(waitMs),
        reason: `Rate limit exceeded: ${this.limits[blockedWindow]} calls per ${blockedWindow}`,
      };
    }

    if (session.lastCallAt !== null && now - session.lastCallAt < this.minIntervalMs) {
      return {
        allowed: false,
        window: "burst",
        retryAfterSeconds: toRetrySeconds(session.lastCallAt + this.minIntervalMs - now),
        reason: `Requests must be at least ${this.minIntervalMs / 1000}s apart`,
      };
    }

    session.callTimestamps.push(now);
    session.lastCallAt = now;
    return { allowed: true };
  }

  counts(session: SessionState): WindowCounts {
    const now = this.now();
    return {
      minute: callsInWindow(session, "minute", now).length,
      hour: callsInWindow(session, "hour", now).length,
      day: callsInWindow(session, "day", now).length,
    };
  }
}

function prune(session: SessionState, now: number): void {
  const cutoff = now - WINDOW_MS.day;
  let drop = 0;
  while (drop < session.callTimestamps.length && session.callTimestamps[drop] <= cutoff) {
    drop += 1;
  }
  if (drop > 0) session.callTimestamps.splice(0, drop);
}

function callsInWindow(session: SessionState, window: RateWindow, now: number): number[] {
  const cutoff = now - WINDOW_MS[window];
  const stamps = session.callTimestamps;
  let start = stamps.length;
  while (start > 0 && stamps[start - 1] > cutoff) {
    start -= 1;
  }
  return stamps.slice(start);
}

function toRetrySeconds(waitMs: number): number {
  return Math.max(1, Math.ceil(waitMs / 1000));
}
