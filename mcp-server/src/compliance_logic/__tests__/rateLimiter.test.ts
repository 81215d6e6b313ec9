import { describe, expect, it } from "vitest";
import { RateLimiter } from "../rateLimiter.js";
import { SessionTracker } from "../sessionTracker.js";
import { fakeClock, makeConfig } from "./helpers.js";

function setup(rateLimiting: Parameters<typeof makeConfig>[0] = {}) {
  const clock = fakeClock();
  const sessions = new SessionTracker({ idleTimeoutSeconds: 86_400, now: clock.now });
  const limiter = new RateLimiter(makeConfig(rateLimiting).rate_limiting, sessions, clock.now);
  return { clock, sessions, limiter };
}

describe("RateLimiter", () => {
  it("blocks the 16th call in a minute and reports when the oldest call expires", () => {
    const { clock, limiter } = setup();
    for (let i = 0; i < 15; i++) {
      clock.set(i * 1000);
      expect(limiter.check("s1")).toEqual({ allowed: true });
    }
    clock.set(15_000);
    expect(limiter.check("s1")).toEqual({
      allowed: false,
      window: "minute",
      retryAfterSeconds: 45,
      reason: "Rate limit exceeded: 15 calls per minute",
    });
  });

  it("does not record rejected calls", () => {
    const { clock, sessions, limiter } = setup();
    for (let i = 0; i < 16; i++) {
      clock.set(i * 1000);
      limiter.check("s1");
    }
    expect(sessions.get("s1")?.callTimestamps).toHaveLength(15);
    clock.set(60_000);
    expect(limiter.check("s1")).toEqual({ allowed: true });
  });

  it("enforces the minimum gap between calls", () => {
    const { clock, limiter } = setup();
    expect(limiter.check("s1").allowed).toBe(true);
    clock.set(500);
    expect(limiter.check("s1")).toEqual({
      allowed: false,
      window: "burst",
      retryAfterSeconds: 1,
      reason: "Requests must be at least 1s apart",
    });
    clock.set(1000);
    expect(limiter.check("s1").allowed).toBe(true);
  });

  it("reports the hour window when it is the binding one", () => {
    const { clock, limiter } = setup({
      rate_limiting: {
        max_calls_per_minute: 2,
        max_calls_per_hour: 3,
        max_calls_per_day: 10,
        min_request_interval_seconds: 0,
      },
    });
    expect(limiter.check("s1").allowed).toBe(true);
    clock.set(1000);
    expect(limiter.check("s1").allowed).toBe(true);
    clock.set(2000);
    expect(limiter.check("s1")).toMatchObject({ allowed: false, window: "minute", retryAfterSeconds: 58 });
    clock.set(61_000);
    expect(limiter.check("s1").allowed).toBe(true);
    clock.set(122_000);
    expect(limiter.check("s1")).toEqual({
      allowed: false,
      window: "hour",
      retryAfterSeconds: 3478,
      reason: "Rate limit exceeded: 3 calls per hour",
    });
  });

  it("keeps sessions independent", () => {
    const { limiter } = setup();
    expect(limiter.check("a").allowed).toBe(true);
    expect(limiter.check("b").allowed).toBe(true);
    expect(limiter.check("a").allowed).toBe(false);
  });

  it("counts calls per window", () => {
    const { clock, sessions, limiter } = setup();
    limiter.check("s1");
    clock.set(120_000);
    limiter.check("s1");
    const session = sessions.getOrCreate("s1");
    expect(limiter.counts(session)).toEqual({ minute: 1, hour: 2, day: 2 });
  });
});
