import { describe, expect, it } from "vitest";
import type { Violation } from "../decision.js";
import { SessionTracker, VIOLATIONS_KEPT } from "../sessionTracker.js";
import { fakeClock } from "./helpers.js";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("SessionTracker", () => {
  it("serializes work on the same session", async () => {
    const tracker = new SessionTracker({ idleTimeoutSeconds: 60 });
    const events: string[] = [];
    let release: () => void = () => undefined;

    const first = tracker.withSession("s", async () => {
      events.push("first:start");
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      events.push("first:end");
    });
    const second = tracker.withSession("s", () => {
      events.push("second");
    });

    await tick();
    expect(events).toEqual(["first:start"]);
    release();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other sessions", async () => {
    const tracker = new SessionTracker({ idleTimeoutSeconds: 60 });
    let release: () => void = () => undefined;
    const held = tracker.withSession("a", () => new Promise<void>((resolve) => (release = resolve)));

    await expect(tracker.withSession("b", () => "b-done")).resolves.toBe("b-done");
    release();
    await held;
  });

  it("releases the lock when the work throws", async () => {
    const tracker = new SessionTracker({ idleTimeoutSeconds: 60 });
    await expect(
      tracker.withSession("s", () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(tracker.withSession("s", () => "next")).resolves.toBe("next");
  });

  it("evicts idle sessions", () => {
    const clock = fakeClock();
    const tracker = new SessionTracker({ idleTimeoutSeconds: 60, now: clock.now });
    tracker.getOrCreate("a");
    expect(tracker.evictIdle(59_999)).toBe(0);
    expect(tracker.evictIdle(60_000)).toBe(1);
    expect(tracker.size).toBe(0);
  });

  it("sweeps lazily on access", () => {
    const clock = fakeClock();
    const tracker = new SessionTracker({ idleTimeoutSeconds: 10, now: clock.now });
    tracker.getOrCreate("a");
    clock.set(60_000);
    tracker.getOrCreate("b");
    expect(tracker.get("a")).toBeUndefined();
    expect(tracker.size).toBe(1);
  });

  it("never evicts a session that holds the lock", async () => {
    const clock = fakeClock();
    const tracker = new SessionTracker({ idleTimeoutSeconds: 10, now: clock.now });
    await tracker.withSession("a", () => {
      expect(tracker.evictIdle(100_000)).toBe(0);
    });
    expect(tracker.evictIdle(100_000)).toBe(1);
  });

  it("keeps the last ten decision labels", () => {
    const tracker = new SessionTracker({ idleTimeoutSeconds: 60 });
    for (let i = 0; i < 12; i++) tracker.recordDecision("s", `l${i}`);
    expect(tracker.get("s")?.lastDecisionReasons).toEqual(["l2", "l3", "l4", "l5", "l6", "l7", "l8", "l9", "l10", "l11"]);
  });

  it("bounds the violations it holds while counting every one", () => {
    const tracker = new SessionTracker({ idleTimeoutSeconds: 60 });
    const violation = (n: number): Violation => ({
      sessionId: "abuser",
      timestamp: new Date(n * 10).toISOString(),
      category: "content",
      reason: "ContentBlocked",
      toolName: "screen_query",
      input: `Should I buy AAPL? #${n}`,
      outcome: "blocked",
    });
    for (let i = 0; i < 1000; i++) tracker.recordViolation(violation(i));

    const session = tracker.get("abuser");
    expect(session?.violationCount).toBe(1000);
    expect(session?.violations).toHaveLength(VIOLATIONS_KEPT);
    expect(session?.violations[0]?.input).toBe(`Should I buy AAPL? #${1000 - VIOLATIONS_KEPT}`);
    expect(session?.violations.at(-1)?.input).toBe("Should I buy AAPL? #999");
  });
});
