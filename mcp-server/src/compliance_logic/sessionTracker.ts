import type { Violation } from "./decision.js";

export type Clock = () => number;

export interface SessionState {
  readonly id: string;
  readonly createdAt: number;
  lastSeenAt: number;
  /** Last call the rate limiter admitted */
  lastCallAt: number | null;
  /** Admitted calls, ascending, pruned to the widest rate window */
  callTimestamps: number[];
  successfulCalls: number;
  /** Every violation this session has produced */
  violationCount: number;
  /** Most recent violations only; the full history is in the violation stream */
  violations: Violation[];
  lastDecisionReasons: string[];
}

export interface SessionTrackerOptions {
  idleTimeoutSeconds: number;
  now?: Clock;
}

const LAST_REASONS_KEPT = 10;
export const VIOLATIONS_KEPT = 20;
const SWEEP_INTERVAL_MS = 60_000;

/**
 * Process-wide session registry. Sessions idle longer than idleTimeoutSeconds
 * are evicted on a lazy sweep; a session with a pending lock is never evicted.
 */
export class SessionTracker {
  private readonly sessions = new Map<string, SessionState>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly idleTimeoutMs: number;
  private readonly now: Clock;
  private lastSweepAt: number;

  constructor(options: SessionTrackerOptions) {
    this.idleTimeoutMs = options.idleTimeoutSeconds * 1000;
    this.now = options.now ?? Date.now;
    this.lastSweepAt = this.now();
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  getOrCreate(sessionId: string): SessionState {
    const now = this.now();
    if (now - this.lastSweepAt >= SWEEP_INTERVAL_MS) {
      this.evictIdle(now);
    }
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        id: sessionId,
        createdAt: now,
        lastSeenAt: now,
        lastCallAt: null,
        callTimestamps: [],
        successfulCalls: 0,
        violationCount: 0,
        violations: [],
        lastDecisionReasons: [],
      };
      this.sessions.set(sessionId, session);
    }
    session.lastSeenAt = now;
    return session;
  }

  /**
   * Run fn with exclusive access to one session. Calls for the same id queue
   * behind each other; distinct ids never wait on one another.
   */
  async withSession<T>(sessionId: string, fn: (session: SessionState) => T | Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(sessionId, tail);

    await previous;
    try {
      return await fn(this.getOrCreate(sessionId));
    } finally {
      release();
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    }
  }

  recordViolation(violation: Violation): void {
    const session = this.getOrCreate(violation.sessionId);
    session.violations.push(violation);
    session.violationCount += 1;
    if (session.violations.length > VIOLATIONS_KEPT) {
      session.violations.splice(0, session.violations.length - VIOLATIONS_KEPT);
    }
  }

  recordDecision(sessionId: string, label: string): void {
    const session = this.getOrCreate(sessionId);
    session.lastDecisionReasons.push(label);
    if (session.lastDecisionReasons.length > LAST_REASONS_KEPT) {
      session.lastDecisionReasons.splice(0, session.lastDecisionReasons.length - LAST_REASONS_KEPT);
    }
  }

  recordSuccess(sessionId: string): void {
    this.getOrCreate(sessionId).successfulCalls += 1;
  }

  evictIdle(now: number = this.now()): number {
    this.lastSweepAt = now;
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt >= this.idleTimeoutMs && !this.locks.has(id)) {
        this.sessions.delete(id);
        evicted += 1;
      }
    }
    return evicted;
  }
}
