/**
 * Audit logging for guardrail decisions.
 *
 * - Every decision (allowed, blocked, upstream failure) goes to the event stream
 * - Every violation also goes to the append-only violation stream
 * - JSONL, one record per line
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { DecisionOutcome, RejectionReason, RequestStage, RiskLevel, Violation } from "./decision.js";
import { logger } from "./logger.js";

export type LogStream = "event" | "violation";

export interface PolicyResultSummary {
  outcome: DecisionOutcome;
  reason?: RejectionReason;
  category?: string;
  riskLevel: RiskLevel;
  retryAfterSeconds?: number;
  matchedCategories: readonly string[];
}

export interface DecisionLog {
  eventType: "guardrail_decision";
  timestamp: string;
  decisionId: string;
  sessionId: string;
  toolName: string;
  intentCategory: string;
  policyResult: PolicyResultSummary;
  stages: RequestStage[];
  durationMs?: number;
  outcome: "blocked" | "executed" | "failed";
  errorCode?: string;
  errorReason?: string;
}

export interface ViolationLog extends Violation {
  eventType: "guardrail_violation";
}

type LogRecord = DecisionLog | ViolationLog;

function getLogPaths(): Record<LogStream, string> {
  const cwd = process.cwd();
  return {
    event: process.env.MCP_LOG_EVENTS_PATH ?? path.join(cwd, "logs", "events.jsonl"),
    violation: process.env.MCP_LOG_VIOLATIONS_PATH ?? path.join(cwd, "logs", "violations.jsonl"),
  };
}

async function appendJsonLine(filePath: string, record: LogRecord): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

export type AuditSink = (stream: LogStream, record: LogRecord) => Promise<void>;

/** Default sink: JSONL files under ./logs (or the MCP_LOG_* paths) */
export const fileAuditSink: AuditSink = async (stream, record) => {
  await appendJsonLine(getLogPaths()[stream], record);
};

/** Audit writes must never fail a request; failures are reported on stderr. */
export async function logDecision(record: DecisionLog, sink: AuditSink = fileAuditSink): Promise<void> {
  try {
    await sink("event", record);
  } catch (err) {
    logger.error({ err, decisionId: record.decisionId }, "failed to write decision log");
  }
}

export async function logViolation(violation: Violation, sink: AuditSink = fileAuditSink): Promise<void> {
  try {
    await sink("violation", { eventType: "guardrail_violation", ...violation });
  } catch (err) {
    logger.error({ err, sessionId: violation.sessionId }, "failed to write violation log");
  }
}
