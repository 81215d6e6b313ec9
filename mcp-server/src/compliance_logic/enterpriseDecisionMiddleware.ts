/**
 * MCP adapters: every tool, prompt and resource callback runs through the
 * guardrails engine and every decision is written to the audit stream.
 *
 * - Tools get a structured isError result when blocked.
 * - Prompts and resources raise an McpError when blocked.
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { GuardrailDecision } from "./decision.js";
import type { GuardedRunResult, ToolCallContext, ToolResult } from "./DeterministicGuardrails.js";
import { logDecision, type AuditSink } from "./enterpriseLogging.js";
import type { GuardrailsEngine } from "./GuardrailsEngine.js";

export const DEFAULT_SESSION_ID = "default";

/** Argument keys never screened as free text */
const NON_TEXT_KEYS = new Set(["symbol", "symbols", "session_id", "period", "interval", "metric"]);

export interface DispatchContext {
  decision: GuardrailDecision;
  signal: AbortSignal;
  sessionId: string;
}

export type GuardedHandler<A> = (args: A, ctx: DispatchContext) => Promise<ToolResult>;

export interface GuardedOperation<A> {
  toolName: string;
  intentCategory: string;
  /** Symbols the call carries; undefined skips symbol validation */
  symbolsOf?: (args: A) => readonly string[] | undefined;
  advisory?: boolean;
  auditSink?: AuditSink;
}

export function resolveSessionId(args: Record<string, unknown>, extra: unknown): string {
  const fromArgs = args.session_id;
  if (typeof fromArgs === "string" && fromArgs.trim() !== "") return fromArgs.trim();
  if (typeof extra === "object" && extra !== null && "sessionId" in extra && typeof extra.sessionId === "string") {
    return extra.sessionId;
  }
  return DEFAULT_SESSION_ID;
}

/** String argument values joined for content screening */
export function collectText(args: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(args)) {
    if (NON_TEXT_KEYS.has(key)) continue;
    if (typeof value === "string" && value.trim() !== "") parts.push(value.trim());
  }
  return parts.join(" ");
}

export function formatBlockedMessage(toolName: string, decision: GuardrailDecision): string {
  const prefix = decision.reason === "UpstreamError" ? "[Upstream]" : "[Guardrail]";
  const verb = decision.reason === "UpstreamError" ? "failed" : "blocked";
  return `${prefix} Tool "${toolName}" ${verb}. ${decision.message ?? "Not allowed."}${
    decision.reason ? ` (${decision.reason})` : ""
  }`;
}

/**
 * Run one guarded operation end to end and log the decision. Shared by the
 * tool, prompt and resource adapters.
 */
export async function runGuarded<A extends Record<string, unknown>>(
  engine: GuardrailsEngine,
  operation: GuardedOperation<A>,
  args: A,
  sessionId: string,
  handler: GuardedHandler<A>
): Promise<GuardedRunResult> {
  const start = Date.now();
  const text = collectText(args);
  const context: ToolCallContext = {
    toolName: operation.toolName,
    sessionId,
    args,
    symbols: operation.symbolsOf?.(args),
    text: text === "" ? undefined : text,
    advisory: operation.advisory,
  };

  const run = await engine.run(context, (decision, signal) => handler(args, { decision, signal, sessionId }));
  const { decision } = run;

  await logDecision(
    {
      eventType: "guardrail_decision",
      timestamp: new Date().toISOString(),
      decisionId: `${operation.toolName}-${start}`,
      sessionId,
      toolName: operation.toolName,
      intentCategory: operation.intentCategory,
      policyResult: {
        outcome: decision.outcome,
        reason: decision.reason,
        category: decision.category,
        riskLevel: decision.riskLevel,
        retryAfterSeconds: decision.retryAfterSeconds,
        matchedCategories: decision.matchedCategories,
      },
      stages: run.stages,
      durationMs: Date.now() - start,
      outcome: run.result ? "executed" : decision.reason === "UpstreamError" ? "failed" : "blocked",
      errorCode: decision.reason,
      errorReason: decision.message,
    },
    operation.auditSink
  );
  return run;
}

export function wrapToolWithGuardrails<A extends Record<string, unknown>>(
  engine: GuardrailsEngine,
  operation: GuardedOperation<A>,
  handler: GuardedHandler<A>
): (args: A, extra?: unknown) => Promise<ToolResult> {
  return async (args: A, extra?: unknown) => {
    const run = await runGuarded(engine, operation, args, resolveSessionId(args, extra), handler);
    if (run.result) return run.result;
    return {
      content: [{ type: "text", text: formatBlockedMessage(operation.toolName, run.decision) }],
      isError: true,
    };
  };
}

/** For prompt and resource callbacks, which have no isError channel */
export async function runGuardedOrThrow<A extends Record<string, unknown>>(
  engine: GuardrailsEngine,
  operation: GuardedOperation<A>,
  args: A,
  extra: unknown,
  handler: GuardedHandler<A>
): Promise<ToolResult> {
  const run = await runGuarded(engine, operation, args, resolveSessionId({}, extra), handler);
  if (run.result) return run.result;
  const code = run.decision.reason === "UpstreamError" ? ErrorCode.InternalError : ErrorCode.InvalidParams;
  throw new McpError(code, formatBlockedMessage(operation.toolName, run.decision), {
    reason: run.decision.reason,
    retryAfterSeconds: run.decision.retryAfterSeconds,
  });
}
