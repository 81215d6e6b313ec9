import { resolveSessionId } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import type { ToolResult } from "../compliance_logic/DeterministicGuardrails.js";
import { logDecision, type AuditSink } from "../compliance_logic/enterpriseLogging.js";
import type { GuardrailsEngine, SessionStatus } from "../compliance_logic/GuardrailsEngine.js";
import { getGuardrailStatusSchema, type GetGuardrailStatusInput } from "../schemas/market-tools.js";
import { jsonResult } from "./shared.js";

export { getGuardrailStatusSchema };
export type { GetGuardrailStatusInput };

export interface StatusDeps {
  engine: GuardrailsEngine;
  auditSink?: AuditSink;
}

/**
 * Session status lookup that bypasses the engine. It never counts against
 * the rate limit, but the lookup is still written to the event stream.
 */
export async function readSessionStatus(deps: StatusDeps, sessionId: string, toolName: string): Promise<SessionStatus> {
  const start = Date.now();
  const status = deps.engine.status(sessionId);
  await logDecision(
    {
      eventType: "guardrail_decision",
      timestamp: new Date().toISOString(),
      decisionId: `${toolName}-${start}`,
      sessionId,
      toolName,
      intentCategory: "GuardrailStatus",
      policyResult: { outcome: "allowed", riskLevel: "low", matchedCategories: [] },
      stages: ["received", "delivered"],
      durationMs: Date.now() - start,
      outcome: "executed",
    },
    deps.auditSink
  );
  return status;
}

export function createGuardrailStatusHandler(deps: StatusDeps) {
  return async (args: GetGuardrailStatusInput, extra?: unknown): Promise<ToolResult> =>
    jsonResult(await readSessionStatus(deps, resolveSessionId(args, extra), "get_guardrail_status"));
}
