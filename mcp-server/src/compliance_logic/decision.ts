/**
 * Decision vocabulary shared by every guardrail stage.
 */

export type RiskLevel = "low" | "medium" | "high";

export type DecisionOutcome = "allowed" | "blocked" | "allowed_with_warning";

export type RejectionReason =
  | "InvalidSymbol"      // format or blocklist failure
  | "TooManySymbols"     // batch exceeds max_symbols_per_request
  | "RateLimited"        // minute/hour/day window or burst spacing
  | "ContentBlocked"     // blocked keyword, advice request or oversized input
  | "SecurityViolation"  // injection pattern
  | "InvalidRequest"     // tool argument outside data-access policy
  | "UpstreamError";     // data layer failure or timeout

/** Lifecycle of one request through the engine */
export type RequestStage =
  | "received"
  | "validated"
  | "rate_checked"
  | "content_checked"
  | "dispatched"
  | "sanitized"
  | "delivered"
  | "rejected";

export type ViolationCategory = "content" | "rate" | "symbol" | "injection" | "request";

export interface GuardrailDecision {
  readonly outcome: DecisionOutcome;
  readonly reason?: RejectionReason;
  /** Content-filter reason when reason is ContentBlocked or SecurityViolation */
  readonly category?: string;
  readonly riskLevel: RiskLevel;
  /** Safe to surface to the caller */
  readonly message?: string;
  readonly retryAfterSeconds?: number;
  readonly warnings: readonly string[];
  readonly matchedCategories: readonly string[];
  /** Response must carry a disclaimer regardless of risk level */
  readonly advisory: boolean;
  /** Accepted, normalized symbols when the request carried any */
  readonly symbols?: readonly string[];
}

export interface Violation {
  readonly sessionId: string;
  readonly timestamp: string;
  readonly category: ViolationCategory;
  readonly reason: RejectionReason;
  readonly toolName: string;
  /** Control characters removed, truncated */
  readonly input: string;
  readonly outcome: DecisionOutcome;
  readonly message?: string;
}

export function allowDecision(fields: Partial<GuardrailDecision> = {}): GuardrailDecision {
  const warnings = fields.warnings ?? [];
  return Object.freeze({
    riskLevel: "low" as const,
    matchedCategories: [],
    advisory: false,
    ...fields,
    warnings,
    outcome: warnings.length > 0 ? ("allowed_with_warning" as const) : ("allowed" as const),
  });
}

export function blockDecision(
  reason: RejectionReason,
  message: string,
  fields: Partial<GuardrailDecision> = {}
): GuardrailDecision {
  return Object.freeze({
    riskLevel: "high" as const,
    warnings: [],
    matchedCategories: [],
    advisory: false,
    ...fields,
    reason,
    message,
    outcome: "blocked" as const,
  });
}

export function violationCategoryFor(reason: RejectionReason): ViolationCategory | null {
  switch (reason) {
    case "InvalidSymbol":
    case "TooManySymbols":
      return "symbol";
    case "RateLimited":
      return "rate";
    case "ContentBlocked":
      return "content";
    case "SecurityViolation":
      return "injection";
    case "InvalidRequest":
      return "request";
    case "UpstreamError":
      return null;
  }
}
