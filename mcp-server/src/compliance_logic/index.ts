/**
 * Guardrails exports.
 */

export {
  DeterministicGuardrails,
  dispatchWithTimeout,
  type Dispatch,
  type GuardedRunResult,
  type ToolCallContext,
  type ToolContent,
  type ToolResult,
} from "./DeterministicGuardrails.js";
export { GuardrailsEngine, type GuardrailsEngineOptions, type SessionStatus } from "./GuardrailsEngine.js";
export {
  allowDecision,
  blockDecision,
  violationCategoryFor,
  type DecisionOutcome,
  type GuardrailDecision,
  type RejectionReason,
  type RequestStage,
  type RiskLevel,
  type Violation,
  type ViolationCategory,
} from "./decision.js";
export { ConfigError, UpstreamError, errorMessage } from "./errors.js";
export { ContentFilter, type ContentBlockReason, type ContentClassification } from "./contentFilter.js";
export { RateLimiter, WINDOW_MS, type RateLimitResult, type RateWindow, type WindowCounts } from "./rateLimiter.js";
export { ResponseSanitizer, DISCLAIMERS, TRUNCATION_MARKER, safeSlice, stripControlChars } from "./responseSanitizer.js";
export { SessionTracker, type Clock, type SessionState } from "./sessionTracker.js";
export {
  SymbolValidator,
  SYMBOL_PATTERN,
  describeRejections,
  normalizeSymbol,
  type SymbolRejection,
  type SymbolValidationResult,
} from "./symbolValidator.js";
export { loadPolicyConfig, parsePolicyConfig, DEFAULT_CONFIG_FILE } from "./policyConfig.js";
export {
  fileAuditSink,
  logDecision,
  logViolation,
  type AuditSink,
  type DecisionLog,
  type LogStream,
  type PolicyResultSummary,
  type ViolationLog,
} from "./enterpriseLogging.js";
export {
  DEFAULT_SESSION_ID,
  collectText,
  formatBlockedMessage,
  resolveSessionId,
  runGuarded,
  runGuardedOrThrow,
  wrapToolWithGuardrails,
  type DispatchContext,
  type GuardedHandler,
  type GuardedOperation,
} from "./enterpriseDecisionMiddleware.js";
export { logger, getSessionLogger } from "./logger.js";
