import type { PolicyConfig } from "../schemas/policy.js";
import { PERIOD_DAYS, isCompatibleInterval, isPeriod } from "../schemas/tool-inputs.js";
import { ContentFilter } from "./contentFilter.js";
import {
  allowDecision,
  blockDecision,
  violationCategoryFor,
  type GuardrailDecision,
  type RequestStage,
  type Violation,
} from "./decision.js";
import {
  DeterministicGuardrails,
  type ToolCallContext,
  type ToolResult,
} from "./DeterministicGuardrails.js";
import { fileAuditSink, logViolation, type AuditSink } from "./enterpriseLogging.js";
import type { UpstreamError } from "./errors.js";
import { getSessionLogger } from "./logger.js";
import { RateLimiter, type WindowCounts } from "./rateLimiter.js";
import { ResponseSanitizer, safeSlice, stripControlChars } from "./responseSanitizer.js";
import { SessionTracker, type Clock } from "./sessionTracker.js";
import { SymbolValidator, describeRejections } from "./symbolValidator.js";

const VIOLATION_INPUT_MAX = 200;

const ADVICE_REFUSAL =
  "I cannot provide investment advice. I can only provide factual information about stocks and markets. " +
  "Please consult a licensed financial advisor for investment decisions.";

export interface GuardrailsEngineOptions {
  now?: Clock;
  auditSink?: AuditSink;
}

export interface SessionStatus {
  sessionId: string;
  exists: boolean;
  createdAt?: string;
  lastCallAt?: string;
  calls: WindowCounts;
  successfulCalls: number;
  violationCount: number;
  lastDecisionReasons: string[];
  recentViolations: Violation[];
}

/**
 * Financial-data guardrails: symbol validation, rate limiting, content
 * screening and response sanitizing, with per-session audit state.
 */
export class GuardrailsEngine extends DeterministicGuardrails {
  readonly config: PolicyConfig;
  readonly sessions: SessionTracker;
  readonly symbolValidator: SymbolValidator;
  readonly rateLimiter: RateLimiter;
  readonly contentFilter: ContentFilter;
  readonly sanitizer: ResponseSanitizer;
  private readonly auditSink: AuditSink;
  private readonly now: Clock;

  constructor(config: PolicyConfig, options: GuardrailsEngineOptions = {}) {
    super(config.security.timeout_seconds * 1000);
    this.config = config;
    this.now = options.now ?? Date.now;
    this.auditSink = options.auditSink ?? fileAuditSink;
    this.sessions = new SessionTracker({
      idleTimeoutSeconds: config.session.idle_timeout_seconds,
      now: this.now,
    });
    this.symbolValidator = new SymbolValidator(config.symbol_validation);
    this.rateLimiter = new RateLimiter(config.rate_limiting, this.sessions, this.now);
    this.contentFilter = new ContentFilter(config.content_filtering, {
      maxInputLength: config.security.max_input_length,
    });
    this.sanitizer = new ResponseSanitizer(config);
  }

  override async beforeToolCall(context: ToolCallContext, stages: RequestStage[]): Promise<GuardrailDecision> {
    return this.sessions.withSession(context.sessionId, async (session) => {
      const warnings: string[] = [];
      let symbols: string[] | undefined;

      if (context.symbols !== undefined) {
        const { accepted, rejected } = this.symbolValidator.validate(context.symbols);
        const max = this.config.symbol_validation.max_symbols_per_request;
        if (rejected.some((r) => r.reason === "TooManySymbols")) {
          return this.reject(
            context,
            blockDecision(
              "TooManySymbols",
              `Too many symbols: ${context.symbols.length}. Maximum allowed: ${max}.`
            )
          );
        }
        if (rejected.length > 0) {
          const partial = this.config.symbol_validation.allow_partial_symbols && accepted.length > 0;
          if (!partial) {
            return this.reject(
              context,
              blockDecision("InvalidSymbol", `Invalid symbols: ${describeRejections(rejected)}.`)
            );
          }
          warnings.push(`Ignored invalid symbols: ${describeRejections(rejected)}.`);
        }
        symbols = accepted;
      }

      const argumentIssue = this.checkArguments(context.args);
      if (argumentIssue) {
        return this.reject(context, blockDecision("InvalidRequest", argumentIssue));
      }
      stages.push("validated");

      const rate = this.rateLimiter.checkSession(session);
      if (!rate.allowed) {
        return this.reject(
          context,
          blockDecision("RateLimited", `${rate.reason}. Retry after ${rate.retryAfterSeconds}s.`, {
            riskLevel: "medium",
            retryAfterSeconds: rate.retryAfterSeconds,
            category: rate.window,
          })
        );
      }
      stages.push("rate_checked");

      const classification = context.text ? this.contentFilter.classify(context.text) : undefined;
      if (classification?.blocked) {
        const category = classification.blockReason;
        const reason = category === "SecurityViolation" ? "SecurityViolation" : "ContentBlocked";
        let message: string;
        switch (category) {
          case "SecurityViolation":
            message = "Potential security threat detected in query.";
            break;
          case "InvestmentAdviceRequest":
            message = ADVICE_REFUSAL;
            break;
          case "InputTooLong":
            message = `Query too long (max ${this.config.security.max_input_length} chars).`;
            break;
          default:
            message = `Query contains blocked content related to: ${classification.matchedTerms.join(", ")}.`;
        }
        return this.reject(
          context,
          blockDecision(reason, message, {
            category,
            matchedCategories: classification.matchedCategories,
          })
        );
      }
      stages.push("content_checked");

      const decision = allowDecision({
        riskLevel: classification?.riskLevel ?? "low",
        matchedCategories: classification?.matchedCategories ?? [],
        advisory: context.advisory ?? false,
        warnings,
        symbols,
      });
      this.sessions.recordDecision(session.id, decision.outcome);
      return decision;
    });
  }

  override async afterToolCall(
    context: ToolCallContext,
    decision: GuardrailDecision,
    result: ToolResult
  ): Promise<ToolResult> {
    const last = result.content.length - 1;
    const content = result.content.map((item, index) => ({
      type: item.type,
      text:
        index === last
          ? this.sanitizer.finalize(item.text, decision.riskLevel, decision.advisory)
          : this.sanitizer.finalize(item.text, "low"),
    }));
    if (decision.warnings.length > 0) {
      content.unshift({ type: "text", text: `[Guardrail] ${decision.warnings.join(" ")}` });
    }
    await this.sessions.withSession(context.sessionId, () => this.sessions.recordSuccess(context.sessionId));
    return { ...result, content };
  }

  override async onUpstreamError(context: ToolCallContext, error: UpstreamError): Promise<GuardrailDecision> {
    getSessionLogger(context.sessionId, context.toolName).warn(
      { err: error, timedOut: error.timedOut },
      "data provider call failed"
    );
    this.sessions.recordDecision(context.sessionId, "UpstreamError");
    return super.onUpstreamError(context, error);
  }

  /** Read-only snapshot; does not create the session. */
  status(sessionId: string): SessionStatus {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return {
        sessionId,
        exists: false,
        calls: { minute: 0, hour: 0, day: 0 },
        successfulCalls: 0,
        violationCount: 0,
        lastDecisionReasons: [],
        recentViolations: [],
      };
    }
    return {
      sessionId,
      exists: true,
      createdAt: new Date(session.createdAt).toISOString(),
      lastCallAt: session.lastCallAt === null ? undefined : new Date(session.lastCallAt).toISOString(),
      calls: this.rateLimiter.counts(session),
      successfulCalls: session.successfulCalls,
      violationCount: session.violationCount,
      lastDecisionReasons: [...session.lastDecisionReasons],
      recentViolations: session.violations.slice(-5),
    };
  }

  private checkArguments(args: Record<string, unknown>): string | null {
    const { period, interval } = args;
    if (typeof period === "string" && isPeriod(period)) {
      const days = PERIOD_DAYS[period];
      const maxDays = this.config.data_access.max_historical_period_days;
      if (days > maxDays) {
        return `Invalid or excessive period: ${period} (maximum ${maxDays} days).`;
      }
    }
    if (typeof interval === "string" && !this.config.data_access.allowed_intervals.includes(interval)) {
      return `Invalid interval. Allowed: ${this.config.data_access.allowed_intervals.join(", ")}.`;
    }
    if (typeof period === "string" && typeof interval === "string" && !isCompatibleInterval(period, interval)) {
      return `Incompatible combination: ${interval} interval with ${period} period.`;
    }
    return null;
  }

  private async reject(context: ToolCallContext, decision: GuardrailDecision): Promise<GuardrailDecision> {
    const reason = decision.reason ?? "InvalidRequest";
    const category = violationCategoryFor(reason);
    this.sessions.recordDecision(context.sessionId, reason);
    if (category === null) return decision;

    const violation: Violation = Object.freeze({
      sessionId: context.sessionId,
      timestamp: new Date(this.now()).toISOString(),
      category,
      reason,
      toolName: context.toolName,
      input: redactInput(context),
      outcome: decision.outcome,
      message: decision.message,
    });
    this.sessions.recordViolation(violation);

    getSessionLogger(context.sessionId, context.toolName).warn(
      { reason, category: decision.category, retryAfterSeconds: decision.retryAfterSeconds },
      "guardrail violation"
    );
    if (this.config.security.log_violations) {
      await logViolation(violation, this.auditSink);
    }
    return decision;
  }
}

function redactInput(context: ToolCallContext): string {
  const raw = context.text ?? (context.symbols ? context.symbols.join(",") : JSON.stringify(context.args));
  const clean = stripControlChars(raw).replace(/\n/g, " ");
  return clean.length > VIOLATION_INPUT_MAX ? `${safeSlice(clean, VIOLATION_INPUT_MAX)}...` : clean;
}
