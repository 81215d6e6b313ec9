/**
 * DeterministicGuardrails: base class for tool-call interception.
 *
 * Every tool call, prompt invocation, resource read and chat turn is driven
 * through run(): pre-dispatch checks, the dispatch itself under a timeout,
 * then post-processing of the result. Subclasses supply the checks.
 *
 * Checks must be deterministic: the same inputs, session history and clock
 * reading produce the same decision.
 */

import { blockDecision, type GuardrailDecision, type RequestStage } from "./decision.js";
import { UpstreamError, errorMessage } from "./errors.js";

export interface ToolCallContext {
  /** Tool, prompt or resource name as registered with the MCP server */
  toolName: string;
  sessionId: string;
  /** Parsed and validated arguments (after Zod) */
  args: Record<string, unknown>;
  /** Symbols to validate, when the call carries any */
  symbols?: readonly string[];
  /** Free-text portion screened by the content filter */
  text?: string;
  /** Output relates to recommendations and always carries a disclaimer */
  advisory?: boolean;
}

export type ToolContent = Array<{ type: "text"; text: string }>;

export type ToolResult = {
  content: ToolContent;
  isError?: boolean;
};

/** Data-layer call. Receives the admitting decision (accepted symbols) and an abort signal. */
export type Dispatch = (decision: GuardrailDecision, signal: AbortSignal) => Promise<ToolResult>;

export interface GuardedRunResult {
  decision: GuardrailDecision;
  stages: RequestStage[];
  /** Present only when the request was delivered */
  result?: ToolResult;
  error?: UpstreamError;
}

/**
 * Base class for deterministic guardrails. Override beforeToolCall() to
 * implement policy and afterToolCall() to post-process delivered output.
 */
export abstract class DeterministicGuardrails {
  protected constructor(protected readonly timeoutMs: number) {}

  /**
   * Run the pre-dispatch checks. Push each stage reached onto stages; a
   * blocked decision ends the request.
   */
  abstract beforeToolCall(context: ToolCallContext, stages: RequestStage[]): Promise<GuardrailDecision>;

  /** Post-process a delivered result. Default returns it unchanged. */
  async afterToolCall(
    _context: ToolCallContext,
    _decision: GuardrailDecision,
    result: ToolResult
  ): Promise<ToolResult> {
    return result;
  }

  /** Map a data-layer failure to a decision. Not a policy violation. */
  async onUpstreamError(_context: ToolCallContext, error: UpstreamError): Promise<GuardrailDecision> {
    return blockDecision("UpstreamError", error.message, { riskLevel: "low" });
  }

  async run(context: ToolCallContext, dispatch: Dispatch): Promise<GuardedRunResult> {
    const stages: RequestStage[] = ["received"];
    const decision = await this.beforeToolCall(context, stages);
    if (decision.outcome === "blocked") {
      stages.push("rejected");
      return { decision, stages };
    }

    stages.push("dispatched");
    let raw: ToolResult;
    try {
      raw = await dispatchWithTimeout(dispatch, decision, this.timeoutMs);
    } catch (err) {
      const error = err instanceof UpstreamError ? err : new UpstreamError(errorMessage(err), { cause: err });
      stages.push("rejected");
      return { decision: await this.onUpstreamError(context, error), stages, error };
    }

    const result = await this.afterToolCall(context, decision, raw);
    stages.push("sanitized", "delivered");
    return { decision, stages, result };
  }
}

export async function dispatchWithTimeout(
  dispatch: Dispatch,
  decision: GuardrailDecision,
  timeoutMs: number
): Promise<ToolResult> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new UpstreamError(`Data provider did not respond within ${timeoutMs / 1000}s`, { timedOut: true }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([dispatch(decision, controller.signal), timeout]);
  } catch (err) {
    if (err instanceof UpstreamError) throw err;
    throw new UpstreamError(errorMessage(err), { cause: err });
  } finally {
    clearTimeout(timer);
  }
}
