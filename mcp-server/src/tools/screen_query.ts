import { parseQueryDirective, type QueryDirective } from "../chat/queryDirectives.js";
import type { ToolResult } from "../compliance_logic/DeterministicGuardrails.js";
import {
  resolveSessionId,
  wrapToolWithGuardrails,
  type GuardedHandler,
} from "../compliance_logic/enterpriseDecisionMiddleware.js";
import type { GuardrailsEngine } from "../compliance_logic/GuardrailsEngine.js";
import { isValidSnapshotName } from "../data/financialDataStore.js";
import { PROMPT_DEFINITIONS, splitSymbolList } from "../prompts/analysis_prompts.js";
import { screenQuerySchema, type ScreenQueryInput } from "../schemas/market-tools.js";
import { readSessionStatus, type StatusDeps } from "./guardrail_status.js";
import { jsonResult } from "./shared.js";

export { screenQuerySchema };
export type { ScreenQueryInput };

/** Symbols carried by a /prompt directive, if any */
export function symbolsOfQuery(args: ScreenQueryInput): string[] | undefined {
  const directive = parseQueryDirective(args.query);
  if (directive.kind !== "invoke_prompt") return undefined;
  const { symbol, symbols } = directive.arguments;
  if (symbols !== undefined) return splitSymbolList(symbols);
  if (symbol !== undefined) return [symbol];
  return undefined;
}

function sanitizeDirective(engine: GuardrailsEngine, directive: QueryDirective): QueryDirective {
  switch (directive.kind) {
    case "invoke_prompt":
      return {
        ...directive,
        arguments: Object.fromEntries(
          Object.entries(directive.arguments).map(([key, value]) => [key, engine.sanitizer.sanitizeInput(value)])
        ),
      };
    case "query":
      return { kind: "query", text: engine.sanitizer.sanitizeInput(directive.text) };
    default:
      return directive;
  }
}

/**
 * Screens one chat turn. The engine has already admitted it when this runs;
 * the result tells the client what the turn resolves to.
 */
export function createScreenQueryHandler(deps: { engine: GuardrailsEngine }): GuardedHandler<ScreenQueryInput> {
  return async (args, { decision }) => {
    const directive = sanitizeDirective(deps.engine, parseQueryDirective(args.query));
    const body: Record<string, unknown> = {
      directive,
      decision: {
        outcome: decision.outcome,
        risk_level: decision.riskLevel,
        matched_categories: decision.matchedCategories,
        warnings: decision.warnings,
      },
    };

    switch (directive.kind) {
      case "list_prompts":
        body.prompts = PROMPT_DEFINITIONS;
        break;
      case "read_resource":
        body.valid_filename = isValidSnapshotName(directive.filename);
        break;
      case "invoke_prompt":
        body.known_prompt = PROMPT_DEFINITIONS.some((p) => p.name === directive.name);
        break;
      default:
        break;
    }
    return jsonResult(body);
  };
}

/**
 * The registered screen_query callback. A /status turn is answered from the
 * session registry directly, like get_guardrail_status; every other turn
 * runs through the engine.
 */
export function createScreenQueryTool(deps: StatusDeps): (args: ScreenQueryInput, extra?: unknown) => Promise<ToolResult> {
  const guarded = wrapToolWithGuardrails(
    deps.engine,
    { toolName: "screen_query", intentCategory: "ChatQuery", symbolsOf: symbolsOfQuery, auditSink: deps.auditSink },
    createScreenQueryHandler({ engine: deps.engine })
  );
  return async (args, extra) => {
    const directive = parseQueryDirective(args.query);
    if (directive.kind !== "status") return guarded(args, extra);
    const status = await readSessionStatus(deps, resolveSessionId(args, extra), "screen_query");
    return jsonResult({ directive, status });
  };
}
