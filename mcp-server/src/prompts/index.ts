import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GetPromptResult } from "@modelcontextprotocol/sdk/types.js";
import { runGuardedOrThrow } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import type { AuditSink } from "../compliance_logic/enterpriseLogging.js";
import type { GuardrailsEngine } from "../compliance_logic/GuardrailsEngine.js";
import type { ToolResult } from "../compliance_logic/DeterministicGuardrails.js";
import {
  analyzeStockPrompt,
  analyzeStockPromptSchema,
  portfolioComparisonPrompt,
  portfolioComparisonPromptSchema,
  splitSymbolList,
} from "./analysis_prompts.js";

export * from "./analysis_prompts.js";

export interface PromptDeps {
  engine: GuardrailsEngine;
  auditSink?: AuditSink;
}

function toPromptResult(result: ToolResult): GetPromptResult {
  return {
    messages: result.content.map((c) => ({ role: "user" as const, content: { type: "text" as const, text: c.text } })),
  };
}

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

export async function getAnalyzeStockPrompt(
  deps: PromptDeps,
  args: { symbol: string; analysis_type?: string },
  extra?: unknown
): Promise<GetPromptResult> {
  const clean = (value: string) => deps.engine.sanitizer.sanitizeInput(value);
  const result = await runGuardedOrThrow(
    deps.engine,
    {
      toolName: "analyze_stock_prompt",
      intentCategory: "Prompt",
      symbolsOf: (a) => [a.symbol],
      advisory: true,
      auditSink: deps.auditSink,
    },
    args,
    extra,
    async (a, { decision }) =>
      textResult(analyzeStockPrompt(decision.symbols?.[0] ?? clean(a.symbol), clean(a.analysis_type ?? "comprehensive")))
  );
  return toPromptResult(result);
}

export async function getPortfolioComparisonPrompt(
  deps: PromptDeps,
  args: { symbols: string; timeframe?: string },
  extra?: unknown
): Promise<GetPromptResult> {
  const clean = (value: string) => deps.engine.sanitizer.sanitizeInput(value);
  const result = await runGuardedOrThrow(
    deps.engine,
    {
      toolName: "portfolio_comparison_prompt",
      intentCategory: "Prompt",
      symbolsOf: (a) => splitSymbolList(a.symbols),
      advisory: true,
      auditSink: deps.auditSink,
    },
    args,
    extra,
    async (a, { decision }) =>
      textResult(
        portfolioComparisonPrompt(decision.symbols ?? splitSymbolList(clean(a.symbols)), clean(a.timeframe ?? "1y"))
      )
  );
  return toPromptResult(result);
}

export function registerAnalysisPrompts(server: McpServer, deps: PromptDeps): void {
  server.prompt(
    "analyze_stock_prompt",
    "Structured, data-driven analysis of a single stock",
    analyzeStockPromptSchema,
    (args, extra) => getAnalyzeStockPrompt(deps, args, extra)
  );
  server.prompt(
    "portfolio_comparison_prompt",
    "Side-by-side comparison of several stocks",
    portfolioComparisonPromptSchema,
    (args, extra) => getPortfolioComparisonPrompt(deps, args, extra)
  );
}
