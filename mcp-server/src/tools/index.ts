/**
 * Market-data tool definitions. Each data tool runs through the guardrails
 * engine; get_guardrail_status and the /status turn of screen_query are
 * read-only and unguarded.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { wrapToolWithGuardrails } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import type { AuditSink } from "../compliance_logic/enterpriseLogging.js";
import type { GuardrailsEngine } from "../compliance_logic/GuardrailsEngine.js";
import { compareStocksSchema, createCompareStocksHandler } from "./compare_stocks.js";
import { createGuardrailStatusHandler, getGuardrailStatusSchema } from "./guardrail_status.js";
import { createHistoricalDataHandler, getHistoricalDataSchema } from "./historical_data.js";
import { createMarketSummaryHandler, getMarketSummarySchema } from "./market_summary.js";
import { createScreenQueryTool, screenQuerySchema } from "./screen_query.js";
import type { MarketToolDeps } from "./shared.js";
import { createStockInfoHandler, getStockInfoSchema } from "./stock_info.js";

export * from "./compare_stocks.js";
export * from "./guardrail_status.js";
export * from "./historical_data.js";
export * from "./market_summary.js";
export * from "./screen_query.js";
export * from "./shared.js";
export * from "./stock_info.js";

export interface ToolRegistrationDeps extends MarketToolDeps {
  engine: GuardrailsEngine;
  auditSink?: AuditSink;
}

const intentCategoryByTool = {
  get_stock_info: "MarketData",
  get_historical_data: "MarketData",
  compare_stocks: "Comparison",
  get_market_summary: "MarketData",
} as const;

export function registerMarketTools(server: McpServer, deps: ToolRegistrationDeps): void {
  const { engine, auditSink } = deps;

  server.tool(
    "get_stock_info",
    "Current price, previous close, day range, volume, 52-week range, market cap, P/E ratio, dividend yield, sector and industry for one ticker symbol.",
    getStockInfoSchema.shape,
    wrapToolWithGuardrails(
      engine,
      {
        toolName: "get_stock_info",
        intentCategory: intentCategoryByTool.get_stock_info,
        symbolsOf: (args) => [args.symbol],
        auditSink,
      },
      createStockInfoHandler(deps)
    )
  );

  server.tool(
    "get_historical_data",
    "Daily or intraday OHLCV bars for one ticker symbol over a period. Period and interval are limited by policy.",
    getHistoricalDataSchema.shape,
    wrapToolWithGuardrails(
      engine,
      {
        toolName: "get_historical_data",
        intentCategory: intentCategoryByTool.get_historical_data,
        symbolsOf: (args) => [args.symbol],
        auditSink,
      },
      createHistoricalDataHandler(deps)
    )
  );

  server.tool(
    "compare_stocks",
    "Compare several ticker symbols on one metric, sorted descending. Responses carry a disclaimer.",
    compareStocksSchema.shape,
    wrapToolWithGuardrails(
      engine,
      {
        toolName: "compare_stocks",
        intentCategory: intentCategoryByTool.compare_stocks,
        symbolsOf: (args) => args.symbols,
        advisory: true,
        auditSink,
      },
      createCompareStocksHandler(deps)
    )
  );

  server.tool(
    "get_market_summary",
    "Snapshot of the major indices: S&P 500, Dow Jones, NASDAQ, Russell 2000 and VIX.",
    getMarketSummarySchema.shape,
    wrapToolWithGuardrails(
      engine,
      { toolName: "get_market_summary", intentCategory: intentCategoryByTool.get_market_summary, auditSink },
      createMarketSummaryHandler(deps)
    )
  );

  server.tool(
    "screen_query",
    "Screen one chat turn through the guardrails and resolve directives (@portfolios, @<file>, /prompts, /prompt, /status).",
    screenQuerySchema.shape,
    createScreenQueryTool({ engine, auditSink })
  );

  // Read-only; never rate limited
  server.tool(
    "get_guardrail_status",
    "Guardrail status for a session: call counts per window, violations and recent decisions.",
    getGuardrailStatusSchema.shape,
    createGuardrailStatusHandler({ engine, auditSink })
  );
}
