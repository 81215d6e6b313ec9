import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GuardrailsEngine, type AuditSink } from "./compliance_logic/index.js";
import type { FinancialDataStore } from "./data/financialDataStore.js";
import type { MarketDataService } from "./data/marketDataService.js";
import { registerAnalysisPrompts } from "./prompts/index.js";
import { registerFinancialDataResources } from "./resources/financial_data.js";
import type { PolicyConfig } from "./schemas/policy.js";
import { registerMarketTools } from "./tools/index.js";

export const SERVER_NAME = "finance-guardrails-mcp-server";
export const SERVER_VERSION = "1.0.0";

export interface ServerDeps {
  config: PolicyConfig;
  service: MarketDataService;
  store: FinancialDataStore;
  auditSink?: AuditSink;
  /** Injected clock for the engine; defaults to Date.now */
  now?: () => number;
}

export interface FinanceServer {
  server: McpServer;
  engine: GuardrailsEngine;
}

/** Build the MCP server with every tool, prompt and resource behind one engine. */
export function createServer(deps: ServerDeps): FinanceServer {
  const engine = new GuardrailsEngine(deps.config, { now: deps.now, auditSink: deps.auditSink });
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  registerMarketTools(server, {
    engine,
    service: deps.service,
    store: deps.store,
    auditSink: deps.auditSink,
  });
  registerFinancialDataResources(server, { engine, store: deps.store, auditSink: deps.auditSink });
  registerAnalysisPrompts(server, { engine, auditSink: deps.auditSink });

  return { server, engine };
}
