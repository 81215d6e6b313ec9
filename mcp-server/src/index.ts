#!/usr/bin/env node
/**
 * Finance guardrails MCP server.
 *
 * - tools/: market-data tools and the chat-turn screen
 * - prompts/, resources/: analysis prompts and saved-snapshot resources
 * - schemas/: Zod schemas for tool inputs and the policy document
 * - compliance_logic/: GuardrailsEngine and its checks
 *
 * For STDIO: log to stderr only; stdout is used for JSON-RPC.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ConfigError } from "./compliance_logic/errors.js";
import { logger } from "./compliance_logic/logger.js";
import { loadPolicyConfig } from "./compliance_logic/policyConfig.js";
import { FinancialDataStore } from "./data/financialDataStore.js";
import { DEFAULT_MARKET_DATA_BASE_URL, YahooChartProvider } from "./data/marketDataProvider.js";
import { MarketDataService } from "./data/marketDataService.js";
import { SERVER_NAME, SERVER_VERSION, createServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadPolicyConfig();
  const provider = new YahooChartProvider({
    baseUrl: process.env.MCP_MARKET_DATA_BASE_URL ?? DEFAULT_MARKET_DATA_BASE_URL,
  });
  const { server } = createServer({
    config,
    service: new MarketDataService(provider),
    store: new FinancialDataStore(),
  });

  await server.connect(new StdioServerTransport());
  logger.info({ version: SERVER_VERSION }, `${SERVER_NAME} running on stdio`);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.fatal({ issues: err.issues }, err.message);
  } else {
    logger.fatal({ err }, "fatal error");
  }
  process.exit(1);
});
