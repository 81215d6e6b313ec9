import { z } from "zod";

export interface PromptDefinition {
  name: string;
  description: string;
  arguments: Array<{ name: string; required: boolean; description: string }>;
}

export const analyzeStockPromptSchema = {
  symbol: z.string().min(1).describe("Ticker symbol to analyze"),
  analysis_type: z.string().optional().describe("comprehensive (default), technical or fundamental"),
};

export const portfolioComparisonPromptSchema = {
  symbols: z.string().min(1).describe("Comma-separated ticker symbols"),
  timeframe: z.string().optional().describe("History period, e.g. 1y (default)"),
};

export const PROMPT_DEFINITIONS: readonly PromptDefinition[] = [
  {
    name: "analyze_stock_prompt",
    description: "Structured, data-driven analysis of a single stock using the market data tools.",
    arguments: [
      { name: "symbol", required: true, description: "Ticker symbol" },
      { name: "analysis_type", required: false, description: "comprehensive, technical or fundamental" },
    ],
  },
  {
    name: "portfolio_comparison_prompt",
    description: "Side-by-side comparison of several stocks using the market data tools.",
    arguments: [
      { name: "symbols", required: true, description: "Comma-separated ticker symbols" },
      { name: "timeframe", required: false, description: "History period, e.g. 1y" },
    ],
  },
];

export function splitSymbolList(symbols: string): string[] {
  return symbols
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

export function analyzeStockPrompt(symbol: string, analysisType = "comprehensive"): string {
  return `Analyze the stock ${symbol} (${analysisType} analysis) using the available financial tools.

1. Basic information: call get_stock_info with symbol "${symbol}" for the current price, previous close, day range, volume and 52-week range.
2. Historical performance: call get_historical_data with symbol "${symbol}" and period "1y" to describe the price trend, volatility and notable highs and lows.
3. Market context: call get_market_summary to describe how the broader indices moved over the same period.
4. Write up:
   - Summary of key facts about ${symbol}
   - Price trend and range observations
   - How ${symbol} moved relative to the major indices
   - Risk factors visible in the data (volatility, drawdowns)

Base every statement on data returned by the tools and keep factual data separate from interpretation. Do not recommend buying, selling or holding.`;
}

export function portfolioComparisonPrompt(symbols: readonly string[], timeframe = "1y"): string {
  const list = symbols.join(", ");
  return `Compare the following stocks side by side: ${list}

1. For each of ${list}: call get_stock_info, then get_historical_data with period "${timeframe}".
2. Call compare_stocks with symbols [${symbols.map((s) => `"${s}"`).join(", ")}] for current_price, change_percent and volume.
3. Call get_market_summary for index context.
4. Write up:
   - A table of the compared metrics
   - Relative price performance over ${timeframe}
   - Differences in volatility and trading volume
   - Concentration and correlation observations visible in the data

Present the comparison factually. Do not suggest allocations, entry or exit points, or any buy/sell action.`;
}
