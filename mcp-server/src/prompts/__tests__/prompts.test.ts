import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { describe, expect, it } from "vitest";
import { makeConfig, memorySink } from "../../compliance_logic/__tests__/helpers.js";
import { GuardrailsEngine } from "../../compliance_logic/GuardrailsEngine.js";
import { DISCLAIMERS } from "../../compliance_logic/responseSanitizer.js";
import { analyzeStockPrompt, portfolioComparisonPrompt, splitSymbolList } from "../analysis_prompts.js";
import { getAnalyzeStockPrompt, getPortfolioComparisonPrompt } from "../index.js";

function deps() {
  const audit = memorySink();
  const engine = new GuardrailsEngine(makeConfig({ rate_limiting: { min_request_interval_seconds: 0 } }), {
    auditSink: audit.sink,
  });
  return { engine, auditSink: audit.sink };
}

describe("analysis prompt templates", () => {
  it("splits comma-separated symbols", () => {
    expect(splitSymbolList(" AAPL, MSFT ,,GOOG ")).toEqual(["AAPL", "MSFT", "GOOG"]);
  });

  it("stays factual", () => {
    expect(analyzeStockPrompt("AAPL")).toContain("Do not recommend buying, selling or holding.");
    expect(portfolioComparisonPrompt(["AAPL", "MSFT"], "6mo")).toContain(
      'Call compare_stocks with symbols ["AAPL", "MSFT"]'
    );
  });
});

describe("prompt handlers", () => {
  it("renders analyze_stock_prompt with the normalized symbol and a disclaimer", async () => {
    const result = await getAnalyzeStockPrompt(deps(), { symbol: "aapl" });
    expect(result.messages).toHaveLength(1);
    const message = result.messages[0];
    expect(message?.role).toBe("user");
    const text = message?.content.type === "text" ? message.content.text : "";
    expect(text.startsWith("Analyze the stock AAPL (comprehensive analysis)")).toBe(true);
    expect(text.endsWith(DISCLAIMERS.informational)).toBe(true);
  });

  it("renders portfolio_comparison_prompt for each accepted symbol", async () => {
    const result = await getPortfolioComparisonPrompt(deps(), { symbols: "aapl, msft", timeframe: "6mo" });
    const content = result.messages[0]?.content;
    const text = content?.type === "text" ? content.text : "";
    expect(text.startsWith("Compare the following stocks side by side: AAPL, MSFT")).toBe(true);
  });

  it("refuses blocked symbols", async () => {
    const attempt = getAnalyzeStockPrompt(deps(), { symbol: "PONZI" });
    await expect(attempt).rejects.toBeInstanceOf(McpError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it("screens free-text arguments", async () => {
    await expect(getAnalyzeStockPrompt(deps(), { symbol: "AAPL", analysis_type: "<script>x</script>" })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });
});
