import { describe, expect, it } from "vitest";
import { parseQueryDirective } from "../queryDirectives.js";

describe("parseQueryDirective", () => {
  it("recognizes resource directives", () => {
    expect(parseQueryDirective("@portfolios")).toEqual({ kind: "list_resources", uri: "finance://portfolios" });
    expect(parseQueryDirective(" @AAPL_info.json ")).toEqual({
      kind: "read_resource",
      filename: "AAPL_info.json",
      uri: "finance://AAPL_info.json",
    });
    expect(parseQueryDirective("@")).toEqual({ kind: "invalid", error: "Resource name is required after @" });
  });

  it("recognizes prompt listing and status", () => {
    expect(parseQueryDirective("/prompts")).toEqual({ kind: "list_prompts" });
    expect(parseQueryDirective("/status")).toEqual({ kind: "status" });
  });

  it("parses prompt invocations with bare and quoted values", () => {
    expect(parseQueryDirective('/prompt analyze_stock_prompt symbol=AAPL analysis_type="deep dive"')).toEqual({
      kind: "invoke_prompt",
      name: "analyze_stock_prompt",
      arguments: { symbol: "AAPL", analysis_type: "deep dive" },
    });
    expect(parseQueryDirective('/prompt portfolio_comparison_prompt symbols="AAPL, MSFT" timeframe=6mo')).toEqual({
      kind: "invoke_prompt",
      name: "portfolio_comparison_prompt",
      arguments: { symbols: "AAPL, MSFT", timeframe: "6mo" },
    });
  });

  it("rejects a prompt directive without a usable name", () => {
    const invalid = { kind: "invalid", error: "Invalid prompt format. Use: /prompt <name> <arg1=value1>" };
    expect(parseQueryDirective("/prompt")).toEqual(invalid);
    expect(parseQueryDirective("/prompt symbol=AAPL")).toEqual(invalid);
    expect(parseQueryDirective("/prompt bad-name")).toEqual(invalid);
  });

  it("treats everything else as a query", () => {
    expect(parseQueryDirective("  What is the P/E of MSFT?  ")).toEqual({ kind: "query", text: "What is the P/E of MSFT?" });
    expect(parseQueryDirective("/promptx")).toEqual({ kind: "query", text: "/promptx" });
  });
});
