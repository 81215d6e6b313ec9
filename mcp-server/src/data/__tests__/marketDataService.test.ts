import { describe, expect, it } from "vitest";
import { MarketDataError } from "../marketDataProvider.js";
import { MARKET_INDICES, MarketDataService } from "../marketDataService.js";
import { FakeMarketDataProvider, quote } from "./fakes.js";

const fixedNow = () => new Date("2026-01-02T03:04:05.000Z");

describe("MarketDataService", () => {
  it("builds a stock info report", async () => {
    const service = new MarketDataService(new FakeMarketDataProvider({ AAPL: quote("AAPL", 110, 100) }), fixedNow);
    expect(await service.getStockInfo("AAPL")).toEqual({
      symbol: "AAPL",
      name: "AAPL Holdings",
      currency: "USD",
      exchange: "NMS",
      current_price: 110,
      previous_close: 100,
      change: 10,
      change_percent: 10,
      day_high: null,
      day_low: null,
      volume: 1000,
      fifty_two_week_high: null,
      fifty_two_week_low: null,
      market_cap: null,
      pe_ratio: null,
      dividend_yield: null,
      average_volume: null,
      sector: "N/A",
      industry: "N/A",
      retrieved_at: "2026-01-02T03:04:05.000Z",
    });
  });

  it("carries valuation and profile fields", async () => {
    const aapl = { ...quote("AAPL", 110, 100), marketCap: 2_000_000, peRatio: 28.5, sector: "Technology" };
    const report = await new MarketDataService(new FakeMarketDataProvider({ AAPL: aapl }), fixedNow).getStockInfo("AAPL");
    expect(report).toMatchObject({ market_cap: 2_000_000, pe_ratio: 28.5, sector: "Technology", industry: "N/A" });
  });

  it("compares on market cap and P/E ratio", async () => {
    const provider = new FakeMarketDataProvider({
      AAA: { ...quote("AAA", 10), marketCap: 500, peRatio: 40 },
      BBB: { ...quote("BBB", 30), marketCap: 900, peRatio: null },
      CCC: { ...quote("CCC", 20), marketCap: 100, peRatio: 12 },
    });
    const service = new MarketDataService(provider, fixedNow);

    const byCap = await service.compareStocks(["AAA", "BBB", "CCC"], "market_cap");
    expect(byCap.stocks.map((s) => [s.symbol, s.metric_value])).toEqual([
      ["BBB", 900],
      ["AAA", 500],
      ["CCC", 100],
    ]);
    const byPe = await service.compareStocks(["AAA", "BBB", "CCC"], "pe_ratio");
    expect(byPe.stocks.map((s) => s.symbol)).toEqual(["AAA", "CCC", "BBB"]);
  });

  it("leaves change empty without a previous close", async () => {
    const service = new MarketDataService(new FakeMarketDataProvider({ NEW: quote("NEW", 5, null) }), fixedNow);
    const report = await service.getStockInfo("NEW");
    expect(report.change).toBeNull();
    expect(report.change_percent).toBeNull();
  });

  it("ranks comparisons descending with missing values and failures last", async () => {
    const provider = new FakeMarketDataProvider({
      AAA: quote("AAA", 10),
      BBB: quote("BBB", 30),
      CCC: quote("CCC", null),
    });
    const report = await new MarketDataService(provider, fixedNow).compareStocks(
      ["AAA", "BBB", "CCC", "ERR"],
      "current_price"
    );

    expect(report.metric).toBe("current_price");
    expect(report.comparison_date).toBe("2026-01-02T03:04:05.000Z");
    expect(report.stocks.map((s) => s.symbol)).toEqual(["BBB", "AAA", "CCC", "ERR"]);
    expect(report.stocks[0]).toEqual({ symbol: "BBB", name: "BBB Holdings", metric_value: 30, currency: "USD" });
    expect(report.stocks[3]).toEqual({ symbol: "ERR", error: "Symbol ERR not found" });
  });

  it("keeps input order among equal values", async () => {
    const provider = new FakeMarketDataProvider({ AAA: quote("AAA", 10), BBB: quote("BBB", 10) });
    const report = await new MarketDataService(provider, fixedNow).compareStocks(["BBB", "AAA"], "volume");
    expect(report.stocks.map((s) => s.symbol)).toEqual(["BBB", "AAA"]);
  });

  it("fails a comparison when every symbol fails", async () => {
    const service = new MarketDataService(new FakeMarketDataProvider({}), fixedNow);
    await expect(service.compareStocks(["X", "Y"], "current_price")).rejects.toBeInstanceOf(MarketDataError);
  });

  it("summarizes indices with per-index errors", async () => {
    const quotes = Object.fromEntries(
      MARKET_INDICES.filter(({ symbol }) => symbol !== "^VIX").map(({ symbol }) => [symbol, quote(symbol, 101, 100)])
    );
    const report = await new MarketDataService(new FakeMarketDataProvider(quotes), fixedNow).getMarketSummary();

    expect(report.summary_date).toBe("2026-01-02T03:04:05.000Z");
    expect(report.indices).toHaveLength(5);
    expect(report.indices[0]).toEqual({ symbol: "^GSPC", name: "S&P 500", current_price: 101, change: 1, change_percent: 1 });
    expect(report.indices[4]).toEqual({ symbol: "^VIX", name: "VIX", error: "Symbol ^VIX not found" });
  });

  it("fails the summary when no index is available", async () => {
    const service = new MarketDataService(new FakeMarketDataProvider({}), fixedNow);
    await expect(service.getMarketSummary()).rejects.toThrow("No market index data available");
  });
});
