import type { Interval, Period } from "../schemas/tool-inputs.js";
import { MarketDataError, type MarketDataProvider, type PriceBar, type Quote } from "./marketDataProvider.js";

export const MARKET_INDICES: ReadonlyArray<{ symbol: string; name: string }> = [
  { symbol: "^GSPC", name: "S&P 500" },
  { symbol: "^DJI", name: "Dow Jones" },
  { symbol: "^IXIC", name: "NASDAQ" },
  { symbol: "^RUT", name: "Russell 2000" },
  { symbol: "^VIX", name: "VIX" },
];

export const COMPARE_METRICS = [
  "current_price",
  "previous_close",
  "change_percent",
  "volume",
  "fifty_two_week_high",
  "fifty_two_week_low",
  "market_cap",
  "pe_ratio",
  "dividend_yield",
  "average_volume",
] as const;

export type CompareMetric = (typeof COMPARE_METRICS)[number];

export interface StockInfoReport {
  symbol: string;
  name: string;
  currency: string;
  exchange: string;
  current_price: number | null;
  previous_close: number | null;
  change: number | null;
  change_percent: number | null;
  day_high: number | null;
  day_low: number | null;
  volume: number | null;
  fifty_two_week_high: number | null;
  fifty_two_week_low: number | null;
  market_cap: number | null;
  pe_ratio: number | null;
  dividend_yield: number | null;
  average_volume: number | null;
  sector: string;
  industry: string;
  retrieved_at: string;
}

export interface HistoricalReport {
  symbol: string;
  period: Period;
  interval: Interval;
  data: PriceBar[];
}

export interface ComparisonEntry {
  symbol: string;
  name?: string;
  metric_value?: number | null;
  currency?: string;
  error?: string;
}

export interface ComparisonReport {
  metric: CompareMetric;
  comparison_date: string;
  stocks: ComparisonEntry[];
}

export interface IndexSummary {
  symbol: string;
  name: string;
  current_price?: number | null;
  change?: number | null;
  change_percent?: number | null;
  error?: string;
}

export interface MarketSummaryReport {
  summary_date: string;
  indices: IndexSummary[];
}

function round(value: number, places: number): number {
  const f = 10 ** places;
  return Math.round(value * f) / f;
}

function changeOf(quote: Quote): { change: number | null; changePercent: number | null } {
  if (quote.currentPrice == null || quote.previousClose == null) {
    return { change: null, changePercent: null };
  }
  const change = quote.currentPrice - quote.previousClose;
  const changePercent = quote.previousClose !== 0 ? (change / quote.previousClose) * 100 : 0;
  return { change: round(change, 4), changePercent: round(changePercent, 4) };
}

function metricOf(report: StockInfoReport, metric: CompareMetric): number | null {
  return report[metric];
}

/**
 * Report builders over a MarketDataProvider. Multi-symbol reports record a
 * per-entry error and fail only when every entry failed.
 */
export class MarketDataService {
  constructor(
    private readonly provider: MarketDataProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getStockInfo(symbol: string, signal?: AbortSignal): Promise<StockInfoReport> {
    const quote = await this.provider.getQuote(symbol, signal);
    const { change, changePercent } = changeOf(quote);
    return {
      symbol: symbol.toUpperCase(),
      name: quote.name ?? "N/A",
      currency: quote.currency ?? "USD",
      exchange: quote.exchange ?? "N/A",
      current_price: quote.currentPrice,
      previous_close: quote.previousClose,
      change,
      change_percent: changePercent,
      day_high: quote.dayHigh,
      day_low: quote.dayLow,
      volume: quote.volume,
      fifty_two_week_high: quote.fiftyTwoWeekHigh,
      fifty_two_week_low: quote.fiftyTwoWeekLow,
      market_cap: quote.marketCap,
      pe_ratio: quote.peRatio,
      dividend_yield: quote.dividendYield,
      average_volume: quote.averageVolume,
      sector: quote.sector ?? "N/A",
      industry: quote.industry ?? "N/A",
      retrieved_at: this.now().toISOString(),
    };
  }

  async getHistoricalData(
    symbol: string,
    period: Period,
    interval: Interval,
    signal?: AbortSignal
  ): Promise<HistoricalReport> {
    const data = await this.provider.getHistory(symbol, period, interval, signal);
    return { symbol: symbol.toUpperCase(), period, interval, data };
  }

  async compareStocks(symbols: readonly string[], metric: CompareMetric, signal?: AbortSignal): Promise<ComparisonReport> {
    const stocks = await Promise.all(
      symbols.map(async (symbol): Promise<ComparisonEntry> => {
        try {
          const info = await this.getStockInfo(symbol, signal);
          return { symbol: info.symbol, name: info.name, metric_value: metricOf(info, metric), currency: info.currency };
        } catch (err) {
          return { symbol: symbol.toUpperCase(), error: err instanceof Error ? err.message : String(err) };
        }
      })
    );

    if (stocks.every((entry) => entry.error !== undefined)) {
      throw new MarketDataError(symbols.join(","), `No market data available for ${symbols.join(", ")}`);
    }

    // Descending by value; missing values and errors last, input order kept among ties.
    const ranked = stocks
      .map((entry, index) => ({ entry, index }))
      .sort((a, b) => {
        const av = a.entry.metric_value;
        const bv = b.entry.metric_value;
        if (av == null && bv == null) return a.index - b.index;
        if (av == null) return 1;
        if (bv == null) return -1;
        return bv - av || a.index - b.index;
      })
      .map(({ entry }) => entry);

    return { metric, comparison_date: this.now().toISOString(), stocks: ranked };
  }

  async getMarketSummary(signal?: AbortSignal): Promise<MarketSummaryReport> {
    const indices = await Promise.all(
      MARKET_INDICES.map(async ({ symbol, name }): Promise<IndexSummary> => {
        try {
          const quote = await this.provider.getQuote(symbol, signal);
          const { change, changePercent } = changeOf(quote);
          return { symbol, name, current_price: quote.currentPrice, change, change_percent: changePercent };
        } catch (err) {
          return { symbol, name, error: err instanceof Error ? err.message : String(err) };
        }
      })
    );
    if (indices.every((entry) => entry.error !== undefined)) {
      throw new MarketDataError("indices", "No market index data available");
    }
    return { summary_date: this.now().toISOString(), indices };
  }
}
