/**
 * Market data access over a Yahoo-Finance-compatible API. Prices, index
 * levels and OHLCV history come from the chart endpoint
 * (/v8/finance/chart/{symbol}); valuation and profile fields come from
 * /v10/finance/quoteSummary/{symbol} and are left null when that lookup fails.
 */

import { z } from "zod";
import { logger } from "../compliance_logic/logger.js";
import type { Interval, Period } from "../schemas/tool-inputs.js";

export const DEFAULT_MARKET_DATA_BASE_URL = "https://query1.finance.yahoo.com";

export class MarketDataError extends Error {
  readonly symbol: string;
  readonly status?: number;

  constructor(symbol: string, message: string, status?: number) {
    super(message);
    this.name = "MarketDataError";
    this.symbol = symbol;
    this.status = status;
  }
}

export interface Quote {
  symbol: string;
  name: string | null;
  currency: string | null;
  exchange: string | null;
  currentPrice: number | null;
  previousClose: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  volume: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  /** Epoch seconds of the last trade */
  marketTime: number | null;
  marketCap: number | null;
  /** Trailing twelve months */
  peRatio: number | null;
  /** Fraction, e.g. 0.005 for 0.5% */
  dividendYield: number | null;
  averageVolume: number | null;
  sector: string | null;
  industry: string | null;
}

export type Fundamentals = Pick<
  Quote,
  "marketCap" | "peRatio" | "dividendYield" | "averageVolume" | "sector" | "industry"
>;

export const EMPTY_FUNDAMENTALS: Fundamentals = Object.freeze({
  marketCap: null,
  peRatio: null,
  dividendYield: null,
  averageVolume: null,
  sector: null,
  industry: null,
});

export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface MarketDataProvider {
  getQuote(symbol: string, signal?: AbortSignal): Promise<Quote>;
  getHistory(symbol: string, period: Period, interval: Interval, signal?: AbortSignal): Promise<PriceBar[]>;
}

const num = z.number().nullable().optional();
const series = z.array(z.number().nullable()).optional();

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string(),
            currency: z.string().nullable().optional(),
            exchangeName: z.string().nullable().optional(),
            longName: z.string().nullable().optional(),
            shortName: z.string().nullable().optional(),
            regularMarketPrice: num,
            chartPreviousClose: num,
            previousClose: num,
            regularMarketDayHigh: num,
            regularMarketDayLow: num,
            regularMarketVolume: num,
            fiftyTwoWeekHigh: num,
            fiftyTwoWeekLow: num,
            regularMarketTime: num,
          }),
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({
              quote: z
                .array(z.object({ open: series, high: series, low: series, close: series, volume: series }))
                .optional(),
            })
            .optional(),
        })
      )
      .nullable()
      .optional(),
    error: z.object({ code: z.string(), description: z.string().nullable().optional() }).nullable().optional(),
  }),
});

// quoteSummary wraps numbers as { raw, fmt }
const rawNum = z.object({ raw: z.number().optional() }).passthrough().nullable().optional();
const text = z.string().nullable().optional();

const QuoteSummaryResponseSchema = z.object({
  quoteSummary: z.object({
    result: z
      .array(
        z.object({
          price: z.object({ marketCap: rawNum }).passthrough().nullable().optional(),
          summaryDetail: z
            .object({ marketCap: rawNum, trailingPE: rawNum, dividendYield: rawNum, averageVolume: rawNum })
            .passthrough()
            .nullable()
            .optional(),
          assetProfile: z.object({ sector: text, industry: text }).passthrough().nullable().optional(),
        })
      )
      .nullable()
      .optional(),
    error: z.object({ code: z.string(), description: z.string().nullable().optional() }).nullable().optional(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof ChartResponseSchema>["chart"]["result"]>[number];

const orNull = (v: number | null | undefined): number | null =>
  v != null && Number.isFinite(v) ? v : null;

export interface YahooChartProviderOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export class YahooChartProvider implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: YahooChartProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_MARKET_DATA_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getQuote(symbol: string, signal?: AbortSignal): Promise<Quote> {
    const [{ meta }, fundamentals] = await Promise.all([
      this.fetchChart(symbol, "5d", "1d", signal),
      this.fetchFundamentals(symbol, signal),
    ]);
    return {
      symbol: meta.symbol,
      name: meta.longName ?? meta.shortName ?? null,
      currency: meta.currency ?? null,
      exchange: meta.exchangeName ?? null,
      currentPrice: orNull(meta.regularMarketPrice),
      previousClose: orNull(meta.previousClose ?? meta.chartPreviousClose),
      dayHigh: orNull(meta.regularMarketDayHigh),
      dayLow: orNull(meta.regularMarketDayLow),
      volume: orNull(meta.regularMarketVolume),
      fiftyTwoWeekHigh: orNull(meta.fiftyTwoWeekHigh),
      fiftyTwoWeekLow: orNull(meta.fiftyTwoWeekLow),
      marketTime: orNull(meta.regularMarketTime),
      ...fundamentals,
    };
  }

  async getHistory(symbol: string, period: Period, interval: Interval, signal?: AbortSignal): Promise<PriceBar[]> {
    const result = await this.fetchChart(symbol, period, interval, signal);
    const timestamps = result.timestamp ?? [];
    const quote = result.indicators?.quote?.[0];
    if (!quote || timestamps.length === 0) {
      throw new MarketDataError(symbol, `No data found for symbol ${symbol}`);
    }

    const bars: PriceBar[] = [];
    timestamps.forEach((ts, i) => {
      const open = quote.open?.[i];
      const high = quote.high?.[i];
      const low = quote.low?.[i];
      const close = quote.close?.[i];
      // Provider emits null rows for halted or partial sessions.
      if (open == null || high == null || low == null || close == null) return;
      bars.push({
        date: new Date(ts * 1000).toISOString().slice(0, 10),
        open,
        high,
        low,
        close,
        volume: quote.volume?.[i] ?? 0,
      });
    });
    return bars;
  }

  /** Best effort: failures are logged and yield EMPTY_FUNDAMENTALS, except aborts. */
  private async fetchFundamentals(symbol: string, signal?: AbortSignal): Promise<Fundamentals> {
    try {
      return await this.fetchQuoteSummary(symbol, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.warn({ err, symbol }, "quote summary unavailable");
      return EMPTY_FUNDAMENTALS;
    }
  }

  private async fetchQuoteSummary(symbol: string, signal?: AbortSignal): Promise<Fundamentals> {
    const url =
      `${this.baseUrl}/v10/finance/quoteSummary/${encodeURIComponent(symbol)}` +
      "?modules=price,summaryDetail,assetProfile";
    const body = await this.getJson(symbol, url, signal);
    const parsed = QuoteSummaryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MarketDataError(symbol, `Unexpected quote summary payload for ${symbol}`);
    }
    const { result, error } = parsed.data.quoteSummary;
    const first = result?.[0];
    if (error || !first) {
      throw new MarketDataError(symbol, error?.description ?? `No quote summary for ${symbol}`);
    }
    const detail = first.summaryDetail;
    return {
      marketCap: orNull(detail?.marketCap?.raw ?? first.price?.marketCap?.raw),
      peRatio: orNull(detail?.trailingPE?.raw),
      dividendYield: orNull(detail?.dividendYield?.raw),
      averageVolume: orNull(detail?.averageVolume?.raw),
      sector: first.assetProfile?.sector ?? null,
      industry: first.assetProfile?.industry ?? null,
    };
  }

  private async getJson(symbol: string, url: string, signal?: AbortSignal): Promise<unknown> {
    const res = await this.fetchImpl(url, {
      headers: { Accept: "application/json", "User-Agent": "Mozilla/5.0 (finance-guardrails-mcp-server)" },
      signal,
    });
    if (!res.ok) {
      throw new MarketDataError(symbol, `Market data request for ${symbol} failed with HTTP ${res.status}`, res.status);
    }
    return res.json();
  }

  private async fetchChart(
    symbol: string,
    range: string,
    interval: string,
    signal?: AbortSignal
  ): Promise<ChartResult> {
    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}?range=${range}&interval=${interval}`;
    const parsed = ChartResponseSchema.safeParse(await this.getJson(symbol, url, signal));
    if (!parsed.success) {
      throw new MarketDataError(symbol, `Unexpected market data payload for ${symbol}`);
    }
    const { result, error } = parsed.data.chart;
    const first = result?.[0];
    if (error || !first) {
      throw new MarketDataError(symbol, error?.description ?? `Symbol ${symbol} not found`);
    }
    return first;
  }
}
