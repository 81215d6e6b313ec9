import {
  EMPTY_FUNDAMENTALS,
  MarketDataError,
  type MarketDataProvider,
  type PriceBar,
  type Quote,
} from "../marketDataProvider.js";

export function quote(symbol: string, currentPrice: number | null, previousClose: number | null = currentPrice): Quote {
  return {
    symbol,
    name: `${symbol} Holdings`,
    currency: "USD",
    exchange: "NMS",
    currentPrice,
    previousClose,
    dayHigh: null,
    dayLow: null,
    volume: 1000,
    fiftyTwoWeekHigh: null,
    fiftyTwoWeekLow: null,
    marketTime: null,
    ...EMPTY_FUNDAMENTALS,
  };
}

/** In-memory provider; unknown symbols fail like the HTTP provider does */
export class FakeMarketDataProvider implements MarketDataProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly quotes: Record<string, Quote>,
    private readonly history: Record<string, PriceBar[]> = {}
  ) {}

  async getQuote(symbol: string): Promise<Quote> {
    this.calls.push(symbol);
    const found = this.quotes[symbol];
    if (!found) throw new MarketDataError(symbol, `Symbol ${symbol} not found`);
    return found;
  }

  async getHistory(symbol: string): Promise<PriceBar[]> {
    this.calls.push(symbol);
    const found = this.history[symbol];
    if (!found) throw new MarketDataError(symbol, `No data found for symbol ${symbol}`);
    return found;
  }
}
