import { z } from "zod";

/**
 * Shared shapes for market-data tool inputs. Symbol strings and lists carry
 * no length or count caps here: the symbol format, blocklist and batch limit
 * are decided by the guardrails so that every rejection is audited.
 */

export const PERIODS = ["1d", "5d", "1mo", "3mo", "6mo", "1y", "2y", "5y", "10y", "ytd", "max"] as const;
export const INTERVALS = [
  "1m", "2m", "5m", "15m", "30m", "60m", "90m", "1h", "1d", "5d", "1wk", "1mo", "3mo",
] as const;

export type Period = (typeof PERIODS)[number];
export type Interval = (typeof INTERVALS)[number];

/** Approximate calendar days covered by each period */
export const PERIOD_DAYS: Record<Period, number> = {
  "1d": 1,
  "5d": 5,
  "1mo": 30,
  "3mo": 90,
  "6mo": 180,
  "1y": 365,
  "2y": 730,
  "5y": 1825,
  "10y": 3650,
  ytd: 366,
  max: 7300,
};

/**
 * Interval and period pairs that are refused: fine intervals over long
 * periods, and coarse intervals over periods too short to fill one bar.
 */
const INCOMPATIBLE_INTERVAL_PERIODS: ReadonlyArray<readonly [readonly string[], readonly string[]]> = [
  [["1m", "2m", "5m"], ["1y", "2y", "5y", "10y", "max"]],
  [["15m", "30m"], ["2y", "5y", "10y", "max"]],
  [["60m", "90m", "1h"], ["5y", "10y", "max"]],
  [["1d", "5d", "1wk"], ["1d"]],
  [["1mo", "3mo"], ["1d", "5d", "1mo"]],
];

export function isCompatibleInterval(period: string, interval: string): boolean {
  return !INCOMPATIBLE_INTERVAL_PERIODS.some(
    ([intervals, periods]) => intervals.includes(interval) && periods.includes(period)
  );
}

export const SymbolArgSchema = z
  .string()
  .describe("Ticker symbol, e.g. AAPL or BRK.B");

export const SymbolListArgSchema = z
  .array(SymbolArgSchema)
  .min(1)
  .describe("Ticker symbols to compare");

export const SessionIdArgSchema = z
  .string()
  .min(1)
  .max(128)
  .optional()
  .describe("Client session id used for rate limiting and audit; defaults to the transport session");

export const PeriodArgSchema = z.enum(PERIODS).default("1mo").describe("Time period");
export const IntervalArgSchema = z.enum(INTERVALS).default("1d").describe("Sampling interval");

export function isPeriod(value: string): value is Period {
  return PERIODS.some((p) => p === value);
}
