import { z } from "zod";
import { COMPARE_METRICS } from "../data/marketDataService.js";
import {
  IntervalArgSchema,
  PeriodArgSchema,
  SessionIdArgSchema,
  SymbolArgSchema,
  SymbolListArgSchema,
} from "./tool-inputs.js";

/** MCP input schemas for the market-data tools (no unknown keys) */
export const getStockInfoSchema = z
  .object({
    symbol: SymbolArgSchema,
    session_id: SessionIdArgSchema,
  })
  .strict();

export const getHistoricalDataSchema = z
  .object({
    symbol: SymbolArgSchema,
    period: PeriodArgSchema,
    interval: IntervalArgSchema,
    session_id: SessionIdArgSchema,
  })
  .strict();

export const compareStocksSchema = z
  .object({
    symbols: SymbolListArgSchema,
    metric: z.enum(COMPARE_METRICS).default("current_price").describe("Metric to compare"),
    session_id: SessionIdArgSchema,
  })
  .strict();

export const getMarketSummarySchema = z
  .object({
    session_id: SessionIdArgSchema,
  })
  .strict();

export const screenQuerySchema = z
  .object({
    query: z.string().min(1, "Query is required").describe("Chat turn or directive (@portfolios, /prompt, /status)"),
    session_id: SessionIdArgSchema,
  })
  .strict();

export const getGuardrailStatusSchema = z
  .object({
    session_id: SessionIdArgSchema,
  })
  .strict();

export type GetStockInfoInput = z.infer<typeof getStockInfoSchema>;
export type GetHistoricalDataInput = z.infer<typeof getHistoricalDataSchema>;
export type CompareStocksInput = z.infer<typeof compareStocksSchema>;
export type GetMarketSummaryInput = z.infer<typeof getMarketSummarySchema>;
export type ScreenQueryInput = z.infer<typeof screenQuerySchema>;
export type GetGuardrailStatusInput = z.infer<typeof getGuardrailStatusSchema>;
