import type { GuardedHandler } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import { normalizeSymbol } from "../compliance_logic/symbolValidator.js";
import { getStockInfoSchema, type GetStockInfoInput } from "../schemas/market-tools.js";
import { jsonResult, saveSnapshot, type MarketToolDeps } from "./shared.js";

export { getStockInfoSchema };
export type { GetStockInfoInput };

/**
 * Price, range, valuation and profile fields for one symbol. Guardrails run
 * before this (format, blocklist, rate, content).
 */
export function createStockInfoHandler(deps: MarketToolDeps): GuardedHandler<GetStockInfoInput> {
  return async (args, { decision, signal }) => {
    const symbol = decision.symbols?.[0] ?? normalizeSymbol(args.symbol);
    const report = await deps.service.getStockInfo(symbol, signal);
    await saveSnapshot(deps.store, `${symbol}_info.json`, report);
    return jsonResult(report);
  };
}
