import type { GuardedHandler } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import { timestampSuffix } from "../data/financialDataStore.js";
import { getMarketSummarySchema, type GetMarketSummaryInput } from "../schemas/market-tools.js";
import { jsonResult, saveSnapshot, type MarketToolDeps } from "./shared.js";

export { getMarketSummarySchema };
export type { GetMarketSummaryInput };

/** Fixed index set: S&P 500, Dow Jones, NASDAQ, Russell 2000, VIX */
export function createMarketSummaryHandler(deps: MarketToolDeps): GuardedHandler<GetMarketSummaryInput> {
  const now = deps.now ?? (() => new Date());
  return async (_args, { signal }) => {
    const report = await deps.service.getMarketSummary(signal);
    await saveSnapshot(deps.store, `market_summary_${timestampSuffix(now())}.json`, report);
    return jsonResult(report);
  };
}
