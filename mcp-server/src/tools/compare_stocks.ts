import type { GuardedHandler } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import { timestampSuffix } from "../data/financialDataStore.js";
import { compareStocksSchema, type CompareStocksInput } from "../schemas/market-tools.js";
import { jsonResult, saveSnapshot, type MarketToolDeps } from "./shared.js";

export { compareStocksSchema };
export type { CompareStocksInput };

export function createCompareStocksHandler(deps: MarketToolDeps): GuardedHandler<CompareStocksInput> {
  const now = deps.now ?? (() => new Date());
  return async (args, { decision, signal }) => {
    // Accepted subset only; differs from args.symbols when partial acceptance is on.
    const symbols = decision.symbols ?? args.symbols;
    const report = await deps.service.compareStocks(symbols, args.metric, signal);
    await saveSnapshot(deps.store, `comparison_${args.metric}_${timestampSuffix(now())}.json`, report);
    return jsonResult(report);
  };
}
