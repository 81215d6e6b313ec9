import type { GuardedHandler } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import { normalizeSymbol } from "../compliance_logic/symbolValidator.js";
import { getHistoricalDataSchema, type GetHistoricalDataInput } from "../schemas/market-tools.js";
import { jsonResult, saveSnapshot, type MarketToolDeps } from "./shared.js";

export { getHistoricalDataSchema };
export type { GetHistoricalDataInput };

/** OHLCV series for one symbol; period and interval are checked against data-access policy first. */
export function createHistoricalDataHandler(deps: MarketToolDeps): GuardedHandler<GetHistoricalDataInput> {
  return async (args, { decision, signal }) => {
    const symbol = decision.symbols?.[0] ?? normalizeSymbol(args.symbol);
    const report = await deps.service.getHistoricalData(symbol, args.period, args.interval, signal);
    await saveSnapshot(deps.store, `${symbol}_historical_${args.period}_${args.interval}.json`, report);
    return jsonResult(report);
  };
}
