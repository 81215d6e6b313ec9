import type { ToolResult } from "../compliance_logic/DeterministicGuardrails.js";
import { logger } from "../compliance_logic/logger.js";
import type { FinancialDataStore } from "../data/financialDataStore.js";
import type { MarketDataService } from "../data/marketDataService.js";

export interface MarketToolDeps {
  service: MarketDataService;
  store: FinancialDataStore;
  now?: () => Date;
}

export function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}

/** Snapshot writes are best effort; the tool result does not depend on them. */
export async function saveSnapshot(store: FinancialDataStore, filename: string, data: unknown): Promise<void> {
  try {
    const filePath = await store.save(filename, data);
    logger.debug({ filePath }, "snapshot saved");
  } catch (err) {
    logger.warn({ err, filename }, "failed to save snapshot");
  }
}
