import type { SymbolValidationConfig } from "../schemas/policy.js";

/** 1-5 uppercase alphanumerics, optional share-class suffix (BRK.B, RDS-A) */
export const SYMBOL_PATTERN = /^[A-Z0-9]{1,5}([.-][A-Z0-9]{1,2})?$/;

export type SymbolRejectionReason = "InvalidFormat" | "BlockedSymbol" | "TooManySymbols";

export interface SymbolRejection {
  symbol: string;
  reason: SymbolRejectionReason;
}

export interface SymbolValidationResult {
  accepted: string[];
  rejected: SymbolRejection[];
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Pure validation over the symbol policy. Entries past the batch limit are
 * rejected with TooManySymbols rather than dropped.
 */
export class SymbolValidator {
  private readonly blocked: ReadonlySet<string>;
  private readonly maxSymbols: number;

  constructor(config: Pick<SymbolValidationConfig, "blocked_symbols" | "max_symbols_per_request">) {
    this.blocked = new Set(config.blocked_symbols.map(normalizeSymbol));
    this.maxSymbols = config.max_symbols_per_request;
  }

  validate(symbols: readonly string[]): SymbolValidationResult {
    const result: SymbolValidationResult = { accepted: [], rejected: [] };

    symbols.forEach((raw, index) => {
      const symbol = normalizeSymbol(raw);
      if (index >= this.maxSymbols) {
        result.rejected.push({ symbol, reason: "TooManySymbols" });
      } else if (!SYMBOL_PATTERN.test(symbol)) {
        result.rejected.push({ symbol, reason: "InvalidFormat" });
      } else if (this.blocked.has(symbol)) {
        result.rejected.push({ symbol, reason: "BlockedSymbol" });
      } else {
        result.accepted.push(symbol);
      }
    });

    return result;
  }

  isValid(symbol: string): boolean {
    return this.validate([symbol]).rejected.length === 0;
  }
}

export function describeRejections(rejected: readonly SymbolRejection[]): string {
  return rejected
    .map(({ symbol, reason }) => {
      switch (reason) {
        case "InvalidFormat":
          return `${symbol || "(empty)"} (invalid format)`;
        case "BlockedSymbol":
          return `${symbol} (blocked)`;
        case "TooManySymbols":
          return `${symbol} (over limit)`;
      }
    })
    .join(", ");
}
