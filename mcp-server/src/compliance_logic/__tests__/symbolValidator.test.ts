import { describe, expect, it } from "vitest";
import { SymbolValidator, describeRejections, normalizeSymbol } from "../symbolValidator.js";
import { makeConfig } from "./helpers.js";

const validator = new SymbolValidator(makeConfig().symbol_validation);

describe("SymbolValidator", () => {
  it("normalizes case and whitespace", () => {
    expect(normalizeSymbol("  brk.b ")).toBe("BRK.B");
    expect(validator.validate(["aapl", " msft "])).toEqual({ accepted: ["AAPL", "MSFT"], rejected: [] });
  });

  it("returns empty lists for an empty input", () => {
    expect(validator.validate([])).toEqual({ accepted: [], rejected: [] });
  });

  it("accepts share-class suffixes", () => {
    expect(validator.isValid("BRK.B")).toBe(true);
    expect(validator.isValid("RDS-A")).toBe(true);
    expect(validator.isValid("BRK.BBB")).toBe(false);
  });

  it("rejects bad formats and blocked symbols", () => {
    const result = validator.validate(["TOOLONGSYM", "SCAM", "", "GOOG"]);
    expect(result.accepted).toEqual(["GOOG"]);
    expect(result.rejected).toEqual([
      { symbol: "TOOLONGSYM", reason: "InvalidFormat" },
      { symbol: "SCAM", reason: "BlockedSymbol" },
      { symbol: "", reason: "InvalidFormat" },
    ]);
  });

  it("marks every symbol past the batch limit", () => {
    const symbols = ["A", "B", "C", "D", "E", "F", "G", "H", "I", "J", "K"];
    const result = validator.validate(symbols);
    expect(result.accepted).toHaveLength(10);
    expect(result.rejected).toEqual([{ symbol: "K", reason: "TooManySymbols" }]);
  });

  it("uses a configured blocklist case-insensitively", () => {
    const custom = new SymbolValidator({ blocked_symbols: ["meme"], max_symbols_per_request: 2 });
    expect(custom.validate(["MEME"]).rejected).toEqual([{ symbol: "MEME", reason: "BlockedSymbol" }]);
  });

  it("describes rejections for messages", () => {
    expect(
      describeRejections([
        { symbol: "BAD!", reason: "InvalidFormat" },
        { symbol: "SCAM", reason: "BlockedSymbol" },
        { symbol: "K", reason: "TooManySymbols" },
        { symbol: "", reason: "InvalidFormat" },
      ])
    ).toBe("BAD! (invalid format), SCAM (blocked), K (over limit), (empty) (invalid format)");
  });
});
