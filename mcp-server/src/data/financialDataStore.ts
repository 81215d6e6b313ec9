import { promises as fs } from "node:fs";
import path from "node:path";

/** Saved snapshot names: no separators, no traversal, .json only */
export const SNAPSHOT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.^-]*\.json$/;

export class SnapshotNameError extends Error {
  constructor(filename: string) {
    super(`Invalid financial data file name: ${filename}`);
    this.name = "SnapshotNameError";
  }
}

export function isValidSnapshotName(filename: string): boolean {
  return SNAPSHOT_NAME_PATTERN.test(filename) && !filename.includes("..");
}

/** YYYYMMDD_HHMMSS in UTC */
export function timestampSuffix(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const fmt = (value: unknown): string => (value === null || value === undefined ? "N/A" : String(value));

/**
 * Flat-file store for tool outputs. Every data tool saves its JSON report
 * here; the finance:// resources list and render them.
 */
export class FinancialDataStore {
  readonly directory: string;

  constructor(directory: string = process.env.MCP_FINANCE_DATA_DIR ?? "financial_data") {
    this.directory = path.resolve(directory);
  }

  async save(filename: string, data: unknown): Promise<string> {
    const filePath = this.pathFor(filename);
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
    return filePath;
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries.filter(isValidSnapshotName).sort();
  }

  /** Parsed snapshot, or null when no such file exists */
  async read(filename: string): Promise<unknown> {
    try {
      return JSON.parse(await fs.readFile(this.pathFor(filename), "utf8"));
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async renderIndex(): Promise<string> {
    const files = await this.list();
    const lines = ["# Available Financial Data", ""];
    if (files.length === 0) {
      lines.push("No financial data found.");
    } else {
      lines.push(...files.map((f) => `- ${f}`), "", "Use @<filename> to access specific financial data.");
    }
    return lines.join("\n");
  }

  async renderSnapshot(filename: string): Promise<string> {
    if (!isValidSnapshotName(filename)) {
      return `# Invalid financial data file name: ${filename}\n\nFile names look like AAPL_info.json.`;
    }
    let data: unknown;
    try {
      data = await this.read(filename);
    } catch (err) {
      if (err instanceof SyntaxError) {
        return `# Error reading financial data: ${filename}\n\nThe data file is corrupted.`;
      }
      throw err;
    }
    if (data === null) {
      return `# Financial data file not found: ${filename}\n\nAvailable files can be viewed with @portfolios`;
    }
    return renderMarkdown(filename, data);
  }

  private pathFor(filename: string): string {
    if (!isValidSnapshotName(filename)) throw new SnapshotNameError(filename);
    return path.join(this.directory, filename);
  }
}

function isMissing(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

export function renderMarkdown(filename: string, data: unknown): string {
  if (isRecord(data) && "symbol" in data && "current_price" in data) {
    return [
      `# Stock Information: ${fmt(data.symbol)}`,
      "",
      `**Company**: ${fmt(data.name)}`,
      `**Current Price**: ${fmt(data.current_price)} ${fmt(data.currency)}`,
      `**Previous Close**: ${fmt(data.previous_close)}`,
      `**Change**: ${fmt(data.change)} (${fmt(data.change_percent)}%)`,
      `**52-Week Range**: ${fmt(data.fifty_two_week_low)} - ${fmt(data.fifty_two_week_high)}`,
      `**Volume**: ${fmt(data.volume)}`,
      `**Market Cap**: ${fmt(data.market_cap)}`,
      `**P/E Ratio**: ${fmt(data.pe_ratio)}`,
      `**Sector**: ${fmt(data.sector)}`,
      `**Industry**: ${fmt(data.industry)}`,
      `**Exchange**: ${fmt(data.exchange)}`,
    ].join("\n");
  }

  if (isRecord(data) && Array.isArray(data.indices)) {
    const lines = ["# Market Summary", "", `**Date**: ${fmt(data.summary_date)}`, ""];
    for (const index of data.indices) {
      if (!isRecord(index)) continue;
      lines.push(
        `## ${fmt(index.name)} (${fmt(index.symbol)})`,
        `- **Price**: ${fmt(index.current_price)}`,
        `- **Change**: ${fmt(index.change)} (${fmt(index.change_percent)}%)`,
        ""
      );
    }
    return lines.join("\n").trimEnd();
  }

  return [`# Financial Data: ${filename}`, "", "```json", JSON.stringify(data, null, 2), "```"].join("\n");
}
