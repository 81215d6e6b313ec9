import type { ContentFilteringConfig } from "../schemas/policy.js";
import { ConfigError } from "./errors.js";
import type { RiskLevel } from "./decision.js";

export type ContentBlockReason =
  | "SecurityViolation"
  | "InvestmentAdviceRequest"
  | "BlockedKeyword"
  | "InputTooLong";

/** Highest priority first */
const BLOCK_PRIORITY: readonly ContentBlockReason[] = [
  "SecurityViolation",
  "InvestmentAdviceRequest",
  "BlockedKeyword",
  "InputTooLong",
];

const SPECULATIVE_TERMS = ["volatile", "risky", "speculation", "speculative", "gamble"];

export interface ContentClassification {
  riskLevel: RiskLevel;
  blocked: boolean;
  blockReason?: ContentBlockReason;
  /** Every scan that fired, blocking or not */
  matchedCategories: string[];
  /** Keywords, terms or pattern sources that matched */
  matchedTerms: string[];
}

export interface ContentFilterOptions {
  maxInputLength: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compilePatterns(sources: readonly string[], listName: string): RegExp[] {
  return sources.map((source) => {
    try {
      return new RegExp(source, "i");
    } catch (err) {
      throw new ConfigError(`Invalid pattern in content_filtering.${listName}`, [
        `${source}: ${err instanceof Error ? err.message : String(err)}`,
      ]);
    }
  });
}

/**
 * Lexical classifier. All scans run on every input so the audit trail
 * records each category that fired; the reported block reason follows
 * BLOCK_PRIORITY.
 */
export class ContentFilter {
  private readonly blockedKeywords: string[];
  private readonly highRiskTerms: Array<{ term: string; pattern: RegExp }>;
  private readonly advicePatterns: RegExp[];
  private readonly injectionPatterns: RegExp[];
  private readonly maxInputLength: number;

  constructor(config: ContentFilteringConfig, options: ContentFilterOptions) {
    this.blockedKeywords = config.blocked_keywords.map((k) => k.toLowerCase());
    this.highRiskTerms = config.high_risk_terms.map((term) => ({
      term: term.toLowerCase(),
      pattern: new RegExp(`\\b${escapeRegExp(term.toLowerCase())}\\b`),
    }));
    this.advicePatterns = compilePatterns(config.investment_advice_patterns, "investment_advice_patterns");
    this.injectionPatterns = compilePatterns(config.injection_patterns, "injection_patterns");
    this.maxInputLength = options.maxInputLength;
  }

  classify(text: string): ContentClassification {
    const folded = text.toLowerCase();
    const reasons = new Set<ContentBlockReason>();
    const matchedCategories: string[] = [];
    const matchedTerms: string[] = [];

    if (text.length > this.maxInputLength) {
      reasons.add("InputTooLong");
      matchedCategories.push("excessive_length");
    }

    const keywords = this.blockedKeywords.filter((k) => folded.includes(k));
    if (keywords.length > 0) {
      reasons.add("BlockedKeyword");
      matchedCategories.push("blocked_keyword");
      matchedTerms.push(...keywords);
    }

    const advice = this.advicePatterns.filter((p) => p.test(folded));
    if (advice.length > 0) {
      reasons.add("InvestmentAdviceRequest");
      matchedCategories.push("investment_advice");
      matchedTerms.push(...advice.map((p) => p.source));
    }

    const highRisk = this.highRiskTerms.filter(({ pattern }) => pattern.test(folded)).map(({ term }) => term);
    if (highRisk.length > 0) {
      matchedCategories.push("high_risk_term");
      matchedTerms.push(...highRisk);
    }

    const injection = this.injectionPatterns.filter((p) => p.test(text));
    if (injection.length > 0) {
      reasons.add("SecurityViolation");
      matchedCategories.push("injection");
      matchedTerms.push(...injection.map((p) => p.source));
    }

    const blockReason = BLOCK_PRIORITY.find((r) => reasons.has(r));
    if (blockReason) {
      return { riskLevel: "high", blocked: true, blockReason, matchedCategories, matchedTerms };
    }

    let riskLevel: RiskLevel = "low";
    if (highRisk.length >= 2) {
      riskLevel = "high";
    } else if (highRisk.length === 1 || SPECULATIVE_TERMS.some((t) => folded.includes(t))) {
      riskLevel = "medium";
    }
    return { riskLevel, blocked: false, matchedCategories, matchedTerms };
  }
}
