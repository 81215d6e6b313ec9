import type { PolicyConfig } from "../schemas/policy.js";
import type { RiskLevel } from "./decision.js";

export const TRUNCATION_MARKER = "\n[... response truncated ...]";

export const DISCLAIMERS = {
  informational:
    "\n\n---\nDisclaimer: This data is for informational purposes only and is not investment advice. " +
    "Market conditions can change rapidly. Consult a licensed financial advisor before making investment decisions.",
  highRisk:
    "\n\n---\nHigh-risk notice: This touches on high-risk financial instruments or strategies that can result " +
    "in significant losses. Past performance does not guarantee future results. Consult a licensed financial " +
    "advisor before acting on any of it.",
} as const;

// C0 controls except \t and \n, DEL, C1 controls
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;
const INPUT_STRIP = /[<>"';\\]/g;

export function stripControlChars(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(CONTROL_CHARS, "");
}

/** Cut to at most maxUnits UTF-16 units without splitting a surrogate pair */
export function safeSlice(text: string, maxUnits: number): string {
  if (text.length <= maxUnits) return text;
  let end = Math.max(0, maxUnits);
  const last = text.charCodeAt(end - 1);
  if (end > 0 && last >= 0xd800 && last <= 0xdbff) end -= 1;
  return text.slice(0, end);
}

/**
 * Outbound text finalizer. finalize() is a fixed point: running it on its own
 * output with the same risk level returns the input unchanged.
 */
export class ResponseSanitizer {
  private readonly maxLength: number;
  private readonly addDisclaimers: boolean;
  private readonly sanitizeInputs: boolean;
  private readonly maxInputLength: number;

  constructor(config: Pick<PolicyConfig, "response_filtering" | "security">) {
    this.maxLength = config.response_filtering.max_response_length;
    this.addDisclaimers = config.response_filtering.add_disclaimers;
    this.sanitizeInputs = config.security.sanitize_inputs;
    this.maxInputLength = config.security.max_input_length;
  }

  disclaimerFor(riskLevel: RiskLevel, advisory = false): string {
    if (!this.addDisclaimers) return "";
    if (riskLevel === "high") return DISCLAIMERS.highRisk;
    if (riskLevel === "medium" || advisory) return DISCLAIMERS.informational;
    return "";
  }

  finalize(raw: string, riskLevel: RiskLevel, advisory = false): string {
    const disclaimer = this.disclaimerFor(riskLevel, advisory);
    let body = stripControlChars(raw);
    if (disclaimer && body.endsWith(disclaimer)) {
      body = body.slice(0, body.length - disclaimer.length);
    }

    const budget = this.maxLength - disclaimer.length;
    if (body.length > budget) {
      body = safeSlice(body, budget - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
    }
    return body + disclaimer;
  }

  /** Strip quoting and markup characters from user-supplied arguments */
  sanitizeInput(input: string): string {
    if (!this.sanitizeInputs) return input;
    return safeSlice(stripControlChars(input).replace(INPUT_STRIP, ""), this.maxInputLength).trim();
  }
}
