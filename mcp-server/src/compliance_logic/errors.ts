/**
 * Exceptional conditions. Policy rejections are never thrown; they are
 * returned as GuardrailDecision values.
 */

/** Malformed policy document. Fatal at startup. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Data layer failed or did not answer within timeout_seconds. Recoverable by the caller. */
export class UpstreamError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.timedOut = options.timedOut ?? false;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
