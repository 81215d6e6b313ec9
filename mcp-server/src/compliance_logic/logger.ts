import pino from "pino";

/**
 * Process logger. STDIO transport owns stdout for JSON-RPC, so every log
 * line goes to stderr (fd 2).
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (process.env.VITEST ? "silent" : "info"),
    base: { service: "finance-guardrails-mcp-server" },
  },
  pino.destination(2)
);

export function getSessionLogger(sessionId: string, toolName: string) {
  return logger.child({ sessionId, toolName });
}
