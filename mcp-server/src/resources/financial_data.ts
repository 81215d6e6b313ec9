import { ResourceTemplate, type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { runGuardedOrThrow } from "../compliance_logic/enterpriseDecisionMiddleware.js";
import type { AuditSink } from "../compliance_logic/enterpriseLogging.js";
import type { GuardrailsEngine } from "../compliance_logic/GuardrailsEngine.js";
import type { ToolResult } from "../compliance_logic/DeterministicGuardrails.js";
import type { FinancialDataStore } from "../data/financialDataStore.js";

const MIME_TYPE = "text/markdown";

export interface ResourceDeps {
  engine: GuardrailsEngine;
  store: FinancialDataStore;
  auditSink?: AuditSink;
}

function toResourceResult(uri: URL, result: ToolResult): ReadResourceResult {
  return {
    contents: [{ uri: uri.href, mimeType: MIME_TYPE, text: result.content.map((c) => c.text).join("\n") }],
  };
}

function firstVariable(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value[0] ?? "";
  return value ?? "";
}

export async function readPortfolioIndex(deps: ResourceDeps, uri: URL, extra?: unknown): Promise<ReadResourceResult> {
  const result = await runGuardedOrThrow(
    deps.engine,
    { toolName: "finance://portfolios", intentCategory: "ResourceRead", auditSink: deps.auditSink },
    {},
    extra,
    async () => ({ content: [{ type: "text", text: await deps.store.renderIndex() }] })
  );
  return toResourceResult(uri, result);
}

export async function readSnapshot(
  deps: ResourceDeps,
  uri: URL,
  filename: string,
  extra?: unknown
): Promise<ReadResourceResult> {
  const result = await runGuardedOrThrow(
    deps.engine,
    { toolName: "finance://{filename}", intentCategory: "ResourceRead", auditSink: deps.auditSink },
    { filename },
    extra,
    async () => ({ content: [{ type: "text", text: await deps.store.renderSnapshot(filename) }] })
  );
  return toResourceResult(uri, result);
}

export function registerFinancialDataResources(server: McpServer, deps: ResourceDeps): void {
  server.resource(
    "financial-data-index",
    "finance://portfolios",
    { description: "Saved financial data snapshots", mimeType: MIME_TYPE },
    (uri, extra) => readPortfolioIndex(deps, uri, extra)
  );

  server.resource(
    "financial-data-file",
    new ResourceTemplate("finance://{filename}", { list: undefined }),
    { description: "One saved snapshot rendered as markdown", mimeType: MIME_TYPE },
    (uri, variables, extra) => readSnapshot(deps, uri, firstVariable(variables.filename), extra)
  );
}
