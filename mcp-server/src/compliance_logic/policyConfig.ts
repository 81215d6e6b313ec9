import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { PolicyConfigSchema, type PolicyConfig } from "../schemas/policy.js";
import { ConfigError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_CONFIG_FILE = "guardrails_config.json";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate a parsed policy document. Missing sections take their defaults;
 * anything the schema rejects is a ConfigError.
 */
export function parsePolicyConfig(document: unknown): PolicyConfig {
  const parsed = PolicyConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid guardrails policy",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return deepFreeze(parsed.data);
}

/**
 * Resolve the policy file: explicit path, then MCP_GUARDRAILS_CONFIG, then
 * ./guardrails_config.json when present. With no file, defaults apply.
 * An explicitly named file that does not exist is a ConfigError.
 */
export function loadPolicyConfig(configPath?: string): PolicyConfig {
  const explicit = configPath ?? process.env.MCP_GUARDRAILS_CONFIG;
  const candidate = explicit ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!existsSync(candidate)) {
    if (explicit) {
      throw new ConfigError(`Guardrails policy file not found: ${candidate}`);
    }
    logger.info("no guardrails policy file found; using defaults");
    return parsePolicyConfig({});
  }

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(candidate, "utf8"));
  } catch (err) {
    throw new ConfigError(`Could not read guardrails policy ${candidate}`, [errorMessage(err)]);
  }
  const config = parsePolicyConfig(document);
  logger.info({ path: candidate }, "guardrails policy loaded");
  return config;
}
