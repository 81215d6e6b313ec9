import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../errors.js";
import { loadPolicyConfig, parsePolicyConfig } from "../policyConfig.js";

describe("parsePolicyConfig", () => {
  it("fills every section with defaults", () => {
    const config = parsePolicyConfig({});
    expect(config.rate_limiting).toEqual({
      max_calls_per_minute: 15,
      max_calls_per_hour: 200,
      max_calls_per_day: 2000,
      min_request_interval_seconds: 1,
    });
    expect(config.symbol_validation.max_symbols_per_request).toBe(10);
    expect(config.security.timeout_seconds).toBe(45);
    expect(config.response_filtering.max_response_length).toBe(15_000);
    expect(config.session.idle_timeout_seconds).toBe(86_400);
  });

  it("returns a frozen document", () => {
    const config = parsePolicyConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.symbol_validation.blocked_symbols)).toBe(true);
  });

  it("rejects window limits out of order", () => {
    expect(() => parsePolicyConfig({ rate_limiting: { max_calls_per_minute: 300 } })).toThrow(ConfigError);
    try {
      parsePolicyConfig({ rate_limiting: { max_calls_per_minute: 300 } });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          "rate_limiting.max_calls_per_minute: max_calls_per_minute must not exceed max_calls_per_hour",
        ]);
      }
    }
  });

  it("names the offending field", () => {
    try {
      parsePolicyConfig({ rate_limiting: { max_calls_per_minute: -1 } });
      expect.fail("expected a ConfigError");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues[0]?.startsWith("rate_limiting.max_calls_per_minute:")).toBe(true);
      }
    }
  });
});

describe("loadPolicyConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "guardrails-config-"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it("reads an explicit path", async () => {
    const file = path.join(dir, "policy.json");
    await writeFile(file, JSON.stringify({ symbol_validation: { max_symbols_per_request: 3 } }));
    expect(loadPolicyConfig(file).symbol_validation.max_symbols_per_request).toBe(3);
  });

  it("reads the path from the environment", async () => {
    const file = path.join(dir, "env-policy.json");
    await writeFile(file, JSON.stringify({ security: { timeout_seconds: 5 } }));
    vi.stubEnv("MCP_GUARDRAILS_CONFIG", file);
    expect(loadPolicyConfig().security.timeout_seconds).toBe(5);
  });

  it("fails when a named file is missing", () => {
    expect(() => loadPolicyConfig(path.join(dir, "missing.json"))).toThrow(ConfigError);
  });

  it("fails on malformed JSON", async () => {
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{ not json");
    expect(() => loadPolicyConfig(file)).toThrow(ConfigError);
  });
});
