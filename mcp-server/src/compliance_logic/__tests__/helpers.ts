import type { AuditSink } from "../enterpriseLogging.js";
import { parsePolicyConfig } from "../policyConfig.js";
import type { PolicyConfig, PolicyConfigInput } from "../../schemas/policy.js";

export type AuditRecord = Parameters<AuditSink>[1];

export function makeConfig(overrides: PolicyConfigInput = {}): PolicyConfig {
  return parsePolicyConfig(overrides);
}

export function memorySink(): { sink: AuditSink; records: Array<{ stream: string; record: AuditRecord }> } {
  const records: Array<{ stream: string; record: AuditRecord }> = [];
  const sink: AuditSink = async (stream, record) => {
    records.push({ stream, record });
  };
  return { sink, records };
}

export function fakeClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    set(ms: number) {
      current = ms;
    },
    advance(ms: number) {
      current += ms;
    },
  };
}
