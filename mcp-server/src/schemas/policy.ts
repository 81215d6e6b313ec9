import { z } from "zod";

/**
 * Policy document schema. Every section is optional in the document and falls
 * back to the defaults below; unknown keys are stripped.
 */

const positiveInt = z.number().int().positive();

const stringList = (defaults: string[]) =>
  z.array(z.string().min(1)).default(defaults);

export const RateLimitingSchema = z.object({
  max_calls_per_minute: positiveInt.default(15),
  max_calls_per_hour: positiveInt.default(200),
  max_calls_per_day: positiveInt.default(2000),
  /** 0 disables burst spacing */
  min_request_interval_seconds: z.number().int().min(0).default(1),
});

export const ContentFilteringSchema = z.object({
  blocked_keywords: stringList([
    "pump and dump",
    "insider trading",
    "market manipulation",
    "guaranteed returns",
    "risk-free investment",
    "get rich quick",
    "sure thing",
    "hot tip",
    "insider info",
    "short squeeze guarantee",
  ]),
  high_risk_terms: stringList([
    "options",
    "derivatives",
    "leverage",
    "margin",
    "short selling",
    "penny stocks",
    "crypto",
    "cryptocurrency",
    "forex",
    "day trading",
    "swing trading",
    "futures",
    "commodities",
    "warrants",
    "cfds",
    "binary options",
  ]),
  investment_advice_patterns: stringList([
    "\\bshould\\s+i\\s+(buy|sell|invest|hold)\\b",
    "\\bwhat\\s+should\\s+i\\s+invest\\b",
    "\\bis\\s+\\S+\\s+a\\s+good\\s+(buy|investment)\\b",
    "\\brecommend\\s+(buying|selling|investing)\\b",
    "\\b(investment|trading|financial)\\s+advice\\b",
    "\\b(stock\\s+tip|hot\\s+stock|next\\s+big\\s+thing)\\b",
    "\\b(buy|sell)\\s+now\\b",
    "\\bact\\s+fast\\b",
  ]),
  injection_patterns: stringList([
    "\\b(drop|truncate|alter)\\s+(table|database|schema)\\b",
    "\\bunion\\s+(all\\s+)?select\\b",
    "\\bselect\\s+\\*\\s+from\\b",
    "\\bselect\\s+[\\w,\\s]+\\s+from\\s+\\w+\\s+where\\b",
    "\\binsert\\s+into\\b",
    "\\bdelete\\s+from\\b",
    "\\bupdate\\s+\\w+\\s+set\\b",
    "'\\s*(or|and)\\s+'?\\d+'?\\s*=\\s*'?\\d+",
    ";\\s*--",
    "<\\s*script\\b",
    "javascript:",
    "\\b(system|exec|eval|import|__import__)\\s*\\(",
    "\\.\\./",
    "__\\w+__",
    "\\$\\(",
    "`[^`]*`",
    "[;&|]\\s*(rm|curl|wget|bash|sh|nc|chmod)\\b",
  ]),
});

export const SymbolValidationSchema = z.object({
  max_symbols_per_request: positiveInt.default(10),
  blocked_symbols: stringList(["SCAM", "FAKE", "TEST", "FRAUD", "PONZI"]),
  /** Proceed with the valid subset instead of rejecting the whole request */
  allow_partial_symbols: z.boolean().default(false),
});

export const DataAccessSchema = z.object({
  max_historical_period_days: positiveInt.default(1825),
  allowed_intervals: stringList(["1m", "5m", "15m", "30m", "1h", "1d", "5d", "1wk", "1mo"]),
});

export const SecuritySchema = z.object({
  sanitize_inputs: z.boolean().default(true),
  max_input_length: positiveInt.default(2000),
  timeout_seconds: positiveInt.default(45),
  log_violations: z.boolean().default(true),
});

export const ResponseFilteringSchema = z.object({
  add_disclaimers: z.boolean().default(true),
  max_response_length: positiveInt.default(15000),
});

export const SessionSchema = z.object({
  idle_timeout_seconds: positiveInt.default(86_400),
});

export const PolicyConfigSchema = z
  .object({
    rate_limiting: RateLimitingSchema.default({}),
    content_filtering: ContentFilteringSchema.default({}),
    symbol_validation: SymbolValidationSchema.default({}),
    data_access: DataAccessSchema.default({}),
    security: SecuritySchema.default({}),
    response_filtering: ResponseFilteringSchema.default({}),
    session: SessionSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const { max_calls_per_minute, max_calls_per_hour, max_calls_per_day } = config.rate_limiting;
    if (max_calls_per_minute > max_calls_per_hour) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["rate_limiting", "max_calls_per_minute"],
        message: "max_calls_per_minute must not exceed max_calls_per_hour",
      });
    }
    if (max_calls_per_hour > max_calls_per_day) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["rate_limiting", "max_calls_per_hour"],
        message: "max_calls_per_hour must not exceed max_calls_per_day",
      });
    }
  });

export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;
export type PolicyConfigInput = z.input<typeof PolicyConfigSchema>;
export type RateLimitingConfig = PolicyConfig["rate_limiting"];
export type ContentFilteringConfig = PolicyConfig["content_filtering"];
export type SymbolValidationConfig = PolicyConfig["symbol_validation"];
