export type ProviderName = "echo" | "openai" | "azure" | "gateway";

export type TableNames = {
  experiments: string;
  results: string;
  metrics: string;
  sources: string;
};

export type SnowflakeSettings = {
  account: string;
  token: string;
  tokenType: string;
  warehouse?: string;
  database?: string;
  schema?: string;
  role?: string;
};

export type AppConfig = {
  provider: ProviderName;
  model: string;
  maxIterations: number;
  maxToolCalls: number;
  timeoutMs: number;
  toolTimeoutMs: number;
  retries: number;
  toolPatterns: string[];
  outputDir: string;
  logJsonPath: string;
  queryMaxBytes: number;
  allowWriteQueries: boolean;
  metricTypesPath?: string;
  tables: TableNames;
  snowflake: SnowflakeSettings | null;
};

export type Env = Record<string, string | undefined>;

export const DEFAULT_MODEL = "gpt-5.2";

export const DEFAULT_TABLES: TableNames = {
  experiments: "EXPERIMENTS.PUBLIC.EXPERIMENT_CATALOG",
  results: "EXPERIMENTS.PUBLIC.EXPERIMENT_RESULTS_DAILY",
  metrics: "METRICS.PUBLIC.METRIC_DEFINITIONS",
  sources: "METRICS.PUBLIC.METRIC_SOURCES",
};

const PROVIDERS: readonly ProviderName[] = ["echo", "openai", "azure", "gateway"];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((p) => p === value);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = env.TRIALSCRIBE_PROVIDER ?? "echo";
  if (!isProviderName(provider)) {
    throw new Error(`Unknown provider '${provider}' (expected one of ${PROVIDERS.join(", ")})`);
  }
  return {
    provider,
    model: env.TRIALSCRIBE_MODEL ?? DEFAULT_MODEL,
    maxIterations: envInt(env, "TRIALSCRIBE_MAX_ITERATIONS", 20),
    maxToolCalls: envInt(env, "TRIALSCRIBE_MAX_TOOL_CALLS", 30),
    timeoutMs: envInt(env, "TRIALSCRIBE_TIMEOUT_MS", 120_000),
    toolTimeoutMs: envInt(env, "TRIALSCRIBE_TOOL_TIMEOUT_MS", 60_000),
    retries: envCount(env, "TRIALSCRIBE_RETRIES", 0),
    toolPatterns: splitList(env.TRIALSCRIBE_TOOLS),
    outputDir: env.TRIALSCRIBE_OUTPUT_DIR ?? "reports",
    logJsonPath: env.TRIALSCRIBE_LOG_JSON ?? ".trialscribe-log.jsonl",
    queryMaxBytes: envInt(env, "TRIALSCRIBE_QUERY_MAX_BYTES", 24_000),
    allowWriteQueries: env.TRIALSCRIBE_ALLOW_WRITE_QUERIES === "1",
    metricTypesPath: env.TRIALSCRIBE_METRIC_TYPES,
    tables: {
      experiments: env.TRIALSCRIBE_EXPERIMENTS_TABLE ?? DEFAULT_TABLES.experiments,
      results: env.TRIALSCRIBE_RESULTS_TABLE ?? DEFAULT_TABLES.results,
      metrics: env.TRIALSCRIBE_METRICS_TABLE ?? DEFAULT_TABLES.metrics,
      sources: env.TRIALSCRIBE_SOURCES_TABLE ?? DEFAULT_TABLES.sources,
    },
    snowflake: snowflakeSettings(env),
  };
}

function snowflakeSettings(env: Env): SnowflakeSettings | null {
  const account = env.TRIALSCRIBE_SNOWFLAKE_ACCOUNT;
  const token = env.TRIALSCRIBE_SNOWFLAKE_TOKEN;
  if (!account || !token) return null;
  return {
    account,
    token,
    tokenType: env.TRIALSCRIBE_SNOWFLAKE_TOKEN_TYPE ?? "OAUTH",
    warehouse: env.TRIALSCRIBE_SNOWFLAKE_WAREHOUSE,
    database: env.TRIALSCRIBE_SNOWFLAKE_DATABASE,
    schema: env.TRIALSCRIBE_SNOWFLAKE_SCHEMA,
    role: env.TRIALSCRIBE_SNOWFLAKE_ROLE,
  };
}

export function envInt(env: Env, name: string, fallback: number) {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Like envInt, but zero is a valid value.
function envCount(env: Env, name: string, fallback: number) {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function splitList(raw: string | undefined): string[] {
  return (raw ?? "").split(",").map((s) => s.trim()).filter(Boolean);
}
