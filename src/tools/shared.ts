import { promises as fs } from "node:fs";
import type { TableNames } from "../config.ts";
import type { Row, ToolResult, Warehouse } from "../types.ts";
import { isPlainObject } from "../util.ts";

export type ToolContext = {
  warehouse: Warehouse;
  tables: TableNames;
  metricTypes: MetricTypes;
  /** Current date as YYYY-MM-DD. */
  today: () => string;
  queryMaxBytes: number;
  allowWriteQueries: boolean;
};

export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<ToolResult>;

export type MetricType = "primary" | "secondary" | "guardrail";

export type MetricTypes = {
  classify(metricName: string): MetricType;
};

const TYPE_RANK: Record<MetricType, number> = { primary: 1, secondary: 2, guardrail: 3 };

export type TypedRow = Row & { metric_type: MetricType };

export function withMetricType(rows: readonly Row[], metricTypes: MetricTypes): TypedRow[] {
  return rows.map((row) => ({ ...row, metric_type: metricTypes.classify(row.metric_name ?? "") }));
}

export function compareMetricType(a: TypedRow, b: TypedRow) {
  return TYPE_RANK[a.metric_type] - TYPE_RANK[b.metric_type];
}

/** Largest absolute relative impact first; rows without an impact sort last. */
export function compareImpact(a: Row, b: Row) {
  const x = toNumber(a.metric_impact_relative);
  const y = toNumber(b.metric_impact_relative);
  if (x === null && y === null) return 0;
  if (x === null) return 1;
  if (y === null) return -1;
  return Math.abs(y) - Math.abs(x);
}

export function isMetricType(val: unknown): val is MetricType {
  return val === "primary" || val === "secondary" || val === "guardrail";
}

export function metricTypesFrom(lists: { primary: readonly string[]; guardrail: readonly string[] }): MetricTypes {
  const primary = new Set(lists.primary);
  const guardrail = new Set(lists.guardrail);
  return {
    classify(name) {
      if (primary.has(name)) return "primary";
      if (guardrail.has(name)) return "guardrail";
      return "secondary";
    },
  };
}

export const DEFAULT_METRIC_TYPES_FILE = new URL("../../data/metric-types.json", import.meta.url);

export async function loadMetricTypes(file: string | URL = DEFAULT_METRIC_TYPES_FILE): Promise<MetricTypes> {
  const raw = await fs.readFile(file, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!isPlainObject(parsed) || !isStringList(parsed.primary) || !isStringList(parsed.guardrail)) {
    throw new Error(`${String(file)}: expected {"primary": string[], "guardrail": string[]}`);
  }
  return metricTypesFrom({ primary: parsed.primary, guardrail: parsed.guardrail });
}

function isStringList(val: unknown): val is string[] {
  return Array.isArray(val) && val.every((item) => typeof item === "string");
}

/** Renders rows as a GitHub-flavored Markdown table, columns in first-row order. */
export function toMarkdownTable(rows: readonly Row[], columns?: readonly string[]) {
  const first = rows[0];
  const cols = columns ?? (first ? Object.keys(first) : []);
  if (!cols.length) return "";
  const cell = (value: string | null | undefined) => (value ?? "").replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
  const header = `| ${cols.join(" | ")} |`;
  const rule = `| ${cols.map(() => "---").join(" | ")} |`;
  const body = rows.map((row) => `| ${cols.map((c) => cell(row[c])).join(" | ")} |`);
  return [header, rule, ...body].join("\n");
}

/** Pulls the analysis UUID out of an experiment results link. */
export function extractAnalysisId(link: string | null | undefined): string | null {
  if (!link || link === "None") return null;
  const query = /analysisId=([a-f0-9-]+)/i.exec(link);
  if (query) return query[1] ?? null;
  const pathMatch = /\/analysis\/([a-f0-9-]+)/i.exec(link);
  return pathMatch?.[1] ?? null;
}

export function toNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function orText(value: string | null | undefined, fallback: string) {
  return value && value !== "None" ? value : fallback;
}
