import type { ToolDefinition } from "../types.ts";
import { compareImpact, compareMetricType, toMarkdownTable, withMetricType } from "./shared.ts";
import type { ToolHandler } from "./shared.ts";

const MAX_ROWS = 100;

const COLUMNS = [
  "metric_type",
  "metric_name",
  "dimension_cut_name",
  "variant_name",
  "metric_value",
  "metric_impact_relative",
  "p_value",
  "stat_sig",
  "metric_definition",
  "metric_desired_direction",
];

export const getAllMetricsForAnalysisDefinition: ToolDefinition = {
  name: "get_all_metrics_for_analysis",
  description: [
    "Get every metric (significant or not) for one analysis and dimension cut, largest movers first within each metric type.",
    "Use it to spot metrics moving together, tradeoffs and supporting or conflicting evidence.",
  ].join(" "),
  parameters: {
    type: "object",
    properties: {
      analysis_id: { type: "string", minLength: 1, description: "Analysis ID (UUID)" },
      dimension_cut: { type: "string", minLength: 1, description: "Dimension cut name (default: overall)" },
    },
    required: ["analysis_id"],
  },
};

export const getAllMetricsForAnalysisTool: ToolHandler = async (args, ctx) => {
  const analysisId = args.analysis_id;
  if (typeof analysisId !== "string") throw new Error("'analysis_id' must be a string");
  const cut = typeof args.dimension_cut === "string" ? args.dimension_cut : "overall";

  const rows = await ctx.warehouse.query(
    `SELECT metric_name, dimension_cut_name, variant_name, metric_value, metric_impact_relative,
       p_value, stat_sig, metric_definition, metric_desired_direction
     FROM ${ctx.tables.results}
     WHERE analysis_id = ?
       AND dimension_cut_name = ?
       AND LOWER(variant_name) <> 'control'`,
    [analysisId, cut],
  );
  if (!rows.length) return { output: `No metrics found for analysis ${analysisId}` };

  const sorted = withMetricType(rows, ctx.metricTypes)
    .sort((a, b) =>
      compareMetricType(a, b)
      || compareImpact(a, b)
      || (a.metric_name ?? "").localeCompare(b.metric_name ?? "")
      || (a.variant_name ?? "").localeCompare(b.variant_name ?? ""))
    .slice(0, MAX_ROWS);
  return { output: toMarkdownTable(sorted, COLUMNS) };
};
