import type { ToolDefinition } from "../types.ts";
import { compareImpact, compareMetricType, isMetricType, toMarkdownTable, withMetricType } from "./shared.ts";
import type { ToolHandler } from "./shared.ts";

const MAX_ROWS = 50;

const COLUMNS = [
  "metric_type",
  "metric_name",
  "dimension_name",
  "dimension_cut_name",
  "variant_name",
  "metric_value",
  "metric_impact_relative",
  "p_value",
  "stat_sig",
  "metric_definition",
  "metric_desired_direction",
];

export const getSignificantMetricsDefinition: ToolDefinition = {
  name: "get_significant_metrics",
  description: [
    "Get statistically significant metrics (positive or negative) for one experiment analysis,",
    "classified as primary, secondary or guardrail. Guardrails only report significant negative movements.",
    "Sorted by metric type, overall cut first, then impact magnitude.",
  ].join(" "),
  parameters: {
    type: "object",
    properties: {
      analysis_id: { type: "string", minLength: 1, description: "Analysis ID (UUID)" },
      metric_type: {
        type: "string",
        enum: ["primary", "secondary", "guardrail"],
        description: "Only return this metric type",
      },
    },
    required: ["analysis_id"],
  },
};

export const getSignificantMetricsTool: ToolHandler = async (args, ctx) => {
  const analysisId = args.analysis_id;
  if (typeof analysisId !== "string") throw new Error("'analysis_id' must be a string");
  const metricType = isMetricType(args.metric_type) ? args.metric_type : undefined;

  const rows = await ctx.warehouse.query(
    `SELECT metric_name, dimension_name, dimension_cut_name, variant_name, metric_value,
       metric_impact_relative, p_value, stat_sig, metric_definition, metric_desired_direction
     FROM ${ctx.tables.results}
     WHERE analysis_id = ?
       AND LOWER(variant_name) <> 'control'
       AND stat_sig IN ('significant positive', 'significant negative')`,
    [analysisId],
  );
  const significant = withMetricType(rows, ctx.metricTypes)
    // Guardrails only matter when they regress.
    .filter((row) => row.metric_type !== "guardrail" || row.stat_sig === "significant negative")
    .filter((row) => !metricType || row.metric_type === metricType)
    .sort((a, b) =>
      compareMetricType(a, b)
      || Number(a.dimension_cut_name !== "overall") - Number(b.dimension_cut_name !== "overall")
      || compareImpact(a, b))
    .slice(0, MAX_ROWS);

  if (!significant.length) {
    return { output: `No significant metrics found${metricType ? ` (${metricType})` : ""}` };
  }
  return { output: toMarkdownTable(significant, COLUMNS) };
};
