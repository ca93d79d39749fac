import type { ToolDefinition } from "../types.ts";
import { orText } from "./shared.ts";
import type { ToolHandler } from "./shared.ts";

export const findSourceSqlDefinition: ToolDefinition = {
  name: "find_source_sql",
  description: [
    "Find the source definition behind a measure: source name, description, lookback window, link and raw SQL.",
    "Useful when a metric behaves unexpectedly and you need to know which tables feed it.",
  ].join(" "),
  parameters: {
    type: "object",
    properties: {
      measure_id: { type: "string", minLength: 1, description: "Measure UUID (from parse_metric_spec output)" },
    },
    required: ["measure_id"],
  },
};

export const findSourceSqlTool: ToolHandler = async (args, ctx) => {
  const measureId = args.measure_id;
  if (typeof measureId !== "string") throw new Error("'measure_id' must be a string");
  const rows = await ctx.warehouse.query(
    `SELECT id, name, description,
       compute_spec:lookBackPeriod::string AS lookback_period,
       compute_spec:lookBackUnit::string AS lookback_unit,
       compute_spec:sql::string AS sql,
       url
     FROM ${ctx.tables.sources}
     WHERE id = ?
     LIMIT 1`,
    [measureId],
  );
  const row = rows[0];
  if (!row) return { output: `No source found for measure ID: ${measureId}` };
  return {
    output: [
      `**Source Name:** ${orText(row.name, "N/A")}`,
      `**Description:** ${orText(row.description, "N/A")}`,
      `**Lookback:** ${orText(row.lookback_period, "?")} ${orText(row.lookback_unit, "")}`.trimEnd(),
      `**URL:** ${orText(row.url, "N/A")}`,
      "",
      "**SQL Definition:**",
      "```sql",
      orText(row.sql, "-- not available"),
      "```",
    ].join("\n"),
  };
};
