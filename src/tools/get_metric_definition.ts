import type { ToolDefinition } from "../types.ts";
import { orText } from "./shared.ts";
import type { ToolHandler } from "./shared.ts";

export const getMetricDefinitionDefinition: ToolDefinition = {
  name: "get_metric_definition",
  description: "Get a metric's description, desired direction and JSON specification (how it is calculated).",
  parameters: {
    type: "object",
    properties: {
      metric_name: { type: "string", minLength: 1, description: "Metric name, e.g. 'checkout_conversion'" },
    },
    required: ["metric_name"],
  },
};

export const getMetricDefinitionTool: ToolHandler = async (args, ctx) => {
  const metricName = args.metric_name;
  if (typeof metricName !== "string") throw new Error("'metric_name' must be a string");
  const rows = await ctx.warehouse.query(
    `SELECT name, description, metric_spec, desired_direction
     FROM ${ctx.tables.metrics}
     WHERE name = ?
     LIMIT 1`,
    [metricName],
  );
  const row = rows[0];
  if (!row) return { output: `Metric definition not found for: ${metricName}` };
  return {
    output: [
      `**Metric:** ${orText(row.name, metricName)}`,
      `**Description:** ${orText(row.description, "N/A")}`,
      `**Desired Direction:** ${orText(row.desired_direction, "N/A")}`,
      "",
      "**Specification:**",
      "```json",
      orText(row.metric_spec, "{}"),
      "```",
    ].join("\n"),
  };
};
