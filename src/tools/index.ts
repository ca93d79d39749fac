import { minimatch } from "minimatch";
import type { ToolDefinition } from "../types.ts";
import { findSourceSqlDefinition, findSourceSqlTool } from "./find_source_sql.ts";
import { getAllMetricsForAnalysisDefinition, getAllMetricsForAnalysisTool } from "./get_all_metrics_for_analysis.ts";
import { getExperimentBriefDefinition, getExperimentBriefTool } from "./get_experiment_brief.ts";
import { getLiveExperimentsDefinition, getLiveExperimentsTool } from "./get_live_experiments.ts";
import { getMetricDefinitionDefinition, getMetricDefinitionTool } from "./get_metric_definition.ts";
import { getSignificantMetricsDefinition, getSignificantMetricsTool } from "./get_significant_metrics.ts";
import { parseMetricSpecDefinition, parseMetricSpecTool } from "./parse_metric_spec.ts";
import { queryWarehouseDefinition, queryWarehouseTool } from "./query_warehouse.ts";
import type { ToolHandler } from "./shared.ts";

export { type ToolContext, type ToolHandler } from "./shared.ts";

/** Every tool the agent knows, in the order they are advertised. */
export const TOOL_NAMES = [
  "get_live_experiments",
  "get_significant_metrics",
  "get_all_metrics_for_analysis",
  "parse_metric_spec",
  "find_source_sql",
  "query_warehouse",
  "get_experiment_brief",
  "get_metric_definition",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((known) => known === name);
}

export const toolHandlers: Record<ToolName, ToolHandler> = {
  get_live_experiments: getLiveExperimentsTool,
  get_significant_metrics: getSignificantMetricsTool,
  get_all_metrics_for_analysis: getAllMetricsForAnalysisTool,
  parse_metric_spec: parseMetricSpecTool,
  find_source_sql: findSourceSqlTool,
  query_warehouse: queryWarehouseTool,
  get_experiment_brief: getExperimentBriefTool,
  get_metric_definition: getMetricDefinitionTool,
};

const definitionsByName: Record<ToolName, ToolDefinition> = {
  get_live_experiments: getLiveExperimentsDefinition,
  get_significant_metrics: getSignificantMetricsDefinition,
  get_all_metrics_for_analysis: getAllMetricsForAnalysisDefinition,
  parse_metric_spec: parseMetricSpecDefinition,
  find_source_sql: findSourceSqlDefinition,
  query_warehouse: queryWarehouseDefinition,
  get_experiment_brief: getExperimentBriefDefinition,
  get_metric_definition: getMetricDefinitionDefinition,
};

export const toolDefinitions: readonly ToolDefinition[] = Object.freeze(TOOL_NAMES.map((name) => definitionsByName[name]));

export function getDefinition(name: ToolName): ToolDefinition {
  return definitionsByName[name];
}

/**
 * The capability catalog advertised to the model. With glob patterns
 * (e.g. `get_*`), only matching tools are listed.
 */
export function listDefinitions(patterns: readonly string[] = []): ToolDefinition[] {
  if (!patterns.length) return [...toolDefinitions];
  return toolDefinitions.filter((def) => patterns.some((pattern) => minimatch(def.name, pattern)));
}
