import type { ToolDefinition } from "../types.ts";
import { orText } from "./shared.ts";
import type { ToolHandler } from "./shared.ts";

export const getExperimentBriefDefinition: ToolDefinition = {
  name: "get_experiment_brief",
  description: [
    "Get the context of one experiment: feature description, status notes, rollout, brief doc and results link.",
    "Use it to understand what the feature does and why, especially when metrics move unexpectedly.",
  ].join(" "),
  parameters: {
    type: "object",
    properties: {
      project_name: { type: "string", minLength: 1, description: "Experiment project name" },
      date: { type: "string", pattern: "^\\d{4}-\\d{2}-\\d{2}$", description: "Date in YYYY-MM-DD format (defaults to today)" },
    },
    required: ["project_name"],
  },
};

export const getExperimentBriefTool: ToolHandler = async (args, ctx) => {
  const projectName = args.project_name;
  if (typeof projectName !== "string") throw new Error("'project_name' must be a string");
  const date = typeof args.date === "string" ? args.date : ctx.today();
  const rows = await ctx.warehouse.query(
    `SELECT project_name, brief_summary, details, status_notes, brief_doc_link, project_status,
       rollout_pct, results_link, updated_at
     FROM ${ctx.tables.experiments}
     WHERE project_name = ? AND view_name = 'Live Experiments' AND DATE(fetched_at) = ?
     LIMIT 1`,
    [projectName, date],
  );
  const row = rows[0];
  if (!row) return { output: `Experiment '${projectName}' not found` };

  const lines = [
    `**Experiment:** ${orText(row.project_name, projectName)}`,
    `**Status:** ${orText(row.project_status, "N/A")}`,
    `**Rollout:** ${orText(row.rollout_pct, "N/A")}`,
    "",
    "**Feature Description:**",
    orText(row.brief_summary, orText(row.details, "No description available")),
  ];
  const notes = orText(row.status_notes, "");
  if (notes) lines.push("", "**Status Notes:**", notes);
  lines.push(
    "",
    `**Brief Doc:** ${orText(row.brief_doc_link, "Not available")}`,
    `**Results Link:** ${orText(row.results_link, "Not available")}`,
    `**Last Updated:** ${orText(row.updated_at, "N/A")}`,
  );
  return { output: lines.join("\n") };
};
