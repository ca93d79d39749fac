import type { ToolDefinition } from "../types.ts";
import { extractAnalysisId, toMarkdownTable } from "./shared.ts";
import type { ToolHandler } from "./shared.ts";

export const getLiveExperimentsDefinition: ToolDefinition = {
  name: "get_live_experiments",
  description: [
    "List live experiments from the experiment catalog.",
    "Returns project_name, brief_summary, details, status_notes, brief_doc_link, results_link,",
    "project_status, rollout_pct, updated_at and analysis_id (parsed from results_link).",
  ].join(" "),
  parameters: {
    type: "object",
    properties: {
      date: { type: "string", pattern: "^\\d{4}-\\d{2}-\\d{2}$", description: "Date in YYYY-MM-DD format (defaults to today)" },
    },
    required: [],
  },
};

export const getLiveExperimentsTool: ToolHandler = async (args, ctx) => {
  const date = typeof args.date === "string" ? args.date : ctx.today();
  const rows = await ctx.warehouse.query(
    `SELECT project_name, brief_summary, details, status_notes, brief_doc_link, results_link,
       project_status, rollout_pct, updated_at
     FROM ${ctx.tables.experiments}
     WHERE view_name = 'Live Experiments' AND DATE(fetched_at) = ?
     ORDER BY project_name`,
    [date],
  );
  if (!rows.length) return { output: `No live experiments found for ${date}` };
  const withIds = rows.map((row) => ({ ...row, analysis_id: extractAnalysisId(row.results_link) }));
  return { output: toMarkdownTable(withIds) };
};
