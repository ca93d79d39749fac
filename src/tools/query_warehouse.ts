import type { ToolDefinition } from "../types.ts";
import { truncateOutput } from "../util.ts";
import { toMarkdownTable } from "./shared.ts";
import type { ToolHandler } from "./shared.ts";

const READ_ONLY_KEYWORDS = new Set(["SELECT", "WITH", "SHOW", "DESCRIBE", "DESC", "EXPLAIN"]);

export const queryWarehouseDefinition: ToolDefinition = {
  name: "query_warehouse",
  description: [
    "Run an ad-hoc read-only SQL query against the warehouse and return the rows as a Markdown table.",
    "Use it for dimensional breakdowns, historical comparisons or metric combinations the other tools do not cover.",
  ].join(" "),
  parameters: {
    type: "object",
    properties: {
      query: { type: "string", minLength: 1, description: "SQL query to execute" },
    },
    required: ["query"],
  },
};

export const queryWarehouseTool: ToolHandler = async (args, ctx) => {
  const query = args.query;
  if (typeof query !== "string") throw new Error("'query' must be a string");
  if (!ctx.allowWriteQueries) assertReadOnly(query);
  const rows = await ctx.warehouse.query(query);
  if (!rows.length) return { output: "Query returned no results" };
  return { output: truncateOutput(toMarkdownTable(rows), ctx.queryMaxBytes) };
};

/** Throws unless the text is a single statement starting with a read-only keyword. */
export function assertReadOnly(query: string) {
  const body = stripComments(query).trim().replace(/;\s*$/, "");
  if (body.includes(";")) {
    throw new Error("only a single statement is allowed");
  }
  const keyword = /^\(*\s*([a-z]+)/i.exec(body)?.[1]?.toUpperCase();
  if (!keyword || !READ_ONLY_KEYWORDS.has(keyword)) {
    throw new Error(`only read-only queries are allowed (got ${keyword ?? "nothing"}); set TRIALSCRIBE_ALLOW_WRITE_QUERIES=1 to lift this`);
  }
}

function stripComments(sql: string) {
  return sql.replace(/\/\*[\s\S]*?\*\//g, " ").replace(/--[^\n]*/g, " ");
}
