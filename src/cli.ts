#!/usr/bin/env tsx
import "dotenv/config";
import { helpText, parseArgs, type Task } from "./args.ts";
import { loadConfig, type AppConfig } from "./config.ts";
import { buildClient } from "./llm.ts";
import { createLogger, type RunLogger } from "./logger.ts";
import { dailyReportPrompt, experimentPrompt } from "./prompts.ts";
import { writeReport } from "./report.ts";
import { AgentLoop } from "./runner.ts";
import { DEFAULT_METRIC_TYPES_FILE, loadMetricTypes } from "./tools/shared.ts";
import type { Warehouse } from "./types.ts";
import { isoDate } from "./util.ts";
import { createWarehouse, mostRecentDataDate } from "./warehouse.ts";

async function main() {
  const options = await parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(helpText());
    return;
  }

  const config = loadConfig();
  const provider = options.provider ?? config.provider;
  const model = options.model ?? config.model;
  const timeoutMs = options.timeoutMs ?? config.timeoutMs;
  const client = buildClient(provider, model, process.env, { timeoutMs, retries: options.retries ?? config.retries });
  const logger = createLogger({
    provider,
    model,
    logJsonPath: options.logJsonPath ?? config.logJsonPath,
    enableHumanLogs: options.enableHumanLogs,
    enableFileLogs: options.enableFileLogs,
    pretty: options.prettyLogs,
  });
  const toolTimeoutMs = options.toolTimeoutMs ?? config.toolTimeoutMs;
  // A warehouse call never outlives the tool call waiting on it.
  const warehouse = createWarehouse(config.snowflake, { requestTimeoutMs: toolTimeoutMs, deadlineMs: toolTimeoutMs });
  const metricTypes = await loadMetricTypes(config.metricTypesPath ?? DEFAULT_METRIC_TYPES_FILE);

  const date = await resolveDate(options.task, warehouse, config, logger);
  const loop = new AgentLoop({
    client,
    context: {
      warehouse,
      tables: config.tables,
      metricTypes,
      today: () => isoDate(),
      queryMaxBytes: config.queryMaxBytes,
      allowWriteQueries: config.allowWriteQueries,
    },
    systemPrompt: options.systemPrompt,
    maxIterations: options.maxIterations ?? config.maxIterations,
    maxToolCalls: options.maxToolCalls ?? config.maxToolCalls,
    toolTimeoutMs,
    toolPatterns: options.toolPatterns ?? config.toolPatterns,
    logger,
    verbose: options.verbose,
  });

  logger.human({ title: "run", body: `${describeTask(options.task, date)} with ${provider}/${model}` });
  const started = Date.now();
  const result = await loop.run(taskPrompt(options.task, date));
  const elapsed = ((Date.now() - started) / 1000).toFixed(1);

  console.log(`\n${result.finalText}\n`);
  console.log(`status=${result.status} iterations=${result.iterationsUsed} tool_calls=${result.toolCallsUsed} elapsed=${elapsed}s`);

  if (result.status === "failed") {
    process.exitCode = 2;
    return;
  }
  if (options.save) {
    const file = await writeReport(options.outputDir ?? config.outputDir, date, result.finalText);
    console.log(`Report saved to: ${file}`);
  }
}

async function resolveDate(task: Task, warehouse: Warehouse, config: AppConfig, logger: RunLogger) {
  if (task.date) return task.date;
  if (task.kind !== "daily") return isoDate();
  const date = await mostRecentDataDate(warehouse, config.tables, () => isoDate(), logger);
  logger.human({ title: "run", body: `using most recent date with data: ${date}` });
  return date;
}

function taskPrompt(task: Task, date: string) {
  switch (task.kind) {
    case "daily":
      return dailyReportPrompt(date);
    case "experiment":
      return experimentPrompt(task.projectName, task.analysisId);
    case "prompt":
      return task.prompt;
  }
}

function describeTask(task: Task, date: string) {
  switch (task.kind) {
    case "daily":
      return `daily report for ${date}`;
    case "experiment":
      return `analysis of ${task.projectName}`;
    case "prompt":
      return "free prompt";
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
