import { promises as fs } from "node:fs";
import path from "node:path";
import { isProviderName, splitList, type ProviderName } from "./config.ts";
import { isDate } from "./util.ts";

export const FAST_MODEL = "gpt-4o";

export type Task =
  | { kind: "daily"; date?: string }
  | { kind: "experiment"; projectName: string; analysisId: string; date?: string }
  | { kind: "prompt"; prompt: string; date?: string };

export type CliOptions = {
  help: boolean;
  task: Task;
  provider?: ProviderName;
  model?: string;
  maxIterations?: number;
  maxToolCalls?: number;
  timeoutMs?: number;
  toolTimeoutMs?: number;
  retries?: number;
  toolPatterns?: string[];
  systemPrompt?: string;
  outputDir?: string;
  save: boolean;
  logJsonPath?: string;
  enableFileLogs: boolean;
  enableHumanLogs: boolean;
  prettyLogs: boolean;
  verbose: boolean;
};

export async function parseArgs(argv: readonly string[], cwd: string = process.cwd()): Promise<CliOptions> {
  const promptParts: string[] = [];
  const options: Omit<CliOptions, "task"> = {
    help: false,
    save: true,
    enableFileLogs: true,
    enableHumanLogs: true,
    prettyLogs: false,
    verbose: false,
  };
  let date: string | undefined;
  let experiment: string | undefined;
  let analysisId: string | undefined;
  let fast = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const value = () => {
      const next = argv[++i];
      if (next === undefined || next.startsWith("--")) throw new Error(`${token} requires a value`);
      return next;
    };
    switch (token) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "--date":
        date = value();
        if (!isDate(date)) throw new Error("--date must be YYYY-MM-DD");
        break;
      case "--experiment":
        experiment = value();
        break;
      case "--analysis-id":
        analysisId = value();
        break;
      case "--provider": {
        const provider = value();
        if (!isProviderName(provider)) throw new Error(`Unknown provider '${provider}'`);
        options.provider = provider;
        break;
      }
      case "--model":
        options.model = value();
        break;
      case "--fast":
        fast = true;
        break;
      case "--max-iterations":
        options.maxIterations = positiveInt(token, value());
        break;
      case "--max-tool-calls":
        options.maxToolCalls = positiveInt(token, value());
        break;
      case "--timeout-ms":
        options.timeoutMs = positiveInt(token, value());
        break;
      case "--tool-timeout-ms":
        options.toolTimeoutMs = positiveInt(token, value());
        break;
      case "--retries": {
        const raw = value();
        const retries = Number(raw);
        if (!Number.isInteger(retries) || retries < 0) throw new Error("--retries must be a non-negative integer");
        options.retries = retries;
        break;
      }
      case "--tools":
        options.toolPatterns = splitList(value());
        break;
      case "--system":
        options.systemPrompt = await fs.readFile(path.resolve(cwd, value()), "utf8");
        break;
      case "--output-dir":
        options.outputDir = value();
        break;
      case "--no-save":
        options.save = false;
        break;
      case "--log-json":
        options.logJsonPath = value();
        break;
      case "--no-log-json":
        options.enableFileLogs = false;
        break;
      case "--quiet":
        options.enableHumanLogs = false;
        break;
      case "--pretty":
        options.prettyLogs = true;
        break;
      case "-v":
      case "--verbose":
        options.verbose = true;
        break;
      default:
        if (token.startsWith("--")) throw new Error(`Unknown option ${token}`);
        promptParts.push(token);
    }
  }

  if (fast && !options.model) options.model = FAST_MODEL;

  const prompt = promptParts.join(" ").trim();
  let task: Task;
  if (experiment !== undefined || analysisId !== undefined) {
    if (!experiment || !analysisId) throw new Error("--experiment and --analysis-id must be given together");
    if (prompt) throw new Error("a prompt cannot be combined with --experiment");
    task = { kind: "experiment", projectName: experiment, analysisId, date };
  } else if (prompt) {
    task = { kind: "prompt", prompt, date };
  } else {
    task = { kind: "daily", date };
  }
  return { ...options, task };
}

function positiveInt(flag: string, raw: string) {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) throw new Error(`${flag} must be a positive integer`);
  return parsed;
}

export function helpText() {
  return `trialscribe [prompt...] [options]

With no prompt, writes the daily report for --date (default: the most recent
date with live experiment data).

Tasks:
  --date <YYYY-MM-DD>        Date to analyze
  --experiment <name>        Analyze one experiment (needs --analysis-id)
  --analysis-id <id>         Analysis id of the experiment

Model:
  --provider <echo|openai|azure|gateway>  Completion provider (default: echo)
  --model <name>             Model name (default: gpt-5.2)
  --fast                     Use ${FAST_MODEL} unless --model is given
  --timeout-ms <n>           Per-completion timeout in milliseconds
  --retries <n>              Transport retries per completion (default: 0)
  --system <file>            Load system prompt from file

Budgets and tools:
  --max-iterations <n>       Completion cycles before a forced answer (default: 20)
  --max-tool-calls <n>       Tool calls before a forced answer (default: 30)
  --tool-timeout-ms <n>      Per-tool timeout in milliseconds (default: 60000)
  --tools <globs>            Comma-separated tool name globs to advertise

Output:
  --output-dir <dir>         Report directory (default: reports)
  --no-save                  Do not write a report file
  --log-json <file>          Write JSON logs to file (default: .trialscribe-log.jsonl)
  --no-log-json              Disable JSONL logging
  --quiet                    Suppress human-readable logs
  --pretty                   Color human logs and show a spinner
  -v, --verbose              Log a context summary before each completion
  -h, --help                 Show this help
`;
}
