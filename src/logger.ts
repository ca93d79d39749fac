import { promises as fs } from "node:fs";
import path from "node:path";
import chalk from "chalk";
import cliTruncate from "cli-truncate";

export type HumanEntry = {
  title?: string;
  body?: string;
  variant?: "info" | "warn" | "error" | "model" | "tool";
};

export interface RunLogger {
  human(entry: HumanEntry): void;
  json(entry: Record<string, unknown>): Promise<void>;
  startSpinner(): () => void;
}

export type LoggerOptions = {
  provider: string;
  model: string;
  logJsonPath?: string | null;
  enableHumanLogs?: boolean;
  enableFileLogs?: boolean;
  pretty?: boolean;
};

export function createLogger(options: LoggerOptions): RunLogger {
  const logPath = options.enableFileLogs === false || !options.logJsonPath
    ? null
    : path.resolve(process.cwd(), options.logJsonPath);
  const variantTheme = (entry: HumanEntry) => {
    const variant = entry.variant ?? "info";
    if (variant === "error") return { color: chalk.red, prefix: "[error]" };
    if (variant === "warn") return { color: chalk.yellow, prefix: "[warn]" };
    if (variant === "model") return { color: chalk.cyan, prefix: "[model]" };
    if (variant === "tool") return { color: chalk.green, prefix: "[tool]" };
    return { color: chalk.blue, prefix: "[info]" };
  };
  const formatPrefix = (entry: HumanEntry) => {
    const theme = variantTheme(entry);
    const tag = entry.title ? `${theme.prefix} ${entry.title}` : theme.prefix;
    return { theme, tag: options.pretty ? theme.color.bold(tag) : tag };
  };

  const spinnerFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  // Each call owns its timer.
  const startSpinner = () => {
    if (options.enableHumanLogs === false || options.pretty !== true || !process.stdout.isTTY) return () => {};
    let frame = 0;
    const timer = setInterval(() => {
      process.stdout.write(`\r${chalk.gray(`waiting ${spinnerFrames[frame++ % spinnerFrames.length]}`)}`);
    }, 120);
    let stopped = false;
    return () => {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
      process.stdout.write("\r\x1b[2K\r");
    };
  };

  const human = options.enableHumanLogs === false
    ? (_entry: HumanEntry) => {}
    : (entry: HumanEntry) => {
        const width = Math.max(40, Math.min(process.stdout.columns ?? 80, 140));
        const { tag, theme } = formatPrefix(entry);
        const rawBody = entry.body ?? "";
        if (entry.variant === "model") {
          // Model text is never truncated.
          console.log(`${tag}\n${options.pretty ? theme.color(rawBody) : rawBody}`);
          return;
        }
        const body = cliTruncate(rawBody.replace(/\s*\n\s*/g, " "), width - 4);
        console.log(options.pretty ? `${tag} ${theme.color(body)}` : `${tag} ${body}`);
      };

  const json = async (entry: Record<string, unknown>) => {
    if (!logPath) return;
    const payload = {
      timestamp: new Date().toISOString(),
      provider: options.provider,
      model: options.model,
      ...entry,
    };
    try {
      await fs.mkdir(path.dirname(logPath), { recursive: true });
      await fs.appendFile(logPath, `${JSON.stringify(payload)}\n`, "utf8");
    } catch (err) {
      console.error(`log write failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  };

  return { human, json, startSpinner };
}

export function silentLogger(): RunLogger {
  return createLogger({ provider: "none", model: "none", enableHumanLogs: false, enableFileLogs: false });
}
