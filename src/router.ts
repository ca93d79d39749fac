import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import type { BudgetTracker } from "./budget.ts";
import { TimeoutError, errorMessage } from "./errors.ts";
import { isToolName, toolHandlers, type ToolContext, type ToolHandler, type ToolName } from "./tools/index.ts";
import type { ToolDefinition } from "./types.ts";
import { isPlainObject, withTimeout } from "./util.ts";

export type ToolErrorKind = "unknown_tool" | "invalid_arguments" | "handler_failed" | "timeout";

export type ToolError = {
  kind: ToolErrorKind;
  tool: string;
  message: string;
};

export type ToolInvocation = {
  name: ToolName;
  arguments: Record<string, unknown>;
  sequence: number;
};

export type ToolOutcome =
  | { ok: true; invocation: ToolInvocation; output: string; reportedError: boolean }
  | { ok: false; sequence: number; error: ToolError };

export type ToolRouterOptions = {
  context: ToolContext;
  budget: BudgetTracker;
  /** The advertised catalog; names outside it are treated as unknown. */
  definitions: readonly ToolDefinition[];
  handlers?: Record<ToolName, ToolHandler>;
  timeoutMs?: number;
};

/**
 * Dispatches model tool calls. Every path resolves to an outcome; nothing
 * thrown by a handler reaches the caller.
 */
export class ToolRouter {
  private readonly validators = new Map<ToolName, ValidateFunction>();
  private readonly handlers: Record<ToolName, ToolHandler>;

  constructor(private readonly options: ToolRouterOptions) {
    this.handlers = options.handlers ?? toolHandlers;
    const ajv = new Ajv({ allErrors: true, strict: false });
    for (const def of options.definitions) {
      if (!isToolName(def.name)) throw new Error(`no handler registered for tool ${def.name}`);
      this.validators.set(def.name, ajv.compile(def.parameters));
    }
  }

  async invoke(name: string, rawArguments: string): Promise<string> {
    return renderOutcome(await this.execute(name, rawArguments));
  }

  async execute(name: string, rawArguments: string): Promise<ToolOutcome> {
    // Counted before anything can fail, so crashing calls still spend budget.
    this.options.budget.incrementToolCall();
    const sequence = this.options.budget.toolCallsUsed;
    const fail = (kind: ToolErrorKind, message: string): ToolOutcome => ({ ok: false, sequence, error: { kind, tool: name, message } });

    const validate = isToolName(name) ? this.validators.get(name) : undefined;
    if (!isToolName(name) || !validate) return fail("unknown_tool", `Unknown tool '${name}'`);

    let decoded: unknown;
    try {
      decoded = rawArguments.trim() === "" ? {} : JSON.parse(rawArguments);
    } catch {
      return fail("invalid_arguments", "");
    }
    if (!isPlainObject(decoded)) return fail("invalid_arguments", "arguments must be a JSON object");
    if (!validate(decoded)) return fail("invalid_arguments", formatSchemaErrors(validate.errors));

    const invocation: ToolInvocation = { name, arguments: decoded, sequence };
    const handler = this.handlers[name];
    try {
      const result = await withTimeout(() => handler(decoded, this.options.context), this.options.timeoutMs);
      return { ok: true, invocation, output: result.output, reportedError: result.error === true };
    } catch (err) {
      return fail(err instanceof TimeoutError ? "timeout" : "handler_failed", errorMessage(err));
    }
  }
}

export function renderOutcome(outcome: ToolOutcome): string {
  if (outcome.ok) return outcome.output;
  const { kind, tool, message } = outcome.error;
  switch (kind) {
    case "unknown_tool":
      return `Error: ${message}`;
    case "invalid_arguments":
      return message ? `Error: Invalid arguments for ${tool}: ${message}` : `Error: Invalid arguments for ${tool}`;
    case "handler_failed":
    case "timeout":
      return `Error executing ${tool}: ${message}`;
  }
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((e) => `${e.instancePath} ${e.message ?? ""}`.trim())
    .join("; ");
}
