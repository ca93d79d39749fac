import { randomUUID } from "node:crypto";
import { BudgetTracker, assertBudgetLimits, type BudgetLimits } from "./budget.ts";
import { Conversation } from "./conversation.ts";
import { ContractViolationError, errorMessage } from "./errors.ts";
import { silentLogger, type RunLogger } from "./logger.ts";
import { FINAL_ANSWER_PROMPT, defaultSystemPrompt } from "./prompts.ts";
import { ToolRouter, renderOutcome } from "./router.ts";
import { listDefinitions, type ToolContext, type ToolHandler, type ToolName } from "./tools/index.ts";
import type { AgentRunResult, CompletionResponse, LLMClient, LoopState, Message, ToolCallDescriptor, ToolDefinition } from "./types.ts";
import { withTimeout } from "./util.ts";

export const DEFAULT_MAX_ITERATIONS = 20;
export const DEFAULT_MAX_TOOL_CALLS = 30;
export const NO_RESPONSE = "No response generated";

export type AgentLoopOptions = {
  client: LLMClient;
  context: ToolContext;
  systemPrompt?: string;
  maxIterations?: number;
  maxToolCalls?: number;
  /** Wall-clock limit for one completion request; unset leaves it to the client. */
  requestTimeoutMs?: number;
  toolTimeoutMs?: number;
  /** Glob patterns restricting the advertised tools. */
  toolPatterns?: readonly string[];
  handlers?: Record<ToolName, ToolHandler>;
  logger?: RunLogger;
  verbose?: boolean;
};

type RunFailure = NonNullable<AgentRunResult["error"]>;

/** What a run owns from the moment it starts. */
type RunFrame = {
  id: string;
  budget: BudgetTracker;
  state: LoopState;
};

type Run = RunFrame & {
  conversation: Conversation;
  router: ToolRouter;
  definitions: ToolDefinition[];
};

/**
 * Reason → act → observe until the model answers without requesting tools,
 * or a budget runs out. Each `run()` owns its conversation, budget and
 * router, so one loop may serve concurrent runs.
 */
export class AgentLoop {
  private readonly limits: BudgetLimits;
  private readonly logger: RunLogger;
  private readonly systemPrompt: string;

  constructor(private readonly options: AgentLoopOptions) {
    this.limits = {
      maxIterations: options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      maxToolCalls: options.maxToolCalls ?? DEFAULT_MAX_TOOL_CALLS,
    };
    assertBudgetLimits(this.limits);
    this.logger = options.logger ?? silentLogger();
    this.systemPrompt = options.systemPrompt ?? defaultSystemPrompt();
  }

  async run(prompt: string): Promise<AgentRunResult> {
    const frame: RunFrame = { id: randomUUID(), budget: new BudgetTracker(this.limits), state: "running" };
    let result: AgentRunResult;
    try {
      const run = this.start(frame);
      await this.log(run, {
        type: "run_start",
        prompt,
        maxIterations: this.limits.maxIterations,
        maxToolCalls: this.limits.maxToolCalls,
        tools: run.definitions.map((def) => def.name),
      });
      run.conversation.seed(this.systemPrompt, prompt);
      result = await this.drive(run);
    } catch (err) {
      const message = errorMessage(err);
      const contract = err instanceof ContractViolationError;
      this.logger.human({ title: contract ? "contract" : "run", body: message, variant: "error" });
      await this.log(frame, { type: contract ? "contract_violation" : "run_error", error: message, budget: frame.budget.snapshot() });
      result = this.finish(frame, "terminated_error", "failed", `Error: ${message}`, { kind: contract ? "contract" : "internal", message });
    }
    await this.log(frame, {
      type: "run_end",
      state: frame.state,
      status: result.status,
      iterations: result.iterationsUsed,
      toolCalls: result.toolCallsUsed,
    });
    return result;
  }

  private start(frame: RunFrame): Run {
    const definitions = listDefinitions(this.options.toolPatterns);
    const router = new ToolRouter({
      context: this.options.context,
      budget: frame.budget,
      definitions,
      handlers: this.options.handlers,
      timeoutMs: this.options.toolTimeoutMs,
    });
    // Extends the frame in place so state changes stay visible to run().
    return Object.assign(frame, { conversation: new Conversation(), definitions, router });
  }

  private async drive(run: Run): Promise<AgentRunResult> {
    const { budget, conversation } = run;
    for (;;) {
      run.state = "running";
      if (!budget.iterationCountOk() || !budget.toolCallCountOk()) return this.forceFinal(run);
      budget.incrementIteration();
      const iteration = budget.iterationsUsed;

      let response: CompletionResponse;
      try {
        response = await this.complete(run, run.definitions, iteration);
      } catch (err) {
        if (err instanceof ContractViolationError) throw err;
        const message = errorMessage(err);
        this.logger.human({ title: "model", body: `iteration ${iteration} failed: ${message}`, variant: "error" });
        await this.log(run, { type: "model_error", iteration, error: message, fatal: true });
        return this.finish(run, "terminated_error", "failed", `Error: LLM call failed - ${message}`, { kind: "completion", message });
      }
      await this.log(run, { type: "model_response", iteration, content: response.content, toolCalls: response.toolCalls });

      if (!response.toolCalls.length) {
        conversation.appendAssistant(response.content ?? "", []);
        if (response.content) this.logger.human({ title: "model", body: response.content, variant: "model" });
        return this.finish(run, "terminated_normal", "completed", response.content || NO_RESPONSE);
      }

      if (response.content?.trim()) this.logger.human({ title: "model", body: response.content, variant: "model" });
      this.logger.human({
        title: "model",
        body: `iteration ${iteration} → tool calls: ${response.toolCalls.map((c) => c.name).join(", ")}`,
        variant: "info",
      });
      conversation.appendAssistant(response.content, response.toolCalls);
      run.state = "awaiting_tools";
      // Every request is answered, in order, even once the tool-call ceiling is crossed mid-batch.
      for (const call of response.toolCalls) {
        await this.answer(run, call, iteration);
      }
    }
  }

  private async answer(run: Run, call: ToolCallDescriptor, iteration: number) {
    this.logger.human({ title: call.name, body: `args=${call.arguments}`, variant: "tool" });
    const outcome = await run.router.execute(call.name, call.arguments);
    const text = renderOutcome(outcome);
    run.conversation.appendToolResult(call.id, text);
    if (outcome.ok) {
      this.logger.human({ title: call.name, body: outcome.output, variant: outcome.reportedError ? "warn" : "tool" });
      await this.log(run, {
        type: "tool_result",
        iteration,
        sequence: outcome.invocation.sequence,
        tool: call.name,
        arguments: outcome.invocation.arguments,
        output: outcome.output,
        error: outcome.reportedError,
      });
      return;
    }
    this.logger.human({ title: call.name, body: text, variant: "error" });
    await this.log(run, {
      type: "tool_error",
      iteration,
      sequence: outcome.sequence,
      tool: call.name,
      arguments: call.arguments,
      kind: outcome.error.kind,
      error: outcome.error.message,
    });
  }

  private async forceFinal(run: Run): Promise<AgentRunResult> {
    const { budget, conversation } = run;
    const snapshot = budget.snapshot();
    const reason = budget.iterationCountOk() ? "tool calls" : "iterations";
    this.logger.human({
      title: "budget",
      body: `${reason} exhausted (${snapshot.iterations}/${snapshot.maxIterations} iterations, ${snapshot.toolCalls}/${snapshot.maxToolCalls} tool calls); asking for a final answer`,
      variant: "warn",
    });
    await this.log(run, { type: "budget_exhausted", reason, budget: snapshot });

    conversation.appendUser(FINAL_ANSWER_PROMPT);
    let finalText: string;
    try {
      const response = await this.complete(run, [], null);
      await this.log(run, { type: "model_response", iteration: null, content: response.content, toolCalls: response.toolCalls });
      // Tool requests are not honored without a tool catalog; only the text is kept.
      conversation.appendAssistant(response.content ?? "", []);
      finalText = response.content || NO_RESPONSE;
      if (response.content) this.logger.human({ title: "model", body: response.content, variant: "model" });
    } catch (err) {
      if (err instanceof ContractViolationError) throw err;
      const message = errorMessage(err);
      this.logger.human({ title: "model", body: `final request failed: ${message}`, variant: "error" });
      await this.log(run, { type: "model_error", iteration: null, error: message, fatal: false });
      finalText = `Error getting final response: ${message}`;
    }
    return this.finish(run, "terminated_budget", "budget_exhausted", finalText);
  }

  private async complete(run: Run, tools: readonly ToolDefinition[], iteration: number | null) {
    const messages = run.conversation.snapshot();
    if (this.options.verbose) await this.log(run, { type: "context", iteration, ...summarizeContext(messages) });
    await this.log(run, { type: "model_request", iteration, messages: messages.length, tools: tools.map((t) => t.name) });
    const stopSpinner = this.logger.startSpinner();
    try {
      return await withTimeout(() => this.options.client.generate(messages, tools), this.options.requestTimeoutMs);
    } finally {
      stopSpinner();
    }
  }

  private finish(run: RunFrame, state: LoopState, status: AgentRunResult["status"], finalText: string, error?: RunFailure): AgentRunResult {
    run.state = state;
    return Object.freeze({
      status,
      finalText,
      iterationsUsed: run.budget.iterationsUsed,
      toolCallsUsed: run.budget.toolCallsUsed,
      ...(error ? { error: Object.freeze({ ...error }) } : {}),
    });
  }

  private log(run: RunFrame, entry: Record<string, unknown>) {
    return this.logger.json({ runId: run.id, ...entry });
  }
}

export function summarizeContext(messages: readonly Message[]) {
  let chars = 0;
  const entries = messages.map((msg, index) => {
    switch (msg.role) {
      case "system":
      case "user":
        chars += msg.content.length;
        return { index, role: msg.role, chars: msg.content.length };
      case "assistant": {
        const length = msg.content?.length ?? 0;
        chars += length;
        return { index, role: msg.role, chars: length, toolCalls: msg.toolCalls.map((c) => c.name) };
      }
      case "tool_result":
        chars += msg.content.length;
        return { index, role: msg.role, chars: msg.content.length, callId: msg.callId };
    }
  });
  return { messages: messages.length, chars, entries };
}
