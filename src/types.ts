export type Role = "system" | "user" | "assistant" | "tool_result";

export type ToolCallDescriptor = {
  id: string;
  name: string;
  /** Raw JSON text exactly as the model emitted it; decoded by the router. */
  arguments: string;
};

export type SystemMessage = { role: "system"; content: string };
export type UserMessage = { role: "user"; content: string };
export type AssistantMessage = {
  role: "assistant";
  content: string | null;
  toolCalls: readonly ToolCallDescriptor[];
};
export type ToolResultMessage = { role: "tool_result"; callId: string; content: string };

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolResultMessage;

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ToolResult = {
  output: string;
  error?: boolean;
};

export type CompletionResponse = {
  content: string | null;
  toolCalls: ToolCallDescriptor[];
};

export interface LLMClient {
  /** An empty `tools` list withholds tool access for this request. */
  generate(messages: readonly Message[], tools: readonly ToolDefinition[]): Promise<CompletionResponse>;
}

export type ModelClass = "reasoning" | "standard";

export type LoopState = "running" | "awaiting_tools" | "terminated_normal" | "terminated_budget" | "terminated_error";

export type RunStatus = "completed" | "budget_exhausted" | "failed";

export type AgentRunResult = Readonly<{
  status: RunStatus;
  finalText: string;
  iterationsUsed: number;
  toolCallsUsed: number;
  error?: Readonly<{ kind: "completion" | "contract" | "internal"; message: string }>;
}>;

export type Row = Record<string, string | null>;

export interface Warehouse {
  query(sql: string, binds?: readonly string[]): Promise<Row[]>;
}
