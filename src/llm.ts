import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { Env, ProviderName } from "./config.ts";
import { CompletionServiceError, errorMessage } from "./errors.ts";
import type { CompletionResponse, LLMClient, Message, ModelClass, ToolCallDescriptor, ToolDefinition } from "./types.ts";
import { isPlainObject, objectToStringMap } from "./util.ts";

export const REASONING_MAX_COMPLETION_TOKENS = 16_000;
export const STANDARD_MAX_TOKENS = 4096;
export const STANDARD_TEMPERATURE = 0.1;

const REASONING_PREFIXES = ["o1", "o3", "o4", "gpt-5"];

/** Reasoning models reject sampling controls, so they get their own request shape. */
export function classifyModel(model: string): ModelClass {
  const id = model.includes("/") ? model.slice(model.lastIndexOf("/") + 1) : model;
  const lower = id.toLowerCase();
  return REASONING_PREFIXES.some((prefix) => lower.startsWith(prefix)) ? "reasoning" : "standard";
}

export function buildCompletionRequest(
  model: string,
  messages: readonly Message[],
  tools: readonly ToolDefinition[],
): ChatCompletionCreateParamsNonStreaming {
  const base = { model, messages: toOpenAIMessages(messages) };
  const withTools = tools.length > 0;
  if (classifyModel(model) === "reasoning") {
    return {
      ...base,
      ...(withTools ? { tools: tools.map(toOpenAITool) } : {}),
      max_completion_tokens: REASONING_MAX_COMPLETION_TOKENS,
    };
  }
  return {
    ...base,
    ...(withTools ? { tools: tools.map(toOpenAITool), tool_choice: "auto" as const } : {}),
    max_tokens: STANDARD_MAX_TOKENS,
    temperature: STANDARD_TEMPERATURE,
  };
}

export interface ChatCompletions {
  create(body: ChatCompletionCreateParamsNonStreaming, options?: { timeout?: number }): Promise<unknown>;
}

/** Reads the first choice of a completion; anything off-shape is a CompletionServiceError. */
export function normalizeCompletion(payload: unknown): CompletionResponse {
  const choices = isPlainObject(payload) ? payload.choices : undefined;
  if (!Array.isArray(choices)) throw new CompletionServiceError("completion response had no choices");
  const first: unknown = choices[0];
  const message = isPlainObject(first) ? first.message : undefined;
  if (!isPlainObject(message)) throw new CompletionServiceError("completion response had no message");

  const rawCalls = message.tool_calls ?? [];
  if (!Array.isArray(rawCalls)) throw new CompletionServiceError("completion tool_calls is not a list");
  const seen = new Set<string>();
  const toolCalls = rawCalls.map((call: unknown, index) => {
    const descriptor = readToolCall(call, index);
    if (seen.has(descriptor.id)) throw new CompletionServiceError(`duplicate tool call id ${descriptor.id}`);
    seen.add(descriptor.id);
    return descriptor;
  });
  const content = typeof message.content === "string" ? message.content : null;
  return { content, toolCalls };
}

function readToolCall(call: unknown, index: number): ToolCallDescriptor {
  const fn = isPlainObject(call) ? call.function : undefined;
  if (!isPlainObject(call) || !isPlainObject(fn) || typeof fn.name !== "string") {
    throw new CompletionServiceError(`tool call ${index + 1} has no function name`);
  }
  if (typeof fn.arguments !== "string") throw new CompletionServiceError(`tool call ${fn.name} has non-string arguments`);
  if (typeof call.id !== "string" || !call.id) throw new CompletionServiceError(`tool call ${fn.name} has no id`);
  return { id: call.id, name: fn.name, arguments: fn.arguments };
}

export type OpenAIClientOptions = {
  model: string;
  apiKey: string;
  baseURL?: string;
  defaultQuery?: Record<string, string>;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
  maxRetries?: number;
};

export class OpenAIClient implements LLMClient {
  private completions: ChatCompletions;
  private model: string;
  private timeoutMs?: number;

  constructor(options: OpenAIClientOptions, completions?: ChatCompletions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    if (completions) {
      this.completions = completions;
      return;
    }
    if (!options.apiKey) {
      throw new Error("TRIALSCRIBE_OPENAI_API_KEY (or Azure/gateway key) is required for this provider");
    }
    const client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      defaultQuery: options.defaultQuery,
      defaultHeaders: options.defaultHeaders,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries ?? 0,
    });
    this.completions = {
      create: (body, requestOptions) => client.chat.completions.create(body, requestOptions),
    };
  }

  async generate(messages: readonly Message[], tools: readonly ToolDefinition[]): Promise<CompletionResponse> {
    const body = buildCompletionRequest(this.model, messages, tools);
    let payload: unknown;
    try {
      payload = await this.completions.create(body, { timeout: this.timeoutMs });
    } catch (err) {
      throw new CompletionServiceError(`completion request failed: ${errorMessage(err)}`, { cause: err });
    }
    return normalizeCompletion(payload);
  }
}

/** Offline provider: answers immediately without tools. */
export class EchoClient implements LLMClient {
  async generate(messages: readonly Message[]): Promise<CompletionResponse> {
    const lastUser = [...messages].reverse().find((m) => m.role === "user");
    return { content: lastUser ? `Echo: ${lastUser.content}` : "Echo", toolCalls: [] };
  }
}

export function buildClient(
  provider: ProviderName,
  model: string,
  env: Env,
  transport: { timeoutMs?: number; retries?: number } = {},
): LLMClient {
  const common = { model, timeoutMs: transport.timeoutMs, maxRetries: transport.retries };
  if (provider === "openai") {
    const apiKey = env.TRIALSCRIBE_OPENAI_API_KEY ?? env.OPENAI_API_KEY;
    const baseURL = env.TRIALSCRIBE_OPENAI_BASE_URL ?? env.OPENAI_BASE_URL;
    return new OpenAIClient({ ...common, apiKey: apiKey ?? "", baseURL });
  }
  if (provider === "azure") {
    const endpoint = env.TRIALSCRIBE_AZURE_OPENAI_ENDPOINT ?? env.AZURE_OPENAI_ENDPOINT;
    const apiKey = env.TRIALSCRIBE_AZURE_OPENAI_KEY ?? env.AZURE_OPENAI_KEY;
    const deployment = env.TRIALSCRIBE_AZURE_OPENAI_DEPLOYMENT ?? env.AZURE_OPENAI_DEPLOYMENT;
    const apiVersion = env.TRIALSCRIBE_AZURE_OPENAI_API_VERSION ?? env.AZURE_OPENAI_API_VERSION ?? "2024-10-01-preview";
    if (!endpoint || !apiKey || !deployment) {
      throw new Error("Azure provider requires endpoint, key, and deployment (TRIALSCRIBE_AZURE_OPENAI_ENDPOINT/KEY/DEPLOYMENT)");
    }
    const baseURL = `${endpoint.replace(/\/$/, "")}/openai/deployments/${deployment}`;
    return new OpenAIClient({ ...common, apiKey, baseURL, defaultQuery: { "api-version": apiVersion } });
  }
  if (provider === "gateway") {
    const baseURL = env.TRIALSCRIBE_GATEWAY_BASE_URL;
    if (!baseURL) throw new Error("gateway provider requires TRIALSCRIBE_GATEWAY_BASE_URL");
    // Gateways usually authenticate through headers; the SDK still insists on a key.
    const apiKey = env.TRIALSCRIBE_GATEWAY_API_KEY ?? "unused";
    return new OpenAIClient({ ...common, apiKey, baseURL, defaultHeaders: parseHeaders(env.TRIALSCRIBE_GATEWAY_HEADERS) });
  }
  return new EchoClient();
}

export function parseHeaders(raw: string | undefined): Record<string, string> | undefined {
  if (!raw) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("TRIALSCRIBE_GATEWAY_HEADERS must be a JSON object of header names to values");
  }
  if (!isPlainObject(parsed)) {
    throw new Error("TRIALSCRIBE_GATEWAY_HEADERS must be a JSON object of header names to values");
  }
  return objectToStringMap(parsed);
}

export function toOpenAIMessages(messages: readonly Message[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "user":
        return { role: "user", content: m.content };
      case "assistant":
        if (m.toolCalls.length === 0) return { role: "assistant", content: m.content ?? "" };
        return {
          role: "assistant",
          content: m.content,
          tool_calls: m.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      case "tool_result":
        return { role: "tool", content: m.content, tool_call_id: m.callId };
    }
  });
}

function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  } satisfies ChatCompletionTool;
}
