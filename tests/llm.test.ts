import { describe, expect, it } from "vitest";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { CompletionServiceError } from "../src/errors.ts";
import {
  EchoClient,
  OpenAIClient,
  buildClient,
  buildCompletionRequest,
  classifyModel,
  normalizeCompletion,
  parseHeaders,
  toOpenAIMessages,
  type ChatCompletions,
} from "../src/llm.ts";
import { getDefinition } from "../src/tools/index.ts";
import type { Message } from "../src/types.ts";
import { toolCall } from "./test_utils.ts";

const conversation: Message[] = [
  { role: "system", content: "sys" },
  { role: "user", content: "task" },
];

class RecordingCompletions implements ChatCompletions {
  readonly bodies: ChatCompletionCreateParamsNonStreaming[] = [];
  readonly timeouts: (number | undefined)[] = [];

  constructor(private readonly respond: () => unknown) {}

  async create(body: ChatCompletionCreateParamsNonStreaming, options?: { timeout?: number }) {
    this.bodies.push(body);
    this.timeouts.push(options?.timeout);
    return this.respond();
  }
}

describe("classifyModel", () => {
  it("recognizes reasoning models with or without a provider prefix", () => {
    expect(classifyModel("gpt-5.2")).toBe("reasoning");
    expect(classifyModel("o1-mini")).toBe("reasoning");
    expect(classifyModel("openai/o3")).toBe("reasoning");
    expect(classifyModel("@gateway/O4-mini")).toBe("reasoning");
    expect(classifyModel("gpt-4o")).toBe("standard");
    expect(classifyModel("gpt-4o-mini")).toBe("standard");
    expect(classifyModel("llama-3-70b")).toBe("standard");
  });
});

describe("buildCompletionRequest", () => {
  const tools = [getDefinition("get_live_experiments")];

  it("omits sampling controls for reasoning models", () => {
    const body = buildCompletionRequest("gpt-5.2", conversation, tools);
    expect(body.max_completion_tokens).toBe(16_000);
    expect(body.temperature).toBeUndefined();
    expect(body.max_tokens).toBeUndefined();
    expect(body.tool_choice).toBeUndefined();
    expect(body.tools?.map((t) => t.function.name)).toEqual(["get_live_experiments"]);
  });

  it("pins temperature and tool choice for standard models", () => {
    const body = buildCompletionRequest("gpt-4o", conversation, tools);
    expect(body).toMatchObject({ model: "gpt-4o", temperature: 0.1, max_tokens: 4096, tool_choice: "auto" });
    expect(body.max_completion_tokens).toBeUndefined();
    expect(body.tools?.[0]).toEqual({
      type: "function",
      function: {
        name: "get_live_experiments",
        description: tools[0]?.description,
        parameters: tools[0]?.parameters,
      },
    });
  });

  it("withholds tools entirely when the catalog is empty", () => {
    for (const model of ["gpt-4o", "o1"]) {
      const body = buildCompletionRequest(model, conversation, []);
      expect("tools" in body).toBe(false);
      expect("tool_choice" in body).toBe(false);
    }
  });
});

describe("toOpenAIMessages", () => {
  it("maps the message union onto chat roles", () => {
    const messages: Message[] = [
      ...conversation,
      { role: "assistant", content: null, toolCalls: [toolCall("c1", "parse_metric_spec", { spec_json: "{}" })] },
      { role: "tool_result", callId: "c1", content: "result" },
      { role: "assistant", content: null, toolCalls: [] },
    ];
    expect(toOpenAIMessages(messages)).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "task" },
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "c1", type: "function", function: { name: "parse_metric_spec", arguments: '{"spec_json":"{}"}' } }],
      },
      { role: "tool", content: "result", tool_call_id: "c1" },
      { role: "assistant", content: "" },
    ]);
  });
});

describe("normalizeCompletion", () => {
  it("keeps tool calls in emitted order with raw arguments", () => {
    const response = normalizeCompletion({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              { id: "a", function: { name: "x", arguments: "{}" } },
              { id: "b", function: { name: "y", arguments: "{bad" } },
            ],
          },
        },
      ],
    });
    expect(response).toEqual({
      content: null,
      toolCalls: [
        { id: "a", name: "x", arguments: "{}" },
        { id: "b", name: "y", arguments: "{bad" },
      ],
    });
  });

  it("rejects malformed responses", () => {
    expect(() => normalizeCompletion({ choices: [] })).toThrow(CompletionServiceError);
    expect(() =>
      normalizeCompletion({ choices: [{ message: { tool_calls: [{ id: "", function: { name: "x", arguments: "{}" } }] } }] }),
    ).toThrow("tool call x has no id");
    expect(() =>
      normalizeCompletion({
        choices: [
          {
            message: {
              tool_calls: [
                { id: "a", function: { name: "x", arguments: "{}" } },
                { id: "a", function: { name: "y", arguments: "{}" } },
              ],
            },
          },
        ],
      }),
    ).toThrow("duplicate tool call id a");
  });

  it("rejects payloads that are not shaped like a chat completion", () => {
    expect(() => normalizeCompletion({})).toThrow("completion response had no choices");
    expect(() => normalizeCompletion(null)).toThrow(CompletionServiceError);
    expect(() => normalizeCompletion({ choices: [{ message: "hi" }] })).toThrow("completion response had no message");
    expect(() => normalizeCompletion({ choices: [{ message: { tool_calls: "x" } }] })).toThrow("completion tool_calls is not a list");
    expect(() => normalizeCompletion({ choices: [{ message: { tool_calls: [{ id: "a" }] } }] })).toThrow(
      "tool call 1 has no function name",
    );
    expect(() =>
      normalizeCompletion({ choices: [{ message: { tool_calls: [{ id: "a", function: { name: "x", arguments: { q: 1 } } }] } }] }),
    ).toThrow("tool call x has non-string arguments");
  });
});

describe("OpenAIClient", () => {
  it("sends the shaped request with the configured timeout", async () => {
    const completions = new RecordingCompletions(() => ({ choices: [{ message: { content: "hello" } }] }));
    const client = new OpenAIClient({ model: "gpt-4o", apiKey: "test-secret", timeoutMs: 1234 }, completions);
    const response = await client.generate(conversation, []);

    expect(response).toEqual({ content: "hello", toolCalls: [] });
    expect(completions.bodies[0]).toEqual({
      model: "gpt-4o",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "task" },
      ],
      max_tokens: 4096,
      temperature: 0.1,
    });
    expect(completions.timeouts).toEqual([1234]);
  });

  it("wraps transport failures with their cause", async () => {
    const cause = new Error("ECONNRESET");
    const client = new OpenAIClient({ model: "gpt-4o", apiKey: "test-secret" }, {
      create: async () => {
        throw cause;
      },
    });
    const error = await client.generate(conversation, []).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CompletionServiceError);
    expect(error instanceof CompletionServiceError && error.message).toBe("completion request failed: ECONNRESET");
    expect(error instanceof CompletionServiceError && error.cause).toBe(cause);
  });

  it("reports an empty payload as a completion service error", async () => {
    const client = new OpenAIClient({ model: "gpt-4o", apiKey: "test-secret" }, new RecordingCompletions(() => ({})));
    const error = await client.generate(conversation, []).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CompletionServiceError);
    expect(error instanceof CompletionServiceError && error.message).toBe("completion response had no choices");
  });

  it("requires an api key when it builds its own SDK client", () => {
    expect(() => new OpenAIClient({ model: "gpt-4o", apiKey: "" })).toThrow(/API_KEY/);
  });
});

describe("buildClient", () => {
  it("defaults to the offline echo client", async () => {
    const client = buildClient("echo", "gpt-5.2", {});
    expect(client).toBeInstanceOf(EchoClient);
    expect(await client.generate(conversation, [])).toEqual({ content: "Echo: task", toolCalls: [] });
  });

  it("builds OpenAI-backed clients from the environment", () => {
    expect(buildClient("openai", "gpt-4o", { OPENAI_API_KEY: "test-secret" })).toBeInstanceOf(OpenAIClient);
    expect(
      buildClient("azure", "gpt-4o", {
        TRIALSCRIBE_AZURE_OPENAI_ENDPOINT: "https://example.invalid/",
        TRIALSCRIBE_AZURE_OPENAI_KEY: "test-secret",
        TRIALSCRIBE_AZURE_OPENAI_DEPLOYMENT: "reports",
      }),
    ).toBeInstanceOf(OpenAIClient);
    expect(buildClient("gateway", "gpt-4o", { TRIALSCRIBE_GATEWAY_BASE_URL: "https://gateway.invalid/v1" })).toBeInstanceOf(OpenAIClient);
  });

  it("reports missing provider settings", () => {
    expect(() => buildClient("azure", "gpt-4o", {})).toThrow(/Azure provider requires/);
    expect(() => buildClient("gateway", "gpt-4o", {})).toThrow("gateway provider requires TRIALSCRIBE_GATEWAY_BASE_URL");
  });
});

describe("parseHeaders", () => {
  it("keeps string values of a JSON object", () => {
    expect(parseHeaders(undefined)).toBeUndefined();
    expect(parseHeaders('{"x-gateway-config":"abc","x-retries":3}')).toEqual({ "x-gateway-config": "abc" });
    expect(() => parseHeaders("[1]")).toThrow(/must be a JSON object/);
    expect(() => parseHeaders("{oops")).toThrow(/must be a JSON object/);
  });
});
