import { describe, expect, it } from "vitest";
import { Conversation } from "../src/conversation.ts";
import { ContractViolationError } from "../src/errors.ts";
import { rolesOf, toolCall } from "./test_utils.ts";

function seeded() {
  const conversation = new Conversation();
  conversation.seed("sys", "task");
  return conversation;
}

describe("Conversation", () => {
  it("starts with the system and user messages", () => {
    const conversation = seeded();
    expect(conversation.snapshot()).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "task" },
    ]);
  });

  it("rejects a second seed", () => {
    const conversation = seeded();
    expect(() => conversation.seed("again", "again")).toThrow(ContractViolationError);
    expect(conversation.length).toBe(2);
  });

  it("rejects use before seeding", () => {
    const conversation = new Conversation();
    expect(() => conversation.appendUser("hi")).toThrow("conversation used before seed()");
    expect(() => conversation.appendAssistant("hi", [])).toThrow(ContractViolationError);
    expect(() => conversation.appendToolResult("c1", "x")).toThrow(ContractViolationError);
  });

  it("tracks outstanding tool requests until each is answered", () => {
    const conversation = seeded();
    conversation.appendAssistant(null, [toolCall("c1", "a"), toolCall("c2", "b")]);
    expect(conversation.pendingCallIds()).toEqual(["c1", "c2"]);
    conversation.appendToolResult("c2", "two");
    expect(conversation.pendingCallIds()).toEqual(["c1"]);
    conversation.appendToolResult("c1", "one");
    expect(conversation.pendingCallIds()).toEqual([]);
    expect(rolesOf(conversation.snapshot())).toEqual(["system", "user", "assistant", "tool_result", "tool_result"]);
  });

  it("blocks new messages while requests are outstanding", () => {
    const conversation = seeded();
    conversation.appendAssistant("thinking", [toolCall("c1", "a")]);
    expect(() => conversation.appendUser("more")).toThrow("cannot append user message with unanswered tool calls: c1");
    expect(() => conversation.appendAssistant("again", [])).toThrow(ContractViolationError);
  });

  it("rejects results without a matching request", () => {
    const conversation = seeded();
    expect(() => conversation.appendToolResult("ghost", "x")).toThrow("no outstanding tool request with id ghost");
    conversation.appendAssistant(null, [toolCall("c1", "a")]);
    conversation.appendToolResult("c1", "done");
    expect(() => conversation.appendToolResult("c1", "twice")).toThrow(ContractViolationError);
  });

  it("rejects malformed assistant messages", () => {
    const conversation = seeded();
    expect(() => conversation.appendAssistant(null, [])).toThrow("assistant message needs content or tool calls");
    expect(() => conversation.appendAssistant(null, [toolCall("d", "a"), toolCall("d", "b")])).toThrow("duplicate tool call id d");
    expect(conversation.length).toBe(2);
    expect(conversation.pendingCallIds()).toEqual([]);
  });

  it("returns frozen snapshots that do not follow later appends", () => {
    const conversation = seeded();
    const snapshot = conversation.snapshot();
    conversation.appendAssistant("answer", []);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toHaveLength(2);
    expect(conversation.length).toBe(3);
  });

  it("shares only frozen messages with snapshots", () => {
    const conversation = seeded();
    conversation.appendAssistant(null, [toolCall("c1", "a")]);
    const snapshot = conversation.snapshot();
    const user = snapshot[1];
    const assistant = snapshot[2];

    expect(Object.isFrozen(user)).toBe(true);
    expect(assistant?.role === "assistant" && Object.isFrozen(assistant.toolCalls[0])).toBe(true);
    expect(() => Object.assign(user ?? {}, { content: "tampered" })).toThrow(TypeError);
    expect(conversation.snapshot()[1]).toEqual({ role: "user", content: "task" });
  });

  it("copies tool call descriptors on append", () => {
    const conversation = seeded();
    const call = toolCall("c1", "a", { x: 1 });
    conversation.appendAssistant(null, [call]);
    call.arguments = "{}";
    const assistant = conversation.snapshot()[2];
    expect(assistant?.role === "assistant" && assistant.toolCalls[0]?.arguments).toBe('{"x":1}');
  });
});
