import { ContractViolationError } from "./errors.ts";
import type { Message, ToolCallDescriptor } from "./types.ts";

/**
 * Append-only message history for one run.
 *
 * Every tool request of an assistant turn must be answered, in any order,
 * before anything else is appended; violations throw ContractViolationError.
 */
export class Conversation {
  private readonly messages: Message[] = [];
  private readonly pending = new Set<string>();
  private seeded = false;

  seed(systemPrompt: string, userPrompt: string) {
    if (this.seeded) throw new ContractViolationError("conversation already seeded");
    this.push({ role: "system", content: systemPrompt });
    this.push({ role: "user", content: userPrompt });
    this.seeded = true;
  }

  appendAssistant(content: string | null, toolCalls: readonly ToolCallDescriptor[]) {
    this.assertSettled("assistant message");
    if (content === null && toolCalls.length === 0) {
      throw new ContractViolationError("assistant message needs content or tool calls");
    }
    const ids = new Set<string>();
    for (const call of toolCalls) {
      if (ids.has(call.id)) throw new ContractViolationError(`duplicate tool call id ${call.id}`);
      ids.add(call.id);
    }
    this.push({ role: "assistant", content, toolCalls: Object.freeze(toolCalls.map((call) => Object.freeze({ ...call }))) });
    for (const id of ids) this.pending.add(id);
  }

  appendToolResult(callId: string, content: string) {
    this.assertSeeded();
    if (!this.pending.delete(callId)) {
      throw new ContractViolationError(`no outstanding tool request with id ${callId}`);
    }
    this.push({ role: "tool_result", callId, content });
  }

  appendUser(content: string) {
    this.assertSettled("user message");
    this.push({ role: "user", content });
  }

  pendingCallIds(): string[] {
    return [...this.pending];
  }

  get length() {
    return this.messages.length;
  }

  snapshot(): readonly Message[] {
    return Object.freeze([...this.messages]);
  }

  // Messages are frozen on the way in so snapshots can share them.
  private push(message: Message) {
    this.messages.push(Object.freeze(message));
  }

  private assertSeeded() {
    if (!this.seeded) throw new ContractViolationError("conversation used before seed()");
  }

  private assertSettled(what: string) {
    this.assertSeeded();
    if (this.pending.size > 0) {
      throw new ContractViolationError(`cannot append ${what} with unanswered tool calls: ${this.pendingCallIds().join(", ")}`);
    }
  }
}
