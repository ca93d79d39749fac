export type BudgetSnapshot = {
  maxIterations: number;
  maxToolCalls: number;
  iterations: number;
  toolCalls: number;
};

export type BudgetLimits = { maxIterations: number; maxToolCalls: number };

/**
 * Iteration and tool-call counters for a single run. Ceilings are fixed at
 * construction; counters only ever go up.
 */
export class BudgetTracker {
  readonly maxIterations: number;
  readonly maxToolCalls: number;
  private iterations = 0;
  private toolCalls = 0;

  constructor(limits: BudgetLimits) {
    assertBudgetLimits(limits);
    this.maxIterations = limits.maxIterations;
    this.maxToolCalls = limits.maxToolCalls;
  }

  iterationCountOk() {
    return this.iterations < this.maxIterations;
  }

  toolCallCountOk() {
    return this.toolCalls < this.maxToolCalls;
  }

  incrementIteration() {
    this.iterations++;
  }

  incrementToolCall() {
    this.toolCalls++;
  }

  get iterationsUsed() {
    return this.iterations;
  }

  get toolCallsUsed() {
    return this.toolCalls;
  }

  snapshot(): BudgetSnapshot {
    return {
      maxIterations: this.maxIterations,
      maxToolCalls: this.maxToolCalls,
      iterations: this.iterations,
      toolCalls: this.toolCalls,
    };
  }
}

export function assertBudgetLimits(limits: BudgetLimits) {
  assertCeiling("maxIterations", limits.maxIterations);
  assertCeiling("maxToolCalls", limits.maxToolCalls);
}

function assertCeiling(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be an integer >= 1 (got ${value})`);
  }
}
