export class CompletionServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompletionServiceError";
  }
}

/** A caller broke a conversation or budget precondition. Always a bug in the loop, never an external failure. */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

export class WarehouseError extends Error {
  readonly status?: number;
  readonly sqlState?: string;

  constructor(message: string, options?: { status?: number; sqlState?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "WarehouseError";
    this.status = options?.status;
    this.sqlState = options?.sqlState;
  }
}

export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs} ms`);
    this.name = "TimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
