export abstract class RefundAssistantError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed request or task context. Never retried. */
export class ValidationError extends RefundAssistantError {
  readonly code: string = "VALIDATION_ERROR";
}

/** A dependency call that may succeed if attempted again. */
export class TransientServiceError extends RefundAssistantError {
  readonly code: string = "TRANSIENT_SERVICE_ERROR";
}

export class TimeoutError extends TransientServiceError {
  readonly code = "TIMEOUT";

  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class ConnectionError extends TransientServiceError {
  readonly code = "CONNECTION_ERROR";
}

/** Model output that does not satisfy the requested output schema. */
export class AssemblyFormatError extends RefundAssistantError {
  readonly code = "ASSEMBLY_FORMAT_ERROR";
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
