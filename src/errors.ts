export class ApiError extends Error {
  readonly status: number | null;
  readonly detail: string;

  constructor(status: number | null, detail: string) {
    super(status === null ? `Summarizer error: ${detail}` : `Summarizer error: ${status} ${detail}`);
    this.name = "ApiError";
    this.status = status;
    this.detail = detail;
  }
}

export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Store operation "${operation}" failed: ${reason}`, { cause });
    this.name = "StoreError";
    this.operation = operation;
  }
}

export class IngestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IngestError";
  }
}

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
