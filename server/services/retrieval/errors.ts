export class RetrievalError extends Error {
  status: number;
  code: string;
  constructor(message: string, code: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.status = status;
    this.name = "RetrievalError";
  }
}

export class ValidationError extends RetrievalError {
  issues: string[];
  constructor(message: string, issues: string[] = []) {
    super(message, "validation_failed", 400);
    this.issues = issues;
    this.name = "ValidationError";
  }
}

export class NotFoundError extends RetrievalError {
  constructor(message: string) {
    super(message, "not_found", 404);
    this.name = "NotFoundError";
  }
}

export class EmptyIndexError extends RetrievalError {
  constructor() {
    super("index contains no chunks", "index_empty", 409);
    this.name = "EmptyIndexError";
  }
}

export class ProviderError extends RetrievalError {
  provider: string;
  retryable: boolean;
  upstreamStatus?: number;
  constructor(
    provider: string,
    message: string,
    options: { retryable: boolean; upstreamStatus?: number; cause?: unknown },
  ) {
    super(`${provider}: ${message}`, "embedding_unavailable", 502, { cause: options.cause });
    this.provider = provider;
    this.retryable = options.retryable;
    this.upstreamStatus = options.upstreamStatus;
    this.name = "ProviderError";
  }
}

export class StoreError extends RetrievalError {
  operation: string;
  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? "" : String(cause);
    super(
      detail ? `index store ${operation} failed: ${detail}` : `index store ${operation} failed`,
      "store_unavailable",
      503,
      { cause },
    );
    this.operation = operation;
    this.name = "StoreError";
  }
}

export class CacheError extends RetrievalError {
  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? "");
    super(`search cache ${operation} failed: ${detail}`, "cache_unavailable", 500, { cause });
    this.name = "CacheError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
