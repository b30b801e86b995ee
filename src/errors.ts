export type FetchFailureKind = "network" | "timeout" | "http_status" | "too_large" | "content_type";

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** A retrieval that did not produce a usable body. Recorded per URL; the run continues. */
export class FetchFailure extends Error {
  readonly kind: FetchFailureKind;
  readonly url: string;
  readonly statusCode: number | null;
  attempts: number;

  constructor(
    kind: FetchFailureKind,
    url: string,
    message: string,
    options: { statusCode?: number | null; attempts?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchFailure";
    this.kind = kind;
    this.url = url;
    this.statusCode = options.statusCode ?? null;
    this.attempts = options.attempts ?? 1;
  }

  /** Transient failures are worth another attempt; a 4xx or an oversized body is not. */
  get retryable(): boolean {
    if (this.kind === "network" || this.kind === "timeout") return true;
    if (this.kind !== "http_status" || this.statusCode === null) return false;
    return this.statusCode >= 500 || this.statusCode === 429;
  }

  describe(): string {
    const suffix = this.attempts > 1 ? ` after ${this.attempts} attempts` : "";
    return `${this.kind}: ${this.message}${suffix}`;
  }
}

/** Persistence failed. Fatal for the run. */
export class StoreFailure extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Document store ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "StoreFailure";
    this.operation = operation;
  }
}

export class SelectorFailure extends Error {
  readonly sourceName: string;

  constructor(sourceName: string, message: string, cause?: unknown) {
    super(`Selection failed for ${sourceName}: ${message}`, { cause });
    this.name = "SelectorFailure";
    this.sourceName = sourceName;
  }
}

export class ResolverFailure extends Error {
  readonly sourceUrl: string;

  constructor(sourceUrl: string, cause: unknown) {
    super(`Candidate resolution failed for ${sourceUrl}: ${describeError(cause)}`, { cause });
    this.name = "ResolverFailure";
    this.sourceUrl = sourceUrl;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
