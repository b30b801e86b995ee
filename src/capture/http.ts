import { FetchFailure } from "../errors";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
export const DEFAULT_ACCEPT_LANGUAGE = "en-US,en;q=0.9";

export const PAGE_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": DEFAULT_ACCEPT_LANGUAGE
};

export const DOCUMENT_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "application/pdf,*/*",
  "Accept-Language": DEFAULT_ACCEPT_LANGUAGE
};

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface RetryPolicy {
  attempts: number;
  retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  retryDelayMs: 500
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export function toFetchFailure(url: string, error: unknown): FetchFailure {
  if (error instanceof FetchFailure) return error;
  if (isAbortError(error)) {
    return new FetchFailure("timeout", url, `Request to ${url} timed out`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchFailure("network", url, `Request to ${url} failed: ${message}`, { cause: error });
}

/**
 * Runs `operation` up to `policy.attempts` times. Only retryable fetch failures
 * are repeated; the last failure is rethrown with its attempt count.
 */
export async function withRetry<T>(
  url: string,
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<T> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      const failure = toFetchFailure(url, error);
      failure.attempts = attempt;
      if (!failure.retryable || attempt >= attempts) {
        throw failure;
      }
    }
    attempt += 1;
    if (policy.retryDelayMs > 0) {
      await sleep(policy.retryDelayMs);
    }
  }
}
