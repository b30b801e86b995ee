import { FetchFailure } from "../errors";
import { createSha256 } from "../utils/hash";
import { parseHttpDate } from "../utils/time";
import { DEFAULT_RETRY_POLICY, DOCUMENT_HEADERS, FetchLike, withRetry } from "./http";

export const DEFAULT_FETCH_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_BYTES = 50 * 1024 * 1024;

export interface FingerprintOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  maxBytes?: number;
  attempts?: number;
  retryDelayMs?: number;
  /** Substrings one of which must appear in Content-Type. Empty or absent accepts anything. */
  acceptContentTypes?: string[];
}

export interface FingerprintResult {
  url: string;
  finalUrl: string;
  fingerprint: string;
  remoteModifiedAt: Date | null;
  byteSize: number;
  contentType: string | null;
  statusCode: number;
}

async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel().catch(() => undefined);
}

function acceptsContentType(contentType: string | null, accepted: string[] | undefined): boolean {
  if (!accepted || accepted.length === 0) return true;
  const lower = (contentType ?? "").toLowerCase();
  return accepted.some((type) => lower.includes(type.toLowerCase()));
}

async function digestBody(
  response: Response,
  url: string,
  maxBytes: number
): Promise<{ fingerprint: string; byteSize: number }> {
  const hash = createSha256();
  if (!response.body) {
    const buffer = new Uint8Array(await response.arrayBuffer());
    if (buffer.byteLength > maxBytes) {
      throw new FetchFailure("too_large", url, `Body of ${url} exceeds ${maxBytes} bytes`);
    }
    hash.update(buffer);
    return { fingerprint: hash.digest(), byteSize: buffer.byteLength };
  }

  const reader = response.body.getReader();
  let byteSize = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk: Uint8Array = value;
    byteSize += chunk.byteLength;
    if (byteSize > maxBytes) {
      await reader.cancel().catch(() => undefined);
      throw new FetchFailure("too_large", url, `Body of ${url} exceeds ${maxBytes} bytes`);
    }
    hash.update(chunk);
  }
  return { fingerprint: hash.digest(), byteSize };
}

async function fingerprintOnce(url: string, options: FingerprintOptions): Promise<FingerprintResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  const response = await fetchImpl(url, {
    headers: DOCUMENT_HEADERS,
    redirect: "follow",
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS)
  });

  if (!response.ok) {
    await discardBody(response);
    throw new FetchFailure("http_status", url, `GET ${url} returned ${response.status}`, {
      statusCode: response.status
    });
  }

  const contentType = response.headers.get("content-type");
  if (!acceptsContentType(contentType, options.acceptContentTypes)) {
    await discardBody(response);
    throw new FetchFailure(
      "content_type",
      url,
      `Unexpected content type "${contentType ?? "none"}" for ${url}`,
      { statusCode: response.status }
    );
  }

  const declaredLength = Number(response.headers.get("content-length") ?? NaN);
  if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
    await discardBody(response);
    throw new FetchFailure("too_large", url, `Body of ${url} exceeds ${maxBytes} bytes`, {
      statusCode: response.status
    });
  }

  const { fingerprint, byteSize } = await digestBody(response, url, maxBytes);
  return {
    url,
    finalUrl: response.url || url,
    fingerprint,
    remoteModifiedAt: parseHttpDate(response.headers.get("last-modified")),
    byteSize,
    contentType,
    statusCode: response.status
  };
}

/**
 * Downloads `url` and returns the SHA-256 of the exact bytes received.
 * Throws FetchFailure once the retry budget is spent.
 */
export async function fingerprintUrl(
  url: string,
  options: FingerprintOptions = {}
): Promise<FingerprintResult> {
  return withRetry(url, () => fingerprintOnce(url, options), {
    attempts: options.attempts ?? DEFAULT_RETRY_POLICY.attempts,
    retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_POLICY.retryDelayMs
  });
}
