import { describeError } from "../errors";
import { parseHttpDate, sameSecond } from "../utils/time";
import { DOCUMENT_HEADERS, FetchLike } from "./http";

export const DEFAULT_PROBE_TIMEOUT_MS = 10000;

export interface ProbePrior {
  fingerprint: string | null;
  contentUpdatedAt: Date | null;
}

export type ProbeOutcome =
  | { kind: "unchanged"; remoteModifiedAt: Date }
  | { kind: "inconclusive"; reason: string };

export interface ProbeOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

/**
 * Conditional HEAD request. Only answers "unchanged" when the server confirms
 * the stored modification time; anything else is inconclusive.
 */
export async function probeRemoteMetadata(
  url: string,
  prior: ProbePrior | null,
  options: ProbeOptions = {}
): Promise<ProbeOutcome> {
  if (!prior?.fingerprint) {
    return { kind: "inconclusive", reason: "no prior fingerprint" };
  }
  const knownModifiedAt = prior.contentUpdatedAt;
  if (!knownModifiedAt) {
    return { kind: "inconclusive", reason: "no stored modification time" };
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "HEAD",
      headers: { ...DOCUMENT_HEADERS, "If-Modified-Since": knownModifiedAt.toUTCString() },
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS)
    });
  } catch (error) {
    return { kind: "inconclusive", reason: `probe failed: ${describeError(error)}` };
  }

  if (response.status === 304) {
    return { kind: "unchanged", remoteModifiedAt: knownModifiedAt };
  }
  if (!response.ok) {
    return { kind: "inconclusive", reason: `HEAD returned ${response.status}` };
  }

  const remoteModifiedAt = parseHttpDate(response.headers.get("last-modified"));
  if (!remoteModifiedAt) {
    return { kind: "inconclusive", reason: "no Last-Modified header" };
  }
  if (!sameSecond(remoteModifiedAt, knownModifiedAt)) {
    return { kind: "inconclusive", reason: "Last-Modified differs from stored value" };
  }
  return { kind: "unchanged", remoteModifiedAt };
}
