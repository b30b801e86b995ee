import type { FetchLike } from "../src/capture/http";

export type Route = (init: RequestInit | undefined, call: number) => Response | Promise<Response>;

export interface StubFetch {
  fetchImpl: FetchLike;
  calls: { method: string; url: string }[];
}

/** Routes are keyed "METHOD url". Unknown routes fail like a refused connection. */
export function stubFetch(routes: Record<string, Route>): StubFetch {
  const calls: { method: string; url: string }[] = [];
  const counts = new Map<string, number>();
  const fetchImpl: FetchLike = async (url, init) => {
    const method = init?.method ?? "GET";
    calls.push({ method, url });
    const key = `${method} ${url}`;
    const route = routes[key];
    if (!route) {
      throw new TypeError(`fetch failed: no route for ${key}`);
    }
    const call = (counts.get(key) ?? 0) + 1;
    counts.set(key, call);
    return route(init, call);
  };
  return { fetchImpl, calls };
}

export function pdfResponse(body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, {
    status: 200,
    headers: { "content-type": "application/pdf", ...headers }
  });
}

export function statusResponse(status: number, headers: Record<string, string> = {}): Response {
  const nullBody = status === 204 || status === 304;
  return new Response(nullBody ? null : `status ${status}`, { status, headers });
}

export function timeoutError(): Error {
  const error = new Error("The operation was aborted due to timeout");
  error.name = "TimeoutError";
  return error;
}

export const FIXED_NOW = new Date("2026-03-01T12:00:00Z");

export const fixedClock = (): Date => FIXED_NOW;

export const silentLog = (): void => undefined;

export const V1_BYTES = "%PDF-1.4 tariff v1";
export const V1_HASH = "7bb9823c60502fedd14723e1f7051e19625a39a3556ce98787130268a14bf18b";
export const V2_BYTES = "%PDF-1.4 tariff v2";
export const V2_HASH = "69edeb0135e09dc4f7384eb2b1e7e495c55c4c2e5f1641ae6562a0ce1806fcb2";

export function sleepFor(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
