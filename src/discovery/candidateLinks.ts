import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { DEFAULT_RETRY_POLICY, FetchLike, PAGE_HEADERS, withRetry } from "../capture/http";
import { FetchFailure, ResolverFailure } from "../errors";
import type { Candidate, CandidateResolver } from "../types/collaborators";
import { normalizeWhitespace, truncate } from "../utils/text";

const MAX_CANDIDATES = 200;
const LINK_TEXT_MAX = 200;
const CONTEXT_MAX = 300;
export const DEFAULT_PAGE_TIMEOUT_MS = 10000;

/** Drops query string and fragment so the same document keeps one URL. */
export function cleanUrl(href: string, baseUrl: string): string | null {
  let resolved: URL;
  try {
    resolved = new URL(href, baseUrl);
  } catch {
    return null;
  }
  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") return null;
  resolved.search = "";
  resolved.hash = "";
  return resolved.toString();
}

function isPdfHref(href: string): boolean {
  return href.toLowerCase().includes(".pdf");
}

function contextFor($link: cheerio.Cheerio<AnyNode>, linkText: string): string {
  const parentText = normalizeWhitespace($link.parent().text());
  let context = linkText ? normalizeWhitespace(parentText.replace(linkText, "")) : parentText;
  if (!context) context = linkText;
  return truncate(context, CONTEXT_MAX);
}

export function extractCandidateLinks(html: string, baseUrl: string): Candidate[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const candidates: Candidate[] = [];

  for (const node of $("a[href]").toArray()) {
    const link = $(node);
    const href = link.attr("href")?.trim() ?? "";
    if (!href || !isPdfHref(href)) continue;
    const url = cleanUrl(href, baseUrl);
    if (!url || seen.has(url)) continue;
    seen.add(url);

    const linkText = truncate(normalizeWhitespace(link.text()), LINK_TEXT_MAX);
    candidates.push({ url, linkText, context: contextFor(link, linkText) });
    if (candidates.length >= MAX_CANDIDATES) break;
  }

  return candidates;
}

export interface ResolveOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  attempts?: number;
  retryDelayMs?: number;
}

async function fetchPage(url: string, options: ResolveOptions): Promise<{ html: string; finalUrl: string }> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const response = await fetchImpl(url, {
    headers: PAGE_HEADERS,
    redirect: "follow",
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_PAGE_TIMEOUT_MS)
  });
  if (!response.ok) {
    throw new FetchFailure("http_status", url, `GET ${url} returned ${response.status}`, {
      statusCode: response.status
    });
  }
  return { html: await response.text(), finalUrl: response.url || url };
}

export function createCandidateResolver(options: ResolveOptions = {}): CandidateResolver {
  return async (sourcePageUrl) => {
    try {
      const page = await withRetry(sourcePageUrl, () => fetchPage(sourcePageUrl, options), {
        attempts: options.attempts ?? DEFAULT_RETRY_POLICY.attempts,
        retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_POLICY.retryDelayMs
      });
      return extractCandidateLinks(page.html, page.finalUrl);
    } catch (error) {
      throw new ResolverFailure(sourcePageUrl, error instanceof FetchFailure ? error.describe() : error);
    }
  };
}
