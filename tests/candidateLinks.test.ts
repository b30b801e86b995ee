import { describe, expect, it } from "vitest";
import { cleanUrl, createCandidateResolver, extractCandidateLinks } from "../src/discovery/candidateLinks";
import { ResolverFailure } from "../src/errors";
import { statusResponse, stubFetch } from "./helpers";

const PAGE_URL = "https://acme.example/rates/approved";

const PAGE_HTML = `
<html><body>
  <h1>Approved Rates</h1>
  <ul>
    <li>Large customers: <a href="/files/commercial-tariff.pdf?v=3">Commercial Tariff</a> effective 2026</li>
    <li><a href="residential.PDF#page=2">Residential Schedule</a></li>
    <li><a href="https://acme.example/files/commercial-tariff.pdf">Commercial Tariff (duplicate)</a></li>
    <li><a href="/contact">Contact us</a></li>
    <li><a href="mailto:rates@acme.example?subject=tariff.pdf">Email</a></li>
  </ul>
</body></html>`;

describe("cleanUrl", () => {
  it("resolves relative links and strips query and fragment", () => {
    expect(cleanUrl("../docs/a.pdf?x=1#top", PAGE_URL)).toBe("https://acme.example/docs/a.pdf");
  });

  it("rejects non-http schemes", () => {
    expect(cleanUrl("javascript:void(0)", PAGE_URL)).toBeNull();
  });
});

describe("extractCandidateLinks", () => {
  it("lists each PDF link once with its text and context", () => {
    const candidates = extractCandidateLinks(PAGE_HTML, PAGE_URL);

    expect(candidates).toEqual([
      {
        url: "https://acme.example/files/commercial-tariff.pdf",
        linkText: "Commercial Tariff",
        context: "Large customers: effective 2026"
      },
      {
        url: "https://acme.example/rates/residential.PDF",
        linkText: "Residential Schedule",
        context: "Residential Schedule"
      }
    ]);
  });

  it("returns nothing for a page without PDF links", () => {
    expect(extractCandidateLinks("<p>No documents</p>", PAGE_URL)).toEqual([]);
  });
});

describe("createCandidateResolver", () => {
  it("fetches the page and extracts candidates", async () => {
    const { fetchImpl } = stubFetch({
      [`GET ${PAGE_URL}`]: () => new Response(PAGE_HTML, { status: 200, headers: { "content-type": "text/html" } })
    });

    const resolve = createCandidateResolver({ fetchImpl });
    const candidates = await resolve(PAGE_URL);

    expect(candidates.map((candidate) => candidate.url)).toEqual([
      "https://acme.example/files/commercial-tariff.pdf",
      "https://acme.example/rates/residential.PDF"
    ]);
  });

  it("wraps page failures in ResolverFailure", async () => {
    const { fetchImpl } = stubFetch({ [`GET ${PAGE_URL}`]: () => statusResponse(404) });

    const resolve = createCandidateResolver({ fetchImpl, attempts: 1 });

    await expect(resolve(PAGE_URL)).rejects.toBeInstanceOf(ResolverFailure);
    await expect(resolve(PAGE_URL)).rejects.toThrow(
      `Candidate resolution failed for ${PAGE_URL}: http_status: GET ${PAGE_URL} returned 404`
    );
  });
});
