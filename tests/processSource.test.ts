import { describe, expect, it, vi } from "vitest";
import type { SourceConfig } from "../src/config/sourceList";
import { ResolverFailure, SelectorFailure, StoreFailure } from "../src/errors";
import { processSource } from "../src/monitor/processSource";
import type { UpsertDocumentInput, UpsertResult } from "../src/store/documentStore";
import { MemoryDocumentStore } from "../src/store/memoryDocumentStore";
import type { Candidate, CandidateResolver, DocumentSelector } from "../src/types/collaborators";
import type { SourceOutcome } from "../src/types/runRecord";
import {
  fixedClock,
  pdfResponse,
  Route,
  silentLog,
  statusResponse,
  stubFetch,
  V1_BYTES,
  V1_HASH,
  V2_BYTES,
  V2_HASH
} from "./helpers";

const ACME: SourceConfig = { name: "Acme Electric", url: "https://acme.example/rates" };
const URL_V1 = "https://acme.example/tariff-v1.pdf";
const URL_V2 = "https://acme.example/tariff-v2.pdf";

const CANDIDATES: Candidate[] = [
  { url: URL_V1, linkText: "Commercial Tariff 2025", context: "Archive" },
  { url: URL_V2, linkText: "Commercial Tariff 2026", context: "Current" }
];

const resolver: CandidateResolver = async () => CANDIDATES;

function selecting(urls: string[], overallRationale = "Newest commercial tariff."): DocumentSelector {
  return {
    select: async () => ({
      selected: urls.map((url) => ({ url, rationale: "commercial" })),
      overallRationale
    })
  };
}

async function check(
  store: MemoryDocumentStore,
  urls: string[],
  routes: Record<string, Route>,
  quickMode = false
): Promise<SourceOutcome> {
  const { fetchImpl } = stubFetch(routes);
  return processSource({
    source: ACME,
    store,
    resolver,
    selector: selecting(urls),
    detect: { quickMode, fingerprint: { fetchImpl, attempts: 1, retryDelayMs: 0 } },
    log: silentLog,
    now: fixedClock
  });
}

describe("processSource", () => {
  it("walks a document from new, to unchanged, to superseded", async () => {
    const store = new MemoryDocumentStore();

    const first = await check(store, [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });
    expect(first).toMatchObject({ candidatesFound: 2, candidatesSelected: 1, addedCount: 1, updatedCount: 0 });
    expect(first.selections[0]).toMatchObject({ kind: "tracked", changed: true, recordState: "added" });

    const second = await check(store, [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });
    expect(second).toMatchObject({ addedCount: 0, updatedCount: 0, errorCount: 0, superseded: [] });
    expect(second.selections[0]).toMatchObject({ changed: false, recordState: "unchanged", fingerprint: V1_HASH });

    const third = await check(store, [URL_V2], { [`GET ${URL_V2}`]: () => pdfResponse(V2_BYTES) });
    expect(third).toMatchObject({ addedCount: 1, updatedCount: 0, superseded: [URL_V1] });

    expect((await store.findByUrl(URL_V1))?.status).toBe("OBSOLETE");
    expect(await store.findByUrl(URL_V2)).toMatchObject({
      status: "ACTIVE",
      fingerprint: V2_HASH,
      displayName: "tariff-v2.pdf",
      linkContext: "Commercial Tariff 2026",
      lastChecked: fixedClock()
    });
  });

  it("records new bytes at a known URL as an update", async () => {
    const store = new MemoryDocumentStore();
    await check(store, [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });

    const outcome = await check(store, [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V2_BYTES) });

    expect(outcome).toMatchObject({ addedCount: 0, updatedCount: 1, superseded: [] });
    expect((await store.findByUrl(URL_V1))?.fingerprint).toBe(V2_HASH);
  });

  it("keeps the old document ACTIVE when its replacement cannot be fetched", async () => {
    const store = new MemoryDocumentStore();
    await check(store, [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });

    const outcome = await check(store, [URL_V2], { [`GET ${URL_V2}`]: () => statusResponse(404) });

    expect(outcome).toMatchObject({ addedCount: 0, errorCount: 1, superseded: [] });
    expect(outcome.selections).toEqual([
      {
        kind: "failed",
        url: URL_V2,
        rationale: "commercial",
        failure: `http_status: GET ${URL_V2} returned 404`
      }
    ]);
    expect((await store.findByUrl(URL_V1))?.status).toBe("ACTIVE");
    expect(await store.findByUrl(URL_V2)).toBeNull();
  });

  it("keeps documents selected together ACTIVE together", async () => {
    const store = new MemoryDocumentStore();

    const outcome = await check(store, [URL_V1, URL_V2], {
      [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES),
      [`GET ${URL_V2}`]: () => pdfResponse(V2_BYTES)
    });

    expect(outcome).toMatchObject({ addedCount: 2, superseded: [] });
    const statuses = (await store.listBySource("Acme Electric")).map((row) => row.status);
    expect(statuses).toEqual(["ACTIVE", "ACTIVE"]);
  });

  it("keeps a re-selected document ACTIVE when only its fetch fails", async () => {
    const store = new MemoryDocumentStore();
    const scheduleA = "https://acme.example/schedule-a.pdf";
    const scheduleB = "https://acme.example/schedule-b.pdf";
    const scheduleC = "https://acme.example/schedule-c.pdf";
    await check(store, [scheduleA, scheduleB], {
      [`GET ${scheduleA}`]: () => pdfResponse(V1_BYTES),
      [`GET ${scheduleB}`]: () => pdfResponse(V2_BYTES)
    });

    const outcome = await check(store, [scheduleA, scheduleB, scheduleC], {
      [`GET ${scheduleA}`]: () => pdfResponse(V1_BYTES),
      [`GET ${scheduleB}`]: () => statusResponse(503),
      [`GET ${scheduleC}`]: () => pdfResponse("%PDF-1.4 schedule c")
    });

    expect(outcome).toMatchObject({ addedCount: 1, errorCount: 1, superseded: [] });
    expect((await store.findByUrl(scheduleB))?.status).toBe("ACTIVE");
    const statuses = (await store.listBySource("Acme Electric")).map((row) => [row.url, row.status]);
    expect(statuses).toEqual([
      [scheduleA, "ACTIVE"],
      [scheduleB, "ACTIVE"],
      [scheduleC, "ACTIVE"]
    ]);
  });

  it("supersedes the old document when the source moves to a URL another source tracks", async () => {
    const store = new MemoryDocumentStore();
    const oldUrl = "https://acme.example/old.pdf";
    const sharedUrl = "https://grid.example/shared.pdf";
    const { fetchImpl } = stubFetch({ [`GET ${sharedUrl}`]: () => pdfResponse(V2_BYTES) });
    await processSource({
      source: { name: "Other Power", url: "https://grid.example/rates" },
      store,
      resolver,
      selector: selecting([sharedUrl]),
      detect: { quickMode: false, fingerprint: { fetchImpl, attempts: 1, retryDelayMs: 0 } },
      log: silentLog,
      now: fixedClock
    });
    await check(store, [oldUrl], { [`GET ${oldUrl}`]: () => pdfResponse(V1_BYTES) });

    const outcome = await check(store, [sharedUrl], { [`GET ${sharedUrl}`]: () => pdfResponse(V2_BYTES) });

    expect(outcome).toMatchObject({ addedCount: 0, superseded: [oldUrl] });
    expect((await store.findByUrl(oldUrl))?.status).toBe("OBSOLETE");
    expect(await store.findByUrl(sharedUrl)).toMatchObject({ sourceName: "Other Power", status: "ACTIVE" });
  });

  it("reinstates a re-selected OBSOLETE document and supersedes its replacement", async () => {
    const store = new MemoryDocumentStore();
    await check(store, [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });
    await check(store, [URL_V2], { [`GET ${URL_V2}`]: () => pdfResponse(V2_BYTES) });

    const outcome = await check(store, [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });

    expect(outcome).toMatchObject({ addedCount: 0, updatedCount: 0, superseded: [URL_V2] });
    expect(outcome.selections[0]).toMatchObject({ status: "ACTIVE", recordState: "unchanged" });
    expect((await store.findByUrl(URL_V2))?.status).toBe("OBSOLETE");
  });

  it("uses the metadata probe in quick mode", async () => {
    const store = new MemoryDocumentStore();
    const lastModified = "Tue, 21 Oct 2025 07:28:00 GMT";
    await check(store, [URL_V1], {
      [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES, { "last-modified": lastModified })
    });

    const { fetchImpl, calls } = stubFetch({ [`HEAD ${URL_V1}`]: () => statusResponse(304) });
    const outcome = await processSource({
      source: ACME,
      store,
      resolver,
      selector: selecting([URL_V1]),
      detect: { quickMode: true, fingerprint: { fetchImpl } },
      log: silentLog,
      now: fixedClock
    });

    expect(calls).toEqual([{ method: "HEAD", url: URL_V1 }]);
    expect(outcome.selections[0]).toMatchObject({ changed: false, checkMode: "probe", recordState: "unchanged" });
    expect((await store.findByUrl(URL_V1))?.fingerprint).toBe(V1_HASH);
  });

  it("treats a selector failure as nothing selected", async () => {
    const store = new MemoryDocumentStore();
    const selector: DocumentSelector = {
      select: async (sourceName) => {
        throw new SelectorFailure(sourceName, "model output is not JSON");
      }
    };

    const outcome = await processSource({
      source: ACME,
      store,
      resolver,
      selector,
      detect: { quickMode: false },
      log: silentLog
    });

    expect(outcome).toMatchObject({
      candidatesFound: 2,
      candidatesSelected: 0,
      errorCount: 1,
      errors: ["Selection failed for Acme Electric: model output is not JSON"],
      selections: []
    });
    expect(store.size).toBe(0);
  });

  it("does not call the selector when candidate resolution fails", async () => {
    const selector = { select: vi.fn(selecting([URL_V1]).select) };
    const failingResolver: CandidateResolver = async (url) => {
      throw new ResolverFailure(url, "timeout");
    };

    const outcome = await processSource({
      source: ACME,
      store: new MemoryDocumentStore(),
      resolver: failingResolver,
      selector,
      detect: { quickMode: false },
      log: silentLog
    });

    expect(selector.select).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      candidatesFound: 0,
      errorCount: 1,
      errors: ["Candidate resolution failed for https://acme.example/rates: timeout"]
    });
  });

  it("ignores a URL the selector returns twice", async () => {
    const store = new MemoryDocumentStore();

    const outcome = await check(store, [URL_V1, URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });

    expect(outcome).toMatchObject({ candidatesSelected: 1, addedCount: 1 });
    expect(outcome.selections).toHaveLength(1);
  });

  it("propagates store failures", async () => {
    class BrokenStore extends MemoryDocumentStore {
      override async upsert(_input: UpsertDocumentInput): Promise<UpsertResult> {
        throw new StoreFailure("upsert", new Error("connection terminated"));
      }
    }

    const promise = check(new BrokenStore(), [URL_V1], { [`GET ${URL_V1}`]: () => pdfResponse(V1_BYTES) });

    await expect(promise).rejects.toThrow("Document store upsert failed: connection terminated");
  });
});
