import type { TrackedDocument } from "../types/trackedDocument";
import type { DocumentStore, UpsertDocumentInput, UpsertResult } from "./documentStore";

function copy(document: TrackedDocument): TrackedDocument {
  return { ...document };
}

/**
 * In-process store keyed by URL. Writes to one URL are chained so concurrent
 * upserts see each other's results.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly rows = new Map<string, TrackedDocument>();
  private readonly locks = new Map<string, Promise<unknown>>();
  private nextId = 1;

  async initialize(): Promise<void> {}

  async findByUrl(url: string): Promise<TrackedDocument | null> {
    const row = this.rows.get(url);
    return row ? copy(row) : null;
  }

  upsert(input: UpsertDocumentInput): Promise<UpsertResult> {
    return this.serialized(input.url, async () => this.applyUpsert(input));
  }

  markObsolete(url: string): Promise<TrackedDocument | null> {
    return this.serialized(url, async () => {
      const row = this.rows.get(url);
      if (!row) return null;
      row.status = "OBSOLETE";
      return copy(row);
    });
  }

  async supersede(sourceName: string, keepUrls: readonly string[]): Promise<string[]> {
    const keep = new Set(keepUrls);
    const targets = this.sortedRows().filter(
      (row) => row.sourceName === sourceName && row.status === "ACTIVE" && !keep.has(row.url)
    );
    const obsoleted: string[] = [];
    for (const row of targets) {
      const updated = await this.markObsolete(row.url);
      if (updated) obsoleted.push(updated.url);
    }
    return obsoleted;
  }

  async listBySource(sourceName: string): Promise<TrackedDocument[]> {
    return this.sortedRows()
      .filter((row) => row.sourceName === sourceName)
      .map(copy);
  }

  get size(): number {
    return this.rows.size;
  }

  private sortedRows(): TrackedDocument[] {
    return [...this.rows.values()].sort((a, b) => a.id - b.id);
  }

  private applyUpsert(input: UpsertDocumentInput): UpsertResult {
    const existing = this.rows.get(input.url);
    if (!existing) {
      const created: TrackedDocument = {
        id: this.nextId++,
        sourceName: input.sourceName,
        url: input.url,
        displayName: input.displayName,
        fingerprint: input.fingerprint,
        lastChecked: input.checkedAt,
        contentUpdatedAt: input.remoteModifiedAt,
        status: "ACTIVE",
        linkContext: input.linkContext
      };
      this.rows.set(input.url, created);
      return { document: copy(created), isNewRecord: true, fingerprintChanged: true, reactivated: false };
    }

    const fingerprintChanged = existing.fingerprint !== input.fingerprint;
    const reactivated = Boolean(input.reactivate) && existing.status === "OBSOLETE";
    existing.fingerprint = input.fingerprint;
    existing.lastChecked = input.checkedAt;
    if (input.remoteModifiedAt) existing.contentUpdatedAt = input.remoteModifiedAt;
    if (input.linkContext !== null) existing.linkContext = input.linkContext;
    if (reactivated) existing.status = "ACTIVE";
    return { document: copy(existing), isNewRecord: false, fingerprintChanged, reactivated };
  }

  private serialized<T>(url: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(url) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(url, settled);
    void settled.then(() => {
      if (this.locks.get(url) === settled) this.locks.delete(url);
    });
    return next;
  }
}
