import { and, asc, eq, notInArray, sql } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { StoreFailure } from "../errors";
import type { DocumentStore, UpsertDocumentInput, UpsertResult } from "../store/documentStore";
import { isDocumentStatus, TrackedDocument } from "../types/trackedDocument";
import { ensureSchema } from "./migrate";
import { trackedDocuments, TrackedDocumentRow } from "./schema";

function toDocument(row: TrackedDocumentRow): TrackedDocument {
  if (!isDocumentStatus(row.status)) {
    throw new Error(`Unknown status "${row.status}" on tracked_documents.id=${row.id}`);
  }
  return {
    id: row.id,
    sourceName: row.sourceName,
    url: row.url,
    displayName: row.documentName ?? "",
    fingerprint: row.hash,
    lastChecked: row.lastChecked,
    contentUpdatedAt: row.tariffLastUpdated,
    status: row.status,
    linkContext: row.linkText
  };
}

async function guarded<T>(operation: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof StoreFailure) throw error;
    throw new StoreFailure(operation, error);
  }
}

/**
 * Postgres-backed store. Each upsert runs in one transaction holding an
 * advisory lock on the URL, so concurrent runs cannot insert the same URL twice.
 */
export class PgDocumentStore implements DocumentStore {
  constructor(private readonly db: NodePgDatabase) {}

  initialize(): Promise<void> {
    return guarded("initialize", () => ensureSchema(this.db));
  }

  findByUrl(url: string): Promise<TrackedDocument | null> {
    return guarded("findByUrl", async () => {
      const rows = await this.db
        .select()
        .from(trackedDocuments)
        .where(eq(trackedDocuments.url, url))
        .limit(1);
      return rows.length ? toDocument(rows[0]) : null;
    });
  }

  upsert(input: UpsertDocumentInput): Promise<UpsertResult> {
    return guarded("upsert", () =>
      this.db.transaction(async (tx) => {
        await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${input.url}))`);

        const existing = await tx
          .select()
          .from(trackedDocuments)
          .where(eq(trackedDocuments.url, input.url))
          .limit(1);

        if (!existing.length) {
          const inserted = await tx
            .insert(trackedDocuments)
            .values({
              sourceName: input.sourceName,
              url: input.url,
              documentName: input.displayName,
              hash: input.fingerprint,
              lastChecked: input.checkedAt,
              tariffLastUpdated: input.remoteModifiedAt,
              status: "ACTIVE",
              linkText: input.linkContext
            })
            .returning();
          return {
            document: toDocument(inserted[0]),
            isNewRecord: true,
            fingerprintChanged: true,
            reactivated: false
          };
        }

        const current = existing[0];
        const reactivated = Boolean(input.reactivate) && current.status === "OBSOLETE";
        const updated = await tx
          .update(trackedDocuments)
          .set({
            hash: input.fingerprint,
            lastChecked: input.checkedAt,
            ...(input.remoteModifiedAt ? { tariffLastUpdated: input.remoteModifiedAt } : {}),
            ...(input.linkContext !== null ? { linkText: input.linkContext } : {}),
            ...(reactivated ? { status: "ACTIVE" } : {})
          })
          .where(eq(trackedDocuments.id, current.id))
          .returning();

        return {
          document: toDocument(updated[0]),
          isNewRecord: false,
          fingerprintChanged: current.hash !== input.fingerprint,
          reactivated
        };
      })
    );
  }

  markObsolete(url: string): Promise<TrackedDocument | null> {
    return guarded("markObsolete", async () => {
      const rows = await this.db
        .update(trackedDocuments)
        .set({ status: "OBSOLETE" })
        .where(eq(trackedDocuments.url, url))
        .returning();
      return rows.length ? toDocument(rows[0]) : null;
    });
  }

  supersede(sourceName: string, keepUrls: readonly string[]): Promise<string[]> {
    return guarded("supersede", async () => {
      const conditions = [
        eq(trackedDocuments.sourceName, sourceName),
        eq(trackedDocuments.status, "ACTIVE")
      ];
      if (keepUrls.length) {
        conditions.push(notInArray(trackedDocuments.url, [...keepUrls]));
      }
      const rows = await this.db
        .update(trackedDocuments)
        .set({ status: "OBSOLETE" })
        .where(and(...conditions))
        .returning({ id: trackedDocuments.id, url: trackedDocuments.url });
      return rows.sort((a, b) => a.id - b.id).map((row) => row.url);
    });
  }

  listBySource(sourceName: string): Promise<TrackedDocument[]> {
    return guarded("listBySource", async () => {
      const rows = await this.db
        .select()
        .from(trackedDocuments)
        .where(eq(trackedDocuments.sourceName, sourceName))
        .orderBy(asc(trackedDocuments.id));
      return rows.map(toDocument);
    });
  }
}
