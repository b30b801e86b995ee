import { pgTable, text, timestamp, serial, index, uniqueIndex } from "drizzle-orm/pg-core";

export const trackedDocuments = pgTable(
  "tracked_documents",
  {
    id: serial("id").primaryKey(),
    sourceName: text("utility_name").notNull(),
    url: text("url").notNull(),
    documentName: text("document_name"),
    hash: text("hash"),
    lastChecked: timestamp("last_checked", { withTimezone: true }),
    tariffLastUpdated: timestamp("tariff_last_updated", { withTimezone: true }),
    status: text("status").notNull().default("ACTIVE"), // ACTIVE | OBSOLETE
    linkText: text("link_text")
  },
  (table) => ({
    trackedDocumentsUrlUnique: uniqueIndex("tracked_documents_url_idx").on(table.url),
    trackedDocumentsSourceIdx: index("tracked_documents_source_status_idx").on(
      table.sourceName,
      table.status
    )
  })
);

export type TrackedDocumentRow = typeof trackedDocuments.$inferSelect;
