import { sql } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";

// Mirrors ./schema.ts. Every statement is safe to re-run.
const STATEMENTS = [
  sql`
    CREATE TABLE IF NOT EXISTS tracked_documents (
      id SERIAL PRIMARY KEY,
      utility_name TEXT NOT NULL,
      url TEXT NOT NULL,
      document_name TEXT,
      hash TEXT,
      last_checked TIMESTAMPTZ,
      tariff_last_updated TIMESTAMPTZ,
      status TEXT NOT NULL DEFAULT 'ACTIVE',
      link_text TEXT
    )
  `,
  sql`CREATE UNIQUE INDEX IF NOT EXISTS tracked_documents_url_idx ON tracked_documents (url)`,
  sql`
    CREATE INDEX IF NOT EXISTS tracked_documents_source_status_idx
      ON tracked_documents (utility_name, status)
  `
];

export async function ensureSchema(db: NodePgDatabase): Promise<void> {
  await db.transaction(async (tx) => {
    for (const statement of STATEMENTS) {
      await tx.execute(statement);
    }
  });
}
