import { getDb, closePool, PgDocumentStore } from "../db";
import { describeError } from "../errors";

export async function runInitDb(): Promise<void> {
  try {
    await new PgDocumentStore(getDb()).initialize();
    console.log("tracked_documents schema is in place.");
  } finally {
    await closePool().catch((error) => console.warn(`Failed to close database pool: ${describeError(error)}`));
  }
}
