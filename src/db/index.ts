export { getDb, getPool, closePool } from "./client";
export { ensureSchema } from "./migrate";
export { PgDocumentStore } from "./pgDocumentStore";
