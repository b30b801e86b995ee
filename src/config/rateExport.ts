import { z } from "zod";
import type { SourceEntry } from "./sourceList";

const MongoDateSchema = z.union([z.string(), z.object({ $date: z.string() })]);

const RateRecordSchema = z
  .object({
    utilityName: z.string(),
    eiaId: z.union([z.number(), z.string()]),
    sector: z.string().optional(),
    country: z.string().optional(),
    rateName: z.string().optional(),
    effectiveDate: MongoDateSchema.nullable().optional(),
    revisions: z.array(z.object({ date: MongoDateSchema.nullable().optional() })).optional(),
    sourceReference: z.string()
  })
  .passthrough();

export const RateExportSchema = z.array(RateRecordSchema);

export type RateRecord = z.infer<typeof RateRecordSchema>;

export interface RateFilter {
  sector: string;
  country: string;
}

export const DEFAULT_RATE_FILTER: RateFilter = { sector: "Commercial", country: "USA" };

function dateText(value: z.infer<typeof MongoDateSchema> | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === "string" ? value : value.$date;
}

function lastRevisionDate(record: RateRecord): string | null {
  const revisions = record.revisions ?? [];
  const last = revisions[revisions.length - 1];
  return last ? dateText(last.date) : null;
}

function compareEiaId(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Keeps records of the given sector and country, one per EIA id (the first
 * seen), ordered by EIA id.
 */
export function buildSourceEntries(records: RateRecord[], filter: RateFilter = DEFAULT_RATE_FILTER): SourceEntry[] {
  const byEiaId = new Map<string, RateRecord>();
  for (const record of records) {
    if (record.sector !== filter.sector || record.country !== filter.country) continue;
    const key = `${typeof record.eiaId}:${record.eiaId}`;
    if (!byEiaId.has(key)) byEiaId.set(key, record);
  }

  return [...byEiaId.values()]
    .sort((a, b) => compareEiaId(a.eiaId, b.eiaId))
    .map((record) => ({
      utilityName: record.utilityName,
      eiaId: record.eiaId,
      sector: record.sector,
      rateName: record.rateName,
      effectiveDate: dateText(record.effectiveDate),
      lastRevision: lastRevisionDate(record),
      sourceReference: record.sourceReference
    }));
}
