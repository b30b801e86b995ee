import { z } from "zod";

// One entry of the utility-rate export (see resources/sample_sources.json).
const SourceEntrySchema = z
  .object({
    utilityName: z.string().trim().min(1),
    sourceReference: z.string().url(),
    eiaId: z.union([z.number(), z.string()]).optional(),
    sector: z.string().optional(),
    rateName: z.string().optional(),
    effectiveDate: z.string().nullable().optional(),
    lastRevision: z.string().nullable().optional()
  })
  .passthrough();

export const SourceListSchema = z.array(SourceEntrySchema);

export type SourceEntry = z.infer<typeof SourceEntrySchema>;

export interface SourceConfig {
  name: string;
  url: string;
}

export function toSourceConfig(entry: SourceEntry): SourceConfig {
  return { name: entry.utilityName, url: entry.sourceReference };
}
