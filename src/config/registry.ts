import path from "path";
import { ConfigError } from "../errors";
import { readJson } from "../utils/fs";
import { SourceConfig, SourceListSchema, toSourceConfig } from "./sourceList";

export interface SourceList {
  name: string;
  path: string;
  sources: SourceConfig[];
}

export function sourceListName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/** Parses a source list; duplicate (name, url) pairs keep their first position. */
export function parseSourceList(data: unknown, label: string): SourceConfig[] {
  const parsed = SourceListSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid source list ${label}: ${issues}`);
  }

  const seen = new Set<string>();
  const sources: SourceConfig[] = [];
  for (const entry of parsed.data) {
    const source = toSourceConfig(entry);
    const key = `${source.name}\n${source.url}`;
    if (seen.has(key)) continue;
    seen.add(key);
    sources.push(source);
  }
  return sources;
}

export async function loadSourceList(filePath: string): Promise<SourceList> {
  const resolved = path.resolve(filePath);
  let data: unknown;
  try {
    data = await readJson(resolved);
  } catch (error) {
    throw new ConfigError(
      `Cannot read source list ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return {
    name: sourceListName(resolved),
    path: resolved,
    sources: parseSourceList(data, resolved)
  };
}
