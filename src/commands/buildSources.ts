import path from "path";
import { buildSourceEntries, RateExportSchema, RateFilter } from "../config/rateExport";
import { ConfigError } from "../errors";
import { readJson, writeText } from "../utils/fs";

export interface BuildSourcesOptions {
  ratesPath: string;
  outPath?: string;
  filter: RateFilter;
}

export async function runBuildSources(options: BuildSourcesOptions): Promise<void> {
  const ratesPath = path.resolve(options.ratesPath);
  const parsed = RateExportSchema.safeParse(await readJson(ratesPath));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid rate export ${ratesPath}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown error"}`
    );
  }

  const entries = buildSourceEntries(parsed.data, options.filter);
  const json = JSON.stringify(entries, null, 2);
  if (options.outPath) {
    const outPath = path.resolve(options.outPath);
    await writeText(outPath, json + "\n");
    console.log(`Wrote ${entries.length} sources to ${outPath}`);
  } else {
    console.log(json);
  }
}
