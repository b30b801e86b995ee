import path from "path";
import { loadSourceList } from "../config/registry";
import { getDb, closePool, PgDocumentStore } from "../db";
import { createCandidateResolver } from "../discovery/candidateLinks";
import { ConfigError, describeError } from "../errors";
import { LlmDocumentSelector } from "../llm/selectDocuments";
import { OpenAiProvider } from "../llm/openai";
import { runBatch } from "../monitor/runBatch";
import { renderReport } from "../report/renderReport";
import type { DocumentStore } from "../store/documentStore";
import { MemoryDocumentStore } from "../store/memoryDocumentStore";
import { runTotals } from "../run/runRecord";
import { writeText } from "../utils/fs";

export interface CheckOptions {
  sourcesPath: string;
  outDir: string;
  quick: boolean;
  initialize: boolean;
  dryRun: boolean;
  model: string;
  apiKeyEnv: string;
  concurrency: number;
  timeoutMs: number;
  attempts: number;
  maxBytes: number;
  contentTypes: string[];
}

export function reportPath(outDir: string, sourceListName: string): string {
  return path.join(outDir, `${sourceListName}.report.md`);
}

export async function runCheck(options: CheckOptions): Promise<void> {
  const apiKey = process.env[options.apiKeyEnv];
  if (!apiKey) {
    throw new ConfigError(`Missing API key in env var ${options.apiKeyEnv}`);
  }

  const sourceList = await loadSourceList(options.sourcesPath);
  const store: DocumentStore = options.dryRun ? new MemoryDocumentStore() : new PgDocumentStore(getDb());

  try {
    if (options.initialize) {
      await store.initialize();
      console.log("Document store schema ensured.");
    }

    const provider = new OpenAiProvider({ apiKey, baseUrl: process.env.OPENAI_BASE_URL });
    const record = await runBatch({
      sourceListName: sourceList.name,
      sources: sourceList.sources,
      store,
      resolver: createCandidateResolver({ attempts: options.attempts }),
      selector: new LlmDocumentSelector({ provider, model: options.model }),
      quickMode: options.quick,
      concurrency: options.concurrency,
      detect: {
        fingerprint: {
          timeoutMs: options.timeoutMs,
          attempts: options.attempts,
          maxBytes: options.maxBytes,
          acceptContentTypes: options.contentTypes
        }
      }
    });

    const outPath = reportPath(path.resolve(options.outDir), sourceList.name);
    await writeText(outPath, renderReport(record));

    const totals = runTotals(record);
    console.log(
      `Checked ${totals.sources} sources: ${totals.added} added, ${totals.updated} updated, ${totals.superseded} superseded, ${totals.errors} errors.`
    );
    console.log(`Wrote report to ${outPath}`);
  } finally {
    if (!options.dryRun) {
      await closePool().catch((error) => console.warn(`Failed to close database pool: ${describeError(error)}`));
    }
  }
}
