import pLimit from "p-limit";
import type { SourceConfig } from "../config/sourceList";
import type { DetectOptions } from "../detect/changeDetector";
import { appendSourceOutcome, createRunRecord, finishRunRecord } from "../run/runRecord";
import type { DocumentStore } from "../store/documentStore";
import type { CandidateResolver, DocumentSelector } from "../types/collaborators";
import type { RunRecord, SourceOutcome } from "../types/runRecord";
import { LogFn, processSource } from "./processSource";

export interface RunBatchParams {
  sourceListName: string;
  sources: SourceConfig[];
  store: DocumentStore;
  resolver: CandidateResolver;
  selector: DocumentSelector;
  quickMode: boolean;
  detect?: Omit<DetectOptions, "quickMode">;
  concurrency?: number;
  log?: LogFn;
  now?: () => Date;
}

/**
 * Processes every source and returns the finished RunRecord. Outcomes are
 * appended in source-list order whatever order they complete in.
 */
export async function runBatch(params: RunBatchParams): Promise<RunRecord> {
  const now = params.now ?? (() => new Date());
  const limit = pLimit(Math.max(1, params.concurrency ?? 1));
  const detect: DetectOptions = { ...params.detect, quickMode: params.quickMode };

  let record = createRunRecord({
    sourceListName: params.sourceListName,
    quickMode: params.quickMode,
    startedAt: now()
  });

  let outcomes: SourceOutcome[];
  try {
    outcomes = await Promise.all(
      params.sources.map((source) =>
        limit(() =>
          processSource({
            source,
            store: params.store,
            resolver: params.resolver,
            selector: params.selector,
            detect,
            log: params.log,
            now
          })
        )
      )
    );
  } catch (error) {
    limit.clearQueue();
    throw error;
  }

  for (const outcome of outcomes) {
    record = appendSourceOutcome(record, outcome);
  }
  return finishRunRecord(record, now());
}
