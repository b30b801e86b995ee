import type { DetectionResult } from "../detect/changeDetector";
import type { UpsertResult } from "../store/documentStore";
import type { RecordState, RunRecord, SourceOutcome } from "../types/runRecord";

// Every function here returns a new value; callers thread the record through.

export interface RunRecordParams {
  sourceListName: string;
  quickMode: boolean;
  startedAt: Date;
}

export function createRunRecord(params: RunRecordParams): RunRecord {
  return {
    sourceListName: params.sourceListName,
    quickMode: params.quickMode,
    startedAt: params.startedAt,
    endedAt: null,
    sources: []
  };
}

export interface SourceOutcomeParams {
  sourceName: string;
  sourceUrl: string;
  candidatesFound?: number;
  candidatesSelected?: number;
  rationale?: string;
}

export function createSourceOutcome(params: SourceOutcomeParams): SourceOutcome {
  return {
    sourceName: params.sourceName,
    sourceUrl: params.sourceUrl,
    candidatesFound: params.candidatesFound ?? 0,
    candidatesSelected: params.candidatesSelected ?? 0,
    rationale: params.rationale ?? "",
    selections: [],
    superseded: [],
    addedCount: 0,
    updatedCount: 0,
    errorCount: 0,
    errors: []
  };
}

function alreadyRecorded(outcome: SourceOutcome, url: string): boolean {
  return outcome.selections.some((selection) => selection.url === url);
}

export function recordStateFor(upsert: Pick<UpsertResult, "isNewRecord" | "fingerprintChanged">): RecordState {
  if (upsert.isNewRecord) return "added";
  return upsert.fingerprintChanged ? "updated" : "unchanged";
}

export interface TrackedSelectionParams {
  url: string;
  rationale: string;
  detection: DetectionResult;
  upsert: UpsertResult;
}

export function recordSelection(outcome: SourceOutcome, params: TrackedSelectionParams): SourceOutcome {
  if (alreadyRecorded(outcome, params.url)) return outcome;
  const recordState = recordStateFor(params.upsert);
  return {
    ...outcome,
    selections: [
      ...outcome.selections,
      {
        kind: "tracked",
        url: params.url,
        rationale: params.rationale,
        changed: params.detection.changed,
        recordState,
        status: params.upsert.document.status,
        fingerprint: params.detection.fingerprint,
        remoteModifiedAt: params.detection.remoteModifiedAt,
        checkMode: params.detection.checkMode
      }
    ],
    addedCount: outcome.addedCount + (recordState === "added" ? 1 : 0),
    updatedCount: outcome.updatedCount + (recordState === "updated" ? 1 : 0)
  };
}

export interface FailedSelectionParams {
  url: string;
  rationale: string;
  failure: string;
}

export function recordFetchFailure(outcome: SourceOutcome, params: FailedSelectionParams): SourceOutcome {
  if (alreadyRecorded(outcome, params.url)) return outcome;
  return {
    ...outcome,
    selections: [
      ...outcome.selections,
      { kind: "failed", url: params.url, rationale: params.rationale, failure: params.failure }
    ],
    errorCount: outcome.errorCount + 1
  };
}

/** Resolver and selector failures: the source continues with nothing selected. */
export function recordSourceFailure(outcome: SourceOutcome, message: string): SourceOutcome {
  return {
    ...outcome,
    errors: [...outcome.errors, message],
    errorCount: outcome.errorCount + 1
  };
}

export function withSuperseded(outcome: SourceOutcome, urls: readonly string[]): SourceOutcome {
  const fresh = urls.filter((url) => !outcome.superseded.includes(url));
  if (!fresh.length) return outcome;
  return { ...outcome, superseded: [...outcome.superseded, ...fresh] };
}

export function appendSourceOutcome(record: RunRecord, outcome: SourceOutcome): RunRecord {
  return { ...record, sources: [...record.sources, outcome] };
}

export function finishRunRecord(record: RunRecord, endedAt: Date): RunRecord {
  return { ...record, endedAt };
}

export interface RunTotals {
  sources: number;
  candidatesFound: number;
  candidatesSelected: number;
  added: number;
  updated: number;
  superseded: number;
  errors: number;
}

export function runTotals(record: RunRecord): RunTotals {
  return record.sources.reduce<RunTotals>(
    (totals, source) => ({
      sources: totals.sources + 1,
      candidatesFound: totals.candidatesFound + source.candidatesFound,
      candidatesSelected: totals.candidatesSelected + source.candidatesSelected,
      added: totals.added + source.addedCount,
      updated: totals.updated + source.updatedCount,
      superseded: totals.superseded + source.superseded.length,
      errors: totals.errors + source.errorCount
    }),
    { sources: 0, candidatesFound: 0, candidatesSelected: 0, added: 0, updated: 0, superseded: 0, errors: 0 }
  );
}
