import type { DocumentStatus } from "./trackedDocument";

export type CheckMode = "probe" | "fetch";

export type RecordState = "added" | "updated" | "unchanged";

export interface TrackedSelection {
  kind: "tracked";
  url: string;
  rationale: string;
  changed: boolean;
  recordState: RecordState;
  status: DocumentStatus;
  fingerprint: string;
  remoteModifiedAt: Date | null;
  checkMode: CheckMode;
}

export interface FailedSelection {
  kind: "failed";
  url: string;
  rationale: string;
  failure: string;
}

export type SelectionOutcome = TrackedSelection | FailedSelection;

export interface SourceOutcome {
  sourceName: string;
  sourceUrl: string;
  candidatesFound: number;
  candidatesSelected: number;
  rationale: string;
  selections: SelectionOutcome[];
  superseded: string[];
  addedCount: number;
  updatedCount: number;
  errorCount: number;
  errors: string[];
}

export interface RunRecord {
  sourceListName: string;
  quickMode: boolean;
  startedAt: Date;
  endedAt: Date | null;
  sources: SourceOutcome[];
}
