import type { SourceConfig } from "../config/sourceList";
import type { DetectOptions } from "../detect/changeDetector";
import { describeError } from "../errors";
import {
  createSourceOutcome,
  recordFetchFailure,
  recordSelection,
  recordSourceFailure,
  recordStateFor,
  withSuperseded
} from "../run/runRecord";
import type { DocumentStore, UpsertResult } from "../store/documentStore";
import type {
  Candidate,
  CandidateResolver,
  DocumentSelector,
  SelectedDocument,
  Selection
} from "../types/collaborators";
import type { SourceOutcome } from "../types/runRecord";
import { trackDocument } from "./trackDocument";

export type LogFn = (message: string) => void;

export interface ProcessSourceParams {
  source: SourceConfig;
  store: DocumentStore;
  resolver: CandidateResolver;
  selector: DocumentSelector;
  detect: DetectOptions;
  log?: LogFn;
  now?: () => Date;
}

function uniqueByUrl(selected: SelectedDocument[]): SelectedDocument[] {
  const seen = new Set<string>();
  return selected.filter((entry) => {
    if (seen.has(entry.url)) return false;
    seen.add(entry.url);
    return true;
  });
}

function linkContextFor(candidate: Candidate | undefined): string | null {
  if (!candidate) return null;
  return candidate.linkText || candidate.context || null;
}

/**
 * A row the source did not already hold as ACTIVE: inserted, brought back from
 * OBSOLETE, or owned by another source. Ownership of a shared URL stays with
 * the source that first recorded it.
 */
function introducesDocument(upsert: UpsertResult, sourceName: string): boolean {
  return upsert.isNewRecord || upsert.reactivated || upsert.document.sourceName !== sourceName;
}

/**
 * Resolves, selects and tracks the documents of one source. Resolver, selector
 * and fetch failures are counted on the outcome; StoreFailure is rethrown.
 */
export async function processSource(params: ProcessSourceParams): Promise<SourceOutcome> {
  const { source, store } = params;
  const log = params.log ?? console.log;
  let outcome = createSourceOutcome({ sourceName: source.name, sourceUrl: source.url });

  let candidates: Candidate[] = [];
  try {
    candidates = await params.resolver(source.url);
  } catch (error) {
    log(`[${source.name}] candidate resolution failed: ${describeError(error)}`);
    outcome = recordSourceFailure(outcome, describeError(error));
  }
  log(`[${source.name}] found ${candidates.length} candidate links`);

  let selection: Selection = { selected: [], overallRationale: "" };
  if (candidates.length) {
    try {
      selection = await params.selector.select(source.name, candidates);
    } catch (error) {
      log(`[${source.name}] selection failed: ${describeError(error)}`);
      outcome = recordSourceFailure(outcome, describeError(error));
    }
  }

  const selectedDocuments = uniqueByUrl(selection.selected);
  outcome = {
    ...outcome,
    candidatesFound: candidates.length,
    candidatesSelected: selectedDocuments.length,
    rationale: selection.overallRationale
  };

  const byUrl = new Map(candidates.map((candidate) => [candidate.url, candidate]));
  let introducedActive = false;

  for (const selected of selectedDocuments) {
    const result = await trackDocument({
      store,
      sourceName: source.name,
      url: selected.url,
      linkContext: linkContextFor(byUrl.get(selected.url)),
      detect: params.detect,
      now: params.now
    });

    if (result.kind === "failed") {
      log(`[${source.name}] ${selected.url}: ${result.failure.describe()}`);
      outcome = recordFetchFailure(outcome, {
        url: selected.url,
        rationale: selected.rationale,
        failure: result.failure.describe()
      });
      continue;
    }

    if (introducesDocument(result.upsert, source.name)) {
      introducedActive = true;
    }
    const note = result.detection.probeNote ? ` (quick check: ${result.detection.probeNote})` : "";
    log(`[${source.name}] ${selected.url}: ${recordStateFor(result.upsert)} via ${result.detection.checkMode}${note}`);
    outcome = recordSelection(outcome, {
      url: selected.url,
      rationale: selected.rationale,
      detection: result.detection,
      upsert: result.upsert
    });
  }

  // A replacement only supersedes once it has been fetched and recorded.
  // Every selected URL is kept, including ones whose fetch failed this run.
  if (introducedActive) {
    const superseded = await store.supersede(
      source.name,
      selectedDocuments.map((selected) => selected.url)
    );
    for (const url of superseded) {
      log(`[${source.name}] ${url}: marked OBSOLETE`);
    }
    outcome = withSuperseded(outcome, superseded);
  }

  return outcome;
}
