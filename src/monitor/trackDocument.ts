import { detectChange, DetectionResult, DetectOptions } from "../detect/changeDetector";
import { FetchFailure } from "../errors";
import { displayNameFor, DocumentStore, UpsertResult } from "../store/documentStore";

export interface TrackDocumentParams {
  store: DocumentStore;
  sourceName: string;
  url: string;
  linkContext: string | null;
  detect: DetectOptions;
  now?: () => Date;
}

export type TrackOutcome =
  | { kind: "tracked"; detection: DetectionResult; upsert: UpsertResult }
  | { kind: "failed"; failure: FetchFailure };

/**
 * Detects and records one selected URL. Fetch failures come back as a value;
 * store failures propagate.
 */
export async function trackDocument(params: TrackDocumentParams): Promise<TrackOutcome> {
  const prior = await params.store.findByUrl(params.url);

  let detection: DetectionResult;
  try {
    detection = await detectChange(params.url, prior, params.detect);
  } catch (error) {
    if (error instanceof FetchFailure) {
      return { kind: "failed", failure: error };
    }
    throw error;
  }

  const upsert = await params.store.upsert({
    sourceName: params.sourceName,
    url: params.url,
    displayName: prior?.displayName || displayNameFor(params.url),
    fingerprint: detection.fingerprint,
    checkedAt: (params.now ?? (() => new Date()))(),
    remoteModifiedAt: detection.remoteModifiedAt,
    linkContext: params.linkContext,
    reactivate: true
  });

  return { kind: "tracked", detection, upsert };
}
