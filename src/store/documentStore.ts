import type { TrackedDocument } from "../types/trackedDocument";

export interface UpsertDocumentInput {
  sourceName: string;
  url: string;
  displayName: string;
  fingerprint: string;
  checkedAt: Date;
  /** Written to contentUpdatedAt when present; an absent value leaves the stored one alone. */
  remoteModifiedAt: Date | null;
  linkContext: string | null;
  /** Bring an OBSOLETE row back to ACTIVE. */
  reactivate?: boolean;
}

export interface UpsertResult {
  document: TrackedDocument;
  isNewRecord: boolean;
  fingerprintChanged: boolean;
  reactivated: boolean;
}

export interface DocumentStore {
  initialize(): Promise<void>;
  findByUrl(url: string): Promise<TrackedDocument | null>;
  upsert(input: UpsertDocumentInput): Promise<UpsertResult>;
  markObsolete(url: string): Promise<TrackedDocument | null>;
  /** Marks every ACTIVE row of `sourceName` outside `keepUrls` OBSOLETE and returns their URLs. */
  supersede(sourceName: string, keepUrls: readonly string[]): Promise<string[]>;
  listBySource(sourceName: string): Promise<TrackedDocument[]>;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function displayNameFor(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // not absolute; use as given
  }
  const lastSegment = pathname.split("/").pop() ?? "";
  return safeDecode(lastSegment) || "unknown.pdf";
}
