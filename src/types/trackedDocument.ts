export const DOCUMENT_STATUSES = ["ACTIVE", "OBSOLETE"] as const;

export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export interface TrackedDocument {
  id: number;
  sourceName: string;
  url: string;
  displayName: string;
  fingerprint: string | null;
  lastChecked: Date | null;
  contentUpdatedAt: Date | null;
  status: DocumentStatus;
  linkContext: string | null;
}

export function isDocumentStatus(value: string): value is DocumentStatus {
  return (DOCUMENT_STATUSES as readonly string[]).includes(value);
}
