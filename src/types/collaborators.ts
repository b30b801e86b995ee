export interface Candidate {
  url: string;
  linkText: string;
  context: string;
}

export interface SelectedDocument {
  url: string;
  rationale: string;
}

export interface Selection {
  selected: SelectedDocument[];
  overallRationale: string;
}

export type CandidateResolver = (sourcePageUrl: string) => Promise<Candidate[]>;

export interface DocumentSelector {
  select(sourceName: string, candidates: Candidate[]): Promise<Selection>;
}
