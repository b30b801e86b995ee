import { runTotals } from "../run/runRecord";
import type { RunRecord, SelectionOutcome, SourceOutcome } from "../types/runRecord";
import { normalizeWhitespace, truncate } from "../utils/text";
import { toUtcIsoSeconds } from "../utils/time";

export const RATIONALE_PREVIEW_MAX = 80;
const ELLIPSIS = "...";

function escapeCell(text: string): string {
  return normalizeWhitespace(text).replace(/\|/g, "\\|");
}

function formatDate(value: Date | null, fallback: string): string {
  return value ? toUtcIsoSeconds(value) : fallback;
}

export function sourceAnchor(ordinal: number): string {
  return `source-${ordinal}`;
}

export function rationalePreview(rationale: string): string {
  return truncate(normalizeWhitespace(rationale), RATIONALE_PREVIEW_MAX, ELLIPSIS);
}

function summaryRow(source: SourceOutcome, ordinal: number): string {
  const cells = [
    String(ordinal),
    `[${escapeCell(source.sourceName)}](#${sourceAnchor(ordinal)})`,
    String(source.candidatesFound),
    String(source.candidatesSelected),
    escapeCell(rationalePreview(source.rationale)),
    String(source.addedCount),
    String(source.updatedCount),
    String(source.errorCount)
  ];
  return `| ${cells.join(" | ")} |`;
}

function selectionLines(selection: SelectionOutcome): string[] {
  const rationale = normalizeWhitespace(selection.rationale) || "n/a";
  if (selection.kind === "failed") {
    return [`- ${selection.url} (failed)`, `  - rationale: ${rationale}`, `  - error: ${selection.failure}`];
  }
  return [
    `- ${selection.url}`,
    `  - rationale: ${rationale}`,
    `  - changed: ${selection.changed ? "yes" : "no"} | status: ${selection.status} | remote modified: ${formatDate(
      selection.remoteModifiedAt,
      "unknown"
    )} | check: ${selection.checkMode}`,
    `  - record: ${selection.recordState} | hash: ${selection.fingerprint}`
  ];
}

function detailSection(source: SourceOutcome, ordinal: number): string[] {
  const lines: string[] = [];
  lines.push(`<a id="${sourceAnchor(ordinal)}"></a>`);
  lines.push(`## ${ordinal}. ${source.sourceName}`);
  lines.push("");
  lines.push(`- Source page: ${source.sourceUrl}`);
  lines.push(`- Candidates found: ${source.candidatesFound} | selected: ${source.candidatesSelected}`);
  lines.push(`- Rationale: ${normalizeWhitespace(source.rationale) || "n/a"}`);
  lines.push("");

  if (source.selections.length) {
    lines.push("### Selected documents");
    lines.push("");
    for (const selection of source.selections) {
      lines.push(...selectionLines(selection));
    }
  } else {
    lines.push("No documents selected.");
  }
  lines.push("");

  if (source.superseded.length) {
    lines.push("### Superseded");
    lines.push("");
    for (const url of source.superseded) {
      lines.push(`- ${url} (OBSOLETE)`);
    }
    lines.push("");
  }

  if (source.errors.length) {
    lines.push("### Errors");
    lines.push("");
    for (const error of source.errors) {
      lines.push(`- ${error}`);
    }
    lines.push("");
  }

  return lines;
}

/** Markdown summary of a finished run. Reads the record only. */
export function renderReport(record: RunRecord): string {
  const totals = runTotals(record);
  const lines: string[] = [];

  lines.push(`# Tariff Watch Report: ${record.sourceListName}`);
  lines.push("");
  lines.push(
    `Run: ${formatDate(record.startedAt, "unknown")} to ${formatDate(record.endedAt, "in progress")} | mode: ${
      record.quickMode ? "quick" : "full"
    }`
  );
  lines.push("");
  lines.push(
    `Totals: ${totals.sources} sources | ${totals.candidatesFound} candidates | ${totals.candidatesSelected} selected | ${totals.added} added | ${totals.updated} updated | ${totals.superseded} superseded | ${totals.errors} errors`
  );
  lines.push("");
  lines.push("## Summary");
  lines.push("");
  lines.push("| # | Source | Candidates | Selected | Rationale | Added | Updated | Errors |");
  lines.push("|---|---|---|---|---|---|---|---|");
  record.sources.forEach((source, index) => {
    lines.push(summaryRow(source, index + 1));
  });
  lines.push("");

  record.sources.forEach((source, index) => {
    lines.push(...detailSection(source, index + 1));
  });

  return lines.join("\n").replace(/\n+$/, "") + "\n";
}
