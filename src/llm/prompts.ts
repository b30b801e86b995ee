import type { Candidate } from "../types/collaborators";

export const SELECTION_SYSTEM_PROMPT = `You are a document triage assistant for an electric utility tariff monitor.
You receive the PDF links found on one utility's rates page, each with its link text and nearby context.

Pick the links that are the utility's current commercial tariff or rate schedule documents.
Look for words like "commercial", "tariff", "rates", "rate schedule", "general service".
Skip residential-only schedules, forms, applications, newsletters, archived or superseded versions.

Hard rules:
- Output MUST be a single JSON object. No markdown, no commentary.
- Only return URLs copied exactly from the list. Never invent or edit a URL.
- If nothing qualifies, return an empty "selected" array and explain why in "overall_rationale".

Output schema:
{
  "selected": [
    { "url": string, "rationale": string }
  ],
  "overall_rationale": string
}`;

export interface SelectionMessageParams {
  sourceName: string;
  candidates: Candidate[];
}

export function buildSelectionMessage(params: SelectionMessageParams): string {
  const links = params.candidates
    .map(
      (candidate, index) =>
        `${index + 1}. TEXT: ${candidate.linkText || "(none)"}\n   CONTEXT: ${candidate.context || "(none)"}\n   URL: ${candidate.url}`
    )
    .join("\n");

  return `Utility: ${params.sourceName}\n\nLINKS:\n<<<\n${links}\n>>>`;
}
