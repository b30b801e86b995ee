import { z } from "zod";
import { describeError, SelectorFailure } from "../errors";
import type { Candidate, DocumentSelector, Selection, SelectedDocument } from "../types/collaborators";
import { buildSelectionMessage, SELECTION_SYSTEM_PROMPT } from "./prompts";
import type { LlmProvider } from "./provider";

export const SelectionResponseSchema = z.object({
  selected: z
    .array(
      z.object({
        url: z.string().min(1),
        rationale: z.string().default("")
      })
    )
    .default([]),
  overall_rationale: z.string().default("")
});

export interface LlmSelectorOptions {
  provider: LlmProvider;
  model: string;
  temperature?: number;
}

function stripCodeFence(content: string): string {
  const fenced = content.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : content.trim();
}

/**
 * Validates a model reply. URLs the model made up or repeated are dropped;
 * anything that is not the expected JSON object is a SelectorFailure.
 */
export function parseSelectionResponse(
  sourceName: string,
  content: string,
  candidates: Candidate[]
): Selection {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(content));
  } catch (error) {
    throw new SelectorFailure(sourceName, `model output is not JSON (${describeError(error)})`, error);
  }

  const parsed = SelectionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SelectorFailure(sourceName, `model output failed validation: ${issues}`);
  }

  const known = new Set(candidates.map((candidate) => candidate.url));
  const seen = new Set<string>();
  const selected: SelectedDocument[] = [];
  for (const entry of parsed.data.selected) {
    const url = entry.url.trim();
    if (!known.has(url) || seen.has(url)) continue;
    seen.add(url);
    selected.push({ url, rationale: entry.rationale.trim() });
  }

  return { selected, overallRationale: parsed.data.overall_rationale.trim() };
}

export class LlmDocumentSelector implements DocumentSelector {
  constructor(private readonly options: LlmSelectorOptions) {}

  async select(sourceName: string, candidates: Candidate[]): Promise<Selection> {
    if (!candidates.length) {
      return { selected: [], overallRationale: "No candidate links found." };
    }

    let content: string;
    try {
      const response = await this.options.provider.invoke({
        model: this.options.model,
        temperature: this.options.temperature,
        jsonMode: true,
        messages: [
          { role: "system", content: SELECTION_SYSTEM_PROMPT },
          { role: "user", content: buildSelectionMessage({ sourceName, candidates }) }
        ]
      });
      content = response.content;
    } catch (error) {
      throw new SelectorFailure(sourceName, describeError(error), error);
    }

    return parseSelectionResponse(sourceName, content, candidates);
  }
}
