import { z } from "zod";
import type { FetchLike } from "../capture/http";
import { LlmProvider, LlmRequest, LlmResponse } from "./provider";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_TIMEOUT_MS = 60000;

export interface OpenAiConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
    .default([]),
  usage: z.object({ total_tokens: z.number().optional() }).optional()
});

export class OpenAiProvider implements LlmProvider {
  name = "openai";
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(config: OpenAiConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async invoke(request: LlmRequest): Promise<LlmResponse> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: request.messages
    };
    if (typeof request.temperature === "number") {
      body.temperature = request.temperature;
    }
    if (request.jsonMode) {
      body.response_format = { type: "json_object" };
    }

    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenAI request failed (${response.status}): ${errorText}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected OpenAI response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    const data = parsed.data;
    const content = data.choices[0]?.message?.content;
    if (!content) {
      throw new Error("OpenAI response missing message content");
    }

    return {
      model: data.model ?? request.model,
      content,
      totalTokens: data.usage?.total_tokens ?? null
    };
  }
}
