export type LlmRole = "system" | "user";

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

export interface LlmRequest {
  model: string;
  messages: LlmMessage[];
  temperature?: number;
  /** Ask the model for a single JSON object. */
  jsonMode?: boolean;
}

export interface LlmResponse {
  model: string;
  content: string;
  totalTokens: number | null;
}

export interface LlmProvider {
  name: string;
  invoke(request: LlmRequest): Promise<LlmResponse>;
}
