export type LLMMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export interface CompletionRequest {
  systemPrompt?: string;
  userText: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

/** Outcome of a single completion attempt. Failures carry a reason for the log, never for the user. */
export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; reason: string };

export interface LLMProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
