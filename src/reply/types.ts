export interface InboundMessage {
  text: string;
  senderDisplayName: string;
  chatId?: string;
}

export interface ResolverConfig {
  /** Completion is attempted only when this is set. */
  completionApiKey?: string;
  /** Base URL of the OpenAI-compatible API. */
  completionEndpoint: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  systemPrompt: string;
  maxReplyLength: number;
  truncationMarker: string;
  fallbackKeywords: readonly string[];
}

export interface ResolveHooks {
  /** Called once right before the completion call. Best-effort: failures are ignored. */
  beforeCompletion?: () => Promise<unknown>;
}
