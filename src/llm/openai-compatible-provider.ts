import OpenAI from 'openai';
import type { ProviderName } from '../config/schema.js';
import type { LLMProvider, LLMMessage, CompletionRequest, CompletionResult } from './types.js';
import * as log from '../utils/logger.js';

const PROVIDER_DEFAULTS: Record<ProviderName, { apiBase: string; extraHeaders?: Record<string, string> }> = {
  openai: {
    apiBase: 'https://api.openai.com/v1',
  },
  openrouter: {
    apiBase: 'https://openrouter.ai/api/v1',
    extraHeaders: {
      'X-Title': 'Sannu Bot',
    },
  },
  deepseek: {
    apiBase: 'https://api.deepseek.com/v1',
  },
  groq: {
    apiBase: 'https://api.groq.com/openai/v1',
  },
};

/** Base URL for a provider: explicit apiBase wins over the provider's default. */
export function resolveApiBase(provider: ProviderName, apiBase?: string): string {
  return apiBase ?? PROVIDER_DEFAULTS[provider].apiBase;
}

export interface OpenAICompatibleProviderOptions {
  name: string;
  apiKey: string;
  apiBase: string;
  timeoutMs: number;
  extraHeaders?: Record<string, string>;
  /** Replaces the global fetch, e.g. with an in-process endpoint. */
  fetch?: typeof fetch;
}

/**
 * Chat-completion provider on the official OpenAI SDK.
 * Works with OpenAI, OpenRouter, DeepSeek, Groq and any OpenAI-compatible API.
 *
 * One attempt per request: SDK retries are off and every failure
 * comes back as a `CompletionResult` instead of a thrown error.
 */
export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private client: OpenAI;

  constructor(opts: OpenAICompatibleProviderOptions) {
    this.name = opts.name;
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.apiBase,
      defaultHeaders: opts.extraHeaders,
      timeout: opts.timeoutMs,
      maxRetries: 0,
      fetch: opts.fetch,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const messages: LLMMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.userText });

    log.debug(`LLM [${this.name}]: model=${request.model}, chars=${request.userText.length}`);

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: request.model,
        messages,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        n: 1,
      });
    } catch (err) {
      return { ok: false, reason: describeError(this.name, err) };
    }

    // The SDK does not validate the body; a 2xx reply may be any JSON value.
    const content = firstChoiceContent(response);
    if (typeof content !== 'string') {
      return { ok: false, reason: `No message content in ${this.name} response` };
    }

    const text = content.trim();
    if (!text) {
      return { ok: false, reason: `Empty message content in ${this.name} response` };
    }

    log.debug(`LLM [${this.name}]: chars=${text.length}`);
    return { ok: true, text };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstChoiceContent(body: unknown): unknown {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const choice: unknown = body.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return undefined;
  return choice.message.content;
}

function describeError(name: string, err: unknown): string {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return `${name} request timed out`;
  }
  if (err instanceof OpenAI.APIError && err.status !== undefined) {
    return `${name} responded ${err.status}: ${err.message}`;
  }
  return `${name} request failed: ${log.errorMessage(err)}`;
}

/** Create the provider for the configured completion section. */
export function createProvider(opts: {
  provider: ProviderName;
  apiKey: string;
  apiBase?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}): LLMProvider {
  return new OpenAICompatibleProvider({
    name: opts.provider,
    apiKey: opts.apiKey,
    apiBase: resolveApiBase(opts.provider, opts.apiBase),
    timeoutMs: opts.timeoutMs,
    extraHeaders: PROVIDER_DEFAULTS[opts.provider].extraHeaders,
    fetch: opts.fetch,
  });
}
