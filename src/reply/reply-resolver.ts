import type { BotConfig } from '../config/schema.js';
import { resolveApiBase } from '../llm/openai-compatible-provider.js';
import type { LLMProvider, CompletionRequest } from '../llm/types.js';
import type { InboundMessage, ResolverConfig, ResolveHooks } from './types.js';
import { fallbackReply } from './fallback.js';
import { truncateReply } from './truncate.js';
import * as log from '../utils/logger.js';

export function toResolverConfig(config: BotConfig): Readonly<ResolverConfig> {
  const { completion, reply } = config;
  return Object.freeze({
    completionApiKey: completion.apiKey || undefined,
    completionEndpoint: resolveApiBase(completion.provider, completion.apiBase),
    model: completion.model,
    maxTokens: completion.maxTokens,
    temperature: completion.temperature,
    timeoutMs: completion.timeoutMs,
    systemPrompt: completion.systemPrompt,
    maxReplyLength: reply.maxLength,
    truncationMarker: reply.truncationMarker,
    fallbackKeywords: Object.freeze([...reply.fallbackKeywords]),
  });
}

/**
 * ReplyResolver: turns one inbound text into exactly one outbound reply.
 *
 * With a completion key and provider it makes a single completion attempt;
 * anything short of usable text routes to the local fallback responder.
 * Holds no per-message state, so concurrent calls are independent.
 */
export class ReplyResolver {
  private config: Readonly<ResolverConfig>;
  private provider: LLMProvider | undefined;

  constructor(config: Readonly<ResolverConfig>, provider?: LLMProvider) {
    this.config = config;
    this.provider = provider;
  }

  /** True when replies may come from the completion service. */
  get completionEnabled(): boolean {
    return Boolean(this.config.completionApiKey && this.provider);
  }

  async resolve(msg: InboundMessage, hooks: ResolveHooks = {}): Promise<string> {
    const { maxReplyLength, truncationMarker } = this.config;

    if (this.config.completionApiKey && this.provider) {
      await this.notify(hooks);

      const result = await this.provider.complete(this.buildRequest(msg.text));
      if (result.ok) {
        return truncateReply(result.text, maxReplyLength, truncationMarker);
      }
      log.warn(`Completion unavailable, falling back to local responder: ${result.reason}`);
    }

    const reply = fallbackReply(msg, this.config.fallbackKeywords);
    return truncateReply(reply, maxReplyLength, truncationMarker);
  }

  buildRequest(userText: string): CompletionRequest {
    return {
      systemPrompt: this.config.systemPrompt || undefined,
      userText,
      model: this.config.model,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };
  }

  private async notify(hooks: ResolveHooks): Promise<void> {
    if (!hooks.beforeCompletion) return;
    try {
      await hooks.beforeCompletion();
    } catch (err) {
      log.debug(`beforeCompletion hook failed: ${log.errorMessage(err)}`);
    }
  }
}
