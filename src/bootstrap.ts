/**
 * Shared bootstrap: builds the reply resolver and its provider from config.
 * Used by both the bot and single-message mode (index.ts).
 */

import type { BotConfig } from './config/schema.js';
import { createProvider } from './llm/openai-compatible-provider.js';
import type { LLMProvider } from './llm/types.js';
import { ReplyResolver, toResolverConfig } from './reply/reply-resolver.js';
import * as log from './utils/logger.js';

export interface AppDeps {
  config: BotConfig;
  provider: LLMProvider | undefined;
  resolver: ReplyResolver;
}

export function createApp(config: BotConfig, opts: { fetch?: typeof fetch } = {}): AppDeps {
  const resolverConfig = toResolverConfig(config);

  let provider: LLMProvider | undefined;
  if (resolverConfig.completionApiKey) {
    provider = createProvider({
      provider: config.completion.provider,
      apiKey: resolverConfig.completionApiKey,
      apiBase: resolverConfig.completionEndpoint,
      timeoutMs: resolverConfig.timeoutMs,
      fetch: opts.fetch,
    });
    log.info(`Completion provider: "${provider.name}" (model=${resolverConfig.model}, base=${resolverConfig.completionEndpoint})`);
  } else {
    log.info('No completion API key configured; replies use the local responder');
  }

  const resolver = new ReplyResolver(resolverConfig, provider);
  return { config, provider, resolver };
}
