import { describe, it, expect } from 'vitest';
import { BotConfigSchema, DEFAULT_FALLBACK_KEYWORDS } from '../../src/config/schema.js';

describe('BotConfigSchema', () => {
  it('should produce all defaults from empty object', () => {
    const config = BotConfigSchema.parse({});

    expect(config.telegram.token).toBeUndefined();
    expect(config.telegram.allowlist).toEqual([]);
    expect(config.completion.provider).toBe('openai');
    expect(config.completion.apiKey).toBeUndefined();
    expect(config.completion.model).toBe('gpt-3.5-turbo');
    expect(config.completion.maxTokens).toBe(512);
    expect(config.completion.temperature).toBe(0.7);
    expect(config.completion.timeoutMs).toBe(30_000);
    expect(config.reply.maxLength).toBe(4096);
    expect(config.reply.truncationMarker).toBe('\n\n[truncated]');
    expect(config.reply.fallbackKeywords).toEqual(DEFAULT_FALLBACK_KEYWORDS);
    expect(config.logging.level).toBe('info');
  });

  it('should ship the Hausa keyword list', () => {
    expect(DEFAULT_FALLBACK_KEYWORDS).toEqual([
      'ina', 'yaya', 'lafiya', 'na gode', 'sannu', 'assalamu', 'salam', 'kwanaki', 'me',
    ]);
  });

  it('should accept custom values', () => {
    const config = BotConfigSchema.parse({
      completion: { provider: 'groq', model: 'llama-3.1-8b-instant', maxTokens: 256 },
      reply: { fallbackKeywords: ['hi'] },
      telegram: { token: 'test-token', allowlist: ['42'] },
    });

    expect(config.completion.provider).toBe('groq');
    expect(config.completion.model).toBe('llama-3.1-8b-instant');
    expect(config.completion.maxTokens).toBe(256);
    expect(config.completion.temperature).toBe(0.7);
    expect(config.reply.fallbackKeywords).toEqual(['hi']);
    expect(config.telegram.token).toBe('test-token');
    expect(config.telegram.allowlist).toEqual(['42']);
  });

  it('should reject an unknown provider', () => {
    expect(() => BotConfigSchema.parse({ completion: { provider: 'nope' } })).toThrow();
  });

  it('should reject a marker that does not fit the truncation headroom', () => {
    expect(() => BotConfigSchema.parse({ reply: { truncationMarker: 'x'.repeat(97) } })).toThrow();
  });

  it('should reject a reply limit below the truncation headroom', () => {
    expect(() => BotConfigSchema.parse({ reply: { maxLength: 96 } })).toThrow();
  });

  it('should reject invalid types', () => {
    expect(() => BotConfigSchema.parse({ completion: { timeoutMs: 'soon' } })).toThrow();
    expect(() => BotConfigSchema.parse({ logging: { level: 'verbose' } })).toThrow();
  });
});
