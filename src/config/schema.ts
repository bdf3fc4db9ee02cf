import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant. Prefer replying in Hausa if the user's message appears to be in Hausa; " +
  "otherwise reply in the user's language. Keep replies concise and friendly.";

export const DEFAULT_FALLBACK_KEYWORDS = [
  'ina',
  'yaya',
  'lafiya',
  'na gode',
  'sannu',
  'assalamu',
  'salam',
  'kwanaki',
  'me',
];

/** Characters cut from the reply budget to make room for the truncation marker. */
export const TRUNCATION_HEADROOM = 96;

export const PROVIDERS = ['openai', 'openrouter', 'deepseek', 'groq'] as const;

export type ProviderName = typeof PROVIDERS[number];

const TelegramSchema = z.object({
  token: z.string().optional(),
  allowlist: z.array(z.string()).default([]),
});

const CompletionSchema = z.object({
  provider: z.enum(PROVIDERS).default('openai'),
  apiKey: z.string().optional(),
  apiBase: z.string().url().optional(),
  model: z.string().default('gpt-3.5-turbo'),
  maxTokens: z.number().int().positive().default(512),
  temperature: z.number().min(0).max(2).default(0.7),
  timeoutMs: z.number().int().positive().default(30_000),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
});

const ReplySchema = z.object({
  maxLength: z.number().int().gt(TRUNCATION_HEADROOM).default(4096),
  truncationMarker: z.string().min(1).max(TRUNCATION_HEADROOM).default('\n\n[truncated]'),
  fallbackKeywords: z.array(z.string().min(1)).default(DEFAULT_FALLBACK_KEYWORDS),
});

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

export const BotConfigSchema = z.object({
  telegram: TelegramSchema.optional().transform(v => TelegramSchema.parse(v ?? {})),
  completion: CompletionSchema.optional().transform(v => CompletionSchema.parse(v ?? {})),
  reply: ReplySchema.optional().transform(v => ReplySchema.parse(v ?? {})),
  logging: LoggingSchema.optional().transform(v => LoggingSchema.parse(v ?? {})),
});

export type BotConfig = z.infer<typeof BotConfigSchema>;
