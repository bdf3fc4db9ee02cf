import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { BotConfigSchema, type BotConfig, type ProviderName } from './schema.js';

export interface LoadConfigOptions {
  /** Directory holding the workspace sannu.json. Defaults to the process cwd. */
  cwd?: string;
  /** Home directory holding .sannu/config.json. */
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config with priority: CLI flags > env vars > workspace json > user json > defaults
 */
export async function loadConfig(
  overrides?: Partial<BotConfig>,
  opts: LoadConfigOptions = {},
): Promise<BotConfig> {
  const env = opts.env ?? process.env;

  // 1. Workspace config
  const workspaceConfig = await loadJSON(resolve(opts.cwd ?? '.', 'sannu.json'));

  // 2. User config
  const home = opts.home ?? env.HOME ?? env.USERPROFILE ?? '';
  const userConfig = await loadJSON(resolve(home, '.sannu', 'config.json'));

  // 3. Env vars
  const envConfig = loadEnvVars(env);

  // 4. Merge: defaults < user < workspace < env < overrides
  const merged = deepMerge(userConfig, workspaceConfig, envConfig, overrides ?? {});

  return BotConfigSchema.parse(merged);
}

const KEY_VARS: [string, ProviderName][] = [
  ['OPENROUTER_API_KEY', 'openrouter'],
  ['OPENAI_API_KEY', 'openai'],
  ['DEEPSEEK_API_KEY', 'deepseek'],
  ['GROQ_API_KEY', 'groq'],
];

export function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  // Priority: OPENROUTER > OPENAI > DEEPSEEK > GROQ
  const found = KEY_VARS.find(([name]) => env[name]);
  const completion: Record<string, unknown> = {};
  if (found) {
    completion.apiKey = env[found[0]];
    completion.provider = found[1];
  }
  if (env.SANNU_MODEL) completion.model = env.SANNU_MODEL;
  if (env.SANNU_API_BASE) completion.apiBase = env.SANNU_API_BASE;
  if (Object.keys(completion).length > 0) result.completion = completion;

  const token = env.TELEGRAM_TOKEN || env.TELEGRAM_BOT_TOKEN;
  if (token) {
    result.telegram = { token };
  }

  if (env.SANNU_LOG_LEVEL) {
    result.logging = { level: env.SANNU_LOG_LEVEL };
  }

  return result;
}

/**
 * Telegram token or a startup error. Polling without it is impossible,
 * so callers treat this as fatal.
 */
export function requireTelegramToken(config: BotConfig): string {
  const token = config.telegram.token;
  if (!token) {
    throw new Error('TELEGRAM_TOKEN environment variable is required (or telegram.token in sannu.json).');
  }
  return token;
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return {};
  }
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
