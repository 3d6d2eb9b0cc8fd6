import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

// Load .env file only for local development.
// In production, environment variables must come from the runtime.
if (!process.env.NETLIFY && process.env.NODE_ENV !== 'test') {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(process.cwd(), '.env'),
    path.resolve(here, '../../.env'),
    path.resolve(here, '../../../.env'),
  ];

  for (const p of candidates) {
    if (!fs.existsSync(p)) continue;
    const res = dotenv.config({ path: p, override: true });
    if (!res.error) break;
    console.warn(`⚠️ Could not load ${p}:`, res.error.message);
  }
}

export interface ProviderCredentials {
  geminiApiKey: string;
  geminiModel: string;
  groqApiKey: string;
  groqModel: string;
  openRouterApiKey: string;
  openRouterModel: string;
  huggingFaceApiKey: string;
  huggingFaceModel: string;
}

export interface AppConfig {
  telegramBotToken: string;
  providers: ProviderCredentials;
  /** Per provider call. */
  requestTimeoutMs: number;
  /** Attempts on the primary provider. */
  maxRetries: number;
  retryDelayMs: number;
  cacheFile: string;
  maxConcurrency: number;
  startDelayMs: number;
  proxyUrl?: string;
}

type Env = Record<string, string | undefined>;

const str = (env: Env, ...names: string[]): string => {
  for (const name of names) {
    const v = (env[name] || '').trim();
    if (v) return v;
  }
  return '';
};

const int = (env: Env, name: string, fallback: number, min: number): number => {
  const parsed = parseInt(env[name] || '', 10);
  return Number.isFinite(parsed) ? Math.max(min, parsed) : fallback;
};

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const DEFAULT_GROQ_MODEL = 'llama-3.3-70b-versatile';
export const DEFAULT_OPENROUTER_MODEL = 'google/gemini-2.0-flash-exp:free';
export const DEFAULT_HUGGINGFACE_MODEL = 'mistralai/Mistral-7B-Instruct-v0.3';

export const loadConfig = (env: Env = process.env): AppConfig => {
  const firstListedGeminiKey = (env.GEMINI_API_KEYS || '').split(',')[0]?.trim() ?? '';
  const proxyUrl = str(env, 'ALL_PROXY', 'HTTPS_PROXY', 'HTTP_PROXY');

  return {
    telegramBotToken: str(env, 'TELEGRAM_BOT_TOKEN'),
    providers: {
      geminiApiKey: str(env, 'GEMINI_API_KEY', 'API_KEY') || firstListedGeminiKey,
      geminiModel: str(env, 'GEMINI_MODEL') || DEFAULT_GEMINI_MODEL,
      groqApiKey: str(env, 'GROQ_API_KEY'),
      groqModel: str(env, 'GROQ_MODEL') || DEFAULT_GROQ_MODEL,
      openRouterApiKey: str(env, 'OPENROUTER_API_KEY'),
      openRouterModel: str(env, 'OPENROUTER_MODEL') || DEFAULT_OPENROUTER_MODEL,
      huggingFaceApiKey: str(env, 'HUGGINGFACE_API_KEY'),
      huggingFaceModel: str(env, 'HUGGINGFACE_MODEL') || DEFAULT_HUGGINGFACE_MODEL,
    },
    requestTimeoutMs: int(env, 'REQUEST_TIMEOUT', 30, 1) * 1000,
    maxRetries: int(env, 'MAX_RETRIES', 3, 1),
    retryDelayMs: int(env, 'RETRY_DELAY', 2, 0) * 1000,
    cacheFile: str(env, 'CONTENT_CACHE_FILE') || 'content_cache.json',
    maxConcurrency: int(env, 'LLM_MAX_CONCURRENCY', 5, 1),
    startDelayMs: int(env, 'BOT_START_DELAY_MS', 0, 0),
    ...(proxyUrl ? { proxyUrl } : {}),
  };
};

export const configWarnings = (config: AppConfig): string[] => {
  const warnings: string[] = [];
  if (!config.telegramBotToken) {
    warnings.push('TELEGRAM_BOT_TOKEN is not set - bot will not work');
  }
  const p = config.providers;
  if (!p.geminiApiKey && !p.groqApiKey && !p.openRouterApiKey && !p.huggingFaceApiKey) {
    warnings.push('No AI provider key is set - content will be served from the local cache only');
  } else if (!p.geminiApiKey) {
    warnings.push('GEMINI_API_KEY is not set - backup providers only');
  }
  return warnings;
};
