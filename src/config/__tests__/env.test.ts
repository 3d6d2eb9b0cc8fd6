import { describe, expect, it } from 'vitest';
import { configWarnings, loadConfig } from '../env.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      telegramBotToken: '',
      providers: {
        geminiApiKey: '',
        geminiModel: 'gemini-2.0-flash',
        groqApiKey: '',
        groqModel: 'llama-3.3-70b-versatile',
        openRouterApiKey: '',
        openRouterModel: 'google/gemini-2.0-flash-exp:free',
        huggingFaceApiKey: '',
        huggingFaceModel: 'mistralai/Mistral-7B-Instruct-v0.3',
      },
      requestTimeoutMs: 30000,
      maxRetries: 3,
      retryDelayMs: 2000,
      cacheFile: 'content_cache.json',
      maxConcurrency: 5,
      startDelayMs: 0,
    });
  });

  it('reads seconds-based timings and clamps counts', () => {
    const config = loadConfig({ REQUEST_TIMEOUT: '10', RETRY_DELAY: '0', MAX_RETRIES: '0', LLM_MAX_CONCURRENCY: 'many' });
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.retryDelayMs).toBe(0);
    expect(config.maxRetries).toBe(1);
    expect(config.maxConcurrency).toBe(5);
  });

  it('falls back through the Gemini key variables', () => {
    expect(loadConfig({ API_KEY: 'test-a' }).providers.geminiApiKey).toBe('test-a');
    expect(loadConfig({ GEMINI_API_KEYS: ' test-b , test-c' }).providers.geminiApiKey).toBe('test-b');
    expect(loadConfig({ GEMINI_API_KEY: 'test-d', API_KEY: 'test-a' }).providers.geminiApiKey).toBe('test-d');
  });

  it('picks up a proxy and trims values', () => {
    const config = loadConfig({ HTTPS_PROXY: 'http://proxy.local:8080', TELEGRAM_BOT_TOKEN: '  test-token  ' });
    expect(config.proxyUrl).toBe('http://proxy.local:8080');
    expect(config.telegramBotToken).toBe('test-token');
  });
});

describe('configWarnings', () => {
  it('warns about a missing token and cache-only mode', () => {
    expect(configWarnings(loadConfig({}))).toEqual([
      'TELEGRAM_BOT_TOKEN is not set - bot will not work',
      'No AI provider key is set - content will be served from the local cache only',
    ]);
  });

  it('warns when only backups are configured', () => {
    expect(configWarnings(loadConfig({ TELEGRAM_BOT_TOKEN: 'test-token', GROQ_API_KEY: 'test-key' }))).toEqual([
      'GEMINI_API_KEY is not set - backup providers only',
    ]);
  });

  it('is silent when fully configured', () => {
    expect(configWarnings(loadConfig({ TELEGRAM_BOT_TOKEN: 'test-token', GEMINI_API_KEY: 'test-key' }))).toEqual([]);
  });
});
