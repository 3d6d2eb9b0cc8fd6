import { ProxyAgent, setGlobalDispatcher } from 'undici';
import process from 'process';
import { createBot } from './bot.js';
import { configWarnings, loadConfig } from './config/env.js';
import { createProviders } from './providers/index.js';
import { ContentCache } from './services/contentCache.js';
import { ContentService } from './services/contentService.js';
import { FailoverOrchestrator } from './services/failoverOrchestrator.js';
import { delay } from './utils/delay.js';

const config = loadConfig();

const launchWithRetry = async () => {
  console.log('🚀 Starting GATE Civil content bot...');
  for (const warning of configWarnings(config)) {
    console.warn(`⚠️ Config: ${warning}`);
  }
  if (!config.telegramBotToken) {
    throw new Error('TELEGRAM_BOT_TOKEN is missing in environment variables.');
  }

  // Provider calls go through global fetch; route them via the proxy too.
  if (config.proxyUrl) {
    setGlobalDispatcher(new ProxyAgent(config.proxyUrl));
  }

  const orchestrator = new FailoverOrchestrator(createProviders(config.providers), {
    primaryAttempts: config.maxRetries,
    baseDelayMs: config.retryDelayMs,
    timeoutMs: config.requestTimeoutMs,
  });
  const cache = new ContentCache(config.cacheFile);
  const service = new ContentService(orchestrator, cache, { maxConcurrency: config.maxConcurrency });

  console.log('🧠 Providers available:', orchestrator.availableProviders().join(', ') || 'none (cache only)');
  console.log('📦 Cached items:', await cache.size());

  const bot = createBot(config.telegramBotToken, { service, orchestrator, cache }, config.proxyUrl);

  // Graceful stop
  process.once('SIGINT', () => bot.stop('SIGINT'));
  process.once('SIGTERM', () => bot.stop('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    console.error('❌ Unhandled Promise Rejection:', reason);
  });
  process.on('uncaughtException', (err) => {
    console.error('❌ Uncaught Exception:', err);
  });

  if (config.startDelayMs > 0) {
    await delay(config.startDelayMs);
  }

  let attempt = 0;
  while (true) {
    try {
      // launch() resolves only when polling stops, so report readiness from onLaunch.
      await bot.launch(() => console.log('🤖 Bot is online and listening for commands!'));
      return;
    } catch (error) {
      attempt += 1;
      console.error(`❌ Failed to start bot (attempt ${attempt}):`, error);

      const message = error instanceof Error ? error.message : String(error);
      const isConflict = message.includes('409');
      const base = isConflict ? 4000 : 1500;
      const waitMs = Math.min(30000, base * Math.pow(2, Math.min(attempt, 5)));
      await delay(waitMs);
    }
  }
};

launchWithRetry().catch((error) => {
  console.error('❌ Fatal startup error:', error);
  process.exit(1);
});
