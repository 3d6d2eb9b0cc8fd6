import { Telegraf, Context } from 'telegraf';
import https from 'https';
import { ProxyAgent } from 'proxy-agent';
import { getAvailableTopics } from './config/topics.js';
import type { ContentCache } from './services/contentCache.js';
import type { ContentService } from './services/contentService.js';
import type { FailoverOrchestrator } from './services/failoverOrchestrator.js';
import { CONTENT_KINDS, type ContentRequest, type ContentResult } from './types/content.js';
import { parseCommandArgs } from './utils/commandArgs.js';
import { UNAVAILABLE_MESSAGE, formatContent, formatStatus, toQuizPoll, type QuizPoll } from './utils/formatters.js';

export interface BotDeps {
  service: ContentService;
  orchestrator: FailoverOrchestrator;
  cache: ContentCache;
}

export interface ContentTarget {
  reply(text: string): Promise<unknown>;
  sendQuiz(poll: QuizPoll): Promise<unknown>;
}

const HELP_TEXT =
  '🏗️ GATE Civil Engineering prep bot\n\n' +
  '/question [TOPIC] [easy|medium|hard] - quiz question\n' +
  '/fact [TOPIC] - key note\n' +
  '/formula [TOPIC] - formula to memorize\n' +
  '/language - one word in a new language\n' +
  '/topics - topic codes\n' +
  '/status - AI provider diagnostics';

/**
 * Sends a pipeline result: questions as native quiz polls, everything else as text.
 * `unavailable` becomes a retry-later message, never a content-shaped reply.
 */
export const deliverContent = async (target: ContentTarget, result: ContentResult): Promise<void> => {
  if (result.status === 'unavailable') {
    await target.reply(UNAVAILABLE_MESSAGE);
    return;
  }
  const { content } = result;
  if (content.kind === 'question') {
    await target.sendQuiz(toQuizPoll(content));
    return;
  }
  await target.reply(formatContent(content));
};

const targetFor = (ctx: Context): ContentTarget => ({
  reply: text => ctx.reply(text),
  sendQuiz: poll =>
    ctx.replyWithQuiz(poll.question, poll.options, {
      correct_option_id: poll.correctOptionIndex,
      explanation: poll.explanation,
      is_anonymous: false,
    }),
});

export const createBot = (token: string, deps: BotDeps, proxyUrl?: string): Telegraf => {
  const agent = proxyUrl
    ? new ProxyAgent({ getProxyForUrl: () => proxyUrl })
    : new https.Agent({ keepAlive: true });
  const bot = new Telegraf(token, { telegram: { agent } });

  const serve = async (ctx: Context, request: ContentRequest) => {
    await ctx.sendChatAction('typing');
    const result = await deps.service.getContent(request);
    if (result.status === 'cached') {
      console.warn(`⚠️ Served cached ${request.kind} to chat ${ctx.chat?.id ?? '?'}`);
    }
    await deliverContent(targetFor(ctx), result);
  };

  bot.start(ctx => ctx.reply(HELP_TEXT));
  bot.help(ctx => ctx.reply(HELP_TEXT));

  bot.command('topics', ctx =>
    ctx.reply(['📚 Topics:', ...getAvailableTopics().map(t => `${t.code} - ${t.name}`)].join('\n'))
  );

  bot.command('question', async ctx => {
    const { topic, difficulty } = parseCommandArgs(ctx.message.text);
    await serve(ctx, {
      kind: 'question',
      ...(topic ? { topic } : {}),
      difficulty: difficulty ?? 'medium',
    });
  });

  bot.command('fact', async ctx => {
    const { topic } = parseCommandArgs(ctx.message.text);
    await serve(ctx, { kind: 'fact', ...(topic ? { topic } : {}) });
  });

  bot.command('formula', async ctx => {
    const { topic } = parseCommandArgs(ctx.message.text);
    await serve(ctx, { kind: 'formula', ...(topic ? { topic } : {}) });
  });

  bot.command('language', async ctx => {
    await serve(ctx, { kind: 'language' });
  });

  bot.command('status', async ctx => {
    const stats = deps.orchestrator.getStats();
    const cached: Record<string, number> = {};
    const store = await deps.cache.load();
    for (const kind of CONTENT_KINDS) {
      cached[kind] = store[kind].length;
    }
    await ctx.reply(formatStatus({ ...stats, available: deps.orchestrator.availableProviders(), cached }));
  });

  bot.catch((err, ctx) => {
    console.error(`Bot error for update ${ctx.update.update_id}:`, err);
  });

  return bot;
};
