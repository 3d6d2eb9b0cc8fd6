import { buildContentPrompt } from "../prompts/contentPrompt.js";
import type { ContentKind, ContentRequest, ContentResult, GeneratedContent } from "../types/content.js";
import { createConcurrencyLimiter, type ConcurrencyLimiter } from "../utils/concurrency.js";
import type { ContentCache } from "./contentCache.js";
import type { FailoverOrchestrator } from "./failoverOrchestrator.js";
import { repairAndParse } from "./responseRepairer.js";

export interface ContentServiceOptions {
  /** Live generations allowed in flight at once. */
  maxConcurrency?: number;
}

/**
 * The only entry point callers use. Walks the degradation ladder:
 * live generation, then a cached prior result, then `unavailable`.
 * Expected failures never reject.
 */
export class ContentService {
  private readonly orchestrator: FailoverOrchestrator;
  private readonly cache: ContentCache;
  private readonly limiter: ConcurrencyLimiter;

  constructor(orchestrator: FailoverOrchestrator, cache: ContentCache, options: ContentServiceOptions = {}) {
    this.orchestrator = orchestrator;
    this.cache = cache;
    this.limiter = createConcurrencyLimiter(options.maxConcurrency ?? 5);
  }

  hasLiveProviders(): boolean {
    return this.orchestrator.hasAvailableProvider();
  }

  async getContent(request: ContentRequest, signal?: AbortSignal): Promise<ContentResult> {
    if (this.orchestrator.hasAvailableProvider()) {
      const generated = await this.limiter.run(() => this.generate(request, signal));
      if (generated) {
        return generated;
      }
      console.warn(`⚠️ Live ${request.kind} generation failed; falling back to the content cache.`);
    }
    return this.fromCache(request.kind);
  }

  private async generate(request: ContentRequest, signal?: AbortSignal): Promise<ContentResult | undefined> {
    const prompt = buildContentPrompt(request);
    const result = await this.orchestrator.run<GeneratedContent>(
      prompt.text,
      raw => {
        const parsed = repairAndParse(raw, request.kind);
        if (!parsed.ok) {
          console.warn(`⚠️ Could not parse ${request.kind}: ${parsed.error.message}`);
        }
        return parsed;
      },
      signal
    );
    if (!result.ok) return undefined;

    try {
      await this.cache.add(result.value);
    } catch (e) {
      console.error('⚠️ Failed to save generated content to cache:', e);
    }
    return { status: 'generated', content: result.value, provider: result.provider };
  }

  private async fromCache(kind: ContentKind): Promise<ContentResult> {
    try {
      const content = await this.cache.sample(kind);
      if (content) return { status: 'cached', content };
    } catch (e) {
      console.error(`⚠️ Content cache unavailable for ${kind}:`, e);
    }
    return { status: 'unavailable' };
  }
}
