import type { ContentProvider, ProviderFailure } from "../providers/types.js";
import { delay, type Sleep } from "../utils/delay.js";
import type { ParseResult } from "./responseRepairer.js";

export type AttemptFailure = ProviderFailure | { status: 'parse_error'; reason: string };

export interface ProviderFailureRecord {
  provider: string;
  attempts: number;
  lastError: AttemptFailure;
}

export type FailoverResult<T> =
  | { ok: true; value: T; provider: string; attempts: number }
  | { ok: false; failures: ProviderFailureRecord[] };

export interface FailoverOptions {
  /** Attempts on the primary (first) provider; backups always get one. */
  primaryAttempts?: number;
  /** Wait before retry n on the primary is `baseDelayMs * n`. */
  baseDelayMs?: number;
  timeoutMs?: number;
  sleep?: Sleep;
}

export interface ProviderStats {
  attempts: number;
  success: number;
  fail: number;
}

export interface FailoverStats {
  providers: Record<string, ProviderStats>;
  lastProvider: string;
  lastError: string;
}

export const DEFAULT_PRIMARY_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 2000;
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Drives providers in priority order. The primary gets bounded retries with
 * linear backoff unless it reports a rate limit or unparseable output; each
 * backup is tried once.
 */
export class FailoverOrchestrator {
  private readonly providers: readonly ContentProvider[];
  private readonly primaryAttempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly sleep: Sleep;
  private stats: FailoverStats;

  constructor(providers: readonly ContentProvider[], options: FailoverOptions = {}) {
    this.providers = providers;
    this.primaryAttempts = Math.max(1, options.primaryAttempts ?? DEFAULT_PRIMARY_ATTEMPTS);
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.sleep = options.sleep ?? delay;
    this.stats = this.emptyStats();
  }

  private emptyStats(): FailoverStats {
    const providers: Record<string, ProviderStats> = {};
    for (const p of this.providers) {
      providers[p.name] = { attempts: 0, success: 0, fail: 0 };
    }
    return { providers, lastProvider: '', lastError: '' };
  }

  getStats(): FailoverStats {
    const providers: Record<string, ProviderStats> = {};
    for (const [name, s] of Object.entries(this.stats.providers)) {
      providers[name] = { ...s };
    }
    return { ...this.stats, providers };
  }

  resetStats(): void {
    this.stats = this.emptyStats();
  }

  availableProviders(): string[] {
    return this.providers.filter(p => p.isAvailable()).map(p => p.name);
  }

  hasAvailableProvider(): boolean {
    return this.providers.some(p => p.isAvailable());
  }

  private record(provider: string, failure?: AttemptFailure): void {
    const s = this.stats.providers[provider] ?? (this.stats.providers[provider] = { attempts: 0, success: 0, fail: 0 });
    s.attempts++;
    this.stats.lastProvider = provider;
    if (failure) {
      s.fail++;
      this.stats.lastError = failure.reason;
    } else {
      s.success++;
      this.stats.lastError = '';
    }
  }

  async run<T>(prompt: string, parse: (raw: string) => ParseResult<T>, signal?: AbortSignal): Promise<FailoverResult<T>> {
    const failures: ProviderFailureRecord[] = [];

    for (const [index, provider] of this.providers.entries()) {
      if (signal?.aborted) break;
      if (!provider.isAvailable()) {
        continue;
      }

      const maxAttempts = index === 0 ? this.primaryAttempts : 1;
      let attempt = 0;
      let lastError: AttemptFailure | undefined;

      while (attempt < maxAttempts) {
        attempt++;
        const outcome = await provider.generate(prompt, { timeoutMs: this.timeoutMs, ...(signal ? { signal } : {}) });

        if (outcome.status === 'success') {
          const parsed = parse(outcome.text);
          if (parsed.ok) {
            this.record(provider.name);
            return { ok: true, value: parsed.content, provider: provider.name, attempts: attempt };
          }
          lastError = { status: 'parse_error', reason: `${provider.name}: ${parsed.error.message}` };
        } else {
          lastError = outcome;
        }
        this.record(provider.name, lastError);

        if (lastError.status === 'rate_limited') {
          console.warn(`⚠️ ${provider.name} is rate limited; failing over without retry.`);
          break;
        }
        if (lastError.status === 'parse_error') {
          console.warn(`⚠️ ${lastError.reason}; failing over to the next provider.`);
          break;
        }
        if (attempt >= maxAttempts || signal?.aborted) break;

        const waitMs = this.baseDelayMs * attempt;
        console.warn(`⚠️ ${provider.name} failed (Attempt ${attempt}/${maxAttempts}): ${lastError.reason}. Retrying in ${waitMs}ms...`);
        const slept = await this.sleep(waitMs, signal).then(
          () => true,
          () => false
        );
        if (!slept) break;
      }

      if (lastError) {
        failures.push({ provider: provider.name, attempts: attempt, lastError });
      }
    }

    console.error(
      '❌ All providers failed:',
      failures.length ? failures.map(f => `${f.provider}[${f.lastError.status}] ${f.lastError.reason}`).join(' | ') : 'no provider available'
    );
    return { ok: false, failures };
  }
}
