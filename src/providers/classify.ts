import type { ProviderFailure } from './types.js';

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const field = (value: unknown, key: string): unknown => {
  if (typeof value !== 'object' || value === null) return undefined;
  const found: unknown = Reflect.get(value, key);
  return found;
};

export const errorStatus = (error: unknown): number | undefined => {
  const status = field(error, 'status') ?? field(error, 'code');
  return typeof status === 'number' ? status : undefined;
};

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message || error.name;
  return String(error ?? 'Unknown error');
};

const errorCode = (error: unknown): string => {
  const own = field(error, 'code');
  if (typeof own === 'string') return own;
  const cause = field(error, 'cause');
  const causeCode = field(cause, 'code');
  return typeof causeCode === 'string' ? causeCode : '';
};

export const isRateLimitText = (text: string): boolean => {
  const lower = text.toLowerCase();
  return lower.includes('resource_exhausted') || lower.includes('rate limit') || lower.includes('rate_limit') || lower.includes('quota');
};

/**
 * Maps a non-2xx HTTP status (and its body) to a failure.
 */
export const classifyHttpStatus = (provider: string, status: number, body: string): ProviderFailure => {
  const reason = `${provider.toUpperCase()}_HTTP_${status}${body ? `: ${body.slice(0, 400)}` : ''}`;
  if (status === 429) return { status: 'rate_limited', reason };
  return { status: 'fatal', reason };
};

/**
 * Maps anything thrown around a provider call to a failure.
 */
export const classifyThrown = (provider: string, error: unknown): ProviderFailure => {
  const message = errorMessage(error);
  const reason = `${provider}: ${message}`;
  const status = errorStatus(error);

  if (status === 429 || isRateLimitText(message)) return { status: 'rate_limited', reason };

  const name = error instanceof Error ? error.name : '';
  if (name === 'TimeoutError' || name === 'AbortError' || message.includes('TIMEOUT')) {
    return { status: 'transient', reason };
  }
  if (TRANSIENT_CODES.has(errorCode(error)) || message === 'fetch failed') {
    return { status: 'transient', reason };
  }
  if (status === undefined && error instanceof TypeError) {
    return { status: 'transient', reason };
  }
  return { status: 'fatal', reason };
};

/**
 * Combines the per-attempt timeout with the caller's cancellation signal.
 */
export const attemptSignal = (timeoutMs: number, signal?: AbortSignal): AbortSignal => {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
};
