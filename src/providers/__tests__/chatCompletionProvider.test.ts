import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createGroqProvider, createOpenRouterProvider } from '../chatCompletionProvider.js';
import type { FetchLike } from '../types.js';
import { jsonResponse } from '../../test/fakes.js';

interface Call {
  url: string;
  init: RequestInit;
  body: Record<string, unknown>;
}

/** Answers each request with the next queued response; the last one repeats. */
const fakeFetch = (...responses: Array<() => Response>) => {
  const calls: Call[] = [];
  const impl: FetchLike = async (url, init) => {
    const body = z.record(z.unknown()).parse(typeof init.body === 'string' ? JSON.parse(init.body) : {});
    calls.push({ url, init, body });
    const next = responses[Math.min(calls.length - 1, responses.length - 1)];
    if (!next) throw new Error('no response queued');
    return next();
  };
  return { impl, calls };
};

const completion = (content: string | null) => ({ choices: [{ message: { role: 'assistant', content } }] });
const options = { timeoutMs: 1000 };

describe('ChatCompletionProvider', () => {
  it('returns the first choice content on success', async () => {
    const { impl, calls } = fakeFetch(() => jsonResponse(completion('{"fact":"x"}')));
    const groq = createGroqProvider('test-key', 'llama-test', impl);

    await expect(groq.generate('Generate a fact', options)).resolves.toEqual({ status: 'success', text: '{"fact":"x"}' });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://api.groq.com/openai/v1/chat/completions');
    expect(calls[0]?.init.method).toBe('POST');
    expect(calls[0]?.init.headers).toMatchObject({ Authorization: 'Bearer test-key' });
    expect(calls[0]?.init.signal).toBeInstanceOf(AbortSignal);
    expect(calls[0]?.body).toMatchObject({
      model: 'llama-test',
      temperature: 0.7,
      max_tokens: 900,
      response_format: { type: 'json_object' },
    });
    expect(calls[0]?.body['messages']).toEqual([
      { role: 'system', content: 'You are a strict GATE Civil Engineering content generator. Output valid JSON only (no markdown/code fences).' },
      { role: 'user', content: 'Generate a fact' },
    ]);
  });

  it('sends the OpenRouter title header', async () => {
    const { impl, calls } = fakeFetch(() => jsonResponse(completion('{}')));
    await createOpenRouterProvider('test-key', 'some/model:free', impl).generate('p', options);

    expect(calls[0]?.url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(calls[0]?.init.headers).toMatchObject({ 'X-Title': 'GATE Civil Content Bot' });
  });

  it('classifies 429 as rate limited', async () => {
    const { impl } = fakeFetch(() => jsonResponse('slow down', 429));
    await expect(createGroqProvider('test-key', 'm', impl).generate('p', options)).resolves.toEqual({
      status: 'rate_limited',
      reason: 'GROQ_HTTP_429: slow down',
    });
  });

  it('classifies other HTTP errors as fatal', async () => {
    const { impl } = fakeFetch(() => jsonResponse('', 500));
    await expect(createOpenRouterProvider('test-key', 'm', impl).generate('p', options)).resolves.toEqual({
      status: 'fatal',
      reason: 'OPENROUTER_HTTP_500',
    });
  });

  it('resends once without response_format when the model rejects it', async () => {
    const { impl, calls } = fakeFetch(
      () => jsonResponse('{"error":"response_format is not supported"}', 400),
      () => jsonResponse(completion('{"fact":"y"}'))
    );

    await expect(createGroqProvider('test-key', 'm', impl).generate('p', options)).resolves.toEqual({
      status: 'success',
      text: '{"fact":"y"}',
    });
    expect(calls).toHaveLength(2);
    expect(calls[0]?.body).toHaveProperty('response_format');
    expect(calls[1]?.body).not.toHaveProperty('response_format');
  });

  it('does not resend on an unrelated 400', async () => {
    const { impl, calls } = fakeFetch(() => jsonResponse('bad model', 400));
    await expect(createGroqProvider('test-key', 'm', impl).generate('p', options)).resolves.toEqual({
      status: 'fatal',
      reason: 'GROQ_HTTP_400: bad model',
    });
    expect(calls).toHaveLength(1);
  });

  it('rejects a non-JSON envelope', async () => {
    const { impl } = fakeFetch(() => jsonResponse('<html>gateway</html>'));
    await expect(createGroqProvider('test-key', 'm', impl).generate('p', options)).resolves.toEqual({
      status: 'fatal',
      reason: 'groq: non-JSON envelope: <html>gateway</html>',
    });
  });

  it('treats a rate-limit error body with status 200 as rate limited', async () => {
    const { impl } = fakeFetch(() => jsonResponse({ error: { message: 'Rate limit reached for model' } }));
    const outcome = await createGroqProvider('test-key', 'm', impl).generate('p', options);
    expect(outcome.status).toBe('rate_limited');
  });

  it('rejects an envelope without choices', async () => {
    const { impl } = fakeFetch(() => jsonResponse({ choices: [] }));
    const outcome = await createGroqProvider('test-key', 'm', impl).generate('p', options);
    expect(outcome.status).toBe('fatal');
    if (outcome.status === 'fatal') expect(outcome.reason.startsWith('groq: unexpected envelope: ')).toBe(true);
  });

  it('rejects empty content', async () => {
    const { impl } = fakeFetch(() => jsonResponse(completion(null)));
    await expect(createGroqProvider('test-key', 'm', impl).generate('p', options)).resolves.toEqual({
      status: 'fatal',
      reason: 'groq: Empty response',
    });
  });

  it('classifies network failures as transient', async () => {
    const impl: FetchLike = async () => {
      throw new TypeError('fetch failed');
    };
    await expect(createGroqProvider('test-key', 'm', impl).generate('p', options)).resolves.toEqual({
      status: 'transient',
      reason: 'groq: fetch failed',
    });
  });

  it('is unavailable without a key', () => {
    expect(createGroqProvider('', 'm').isAvailable()).toBe(false);
    expect(createGroqProvider('   ', 'm').isAvailable()).toBe(false);
    expect(createGroqProvider('test-key', 'm').isAvailable()).toBe(true);
  });
});
