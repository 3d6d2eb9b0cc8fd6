import { z } from 'zod';
import { getSystemInstruction } from '../prompts/contentPrompt.js';
import { attemptSignal, classifyHttpStatus, classifyThrown, isRateLimitText } from './classify.js';
import type { ContentProvider, FetchLike, GenerateOptions, ProviderOutcome } from './types.js';

const chatCompletionEnvelope = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
  error: z.unknown().optional(),
});

export interface ChatCompletionProviderOptions {
  name: string;
  url: string;
  apiKey: string;
  model: string;
  maxTokens?: number;
  /** Ask for `response_format: json_object`; retried once without it if rejected. */
  jsonMode?: boolean;
  extraHeaders?: Record<string, string>;
  fetch?: FetchLike;
}

/**
 * OpenAI-compatible chat-completion endpoint (Groq, OpenRouter).
 */
export class ChatCompletionProvider implements ContentProvider {
  readonly name: string;
  private readonly options: ChatCompletionProviderOptions;
  private readonly fetchImpl: FetchLike;

  constructor(options: ChatCompletionProviderOptions) {
    this.name = options.name;
    this.options = { ...options, apiKey: options.apiKey.trim() };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  isAvailable(): boolean {
    return Boolean(this.options.apiKey);
  }

  private post(body: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
    return this.fetchImpl(this.options.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
        ...this.options.extraHeaders,
      },
      body: JSON.stringify(body),
      signal,
    });
  }

  async generate(prompt: string, { timeoutMs, signal }: GenerateOptions): Promise<ProviderOutcome> {
    const wantJson = this.options.jsonMode ?? true;
    const baseBody: Record<string, unknown> = {
      model: this.options.model,
      temperature: 0.7,
      max_tokens: this.options.maxTokens ?? 900,
      messages: [
        { role: 'system', content: getSystemInstruction() },
        { role: 'user', content: prompt },
      ],
    };
    const requestSignal = attemptSignal(timeoutMs, signal);

    try {
      let res = await this.post(wantJson ? { ...baseBody, response_format: { type: 'json_object' } } : baseBody, requestSignal);

      // If response_format isn't supported by a model/provider, resend once without it.
      if (!res.ok && wantJson && res.status === 400) {
        const text0 = await res.text();
        if (!text0.toLowerCase().includes('response_format')) {
          return classifyHttpStatus(this.name, res.status, text0);
        }
        res = await this.post(baseBody, requestSignal);
      }

      if (!res.ok) {
        return classifyHttpStatus(this.name, res.status, await res.text());
      }

      const raw = await res.text();
      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch {
        return { status: 'fatal', reason: `${this.name}: non-JSON envelope: ${raw.slice(0, 200)}` };
      }

      const envelope = chatCompletionEnvelope.safeParse(data);
      if (!envelope.success) {
        if (isRateLimitText(raw)) {
          return { status: 'rate_limited', reason: `${this.name}: ${raw.slice(0, 200)}` };
        }
        return { status: 'fatal', reason: `${this.name}: unexpected envelope: ${envelope.error.issues[0]?.message ?? 'invalid'}` };
      }

      const content = envelope.data.choices[0]?.message.content;
      if (!content || !content.trim()) {
        return { status: 'fatal', reason: `${this.name}: Empty response` };
      }
      return { status: 'success', text: content };
    } catch (error) {
      return classifyThrown(this.name, error);
    }
  }
}

export const createGroqProvider = (apiKey: string, model: string, fetchImpl?: FetchLike): ChatCompletionProvider =>
  new ChatCompletionProvider({
    name: 'groq',
    url: 'https://api.groq.com/openai/v1/chat/completions',
    apiKey,
    model,
    ...(fetchImpl ? { fetch: fetchImpl } : {}),
  });

export const createOpenRouterProvider = (apiKey: string, model: string, fetchImpl?: FetchLike): ChatCompletionProvider =>
  new ChatCompletionProvider({
    name: 'openrouter',
    url: 'https://openrouter.ai/api/v1/chat/completions',
    apiKey,
    model,
    extraHeaders: { 'X-Title': 'GATE Civil Content Bot' },
    ...(fetchImpl ? { fetch: fetchImpl } : {}),
  });
