import { z } from 'zod';
import { getSystemInstruction } from '../prompts/contentPrompt.js';
import { attemptSignal, classifyHttpStatus, classifyThrown, isRateLimitText } from './classify.js';
import type { ContentProvider, FetchLike, GenerateOptions, ProviderOutcome } from './types.js';

const generation = z.object({ generated_text: z.string() });
const generationEnvelope = z.union([z.array(generation).min(1), generation]);

export interface HuggingFaceProviderOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  fetch?: FetchLike;
}

/**
 * Last-resort provider: the hosted inference API's plain text-generation task.
 */
export class HuggingFaceProvider implements ContentProvider {
  readonly name = 'huggingface';
  private readonly apiKey: string;
  private readonly url: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HuggingFaceProviderOptions) {
    this.apiKey = options.apiKey.trim();
    const baseUrl = (options.baseUrl ?? 'https://api-inference.huggingface.co').replace(/\/+$/, '');
    this.url = `${baseUrl}/models/${options.model}`;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async generate(prompt: string, { timeoutMs, signal }: GenerateOptions): Promise<ProviderOutcome> {
    try {
      const res = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          inputs: `${getSystemInstruction()}\n\n${prompt}`,
          parameters: { max_new_tokens: 900, temperature: 0.7, return_full_text: false },
          options: { wait_for_model: true },
        }),
        signal: attemptSignal(timeoutMs, signal),
      });

      const raw = await res.text();
      if (!res.ok) {
        // The inference API reports cold models as 503 with an estimated_time.
        if (res.status === 503 && raw.includes('estimated_time')) {
          return { status: 'transient', reason: `huggingface: model loading: ${raw.slice(0, 200)}` };
        }
        return classifyHttpStatus(this.name, res.status, raw);
      }

      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch {
        return { status: 'fatal', reason: `huggingface: non-JSON envelope: ${raw.slice(0, 200)}` };
      }

      const envelope = generationEnvelope.safeParse(data);
      if (!envelope.success) {
        if (isRateLimitText(raw)) {
          return { status: 'rate_limited', reason: `huggingface: ${raw.slice(0, 200)}` };
        }
        return { status: 'fatal', reason: 'huggingface: unexpected envelope' };
      }

      const text = Array.isArray(envelope.data) ? envelope.data[0]?.generated_text : envelope.data.generated_text;
      if (!text || !text.trim()) {
        return { status: 'fatal', reason: 'huggingface: Empty response' };
      }
      return { status: 'success', text };
    } catch (error) {
      return classifyThrown(this.name, error);
    }
  }
}
