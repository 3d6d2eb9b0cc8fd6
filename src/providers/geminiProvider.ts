import type { GenerateContentParameters } from "@google/genai";
import { GEMINI_GENERATION_CONFIG, createGeminiClient } from "../config/gemini.js";
import { getSystemInstruction } from "../prompts/contentPrompt.js";
import { attemptSignal, classifyThrown } from "./classify.js";
import type { ContentProvider, GenerateOptions, ProviderOutcome } from "./types.js";

/** The slice of `GoogleGenAI['models']` this provider calls. */
export interface GeminiModels {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export interface GeminiProviderOptions {
  apiKey: string;
  model: string;
  /** Overrides the SDK client, mainly for tests. */
  models?: GeminiModels;
}

/**
 * Primary provider: direct generation through the official SDK in JSON mode.
 */
export class GeminiProvider implements ContentProvider {
  readonly name = 'gemini';
  private readonly apiKey: string;
  private readonly model: string;
  private models: GeminiModels | undefined;

  constructor(options: GeminiProviderOptions) {
    this.apiKey = options.apiKey.trim();
    this.model = options.model;
    this.models = options.models;
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey) || this.models !== undefined;
  }

  private client(): GeminiModels {
    if (!this.models) {
      this.models = createGeminiClient(this.apiKey).models;
    }
    return this.models;
  }

  async generate(prompt: string, { timeoutMs, signal }: GenerateOptions): Promise<ProviderOutcome> {
    let timer: NodeJS.Timeout | undefined;
    try {
      const generation = this.client().generateContent({
        model: this.model,
        contents: prompt,
        config: {
          ...GEMINI_GENERATION_CONFIG,
          systemInstruction: getSystemInstruction(),
          abortSignal: attemptSignal(timeoutMs, signal),
        },
      });
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('GENERATION_TIMEOUT')), timeoutMs);
      });

      const response = await Promise.race([generation, timeout]);
      const text = response.text;
      if (!text || !text.trim()) {
        return { status: 'fatal', reason: 'gemini: Empty response from Gemini' };
      }
      return { status: 'success', text };
    } catch (error) {
      return classifyThrown(this.name, error);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
