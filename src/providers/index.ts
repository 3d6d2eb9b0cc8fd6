import type { ProviderCredentials } from '../config/env.js';
import { createGroqProvider, createOpenRouterProvider } from './chatCompletionProvider.js';
import { GeminiProvider } from './geminiProvider.js';
import { HuggingFaceProvider } from './huggingFaceProvider.js';
import type { ContentProvider } from './types.js';

export type { ContentProvider, GenerateOptions, ProviderFailure, ProviderOutcome } from './types.js';

/**
 * Providers in failover priority order; the first one is the primary.
 */
export const createProviders = (credentials: ProviderCredentials): ContentProvider[] => [
  new GeminiProvider({ apiKey: credentials.geminiApiKey, model: credentials.geminiModel }),
  createGroqProvider(credentials.groqApiKey, credentials.groqModel),
  createOpenRouterProvider(credentials.openRouterApiKey, credentials.openRouterModel),
  new HuggingFaceProvider({ apiKey: credentials.huggingFaceApiKey, model: credentials.huggingFaceModel }),
];
