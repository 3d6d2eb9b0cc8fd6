export type ProviderOutcome =
  | { status: 'success'; text: string }
  | { status: 'rate_limited'; reason: string }
  | { status: 'transient'; reason: string }
  | { status: 'fatal'; reason: string };

export type ProviderFailure = Exclude<ProviderOutcome, { status: 'success' }>;

export interface GenerateOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * One external generation service. `generate` performs exactly one network call
 * and never throws: every failure comes back as a classified outcome.
 */
export interface ContentProvider {
  readonly name: string;
  isAvailable(): boolean;
  generate(prompt: string, options: GenerateOptions): Promise<ProviderOutcome>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
