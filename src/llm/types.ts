export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export type LLMProviderName = 'openai' | 'anthropic' | 'gemini';

export const LLM_PROVIDER_NAMES: readonly LLMProviderName[] = ['openai', 'anthropic', 'gemini'];

export function isLLMProviderName(value: string): value is LLMProviderName {
  return LLM_PROVIDER_NAMES.some((n) => n === value);
}

/** Per-provider connection settings; output length comes with each request */
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface LLMCompletionRequest {
  messages: LLMMessage[];
  /** Provider default when absent */
  temperature?: number;
  maxTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  /** Model id as reported by the provider */
  model: string;
  provider: LLMProviderName;
  usage: { promptTokens: number; completionTokens: number; totalTokens: number };
  latencyMs: number;
}

/** One vendor SDK behind a common completion call */
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
  healthCheck(): Promise<boolean>;
}

/** Failover order; the first entry is the primary */
export type ProviderChain = readonly LLMProviderName[];

export interface InferenceOptions {
  maxOutputTokens: number;
  /** Name from safety-profiles.ts */
  safetyProfile?: string;
}

export interface InferenceResult {
  text: string;
  provider: LLMProviderName;
  model: string;
}

/** What the reply composer calls; the model router is the production implementation */
export interface InferenceService {
  generate(messages: LLMMessage[], options: InferenceOptions): Promise<InferenceResult>;
}
