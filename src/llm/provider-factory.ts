import {
  LLM_PROVIDER_NAMES,
  LLMProvider,
  LLMProviderConfig,
  LLMProviderName,
  ProviderChain,
  isLLMProviderName,
} from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

type ProviderSettings = Record<LLMProviderName, LLMProviderConfig>;

/**
 * Create a single LLM provider by name.
 */
export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build all configured providers. Only providers whose API keys are set are created.
 */
export function buildProviders(settings: ProviderSettings): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of LLM_PROVIDER_NAMES) {
    const config = settings[name];
    if (config.apiKey) {
      providers.set(name, createProvider(name, config));
      log.info({ provider: name, model: config.model }, 'LLM provider initialized');
    }
  }

  if (providers.size === 0) {
    throw new Error(
      'No LLM providers configured. Set at least one of: OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY',
    );
  }

  log.info({ providers: Array.from(providers.keys()) }, `${providers.size} LLM provider(s) initialized`);
  return providers;
}

/**
 * Failover order from configured names. Unknown or unconfigured names are dropped;
 * an empty result falls back to the first available provider.
 */
export function resolveProviderChain(
  names: readonly string[],
  available: ReadonlyMap<LLMProviderName, LLMProvider>,
): ProviderChain {
  const chain = names.filter(isLLMProviderName).filter((n, i, all) => available.has(n) && all.indexOf(n) === i);
  if (chain.length > 0) return chain;

  const [first] = available.keys();
  if (!first) {
    throw new Error('No LLM provider available for routing');
  }
  return [first];
}
