import {
  InferenceOptions,
  InferenceResult,
  InferenceService,
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMMessage,
  LLMProvider,
  LLMProviderName,
  ProviderChain,
} from './types';
import { CircuitBreaker } from './circuit-breaker';
import { getSafetyProfile } from './safety-profiles';
import { InferenceFailureError } from '../errors/pipeline-errors';
import { logger } from '../observability/logger';
import { llmProviderFailovers, llmRequestDuration, llmTokenUsage } from '../observability/metrics';

export type ProviderHealthReport = Record<string, { status: 'ok' | 'error'; latencyMs: number }>;

interface RouteEntry {
  provider: LLMProvider;
  breaker: CircuitBreaker;
}

/**
 * Walks the provider chain in order and returns the first completion that succeeds.
 * A provider whose breaker is open is skipped without being called.
 */
export class ModelRouter implements InferenceService {
  private readonly route: RouteEntry[];
  private readonly log = logger.child({ component: 'model-router' });

  constructor(
    chain: ProviderChain,
    providers: ReadonlyMap<LLMProviderName, LLMProvider>,
    private readonly now: () => number = Date.now,
  ) {
    this.route = [...new Set(chain)].flatMap((name) => {
      const provider = providers.get(name);
      return provider ? [{ provider, breaker: new CircuitBreaker() }] : [];
    });

    if (this.route.length === 0) {
      throw new Error(`None of [${chain.join(', ')}] is configured`);
    }

    this.log.info({ chain: this.route.map((e) => e.provider.name) }, 'Model router initialized');
  }

  async generate(messages: LLMMessage[], options: InferenceOptions): Promise<InferenceResult> {
    const profile = getSafetyProfile(options.safetyProfile);
    if (options.safetyProfile && !profile) {
      this.log.warn({ safetyProfile: options.safetyProfile }, 'Unknown safety profile; using provider defaults');
    }

    const { content, provider, model } = await this.complete({
      messages,
      maxTokens: options.maxOutputTokens,
      temperature: profile?.temperature,
    });
    return { text: content, provider, model };
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    let lastError: Error | undefined;
    let failedOver: LLMProviderName | undefined;

    for (const { provider, breaker } of this.route) {
      if (breaker.isOpen(this.now())) {
        this.log.debug({ provider: provider.name }, 'Circuit open, skipping');
        continue;
      }

      const stopTimer = llmRequestDuration.startTimer({ provider: provider.name, model: provider.model });
      try {
        const response = await provider.complete(request);
        stopTimer({ status: 'success' });
        breaker.recordSuccess();
        this.recordUsage(response);

        if (failedOver) {
          llmProviderFailovers.inc({ from_provider: failedOver, to_provider: provider.name, reason: 'error' });
          this.log.info({ from: failedOver, to: provider.name }, 'Failed over to fallback provider');
        }
        return response;
      } catch (err) {
        stopTimer({ status: 'error' });
        lastError = err instanceof Error ? err : new Error(String(err));
        failedOver = provider.name;

        if (breaker.recordFailure(this.now())) {
          this.log.error({ provider: provider.name, resetMs: breaker.resetMs }, 'Circuit opened for provider');
        }
        this.log.warn({ provider: provider.name, err: lastError.message }, 'Provider failed');
      }
    }

    throw new InferenceFailureError(
      lastError ? `All LLM providers failed: ${lastError.message}` : 'All LLM provider circuits are open',
      { cause: lastError },
    );
  }

  async healthCheck(): Promise<ProviderHealthReport> {
    const entries = await Promise.all(
      this.route.map(async ({ provider }) => {
        const started = Date.now();
        const healthy = await provider.healthCheck().catch(() => false);
        const status: 'ok' | 'error' = healthy ? 'ok' : 'error';
        return [provider.name, { status, latencyMs: Date.now() - started }] as const;
      }),
    );
    return Object.fromEntries(entries);
  }

  isFullyOpen(): boolean {
    const now = this.now();
    return this.route.every(({ breaker }) => breaker.isOpen(now));
  }

  private recordUsage(response: LLMCompletionResponse): void {
    const labels = { provider: response.provider, model: response.model };
    llmTokenUsage.inc({ ...labels, token_type: 'prompt' }, response.usage.promptTokens);
    llmTokenUsage.inc({ ...labels, token_type: 'completion' }, response.usage.completionTokens);
  }
}
