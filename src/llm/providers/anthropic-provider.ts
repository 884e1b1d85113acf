import Anthropic from '@anthropic-ai/sdk';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse } from '../types';
import { shapeConversation } from './message-shaping';
import { logger } from '../../observability/logger';

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;
  private readonly defaultTemperature: number;
  private log = logger.child({ component: 'anthropic-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.defaultTemperature = config.temperature;
    this.client = new Anthropic({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const startedAt = Date.now();
    const { system, turns } = shapeConversation(request.messages);

    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature ?? this.defaultTemperature,
      ...(system ? { system } : {}),
      messages: turns,
    });

    const text = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text) {
      throw new Error(`Anthropic returned no text (stop_reason=${message.stop_reason ?? 'none'})`);
    }

    const { input_tokens: promptTokens, output_tokens: completionTokens } = message.usage;
    return {
      content: text,
      model: message.model || this.model,
      provider: 'anthropic',
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      latencyMs: Date.now() - startedAt,
    };
  }

  /** One-token round trip; the Messages API has no cheaper probe */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: this.model,
        max_tokens: 1,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return true;
    } catch (err) {
      this.log.warn({ err, model: this.model }, 'Anthropic health check failed');
      return false;
    }
  }
}
