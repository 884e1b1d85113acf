import OpenAI from 'openai';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse } from '../types';
import { logger } from '../../observability/logger';

type ChatCompletion = OpenAI.Chat.ChatCompletion;

function toResponse(completion: ChatCompletion, fallbackModel: string, latencyMs: number): LLMCompletionResponse {
  const content = completion.choices[0]?.message?.content;
  if (!content) {
    throw new Error('OpenAI returned no message content');
  }
  return {
    content,
    model: completion.model || fallbackModel,
    provider: 'openai',
    usage: {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      totalTokens: completion.usage?.total_tokens ?? 0,
    },
    latencyMs,
  };
}

/**
 * Chat completions. The SDK's own retries are off so attempts stay within
 * the reply composer's deadline.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly defaultTemperature: number;
  private log = logger.child({ component: 'openai-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.defaultTemperature = config.temperature;
    this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const startedAt = Date.now();
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: request.temperature ?? this.defaultTemperature,
      max_tokens: request.maxTokens,
    });

    if (completion.choices[0]?.finish_reason === 'length') {
      this.log.debug({ maxTokens: request.maxTokens }, 'Completion hit the output token limit');
    }
    return toResponse(completion, this.model, Date.now() - startedAt);
  }

  /** Looks up the configured model; no tokens spent */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch (err) {
      this.log.warn({ err, model: this.model }, 'OpenAI health check failed');
      return false;
    }
  }
}
