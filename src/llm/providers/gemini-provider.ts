import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse } from '../types';
import { ShapedConversation, shapeConversation } from './message-shaping';
import { logger } from '../../observability/logger';

/** Gemini names the assistant side "model" and wraps text in parts */
function toContents(turns: ShapedConversation['turns']): Content[] {
  return turns.map((turn) => ({
    role: turn.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: turn.content }],
  }));
}

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private readonly client: GoogleGenerativeAI;
  private log = logger.child({ component: 'gemini-provider' });

  constructor(private readonly config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const startedAt = Date.now();
    const { system, turns } = shapeConversation(request.messages);

    const model = this.client.getGenerativeModel(
      {
        model: this.model,
        ...(system ? { systemInstruction: system } : {}),
        generationConfig: {
          temperature: request.temperature ?? this.config.temperature,
          maxOutputTokens: request.maxTokens,
        },
      },
      { timeout: this.config.timeoutMs },
    );

    const { response } = await model.generateContent({ contents: toContents(turns) });
    const text = response.text();
    if (!text) {
      throw new Error('Gemini returned no text');
    }

    const usage = response.usageMetadata;
    return {
      content: text,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - startedAt,
    };
  }

  /** Token count call; does not generate */
  async healthCheck(): Promise<boolean> {
    try {
      const model = this.client.getGenerativeModel({ model: this.model }, { timeout: this.config.timeoutMs });
      await model.countTokens('ping');
      return true;
    } catch (err) {
      this.log.warn({ err, model: this.model }, 'Gemini health check failed');
      return false;
    }
  }
}
