import OpenAI from 'openai';
import { logger } from '../observability/logger';

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  /** Vectors come back in input order */
  embedBatch(texts: string[]): Promise<number[][]>;
}

const MAX_INPUTS_PER_REQUEST = 100;

/** Embeddings for the local FAQ index through the OpenAI embeddings endpoint */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client?: OpenAI;
  private readonly log = logger.child({ component: 'embeddings' });

  constructor(
    apiKey: string,
    private readonly model: string,
    timeoutMs = 10_000,
  ) {
    this.client = apiKey ? new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 1 }) : undefined;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) throw new Error('Embedding API returned no vectors');
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const client = this.client;
    if (!client) throw new Error('OPENAI_API_KEY is required for FAQ embeddings');

    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += MAX_INPUTS_PER_REQUEST) {
      const input = texts.slice(offset, offset + MAX_INPUTS_PER_REQUEST);
      const res = await client.embeddings.create({ model: this.model, input });
      const ordered = [...res.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((d) => d.embedding));
    }

    this.log.debug({ inputs: texts.length, model: this.model }, 'Embedded batch');
    return vectors;
  }
}
