import fs from 'fs';
import yaml from 'js-yaml';
import Ajv, { JSONSchemaType } from 'ajv';
import { RetrievedPassage } from '../config/types';
import { FAQEntry, KnowledgeSource } from './types';
import { EmbeddingProvider } from './embedding-service';
import { VectorStore } from './vector-store';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

interface SearchResponse {
  matches: Array<{ text: string; score: number; source?: string }>;
}

const searchResponseSchema: JSONSchemaType<SearchResponse> = {
  type: 'object',
  properties: {
    matches: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          text: { type: 'string' },
          score: { type: 'number' },
          source: { type: 'string', nullable: true },
        },
        required: ['text', 'score'],
      },
    },
  },
  required: ['matches'],
};

const validateSearchResponse = ajv.compile(searchResponseSchema);

/**
 * Remote search service: POST `{query, top_k}` → `{matches: [{text, score}]}`.
 */
export class HttpKnowledgeSource implements KnowledgeSource {
  readonly name = 'http';

  constructor(
    private readonly endpoint: string,
    private readonly apiKey?: string,
  ) {}

  async search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievedPassage[]> {
    const response = await fetch(this.endpoint, {
      signal,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
      },
      body: JSON.stringify({ query, top_k: topK }),
    });

    if (!response.ok) {
      throw new Error(`Knowledge search returned HTTP ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!validateSearchResponse(body)) {
      throw new Error(`Knowledge search response invalid: ${ajv.errorsText(validateSearchResponse.errors)}`);
    }

    return body.matches.map((m) => ({ text: m.text, score: m.score, source: m.source }));
  }
}

interface FAQFile {
  faqs: FAQEntry[];
}

const faqFileSchema: JSONSchemaType<FAQFile> = {
  type: 'object',
  properties: {
    faqs: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          question: { type: 'string' },
          answer: { type: 'string' },
          tags: { type: 'array', items: { type: 'string' }, nullable: true },
        },
        required: ['question', 'answer'],
      },
    },
  },
  required: ['faqs'],
};

const validateFAQFile = ajv.compile(faqFileSchema);

export function loadFAQFile(filePath: string): FAQEntry[] {
  const parsed: unknown = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  if (!validateFAQFile(parsed)) {
    throw new Error(`Invalid FAQ file ${filePath}: ${ajv.errorsText(validateFAQFile.errors)}`);
  }
  return parsed.faqs;
}

/**
 * Local FAQ index: entries are embedded once, on first search, into an in-memory
 * vector store. A failed build is retried on the next search.
 */
export class VectorKnowledgeSource implements KnowledgeSource {
  readonly name = 'faq-vector';
  private store = new VectorStore();
  private building?: Promise<void>;
  private log = logger.child({ component: 'faq-vector-source' });

  constructor(
    private readonly entries: FAQEntry[],
    private readonly embeddings: EmbeddingProvider,
  ) {}

  async search(query: string, topK: number): Promise<RetrievedPassage[]> {
    await this.ensureIndexed();
    const vector = await this.embeddings.embed(query);
    return this.store.search(vector, topK);
  }

  private ensureIndexed(): Promise<void> {
    if (!this.building) {
      this.building = this.buildIndex().catch((err: unknown) => {
        this.building = undefined;
        throw err;
      });
    }
    return this.building;
  }

  private async buildIndex(): Promise<void> {
    const texts = this.entries.map((e) => `Q: ${e.question}\nA: ${e.answer}`);
    const vectors = await this.embeddings.embedBatch(texts);
    this.store.load(
      this.entries.map((entry, i) => ({
        id: `faq-${i + 1}`,
        vector: vectors[i] ?? [],
        text: texts[i],
        source: `faq:${entry.question}`,
      })),
    );
    this.log.info({ entries: this.store.size }, 'FAQ vector index built');
  }
}
