import { RetrievedPassage } from '../config/types';

/**
 * A searchable knowledge backend. Scores are the backend's native
 * similarity, higher meaning more relevant.
 */
export interface KnowledgeSource {
  readonly name: string;
  search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievedPassage[]>;
}

export interface FAQEntry {
  question: string;
  answer: string;
  tags?: string[];
}
