import { RetrievalResult, RetrievedPassage } from '../config/types';
import { PipelineConfig } from '../config/pipeline-config';
import { KnowledgeSource } from './types';
import { Deadline } from '../resilience/deadline';
import { withTimeout } from '../resilience/retry';
import { RetrievalUnavailableError, TimeoutError, toError } from '../errors/pipeline-errors';
import { logger } from '../observability/logger';
import { retrievalFailures } from '../observability/metrics';

export interface RetrievalSettings {
  enabled: boolean;
  topK: number;
  timeoutMs: number;
  scoreThreshold: number;
}

export function retrievalSettings(config: PipelineConfig): RetrievalSettings {
  return {
    enabled: config.retrieval.enabled,
    topK: config.retrieval.topK,
    timeoutMs: config.retrieval.timeoutMs,
    scoreThreshold: config.guardrail.scoreThreshold,
  };
}

/**
 * Runs the knowledge search for a turn. Never throws: a missing source yields
 * `configured: false`, a failing one an empty result with `configured: true`.
 */
export class RetrievalOrchestrator {
  private log = logger.child({ component: 'retrieval' });

  constructor(
    private readonly settings: RetrievalSettings,
    private readonly source?: KnowledgeSource,
  ) {}

  get configured(): boolean {
    return this.settings.enabled && this.source !== undefined;
  }

  async retrieve(
    queryText: string,
    topK: number = this.settings.topK,
    deadline: Deadline = Deadline.none(),
  ): Promise<RetrievalResult> {
    if (!this.settings.enabled || !this.source) {
      return { query: queryText, passages: [], topScore: 0, configured: false };
    }

    const budget = deadline.budget(this.settings.timeoutMs);
    try {
      if (budget <= 0) {
        throw new TimeoutError('retrieval', 0);
      }
      const raw = await withTimeout(
        this.source.search(queryText, topK, AbortSignal.timeout(budget)),
        budget,
        'retrieval',
      );
      return this.rank(queryText, raw);
    } catch (err) {
      const cause = toError(err);
      const failure = new RetrievalUnavailableError(`Knowledge source "${this.source.name}" unavailable`, { cause });
      retrievalFailures.inc({ reason: cause instanceof TimeoutError ? 'timeout' : 'error' });
      this.log.warn({ err: failure, cause: cause.message, source: this.source.name }, 'Retrieval unavailable; continuing without passages');
      return { query: queryText, passages: [], topScore: 0, configured: true };
    }
  }

  private rank(query: string, raw: RetrievedPassage[]): RetrievalResult {
    const sorted = raw
      .filter((p) => Number.isFinite(p.score))
      .sort((a, b) => b.score - a.score);
    const topScore = sorted.length > 0 ? sorted[0].score : 0;
    const passages = sorted.filter((p) => p.score >= this.settings.scoreThreshold);

    this.log.debug({ hits: raw.length, kept: passages.length, topScore }, 'Retrieval complete');
    return { query, passages, topScore, configured: true };
  }
}
