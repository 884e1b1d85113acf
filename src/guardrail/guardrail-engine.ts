import { ConversationTurn, GuardrailDecision, RetrievalResult } from '../config/types';
import { PipelineConfig } from '../config/pipeline-config';
import { IntentClassifier, OUT_OF_SCOPE, clampConfidence } from './intent-classifier';

/**
 * Decides ANSWER / SAFE_FALLBACK / ESCALATE for one message.
 *
 * Pure: same inputs and thresholds always give the same decision.
 * Checks run in order:
 *   1. out-of-scope intent → ESCALATE
 *   2. knowledge source configured but best score under threshold → SAFE_FALLBACK
 *   3. classifier confidence under threshold → SAFE_FALLBACK
 *   4. otherwise ANSWER
 */
export class GuardrailEngine {
  constructor(
    private readonly classifier: IntentClassifier,
    private readonly thresholds: PipelineConfig['guardrail'],
  ) {}

  decide(
    messageText: string,
    retrieval: RetrievalResult,
    history: readonly ConversationTurn[],
  ): GuardrailDecision {
    const classification = this.classifier.classify(messageText, history);
    const intent = classification.intent;
    const confidence = clampConfidence(classification.confidence);

    if (intent === OUT_OF_SCOPE) {
      return { action: 'ESCALATE', intent, confidence, reason: 'intent out of scope' };
    }

    if (retrieval.configured && retrieval.topScore < this.thresholds.scoreThreshold) {
      return {
        action: 'SAFE_FALLBACK',
        intent,
        confidence,
        reason: `retrieval score ${retrieval.topScore.toFixed(2)} below ${this.thresholds.scoreThreshold}`,
      };
    }

    if (confidence < this.thresholds.confidenceThreshold) {
      return {
        action: 'SAFE_FALLBACK',
        intent,
        confidence,
        reason: `confidence ${confidence.toFixed(2)} below ${this.thresholds.confidenceThreshold}`,
      };
    }

    return { action: 'ANSWER', intent, confidence, reason: 'confident' };
  }
}
