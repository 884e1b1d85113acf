import {
  ConversationTurn,
  GuardrailAction,
  GuardrailDecision,
  InboundMessage,
  OutboundReply,
  RetrievalResult,
  Session,
} from '../config/types';
import { PipelineConfig } from '../config/pipeline-config';
import { InferenceResult, InferenceService, LLMMessage } from '../llm/types';
import { buildPrompt } from './prompt-builder';
import { DENYLIST_TEXT, SAFE_FALLBACK_TEXT } from './templates';
import { truncateForChannel } from '../channels/channel-capabilities';
import { appendHistory, recordProcessedReply, sessionIdFor } from '../session/session-model';
import { StateMachine, TurnOutcome, stateMachine } from '../orchestrator/state-machine';
import { Deadline } from '../resilience/deadline';
import { retryWithBackoff, withTimeout } from '../resilience/retry';
import { InferenceFailureError, TimeoutError } from '../errors/pipeline-errors';
import { logger } from '../observability/logger';
import { inferenceFailures, replyPostProcessing } from '../observability/metrics';

export interface ComposeResult {
  reply: OutboundReply;
  /** Next session snapshot, not yet committed */
  session: Session;
}

interface Draft {
  text: string;
  action: GuardrailAction;
  outcome: TurnOutcome;
  generated: boolean;
  citations?: string[];
}

function padWords(text: string): string {
  return ` ${text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim()} `;
}

/** Whole-word match, so "pin" does not trip on "shipping" */
export function findDenylistedTerm(text: string, terms: readonly string[]): string | undefined {
  const haystack = padWords(text);
  return terms.find((term) => {
    const needle = padWords(term);
    return needle.trim().length > 0 && haystack.includes(needle);
  });
}

/**
 * Turns a guardrail decision into reply text and the next session snapshot.
 *
 * The only component that appends history, applies state transitions and
 * records processed replies. It never throws for inference problems: they end
 * in the safe-fallback template with the session marked escalated.
 */
export class ReplyComposer {
  private log = logger.child({ component: 'reply-composer' });

  constructor(
    private readonly config: PipelineConfig,
    private readonly inference: InferenceService,
    private readonly states: StateMachine = stateMachine,
    private readonly clock: () => number = Date.now,
  ) {}

  async compose(
    decision: GuardrailDecision,
    message: InboundMessage,
    retrieval: RetrievalResult,
    session: Session,
    deadline: Deadline,
  ): Promise<ComposeResult> {
    const draft =
      decision.action === 'ANSWER'
        ? await this.answer(message, retrieval, session, deadline)
        : this.templateDraft(decision.action);

    const text = truncateForChannel(message.channel, draft.text);
    if (text !== draft.text) {
      replyPostProcessing.inc({ rule: 'truncated' });
    }

    const escalatedThisTurn = draft.outcome !== 'answered';
    const reply: OutboundReply = {
      channel: message.channel,
      target: message.replyTarget,
      text,
      metadata: {
        messageId: message.messageId,
        sessionId: session.sessionId,
        action: draft.action,
        intent: decision.intent,
        escalated: escalatedThisTurn,
        generated: draft.generated,
        ...(draft.citations ? { citations: draft.citations } : {}),
      },
    };

    return { reply, session: this.nextSession(session, message, decision, draft, reply) };
  }

  /**
   * Uncommitted safe reply for when the turn cannot complete (store failure,
   * commit retries exhausted).
   */
  fallbackReply(message: InboundMessage, intent: string = 'unknown'): OutboundReply {
    return {
      channel: message.channel,
      target: message.replyTarget,
      text: truncateForChannel(message.channel, SAFE_FALLBACK_TEXT),
      metadata: {
        messageId: message.messageId,
        sessionId: sessionIdFor(message.channel, message.externalUserId),
        action: 'SAFE_FALLBACK',
        intent,
        escalated: true,
        generated: false,
      },
    };
  }

  private templateDraft(action: 'SAFE_FALLBACK' | 'ESCALATE'): Draft {
    return {
      text: SAFE_FALLBACK_TEXT,
      action,
      outcome: action === 'ESCALATE' ? 'escalated' : 'fallback',
      generated: false,
    };
  }

  private async answer(
    message: InboundMessage,
    retrieval: RetrievalResult,
    session: Session,
    deadline: Deadline,
  ): Promise<Draft> {
    const prompt = buildPrompt({
      messageText: message.text,
      history: session.history,
      passages: retrieval.passages,
      historyTurns: this.config.session.promptHistoryTurns,
      safetyProfile: this.config.inference.safetyProfile,
    });

    const raw = await this.generate(prompt, deadline, session.sessionId);
    if (raw === null) {
      return this.templateDraft('SAFE_FALLBACK');
    }

    const output = raw.trim();
    if (!output) {
      replyPostProcessing.inc({ rule: 'empty' });
      this.log.warn({ sessionId: session.sessionId }, 'Model returned empty output; using safe fallback');
      return this.templateDraft('SAFE_FALLBACK');
    }

    const term = findDenylistedTerm(output, this.config.denylist);
    if (term) {
      replyPostProcessing.inc({ rule: 'denylist' });
      this.log.warn({ sessionId: session.sessionId, term }, 'Model output hit denylist; replacing reply');
      return { text: DENYLIST_TEXT, action: 'SAFE_FALLBACK', outcome: 'fallback', generated: false };
    }

    const citations = retrieval.passages
      .map((p) => p.source)
      .filter((s): s is string => typeof s === 'string');

    return {
      text: output,
      action: 'ANSWER',
      outcome: 'answered',
      generated: true,
      ...(citations.length > 0 ? { citations } : {}),
    };
  }

  /** Model text, or null once attempts or deadline run out */
  private async generate(prompt: LLMMessage[], deadline: Deadline, sessionId: string): Promise<string | null> {
    const inf = this.config.inference;

    try {
      const result = await retryWithBackoff(
        async (): Promise<InferenceResult> => {
          const budget = deadline.budget(inf.timeoutMs);
          if (budget < inf.minAttemptBudgetMs) {
            throw new TimeoutError('inference', budget);
          }
          return withTimeout(
            this.inference.generate(prompt, {
              maxOutputTokens: inf.maxOutputTokens,
              safetyProfile: inf.safetyProfile,
            }),
            budget,
            'inference',
          );
        },
        { attempts: inf.maxAttempts, baseDelayMs: inf.retryDelayMs, maxDelayMs: inf.retryDelayMs },
        {
          shouldRetry: () => deadline.remainingMs() >= inf.retryDelayMs + inf.minAttemptBudgetMs,
          onRetry: (err, attempt, delayMs) => {
            inferenceFailures.inc({ reason: err instanceof TimeoutError ? 'timeout' : 'error' });
            this.log.warn({ err, sessionId, attempt, delayMs }, 'Inference attempt failed, retrying');
          },
        },
      );
      return result.text;
    } catch (err) {
      inferenceFailures.inc({ reason: err instanceof TimeoutError ? 'timeout' : 'error' });
      this.log.error(
        { err: new InferenceFailureError('Inference gave up; replying with safe fallback', { cause: err }), sessionId },
        'Inference failed',
      );
      return null;
    }
  }

  private nextSession(
    session: Session,
    message: InboundMessage,
    decision: GuardrailDecision,
    draft: Draft,
    reply: OutboundReply,
  ): Session {
    const userTurn: ConversationTurn = {
      role: 'user',
      content: message.text,
      timestamp: message.receivedAt,
      messageId: message.messageId,
    };
    const assistantTurn: ConversationTurn = {
      role: 'assistant',
      content: reply.text,
      timestamp: this.clock(),
      messageId: message.messageId,
      ...(draft.citations ? { citations: draft.citations } : {}),
    };

    const newState = this.states.advance(session.sessionId, session.state, draft.outcome, decision.reason);

    // Older deliveries are still answered but never move the pointer back
    const advances = session.lastMessageAt === undefined || message.receivedAt >= session.lastMessageAt;

    return {
      ...session,
      state: newState,
      history: appendHistory(session.history, [userTurn, assistantTurn], this.config.session.historyMaxTurns),
      escalated: session.escalated || draft.outcome !== 'answered',
      lastIntent: decision.intent,
      lastMessageId: advances ? message.messageId : session.lastMessageId,
      lastMessageAt: advances ? message.receivedAt : session.lastMessageAt,
      processedReplies: recordProcessedReply(
        session.processedReplies,
        { messageId: message.messageId, reply },
        this.config.session.replayWindow,
      ),
    };
  }
}
