import { GuardrailDecision, InboundMessage, OutboundReply, Session } from '../config/types';
import { PipelineConfig } from '../config/pipeline-config';
import { SessionStore } from '../session/types';
import { createInitialSession, findProcessedReply, sessionIdFor } from '../session/session-model';
import { RetrievalOrchestrator } from '../retrieval/retrieval-orchestrator';
import { GuardrailEngine } from '../guardrail/guardrail-engine';
import { ReplyComposer } from '../reply/reply-composer';
import { Deadline } from '../resilience/deadline';
import { withTimeout } from '../resilience/retry';
import { SessionConflictError } from '../errors/pipeline-errors';
import { logger } from '../observability/logger';
import { maskUserId, redactPII } from '../observability/pii-redactor';
import { TraceContext, createTraceContext, startSpan, endSpan, failedSpans, summarizeSpans } from '../observability/trace';
import {
  guardrailDecisions,
  messagesReceived,
  replaysServed,
  sessionConflicts,
  turnDuration,
} from '../observability/metrics';

/** Bounded deadlines cap the whole store call, internal retries included */
function withinDeadline<T>(work: Promise<T>, deadline: Deadline, operation: string): Promise<T> {
  return deadline.bounded ? withTimeout(work, deadline.remainingMs(), operation) : work;
}

export interface TurnOptions {
  deadline?: Deadline;
  trace?: TraceContext;
}

export interface TurnResult {
  reply: OutboundReply;
  /** Committed session; absent when the turn ended in an uncommitted fallback */
  session?: Session;
  replayed: boolean;
  decision?: GuardrailDecision;
}

export interface OrchestratorDeps {
  store: SessionStore;
  retrieval: RetrievalOrchestrator;
  guardrail: GuardrailEngine;
  composer: ReplyComposer;
}

/**
 * Runs one inbound message through load → retrieve → decide → compose → commit.
 *
 * Owns the optimistic-concurrency loop: a commit conflict reloads the session
 * and re-runs the turn against the fresh baseline, up to `maxCommitAttempts`.
 * Store failures and exhausted retries end in an uncommitted safe reply; this
 * method does not throw.
 */
export class Orchestrator {
  private readonly store: SessionStore;
  private readonly retrieval: RetrievalOrchestrator;
  private readonly guardrail: GuardrailEngine;
  private readonly composer: ReplyComposer;

  constructor(
    deps: OrchestratorDeps,
    private readonly config: PipelineConfig,
  ) {
    this.store = deps.store;
    this.retrieval = deps.retrieval;
    this.guardrail = deps.guardrail;
    this.composer = deps.composer;
  }

  async handleTurn(message: InboundMessage, options: TurnOptions = {}): Promise<TurnResult> {
    const sessionId = sessionIdFor(message.channel, message.externalUserId);
    const trace = options.trace ?? createTraceContext({ channel: message.channel });
    trace.sessionId = sessionId;
    const deadline = options.deadline ?? Deadline.none();

    const log = logger.child({
      requestId: trace.requestId,
      sessionId: `${message.channel}:${maskUserId(message.externalUserId)}`,
      channel: message.channel,
      messageId: message.messageId,
    });

    messagesReceived.inc({ channel: message.channel });
    const stopTimer = turnDuration.startTimer({ channel: message.channel });
    const spanTurn = startSpan(trace, 'turn');

    const finish = (result: TurnResult, outcome: string): TurnResult => {
      endSpan(spanTurn, outcome === 'fallback' ? 'error' : 'ok');
      stopTimer({ outcome });
      log.info(
        {
          outcome,
          action: result.reply.metadata.action,
          intent: result.reply.metadata.intent,
          version: result.session?.version,
          spans: summarizeSpans(trace),
          failedSpans: failedSpans(trace),
        },
        'Turn complete',
      );
      return result;
    };

    let lastDecision: GuardrailDecision | undefined;

    const outOfTime = (step: string): TurnResult => {
      log.warn({ step }, 'Turn deadline passed; replying with safe fallback');
      return finish(
        { reply: this.composer.fallbackReply(message, lastDecision?.intent), replayed: false, decision: lastDecision },
        'fallback',
      );
    };

    for (let attempt = 1; attempt <= this.config.session.maxCommitAttempts; attempt++) {
      if (deadline.expired()) return outOfTime('session.load');

      let loaded: Session | null;
      const spanLoad = startSpan(trace, 'session.load', { attempt });
      try {
        loaded = await withinDeadline(this.store.load(sessionId), deadline, 'session.load');
        endSpan(spanLoad);
      } catch (err) {
        endSpan(spanLoad, 'error');
        log.error({ err, attempt }, 'Session load failed; replying with safe fallback');
        return finish({ reply: this.composer.fallbackReply(message, lastDecision?.intent), replayed: false }, 'fallback');
      }

      const baseline = loaded ?? createInitialSession(message);
      const expectedVersion = loaded ? loaded.version : 0;

      const stored = findProcessedReply(baseline, message.messageId);
      if (stored) {
        replaysServed.inc({ channel: message.channel });
        log.info({ attempt }, 'Duplicate message; replaying stored reply');
        return finish({ reply: stored, session: baseline, replayed: true }, 'replayed');
      }

      const spanRetrieve = startSpan(trace, 'retrieval');
      const retrieval = await this.retrieval.retrieve(message.text, undefined, deadline);
      endSpan(spanRetrieve);

      const decision = this.guardrail.decide(message.text, retrieval, baseline.history);
      lastDecision = decision;
      guardrailDecisions.inc({ action: decision.action, intent: decision.intent });
      log.info(
        {
          action: decision.action,
          intent: decision.intent,
          confidence: decision.confidence,
          reason: decision.reason,
          preview: redactPII(message.text.slice(0, 80)),
        },
        'Guardrail decision',
      );

      const spanCompose = startSpan(trace, 'compose');
      const composed = await this.composer.compose(decision, message, retrieval, baseline, deadline);
      endSpan(spanCompose);

      if (deadline.expired()) return outOfTime('session.commit');

      const spanCommit = startSpan(trace, 'session.commit', { attempt, expectedVersion });
      try {
        const result = await withinDeadline(
          this.store.commit(sessionId, expectedVersion, composed.session),
          deadline,
          'session.commit',
        );
        if (result.ok) {
          endSpan(spanCommit);
          return finish(
            { reply: composed.reply, session: result.session, replayed: false, decision },
            'committed',
          );
        }
        endSpan(spanCommit, 'error');
        sessionConflicts.inc({ channel: message.channel });
        log.warn(
          { attempt, expectedVersion, currentVersion: result.currentVersion },
          'Session commit conflict; reloading',
        );
      } catch (err) {
        endSpan(spanCommit, 'error');
        log.error({ err, attempt }, 'Session commit failed; replying with safe fallback');
        return finish({ reply: this.composer.fallbackReply(message, decision.intent), replayed: false, decision }, 'fallback');
      }
    }

    log.error(
      { err: new SessionConflictError(sessionId, this.config.session.maxCommitAttempts) },
      'Commit attempts exhausted; replying with uncommitted safe fallback',
    );
    return finish(
      { reply: this.composer.fallbackReply(message, lastDecision?.intent), replayed: false, decision: lastDecision },
      'fallback',
    );
  }
}
