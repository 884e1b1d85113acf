import path from 'path';
import { Orchestrator, TurnResult } from '../../src/orchestrator/orchestrator';
import { InMemorySessionStore } from '../../src/session/session-store';
import { CommitResult, SessionStore } from '../../src/session/types';
import { Session } from '../../src/config/types';
import { Deadline } from '../../src/resilience/deadline';
import { RetrievalOrchestrator } from '../../src/retrieval/retrieval-orchestrator';
import { GuardrailEngine } from '../../src/guardrail/guardrail-engine';
import { KeywordIntentClassifier } from '../../src/guardrail/intent-classifier';
import { ReplyComposer } from '../../src/reply/reply-composer';
import { SAFE_FALLBACK_TEXT } from '../../src/reply/templates';
import { createPipelineConfig } from '../../src/config/pipeline-config';
import { FakeInference, InterceptingStore, StaticKnowledgeSource, makeMessage } from '../helpers/fixtures';
import { KnowledgeSource } from '../../src/retrieval/types';

const config = createPipelineConfig({
  inference: { timeoutMs: 100, retryDelayMs: 1, minAttemptBudgetMs: 10 },
  retrieval: { enabled: true, timeoutMs: 50 },
});
const classifier = KeywordIntentClassifier.fromFile(path.join(__dirname, '..', '..', 'config', 'intents.yaml'));

function buildOrchestrator(store: SessionStore, inference: FakeInference, source?: KnowledgeSource): Orchestrator {
  return new Orchestrator(
    {
      store,
      retrieval: new RetrievalOrchestrator({ enabled: true, topK: 4, timeoutMs: 50, scoreThreshold: 0.5 }, source),
      guardrail: new GuardrailEngine(classifier, config.guardrail),
      composer: new ReplyComposer(config, inference),
    },
    config,
  );
}

describe('Orchestrator', () => {
  let store: InMemorySessionStore;
  let inference: FakeInference;
  let orchestrator: Orchestrator;

  beforeEach(() => {
    store = new InMemorySessionStore(config.session.ttlMs);
    inference = new FakeInference(['Halo! Ada yang bisa kami bantu?']);
    orchestrator = buildOrchestrator(store, inference);
  });

  it('answers a greeting and commits the first session version', async () => {
    const result = await orchestrator.handleTurn(makeMessage({ text: 'halo' }));

    expect(result.replayed).toBe(false);
    expect(result.decision?.action).toBe('ANSWER');
    expect(result.reply.text).toBe('Halo! Ada yang bisa kami bantu?');
    expect(result.reply.metadata.escalated).toBe(false);
    expect(result.session?.version).toBe(1);
    expect(result.session?.state).toBe('ACTIVE');

    const stored = await store.load('web:tester');
    expect(stored?.history.map((t) => t.role)).toEqual(['user', 'assistant']);
  });

  it('escalates out-of-scope messages without calling the model', async () => {
    const result = await orchestrator.handleTurn(makeMessage({ text: 'tell me a joke about cats' }));

    expect(inference.calls).toHaveLength(0);
    expect(result.reply.text).toBe(SAFE_FALLBACK_TEXT);
    expect(result.reply.metadata.action).toBe('ESCALATE');
    expect(result.session?.state).toBe('ESCALATED');
  });

  it('keeps an escalated session escalated on later turns', async () => {
    await orchestrator.handleTurn(makeMessage({ messageId: 'm-1', text: 'tell me a joke' }));
    const later = await orchestrator.handleTurn(makeMessage({ messageId: 'm-2', text: 'halo' }));

    expect(later.reply.metadata.action).toBe('ANSWER');
    expect(later.session?.state).toBe('ESCALATED');
    expect(later.session?.escalated).toBe(true);
    expect(later.session?.version).toBe(2);
  });

  it('replays the stored reply for a duplicate message id', async () => {
    const first = await orchestrator.handleTurn(makeMessage({ messageId: 'dup-1' }));
    const second = await orchestrator.handleTurn(makeMessage({ messageId: 'dup-1' }));

    expect(second.replayed).toBe(true);
    expect(second.reply).toEqual(first.reply);
    expect(inference.calls).toHaveLength(1);
    expect((await store.load('web:tester'))?.version).toBe(1);
  });

  it('falls back on low retrieval scores when a source is configured', async () => {
    const source = new StaticKnowledgeSource([{ text: 'unrelated', score: 0.1 }]);
    const result = await buildOrchestrator(store, inference, source).handleTurn(makeMessage({ text: 'how do i pay' }));

    expect(result.reply.metadata.action).toBe('SAFE_FALLBACK');
    expect(result.session?.state).toBe('NEW');
    expect(result.session?.escalated).toBe(true);
    expect(inference.calls).toHaveLength(0);
  });

  it('reloads and re-runs the turn after a commit conflict', async () => {
    const intercepting = new InterceptingStore(store);
    const racer = buildOrchestrator(store, new FakeInference(['racer reply']));
    intercepting.beforeCommit = async (_sessionId, commit) => {
      if (commit === 1) {
        await racer.handleTurn(makeMessage({ messageId: 'racer', text: 'hello', receivedAt: 1_700_000_000_500 }));
      }
    };

    const result = await buildOrchestrator(intercepting, inference).handleTurn(makeMessage({ messageId: 'mine' }));

    expect(intercepting.commits).toBe(2);
    expect(inference.calls).toHaveLength(2);
    expect(result.session?.version).toBe(2);
    expect(result.session?.history.map((t) => t.messageId)).toEqual(['racer', 'racer', 'mine', 'mine']);
    expect(result.session?.processedReplies.map((p) => p.messageId)).toEqual(['racer', 'mine']);
    // "mine" was received earlier than "racer", so the pointer stays on the newer message
    expect(result.session?.lastMessageId).toBe('racer');
  });

  it('replays the winner when the same message id arrives twice at once', async () => {
    const intercepting = new InterceptingStore(store);
    const twin = buildOrchestrator(store, new FakeInference(['first delivery']));
    let twinResult: TurnResult | undefined;
    intercepting.beforeCommit = async (_sessionId, commit) => {
      if (commit === 1) {
        twinResult = await twin.handleTurn(makeMessage({ messageId: 'same' }));
      }
    };

    const result = await buildOrchestrator(intercepting, inference).handleTurn(makeMessage({ messageId: 'same' }));

    expect(twinResult?.replayed).toBe(false);
    expect(result.replayed).toBe(true);
    expect(result.reply).toEqual(twinResult?.reply);
    expect(result.reply.text).toBe('first delivery');
    expect(intercepting.commits).toBe(1);
    const stored = await store.load('web:tester');
    expect(stored?.version).toBe(1);
    expect(stored?.processedReplies.map((p) => p.messageId)).toEqual(['same']);
  });

  it('commits two concurrent messages for the same user', async () => {
    await Promise.all([
      orchestrator.handleTurn(makeMessage({ messageId: 'a', text: 'halo' })),
      orchestrator.handleTurn(makeMessage({ messageId: 'b', text: 'hello' })),
    ]);

    const stored = await store.load('web:tester');
    expect(stored?.version).toBe(2);
    expect(stored?.processedReplies.map((p) => p.messageId).sort()).toEqual(['a', 'b']);
  });

  it('returns an uncommitted fallback once commit attempts run out', async () => {
    const alwaysConflicting: SessionStore = {
      load: jest.fn().mockResolvedValue(null),
      commit: jest.fn().mockResolvedValue({ ok: false, conflict: true, currentVersion: 9 }),
    };

    const result = await buildOrchestrator(alwaysConflicting, inference).handleTurn(makeMessage());

    expect(alwaysConflicting.commit).toHaveBeenCalledTimes(3);
    expect(result.session).toBeUndefined();
    expect(result.reply.text).toBe(SAFE_FALLBACK_TEXT);
    expect(result.reply.metadata.intent).toBe('greeting');
  });

  it('returns a fallback when the session cannot be loaded', async () => {
    const broken: SessionStore = {
      load: jest.fn().mockRejectedValue(new Error('ECONNREFUSED')),
      commit: jest.fn(),
    };

    const result = await buildOrchestrator(broken, inference).handleTurn(makeMessage());

    expect(result.reply.text).toBe(SAFE_FALLBACK_TEXT);
    expect(result.reply.metadata.intent).toBe('unknown');
    expect(broken.commit).not.toHaveBeenCalled();
    expect(inference.calls).toHaveLength(0);
  });

  it('returns a fallback when the commit throws', async () => {
    const broken: SessionStore = {
      load: jest.fn().mockResolvedValue(null),
      commit: jest.fn().mockRejectedValue(new Error('READONLY')),
    };

    const result = await buildOrchestrator(broken, inference).handleTurn(makeMessage());

    expect(result.session).toBeUndefined();
    expect(result.reply.metadata.action).toBe('SAFE_FALLBACK');
    expect(result.decision?.action).toBe('ANSWER');
  });

  it('stays within the turn deadline when the store is slow', async () => {
    const slow: SessionStore = {
      load: () => new Promise<Session | null>((resolve) => setTimeout(() => resolve(null), 300)),
      commit: () =>
        new Promise<CommitResult>((resolve) =>
          setTimeout(() => resolve({ ok: false, conflict: true, currentVersion: 9 }), 300),
        ),
    };

    const started = Date.now();
    const result = await buildOrchestrator(slow, inference).handleTurn(makeMessage(), {
      deadline: Deadline.after(500),
    });

    expect(Date.now() - started).toBeLessThan(700);
    expect(result.session).toBeUndefined();
    expect(result.reply.text).toBe(SAFE_FALLBACK_TEXT);
  });

  it('does not touch the store once the deadline has passed', async () => {
    const untouched: SessionStore = { load: jest.fn(), commit: jest.fn() };

    const result = await buildOrchestrator(untouched, inference).handleTurn(makeMessage(), {
      deadline: Deadline.after(0, 0),
    });

    expect(untouched.load).not.toHaveBeenCalled();
    expect(result.reply.metadata.action).toBe('SAFE_FALLBACK');
  });
});
