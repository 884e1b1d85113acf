import { InboundMessage, OutboundReply, RetrievalResult, Session } from '../../src/config/types';
import { CommitResult, SessionStore } from '../../src/session/types';
import { InferenceOptions, InferenceResult, InferenceService, LLMMessage } from '../../src/llm/types';
import { KnowledgeSource } from '../../src/retrieval/types';

export function makeMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    channel: 'web',
    externalUserId: 'tester',
    messageId: 'msg-1',
    text: 'halo',
    receivedAt: 1_700_000_000_000,
    replyTarget: 'tester',
    ...overrides,
  };
}

export function makeReply(overrides: { messageId?: string; text?: string } = {}): OutboundReply {
  return {
    channel: 'web',
    target: 'tester',
    text: overrides.text ?? 'hello',
    metadata: {
      messageId: overrides.messageId ?? 'msg-1',
      sessionId: 'web:tester',
      action: 'ANSWER',
      intent: 'greeting',
      escalated: false,
      generated: true,
    },
  };
}

export function makeRetrieval(overrides: Partial<RetrievalResult> = {}): RetrievalResult {
  return { query: 'halo', passages: [], topScore: 0, configured: false, ...overrides };
}

/**
 * Scripted inference: each call takes the next step; a step is reply text,
 * an Error to throw, or a function of the prompt.
 */
export class FakeInference implements InferenceService {
  readonly calls: Array<{ messages: LLMMessage[]; options: InferenceOptions }> = [];

  constructor(private readonly steps: Array<string | Error | ((messages: LLMMessage[]) => string)> = ['ok']) {}

  async generate(messages: LLMMessage[], options: InferenceOptions): Promise<InferenceResult> {
    this.calls.push({ messages, options });
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (step instanceof Error) throw step;
    const text = typeof step === 'function' ? step(messages) : step;
    return { text, provider: 'openai', model: 'fake-model' };
  }
}

export class StaticKnowledgeSource implements KnowledgeSource {
  readonly name = 'static';
  calls = 0;

  constructor(private readonly passages: Array<{ text: string; score: number; source?: string }>) {}

  async search(_query: string, topK: number) {
    this.calls++;
    return this.passages.slice(0, topK);
  }
}

/** Store wrapper that lets a test run code between a load and the following commit */
export class InterceptingStore implements SessionStore {
  beforeCommit?: (sessionId: string, attempt: number) => Promise<void>;
  commits = 0;

  constructor(private readonly inner: SessionStore) {}

  load(sessionId: string): Promise<Session | null> {
    return this.inner.load(sessionId);
  }

  async commit(sessionId: string, expectedVersion: number, session: Session): Promise<CommitResult> {
    this.commits++;
    if (this.beforeCommit) await this.beforeCommit(sessionId, this.commits);
    return this.inner.commit(sessionId, expectedVersion, session);
  }
}
