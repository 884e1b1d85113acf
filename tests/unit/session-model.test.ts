import {
  appendHistory,
  createInitialSession,
  findProcessedReply,
  parseSession,
  recordProcessedReply,
  sessionIdFor,
} from '../../src/session/session-model';
import { ConversationTurn, OutboundReply } from '../../src/config/types';
import { makeMessage, makeReply } from '../helpers/fixtures';

function turn(n: number): ConversationTurn {
  return { role: 'user', content: `message ${n}`, timestamp: n, messageId: `m-${n}` };
}

describe('session model', () => {
  it('derives the session id from channel and user', () => {
    expect(sessionIdFor('whatsapp', '6281234')).toBe('whatsapp:6281234');
  });

  it('creates a NEW session at version 0', () => {
    const session = createInitialSession(makeMessage({ channel: 'web', externalUserId: 'alice' }), 5000);
    expect(session).toEqual({
      sessionId: 'web:alice',
      channel: 'web',
      externalUserId: 'alice',
      state: 'NEW',
      history: [],
      escalated: false,
      version: 0,
      createdAt: 5000,
      updatedAt: 5000,
      expiresAt: 5000,
      processedReplies: [],
    });
  });

  describe('appendHistory', () => {
    it('keeps only the newest turns', () => {
      const history = [turn(1), turn(2), turn(3)];
      const next = appendHistory(history, [turn(4), turn(5)], 4);
      expect(next.map((t) => t.messageId)).toEqual(['m-2', 'm-3', 'm-4', 'm-5']);
    });

    it('does not mutate the input', () => {
      const history = [turn(1)];
      appendHistory(history, [turn(2)], 10);
      expect(history).toHaveLength(1);
    });
  });

  describe('processed replies', () => {
    const reply = (id: string): OutboundReply => makeReply({ messageId: id, text: `reply ${id}` });

    it('finds a stored reply by message id', () => {
      const session = createInitialSession(makeMessage());
      session.processedReplies = [{ messageId: 'a', reply: reply('a') }];
      expect(findProcessedReply(session, 'a')?.text).toBe('reply a');
      expect(findProcessedReply(session, 'b')).toBeUndefined();
    });

    it('bounds the replay window, oldest out first', () => {
      let processed = recordProcessedReply([], { messageId: 'a', reply: reply('a') }, 2);
      processed = recordProcessedReply(processed, { messageId: 'b', reply: reply('b') }, 2);
      processed = recordProcessedReply(processed, { messageId: 'c', reply: reply('c') }, 2);
      expect(processed.map((p) => p.messageId)).toEqual(['b', 'c']);
    });

    it('replaces an entry with the same message id', () => {
      let processed = recordProcessedReply([], { messageId: 'a', reply: reply('a') }, 5);
      processed = recordProcessedReply(processed, { messageId: 'a', reply: reply('a2') }, 5);
      expect(processed).toHaveLength(1);
    });
  });

  describe('parseSession', () => {
    it('round-trips a valid record', () => {
      const session = createInitialSession(makeMessage(), 1);
      expect(parseSession(JSON.stringify(session))).toEqual(session);
    });

    it('returns null for a record of the wrong shape', () => {
      expect(parseSession(JSON.stringify({ sessionId: 'x', state: 'BOGUS' }))).toBeNull();
    });
  });
});
