import { buildPrompt, buildSystemPrompt, formatPassages } from '../../src/reply/prompt-builder';
import { SYSTEM_PROMPT } from '../../src/reply/templates';
import { ConversationTurn } from '../../src/config/types';

function turn(role: 'user' | 'assistant', content: string): ConversationTurn {
  return { role, content, timestamp: 0, messageId: content };
}

describe('buildPrompt', () => {
  const history = [turn('user', 'one'), turn('assistant', 'two'), turn('user', 'three'), turn('assistant', 'four')];

  it('orders system, recent history, then the user message', () => {
    const messages = buildPrompt({ messageText: 'five', history, passages: [], historyTurns: 2 });
    expect(messages).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'three' },
      { role: 'assistant', content: 'four' },
      { role: 'user', content: 'five' },
    ]);
  });

  it('omits history when historyTurns is 0', () => {
    expect(buildPrompt({ messageText: 'x', history, passages: [], historyTurns: 0 })).toHaveLength(2);
  });

  it('appends the safety profile instruction to the system prompt', () => {
    expect(buildSystemPrompt('strict').startsWith(`${SYSTEM_PROMPT}\n\nNever ask for`)).toBe(true);
    expect(buildSystemPrompt('unknown-profile')).toBe(SYSTEM_PROMPT);
  });
});

describe('formatPassages', () => {
  it('numbers trimmed passages', () => {
    expect(formatPassages([{ text: ' first ', score: 1 }, { text: 'second', score: 0.5 }])).toBe(
      'Reference passages:\n[1] first\n[2] second',
    );
  });

  it('is empty without passages', () => {
    expect(formatPassages([])).toBe('');
  });
});
