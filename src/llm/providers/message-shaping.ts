import { LLMMessage } from '../types';

export type ChatRole = 'user' | 'assistant';

export interface ShapedConversation {
  /** All system messages joined, empty when there were none */
  system: string;
  /** Strictly alternating turns, first one from the user */
  turns: Array<{ role: ChatRole; content: string }>;
}

const OPENER = '(conversation start)';

/**
 * Anthropic and Gemini take the system prompt out of band and reject two
 * consecutive turns from the same side.
 */
export function shapeConversation(messages: readonly LLMMessage[]): ShapedConversation {
  const system: string[] = [];
  const turns: ShapedConversation['turns'] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
      continue;
    }
    const last = turns[turns.length - 1];
    if (last && last.role === message.role) {
      last.content = `${last.content}\n\n${message.content}`;
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  if (turns.length > 0 && turns[0].role !== 'user') {
    turns.unshift({ role: 'user', content: OPENER });
  }

  return { system: system.join('\n\n'), turns };
}
