import { ConversationTurn, RetrievedPassage } from '../config/types';
import { LLMMessage } from '../llm/types';
import { getSafetyProfile } from '../llm/safety-profiles';
import { SYSTEM_PROMPT } from './templates';

export interface PromptInput {
  messageText: string;
  history: readonly ConversationTurn[];
  passages: readonly RetrievedPassage[];
  /** Number of most recent history turns to include */
  historyTurns: number;
  safetyProfile?: string;
}

export function buildSystemPrompt(safetyProfile?: string): string {
  const profile = getSafetyProfile(safetyProfile);
  return profile ? `${SYSTEM_PROMPT}\n\n${profile.instruction}` : SYSTEM_PROMPT;
}

/** Numbered reference block, or an empty string when there is nothing to ground on */
export function formatPassages(passages: readonly RetrievedPassage[]): string {
  if (passages.length === 0) return '';
  const lines = passages.map((p, i) => `[${i + 1}] ${p.text.trim()}`);
  return `Reference passages:\n${lines.join('\n')}`;
}

/**
 * system → recent history → user message (with passages appended).
 */
export function buildPrompt(input: PromptInput): LLMMessage[] {
  const messages: LLMMessage[] = [{ role: 'system', content: buildSystemPrompt(input.safetyProfile) }];

  const recent = input.historyTurns > 0 ? input.history.slice(-input.historyTurns) : [];
  for (const turn of recent) {
    messages.push({ role: turn.role, content: turn.content });
  }

  const references = formatPassages(input.passages);
  messages.push({
    role: 'user',
    content: references ? `${input.messageText}\n\n${references}` : input.messageText,
  });

  return messages;
}
