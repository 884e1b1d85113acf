import {
  Channel,
  ConversationTurn,
  InboundMessage,
  OutboundReply,
  ProcessedReply,
  Session,
  CHANNELS,
} from '../config/types';

export function sessionIdFor(channel: Channel, externalUserId: string): string {
  return `${channel}:${externalUserId}`;
}

/** Fresh, never-committed session for a first message (version 0) */
export function createInitialSession(message: InboundMessage, now: number = Date.now()): Session {
  return {
    sessionId: sessionIdFor(message.channel, message.externalUserId),
    channel: message.channel,
    externalUserId: message.externalUserId,
    state: 'NEW',
    history: [],
    escalated: false,
    version: 0,
    createdAt: now,
    updatedAt: now,
    expiresAt: now,
    processedReplies: [],
  };
}

/** Append turns, keeping only the newest `maxTurns` */
export function appendHistory(
  history: readonly ConversationTurn[],
  turns: readonly ConversationTurn[],
  maxTurns: number,
): ConversationTurn[] {
  const next = [...history, ...turns];
  return next.length > maxTurns ? next.slice(next.length - maxTurns) : next;
}

export function findProcessedReply(session: Session, messageId: string): OutboundReply | undefined {
  return session.processedReplies.find((p) => p.messageId === messageId)?.reply;
}

/** Record a reply, keeping the newest `window` entries */
export function recordProcessedReply(
  processed: readonly ProcessedReply[],
  entry: ProcessedReply,
  window: number,
): ProcessedReply[] {
  const next = [...processed.filter((p) => p.messageId !== entry.messageId), entry];
  return next.length > window ? next.slice(next.length - window) : next;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isChannel(value: unknown): value is Channel {
  return typeof value === 'string' && CHANNELS.some((c) => c === value);
}

/** Shape check for records read back from storage */
export function isSession(value: unknown): value is Session {
  if (!isRecord(value)) return false;
  return (
    typeof value.sessionId === 'string' &&
    isChannel(value.channel) &&
    typeof value.externalUserId === 'string' &&
    (value.state === 'NEW' || value.state === 'ACTIVE' || value.state === 'ESCALATED') &&
    Array.isArray(value.history) &&
    typeof value.escalated === 'boolean' &&
    typeof value.version === 'number' &&
    typeof value.createdAt === 'number' &&
    typeof value.updatedAt === 'number' &&
    typeof value.expiresAt === 'number' &&
    Array.isArray(value.processedReplies)
  );
}

export function parseSession(raw: string): Session | null {
  const parsed: unknown = JSON.parse(raw);
  return isSession(parsed) ? parsed : null;
}
