/** Channel identifiers */
export type Channel = 'whatsapp' | 'discord' | 'web';

export const CHANNELS: readonly Channel[] = ['whatsapp', 'discord', 'web'];

/** Canonical inbound message, produced by a channel adapter */
export interface InboundMessage {
  channel: Channel;
  externalUserId: string;
  /** Idempotency key */
  messageId: string;
  text: string;
  receivedAt: number;
  /** Where the reply goes: Twilio sender, Discord `applicationId/token`, web user id */
  replyTarget: string;
}

/** Session lifecycle states. Expiry is a TTL removal, not a state. */
export type SessionState = 'NEW' | 'ACTIVE' | 'ESCALATED';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
  timestamp: number;
  messageId: string;
  citations?: string[];
}

export interface ProcessedReply {
  messageId: string;
  reply: OutboundReply;
}

export interface Session {
  sessionId: string;
  channel: Channel;
  externalUserId: string;
  state: SessionState;
  history: ConversationTurn[];
  lastMessageId?: string;
  lastMessageAt?: number;
  lastIntent?: string;
  escalated: boolean;
  version: number;
  createdAt: number;
  updatedAt: number;
  expiresAt: number;
  /** Most recent replies keyed by inbound message id, oldest first */
  processedReplies: ProcessedReply[];
}

export interface RetrievedPassage {
  text: string;
  score: number;
  source?: string;
}

export interface RetrievalResult {
  query: string;
  /** Passages at or above the score threshold, best first */
  passages: RetrievedPassage[];
  topScore: number;
  /** True when a knowledge source is configured and enabled */
  configured: boolean;
}

export type GuardrailAction = 'ANSWER' | 'SAFE_FALLBACK' | 'ESCALATE';

export interface GuardrailDecision {
  action: GuardrailAction;
  intent: string;
  confidence: number;
  reason: string;
}

export interface ReplyMetadata {
  messageId: string;
  sessionId: string;
  action: GuardrailAction;
  intent: string;
  escalated: boolean;
  /** false when the text came from a static template */
  generated: boolean;
  citations?: string[];
}

export interface OutboundReply {
  channel: Channel;
  target: string;
  text: string;
  metadata: ReplyMetadata;
}
