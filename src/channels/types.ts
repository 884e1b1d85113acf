import { Channel, InboundMessage, OutboundReply } from '../config/types';

/** What the transport writes back on the inbound HTTP request */
export interface ChannelResponse {
  statusCode: number;
  contentType: string;
  body: string;
}

/**
 * A message to run through the pipeline, or a protocol-level reply
 * the transport sends without running a turn (PING, ignored media, ...).
 */
export type NormalizeOutcome =
  | { kind: 'message'; message: InboundMessage }
  | { kind: 'reply'; response: ChannelResponse };

interface ChannelAdapterBase {
  readonly channel: Channel;
  /** Throws MalformedPayloadError when required fields are missing */
  normalize(payload: unknown, receivedAt?: number): NormalizeOutcome;
}

/** Reply rides on the inbound response */
export interface ImmediateChannelAdapter extends ChannelAdapterBase {
  readonly delivery: 'immediate';
  render(reply: OutboundReply, replayed: boolean): ChannelResponse;
}

/** Inbound gets an ack; the reply follows through a separate API call */
export interface DeferredChannelAdapter extends ChannelAdapterBase {
  readonly delivery: 'deferred';
  renderAck(message: InboundMessage): ChannelResponse;
  /** `signal` aborts the request when the attempt times out */
  sendFollowUp(reply: OutboundReply, signal?: AbortSignal): Promise<void>;
}

export type ChannelAdapter = ImmediateChannelAdapter | DeferredChannelAdapter;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function jsonResponse(body: unknown, statusCode = 200): ChannelResponse {
  return { statusCode, contentType: 'application/json; charset=utf-8', body: JSON.stringify(body) };
}
