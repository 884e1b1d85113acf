import twilio from 'twilio';
import { OutboundReply } from '../config/types';
import { MalformedPayloadError } from '../errors/pipeline-errors';
import { ChannelResponse, ImmediateChannelAdapter, NormalizeOutcome, isRecord } from './types';

function field(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === 'string' ? value.trim() : '';
}

function twimlResponse(text?: string): ChannelResponse {
  const response = new twilio.twiml.MessagingResponse();
  if (text !== undefined) {
    response.message(text);
  }
  return { statusCode: 200, contentType: 'text/xml', body: response.toString() };
}

/**
 * WhatsApp through the Twilio Messaging webhook (form-encoded).
 * Replies synchronously as TwiML in the webhook response.
 */
export class WhatsAppAdapter implements ImmediateChannelAdapter {
  readonly channel = 'whatsapp' as const;
  readonly delivery = 'immediate' as const;

  normalize(payload: unknown, receivedAt: number = Date.now()): NormalizeOutcome {
    if (!isRecord(payload)) {
      throw new MalformedPayloadError(this.channel, 'body is not a form payload');
    }

    const from = field(payload, 'From');
    const messageSid = field(payload, 'MessageSid');
    if (!from) throw new MalformedPayloadError(this.channel, 'missing From');
    if (!messageSid) throw new MalformedPayloadError(this.channel, 'missing MessageSid');

    const body = field(payload, 'Body');
    const numMedia = parseInt(field(payload, 'NumMedia') || '0', 10);

    if (!body) {
      if (numMedia > 0) {
        // Media-only messages are acknowledged without a reply
        return { kind: 'reply', response: twimlResponse() };
      }
      throw new MalformedPayloadError(this.channel, 'missing Body');
    }

    const waId = field(payload, 'WaId');
    return {
      kind: 'message',
      message: {
        channel: this.channel,
        externalUserId: waId || from.replace(/^whatsapp:/, ''),
        messageId: messageSid,
        text: body,
        receivedAt,
        replyTarget: from,
      },
    };
  }

  render(reply: OutboundReply): ChannelResponse {
    return twimlResponse(reply.text);
  }
}
