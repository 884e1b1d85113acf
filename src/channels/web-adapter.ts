import Ajv, { JSONSchemaType } from 'ajv';
import { v4 as uuidv4 } from 'uuid';
import { OutboundReply } from '../config/types';
import { MalformedPayloadError } from '../errors/pipeline-errors';
import { ChannelResponse, ImmediateChannelAdapter, NormalizeOutcome, jsonResponse } from './types';

export const DEFAULT_WEB_USER = 'webtester';

interface WebChatPayload {
  text?: string;
  q?: string;
  user?: string;
  message_id?: string;
}

const webChatSchema: JSONSchemaType<WebChatPayload> = {
  type: 'object',
  properties: {
    text: { type: 'string', nullable: true },
    q: { type: 'string', nullable: true },
    user: { type: 'string', nullable: true, maxLength: 128 },
    message_id: { type: 'string', nullable: true, maxLength: 128 },
  },
  required: [],
};

const ajv = new Ajv({ allErrors: true });
const validateWebChat = ajv.compile(webChatSchema);

/**
 * JSON web chat: `{text|q, user?, message_id?}` in, `{answer, intent, escalate, replayed}` out.
 */
export class WebAdapter implements ImmediateChannelAdapter {
  readonly channel = 'web' as const;
  readonly delivery = 'immediate' as const;

  normalize(payload: unknown, receivedAt: number = Date.now()): NormalizeOutcome {
    if (!validateWebChat(payload)) {
      throw new MalformedPayloadError(this.channel, ajv.errorsText(validateWebChat.errors));
    }

    const text = (payload.text ?? payload.q ?? '').trim();
    if (!text) {
      throw new MalformedPayloadError(this.channel, 'missing text');
    }

    const user = payload.user?.trim() || DEFAULT_WEB_USER;
    return {
      kind: 'message',
      message: {
        channel: this.channel,
        externalUserId: user,
        // Without a client id there is nothing to deduplicate on
        messageId: payload.message_id?.trim() || uuidv4(),
        text,
        receivedAt,
        replyTarget: user,
      },
    };
  }

  render(reply: OutboundReply, replayed: boolean): ChannelResponse {
    return jsonResponse({
      answer: reply.text,
      intent: reply.metadata.intent,
      escalate: reply.metadata.escalated,
      replayed,
    });
  }
}
