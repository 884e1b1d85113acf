import Ajv, { SchemaObject } from 'ajv';
import { InboundMessage, OutboundReply } from '../config/types';
import { MalformedPayloadError } from '../errors/pipeline-errors';
import {
  ChannelResponse,
  DeferredChannelAdapter,
  NormalizeOutcome,
  jsonResponse,
} from './types';

/** Interaction types and callback types from the Discord interactions API */
export const InteractionType = { PING: 1, APPLICATION_COMMAND: 2 } as const;
export const InteractionCallback = {
  PONG: 1,
  CHANNEL_MESSAGE_WITH_SOURCE: 4,
  DEFERRED_CHANNEL_MESSAGE_WITH_SOURCE: 5,
} as const;
const EPHEMERAL_FLAG = 64;

export const SUPPORTED_COMMANDS: readonly string[] = ['chat', 'ask'];
export const PROMPT_OPTIONS: readonly string[] = ['q', 'prompt', 'text', 'pesan'];

const DISCORD_EPOCH = 1420070400000n;

interface CommandOption {
  name: string;
  type?: number;
  value?: string | number | boolean;
}

interface DiscordUser {
  id: string;
}

interface Interaction {
  type: number;
  id?: string;
  token?: string;
  application_id?: string;
  data?: { name: string; options?: CommandOption[] };
  member?: { user?: DiscordUser };
  user?: DiscordUser;
}

const userSchema: SchemaObject = {
  type: 'object',
  properties: { id: { type: 'string' } },
  required: ['id'],
};

const interactionSchema: SchemaObject = {
  type: 'object',
  properties: {
    type: { type: 'integer' },
    id: { type: 'string' },
    token: { type: 'string' },
    application_id: { type: 'string' },
    data: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        options: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              type: { type: 'integer' },
              value: { type: ['string', 'number', 'boolean'] },
            },
            required: ['name'],
          },
        },
      },
      required: ['name'],
    },
    member: {
      type: 'object',
      properties: { user: userSchema },
    },
    user: userSchema,
  },
  required: ['type'],
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateInteraction = ajv.compile<Interaction>(interactionSchema);

function ephemeral(content: string): ChannelResponse {
  return jsonResponse({
    type: InteractionCallback.CHANNEL_MESSAGE_WITH_SOURCE,
    data: { content, flags: EPHEMERAL_FLAG },
  });
}

/** Creation time encoded in a snowflake id */
export function snowflakeTimestamp(id: string): number | undefined {
  if (!/^\d+$/.test(id)) return undefined;
  return Number((BigInt(id) >> 22n) + DISCORD_EPOCH);
}

export interface DiscordAdapterOptions {
  apiBaseUrl: string;
  fetchImpl?: typeof fetch;
}

/**
 * Discord slash-command interactions. The webhook must be acknowledged within
 * three seconds, so replies are deferred and sent later as a follow-up message.
 */
export class DiscordAdapter implements DeferredChannelAdapter {
  readonly channel = 'discord' as const;
  readonly delivery = 'deferred' as const;
  private readonly apiBaseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DiscordAdapterOptions) {
    this.apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  normalize(payload: unknown, receivedAt: number = Date.now()): NormalizeOutcome {
    if (!validateInteraction(payload)) {
      throw new MalformedPayloadError(this.channel, ajv.errorsText(validateInteraction.errors));
    }

    if (payload.type === InteractionType.PING) {
      return { kind: 'reply', response: jsonResponse({ type: InteractionCallback.PONG }) };
    }

    if (payload.type !== InteractionType.APPLICATION_COMMAND) {
      throw new MalformedPayloadError(this.channel, `unsupported interaction type ${payload.type}`);
    }

    const { id, token, application_id: applicationId, data } = payload;
    const userId = payload.member?.user?.id ?? payload.user?.id;
    if (!id) throw new MalformedPayloadError(this.channel, 'missing id');
    if (!token) throw new MalformedPayloadError(this.channel, 'missing token');
    if (!applicationId) throw new MalformedPayloadError(this.channel, 'missing application_id');
    if (!userId) throw new MalformedPayloadError(this.channel, 'missing user');
    if (!data) throw new MalformedPayloadError(this.channel, 'missing command data');

    if (!SUPPORTED_COMMANDS.includes(data.name)) {
      return { kind: 'reply', response: ephemeral(`Unknown command. Try /${SUPPORTED_COMMANDS[0]}.`) };
    }

    const option = (data.options ?? []).find(
      (o) => PROMPT_OPTIONS.includes(o.name) && typeof o.value === 'string' && o.value.trim(),
    );
    const text = typeof option?.value === 'string' ? option.value.trim() : '';
    if (!text) {
      return { kind: 'reply', response: ephemeral('Please include a question with the command.') };
    }

    return {
      kind: 'message',
      message: {
        channel: this.channel,
        externalUserId: userId,
        messageId: id,
        text,
        receivedAt: snowflakeTimestamp(id) ?? receivedAt,
        replyTarget: `${applicationId}/${token}`,
      },
    };
  }

  renderAck(_message: InboundMessage): ChannelResponse {
    return jsonResponse({ type: InteractionCallback.DEFERRED_CHANNEL_MESSAGE_WITH_SOURCE });
  }

  async sendFollowUp(reply: OutboundReply, signal?: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(`${this.apiBaseUrl}/webhooks/${reply.target}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ content: reply.text, allowed_mentions: { parse: [] } }),
      signal,
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new Error(`Discord follow-up returned HTTP ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`);
    }
  }
}
