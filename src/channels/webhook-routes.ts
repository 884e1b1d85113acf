import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { Channel, InboundMessage } from '../config/types';
import { PipelineConfig } from '../config/pipeline-config';
import { Orchestrator } from '../orchestrator/orchestrator';
import { ReplyComposer } from '../reply/reply-composer';
import { OutboundDispatcher } from '../dispatch/outbound-dispatcher';
import { FollowUpTracker } from '../dispatch/follow-up-tracker';
import { RequestVerifier } from '../security/webhook-verifier';
import { Deadline } from '../resilience/deadline';
import { AuthenticationFailureError, MalformedPayloadError } from '../errors/pipeline-errors';
import { ChannelResponse, ChannelAdapter } from './types';
import { logger } from '../observability/logger';
import { createTraceContext, TraceContext } from '../observability/trace';

export interface WebhookRouteDeps {
  config: PipelineConfig;
  orchestrator: Orchestrator;
  composer: ReplyComposer;
  dispatcher: OutboundDispatcher;
  followUps: FollowUpTracker;
  adapters: Readonly<Record<Channel, ChannelAdapter>>;
  verifiers: Readonly<Record<Channel, RequestVerifier>>;
  /** Public origin the senders sign against; derived from the request when empty */
  publicBaseUrl?: string;
}

const ROUTES: ReadonlyArray<{ path: string; channel: Channel }> = [
  { path: '/webhooks/whatsapp', channel: 'whatsapp' },
  { path: '/webhooks/discord', channel: 'discord' },
  { path: '/chat', channel: 'web' },
];

function send(reply: FastifyReply, response: ChannelResponse): FastifyReply {
  return reply.status(response.statusCode).header('content-type', response.contentType).send(response.body);
}

function stringParams(body: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof body === 'object' && body !== null) {
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === 'string') params[key] = value;
    }
  }
  return params;
}

export function registerWebhookRoutes(app: FastifyInstance, deps: WebhookRouteDeps): void {
  const log = logger.child({ component: 'webhooks' });
  const followUpsByRequest = new WeakMap<FastifyRequest, () => void>();

  const requestUrl = (req: FastifyRequest): string => {
    if (deps.publicBaseUrl) return `${deps.publicBaseUrl.replace(/\/+$/, '')}${req.url}`;
    return `${req.protocol}://${req.headers.host ?? 'localhost'}${req.url}`;
  };

  const runImmediate = async (
    message: InboundMessage,
    trace: TraceContext,
    reply: FastifyReply,
  ): Promise<FastifyReply> => {
    try {
      const result = await deps.orchestrator.handleTurn(message, {
        deadline: Deadline.after(deps.config.turnDeadlineMs),
        trace,
      });
      return send(reply, deps.dispatcher.dispatch(result.reply, result.replayed).response);
    } catch (err) {
      // The pipeline absorbs its own failures; anything landing here still gets a safe reply
      log.error({ err, requestId: trace.requestId, channel: message.channel }, 'Unexpected turn failure');
      return send(reply, deps.dispatcher.dispatch(deps.composer.fallbackReply(message)).response);
    }
  };

  const startDeferred = (
    message: InboundMessage,
    trace: TraceContext,
    req: FastifyRequest,
    reply: FastifyReply,
  ): FastifyReply => {
    const pending = deps.dispatcher.acknowledge(message);
    // The follow-up starts only once the ack has been flushed
    followUpsByRequest.set(req, () =>
      deps.followUps.run(`${message.channel}:${message.messageId}`, async () => {
        const result = await deps.orchestrator.handleTurn(message, { deadline: Deadline.none(), trace });
        await pending.deliver(result.reply);
      }),
    );
    return send(reply, pending.ack);
  };

  for (const route of ROUTES) {
    const adapter = deps.adapters[route.channel];
    const verify = deps.verifiers[route.channel];

    app.post(route.path, {
      onResponse: (req, _reply, done) => {
        const start = followUpsByRequest.get(req);
        if (start) {
          followUpsByRequest.delete(req);
          start();
        }
        done();
      },
    }, async (req, reply) => {
      const trace = createTraceContext({ channel: route.channel });

      try {
        const rawBody = req.rawBody ?? '';
        const verified = verify({
          rawBody,
          headers: req.headers,
          url: requestUrl(req),
          params: route.channel === 'whatsapp' ? stringParams(req.body) : undefined,
        });
        if (!verified) {
          throw new AuthenticationFailureError(route.channel);
        }

        const outcome = adapter.normalize(req.body);
        if (outcome.kind === 'reply') {
          return send(reply, outcome.response);
        }

        return adapter.delivery === 'deferred'
          ? startDeferred(outcome.message, trace, req, reply)
          : await runImmediate(outcome.message, trace, reply);
      } catch (err) {
        if (err instanceof AuthenticationFailureError) {
          log.warn({ requestId: trace.requestId, channel: route.channel }, 'Rejected unverified request');
          return reply.status(err.statusCode).send({ error: 'invalid request signature' });
        }
        if (err instanceof MalformedPayloadError) {
          log.warn({ requestId: trace.requestId, channel: route.channel, reason: err.message }, 'Malformed payload');
          return reply.status(400).send({ error: 'malformed payload', detail: err.message });
        }
        log.error({ err, requestId: trace.requestId, channel: route.channel }, 'Webhook processing error');
        return reply.status(500).send({ error: 'Internal server error' });
      }
    });
  }
}
