import { Channel, InboundMessage, OutboundReply } from '../config/types';
import { PipelineConfig } from '../config/pipeline-config';
import { ChannelAdapter, ChannelResponse, DeferredChannelAdapter, ImmediateChannelAdapter } from '../channels/types';
import { DeliveryResult, PendingFollowUp } from './types';
import { retryWithBackoff, withTimeout } from '../resilience/retry';
import { DeliveryFailureError } from '../errors/pipeline-errors';
import { logger } from '../observability/logger';
import { deliveryAttempts, deliveryFailures } from '../observability/metrics';

export type ChannelAdapters = Readonly<Record<Channel, ChannelAdapter>>;

/**
 * Delivers replies according to each channel's contract.
 *
 * Immediate channels: `dispatch` renders the body for the inbound response.
 * Deferred channels: `acknowledge` renders the ack and hands back the only
 * handle that can send the follow-up, which retries with backoff.
 */
export class OutboundDispatcher {
  private log = logger.child({ component: 'outbound-dispatcher' });

  constructor(
    private readonly adapters: ChannelAdapters,
    private readonly policy: PipelineConfig['delivery'],
  ) {}

  dispatch(reply: OutboundReply, replayed = false): DeliveryResult & { response: ChannelResponse } {
    const adapter = this.immediate(reply.channel);
    const response = adapter.render(reply, replayed);
    deliveryAttempts.inc({ channel: reply.channel, status: 'delivered' });
    return { status: 'delivered', mode: 'immediate', attempts: 1, response };
  }

  acknowledge(message: InboundMessage): PendingFollowUp {
    const adapter = this.deferred(message.channel);
    const ack = adapter.renderAck(message);
    let used = false;

    return {
      ack,
      deliver: (reply: OutboundReply) => {
        if (used) {
          return Promise.reject(new Error(`Follow-up for ${message.messageId} already delivered`));
        }
        used = true;
        return this.followUp(adapter, reply);
      },
    };
  }

  private async followUp(adapter: DeferredChannelAdapter, reply: OutboundReply): Promise<DeliveryResult> {
    const log = this.log.child({ channel: reply.channel, messageId: reply.metadata.messageId });
    let attempts = 0;

    try {
      await retryWithBackoff(
        (attempt) => {
          attempts = attempt;
          // Abort the request too, so a timed-out attempt cannot land after the retry
          const signal = AbortSignal.timeout(this.policy.timeoutMs);
          return withTimeout(adapter.sendFollowUp(reply, signal), this.policy.timeoutMs, 'delivery');
        },
        this.policy.retry,
        {
          onRetry: (err, attempt, delayMs) => {
            deliveryAttempts.inc({ channel: reply.channel, status: 'failed' });
            log.warn({ err, attempt, delayMs }, 'Follow-up delivery failed, retrying');
          },
        },
      );
      deliveryAttempts.inc({ channel: reply.channel, status: 'delivered' });
      log.info({ attempts }, 'Follow-up delivered');
      return { status: 'delivered', mode: 'follow_up', attempts };
    } catch (err) {
      deliveryAttempts.inc({ channel: reply.channel, status: 'failed' });
      deliveryFailures.inc({ channel: reply.channel });
      const failure = new DeliveryFailureError(reply.channel, attempts, { cause: err });
      log.error({ err: failure, cause: err instanceof Error ? err.message : String(err) }, 'Follow-up delivery gave up');
      return { status: 'failed', mode: 'follow_up', attempts, error: failure.message };
    }
  }

  private immediate(channel: Channel): ImmediateChannelAdapter {
    const adapter = this.adapters[channel];
    if (adapter.delivery !== 'immediate') {
      throw new Error(`Channel ${channel} does not deliver immediately; use acknowledge()`);
    }
    return adapter;
  }

  private deferred(channel: Channel): DeferredChannelAdapter {
    const adapter = this.adapters[channel];
    if (adapter.delivery !== 'deferred') {
      throw new Error(`Channel ${channel} delivers immediately; use dispatch()`);
    }
    return adapter;
  }
}
