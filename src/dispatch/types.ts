import { OutboundReply } from '../config/types';
import { ChannelResponse } from '../channels/types';

export interface DeliveryResult {
  status: 'delivered' | 'failed';
  mode: 'immediate' | 'follow_up';
  attempts: number;
  /** Set for immediate delivery: what goes back on the inbound request */
  response?: ChannelResponse;
  error?: string;
}

/**
 * Handle returned by `acknowledge`. The follow-up can only be sent through it,
 * and only once.
 */
export interface PendingFollowUp {
  readonly ack: ChannelResponse;
  deliver(reply: OutboundReply): Promise<DeliveryResult>;
}
