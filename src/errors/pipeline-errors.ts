import { Channel } from '../config/types';

export type PipelineErrorCode =
  | 'MALFORMED_PAYLOAD'
  | 'AUTHENTICATION_FAILURE'
  | 'SESSION_CONFLICT'
  | 'RETRIEVAL_UNAVAILABLE'
  | 'INFERENCE_FAILURE'
  | 'DELIVERY_FAILURE'
  | 'TIMEOUT';

/**
 * Base class for every failure the reply pipeline raises.
 * Only MalformedPayloadError and AuthenticationFailureError reach the transport;
 * the rest are absorbed into a safe reply and logged.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedPayloadError extends PipelineError {
  readonly code = 'MALFORMED_PAYLOAD' as const;

  constructor(readonly channel: Channel, detail: string) {
    super(`Malformed ${channel} payload: ${detail}`);
  }
}

export class AuthenticationFailureError extends PipelineError {
  readonly code = 'AUTHENTICATION_FAILURE' as const;

  constructor(readonly channel: Channel, detail = 'signature verification failed') {
    super(`${channel} request rejected: ${detail}`);
  }

  /** Discord expects 401 on a bad signature; the other channels answer 403 */
  get statusCode(): number {
    return this.channel === 'discord' ? 401 : 403;
  }
}

export class SessionConflictError extends PipelineError {
  readonly code = 'SESSION_CONFLICT' as const;

  constructor(readonly sessionId: string, readonly attempts: number) {
    super(`Session ${sessionId} still conflicting after ${attempts} commit attempts`);
  }
}

export class RetrievalUnavailableError extends PipelineError {
  readonly code = 'RETRIEVAL_UNAVAILABLE' as const;
}

export class InferenceFailureError extends PipelineError {
  readonly code = 'INFERENCE_FAILURE' as const;
}

export class DeliveryFailureError extends PipelineError {
  readonly code = 'DELIVERY_FAILURE' as const;

  constructor(readonly channel: Channel, readonly attempts: number, options?: { cause?: unknown }) {
    super(`Delivery on ${channel} failed after ${attempts} attempts`, options);
  }
}

export class TimeoutError extends PipelineError {
  readonly code = 'TIMEOUT' as const;

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
