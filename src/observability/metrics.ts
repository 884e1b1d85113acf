import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'gateway_' });

export const httpRequestDuration = new Histogram({
  name: 'gateway_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const messagesReceived = new Counter({
  name: 'gateway_messages_received_total',
  help: 'Inbound messages normalized, by channel',
  labelNames: ['channel'] as const,
  registers: [registry],
});

export const turnDuration = new Histogram({
  name: 'gateway_turn_duration_seconds',
  help: 'Time to produce a reply for one inbound message',
  labelNames: ['channel', 'outcome'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 4, 8, 15],
  registers: [registry],
});

export const guardrailDecisions = new Counter({
  name: 'gateway_guardrail_decisions_total',
  help: 'Guardrail decisions by action and intent',
  labelNames: ['action', 'intent'] as const,
  registers: [registry],
});

export const replaysServed = new Counter({
  name: 'gateway_replays_total',
  help: 'Duplicate messages answered from the stored reply',
  labelNames: ['channel'] as const,
  registers: [registry],
});

export const sessionConflicts = new Counter({
  name: 'gateway_session_conflicts_total',
  help: 'Optimistic concurrency conflicts on session commit',
  labelNames: ['channel'] as const,
  registers: [registry],
});

export const sessionStoreErrors = new Counter({
  name: 'gateway_session_store_errors_total',
  help: 'Session store operations that failed after retries',
  labelNames: ['operation'] as const,
  registers: [registry],
});

export const stateTransitions = new Counter({
  name: 'gateway_state_transitions_total',
  help: 'Session state transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const retrievalFailures = new Counter({
  name: 'gateway_retrieval_failures_total',
  help: 'Knowledge searches that failed or timed out',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const inferenceFailures = new Counter({
  name: 'gateway_inference_failures_total',
  help: 'Inference attempts that failed',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const replyPostProcessing = new Counter({
  name: 'gateway_reply_postprocess_total',
  help: 'Generated replies replaced or altered by post-processing',
  labelNames: ['rule'] as const,
  registers: [registry],
});

export const deliveryAttempts = new Counter({
  name: 'gateway_delivery_attempts_total',
  help: 'Outbound delivery attempts by channel and status',
  labelNames: ['channel', 'status'] as const,
  registers: [registry],
});

export const deliveryFailures = new Counter({
  name: 'gateway_delivery_failures_total',
  help: 'Follow-up deliveries that exhausted their retries',
  labelNames: ['channel'] as const,
  registers: [registry],
});

export const llmRequestDuration = new Histogram({
  name: 'gateway_llm_request_duration_seconds',
  help: 'LLM provider request duration',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 4, 8, 16],
  registers: [registry],
});

export const llmTokenUsage = new Counter({
  name: 'gateway_llm_tokens_total',
  help: 'LLM tokens consumed',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [registry],
});

export const llmProviderFailovers = new Counter({
  name: 'gateway_llm_provider_failovers_total',
  help: 'Requests served by a fallback provider',
  labelNames: ['from_provider', 'to_provider', 'reason'] as const,
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
