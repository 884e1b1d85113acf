import { performance } from 'perf_hooks';
import { v4 as uuidv4 } from 'uuid';
import { Channel } from '../config/types';

export type SpanStatus = 'ok' | 'error';

export interface Span {
  name: string;
  startedAt: number;
  durationMs?: number;
  status: SpanStatus;
  attributes: Record<string, string | number | boolean>;
}

/** Per-request trace: one per inbound webhook, shared by every pipeline stage */
export interface TraceContext {
  requestId: string;
  sessionId?: string;
  channel?: Channel;
  spans: Span[];
}

export function createTraceContext(init: { requestId?: string; channel?: Channel } = {}): TraceContext {
  return { requestId: init.requestId ?? uuidv4(), channel: init.channel, spans: [] };
}

export function startSpan(ctx: TraceContext, name: string, attributes: Span['attributes'] = {}): Span {
  const span: Span = { name, startedAt: performance.now(), status: 'ok', attributes };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: Span, status: SpanStatus = 'ok'): void {
  span.durationMs = Math.round(performance.now() - span.startedAt);
  span.status = status;
}

/** Milliseconds per stage; repeated stages (commit retries) are summed */
export function summarizeSpans(ctx: TraceContext): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.durationMs === undefined) continue;
    totals[span.name] = (totals[span.name] ?? 0) + span.durationMs;
  }
  return totals;
}

export function failedSpans(ctx: TraceContext): string[] {
  return ctx.spans.filter((s) => s.status === 'error').map((s) => s.name);
}
