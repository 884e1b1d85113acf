import { createTraceContext, endSpan, failedSpans, startSpan, summarizeSpans } from '../../src/observability/trace';

describe('trace', () => {
  it('creates a context with a fresh request id', () => {
    const a = createTraceContext({ channel: 'web' });
    const b = createTraceContext();
    expect(a.channel).toBe('web');
    expect(a.requestId).not.toBe(b.requestId);
    expect(createTraceContext({ requestId: 'req-1' }).requestId).toBe('req-1');
  });

  it('sums repeated stages and skips open spans', () => {
    const ctx = createTraceContext();
    const first = startSpan(ctx, 'session.commit', { attempt: 1 });
    const second = startSpan(ctx, 'session.commit', { attempt: 2 });
    startSpan(ctx, 'compose');
    endSpan(first, 'error');
    endSpan(second);
    first.durationMs = 3;
    second.durationMs = 4;

    expect(summarizeSpans(ctx)).toEqual({ 'session.commit': 7 });
    expect(failedSpans(ctx)).toEqual(['session.commit']);
  });
});
