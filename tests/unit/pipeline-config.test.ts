import { createPipelineConfig, loadPipelineConfig, validatePipelineConfig } from '../../src/config/pipeline-config';
import { env } from '../../src/config/env';

describe('pipeline config', () => {
  it('accepts the defaults and freezes the result', () => {
    const config = createPipelineConfig();
    expect(validatePipelineConfig(config)).toEqual([]);
    expect(Object.isFrozen(config.guardrail)).toBe(true);
    expect(Object.isFrozen(config.session.retry)).toBe(true);
  });

  it('rejects thresholds that are not numbers', () => {
    expect(() => createPipelineConfig({ guardrail: { confidenceThreshold: Number.NaN } })).toThrow(
      'Invalid pipeline configuration: guardrail.confidenceThreshold must be a number between 0 and 1 (got NaN)',
    );
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => createPipelineConfig({ guardrail: { scoreThreshold: 1.5 } })).toThrow(
      'guardrail.scoreThreshold must be a number between 0 and 1 (got 1.5)',
    );
    expect(() => createPipelineConfig({ guardrail: { confidenceThreshold: -0.1 } })).toThrow(
      'guardrail.confidenceThreshold must be a number between 0 and 1',
    );
  });

  it('accepts the threshold bounds themselves', () => {
    expect(() => createPipelineConfig({ guardrail: { confidenceThreshold: 0, scoreThreshold: 1 } })).not.toThrow();
  });

  it('rejects zero or fractional counts and timeouts', () => {
    expect(() => createPipelineConfig({ retrieval: { topK: 0 } })).toThrow('retrieval.topK must be a positive integer (got 0)');
    expect(() => createPipelineConfig({ delivery: { retry: { attempts: 2.5 } } })).toThrow(
      'delivery.retry.attempts must be a positive integer (got 2.5)',
    );
    expect(() => createPipelineConfig({ session: { operationTimeoutMs: Number.NaN } })).toThrow(
      'session.operationTimeoutMs must be a positive integer (got NaN)',
    );
  });

  it('rejects negative delays', () => {
    expect(() => createPipelineConfig({ inference: { retryDelayMs: -1 } })).toThrow(
      'inference.retryDelayMs must be a non-negative integer (got -1)',
    );
  });

  it('lists every problem at once', () => {
    const config = { ...createPipelineConfig(), turnDeadlineMs: 0, guardrail: { confidenceThreshold: 2, scoreThreshold: 0.5 } };
    expect(validatePipelineConfig(config)).toEqual([
      'guardrail.confidenceThreshold must be a number between 0 and 1 (got 2)',
      'turnDeadlineMs must be a positive integer (got 0)',
    ]);
  });

  it('fails to load when an env threshold does not parse', () => {
    const source = {
      ...env,
      guardrail: {
        ...env.guardrail,
        confidenceThreshold: Number.parseFloat('high'),
        scoreThreshold: Number.parseFloat('strict'),
      },
    };

    expect(() => loadPipelineConfig(source)).toThrow(
      'guardrail.confidenceThreshold must be a number between 0 and 1 (got NaN); ' +
        'guardrail.scoreThreshold must be a number between 0 and 1 (got NaN)',
    );
  });
});
