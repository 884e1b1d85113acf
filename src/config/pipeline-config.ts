import { env as defaultEnv, Env } from './env';

export interface RetryPolicy {
  /** Total attempts including the first */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Immutable snapshot of every tunable the reply pipeline reads.
 * Built once at startup and handed to component constructors.
 */
export interface PipelineConfig {
  readonly guardrail: {
    readonly confidenceThreshold: number;
    readonly scoreThreshold: number;
  };
  readonly retrieval: {
    readonly enabled: boolean;
    readonly topK: number;
    readonly timeoutMs: number;
  };
  readonly inference: {
    readonly timeoutMs: number;
    /** Two attempts: the first call plus one retry */
    readonly maxAttempts: number;
    readonly retryDelayMs: number;
    /** An attempt is skipped when less than this remains on the deadline */
    readonly minAttemptBudgetMs: number;
    readonly maxOutputTokens: number;
    readonly safetyProfile?: string;
  };
  readonly session: {
    readonly ttlMs: number;
    readonly historyMaxTurns: number;
    readonly promptHistoryTurns: number;
    readonly replayWindow: number;
    readonly maxCommitAttempts: number;
    readonly operationTimeoutMs: number;
    readonly retry: RetryPolicy;
  };
  readonly delivery: {
    readonly timeoutMs: number;
    readonly retry: RetryPolicy;
  };
  readonly turnDeadlineMs: number;
  readonly denylist: readonly string[];
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function loadPipelineConfig(source: Env = defaultEnv): PipelineConfig {
  return createPipelineConfig({
    guardrail: {
      confidenceThreshold: source.guardrail.confidenceThreshold,
      scoreThreshold: source.guardrail.scoreThreshold,
    },
    retrieval: {
      enabled: source.retrieval.enabled,
      topK: source.retrieval.topK,
      timeoutMs: source.retrieval.timeoutMs,
    },
    inference: {
      timeoutMs: source.inference.timeoutMs,
      maxAttempts: 2,
      retryDelayMs: source.inference.retryDelayMs,
      minAttemptBudgetMs: 500,
      maxOutputTokens: source.inference.maxOutputTokens,
      safetyProfile: source.inference.safetyProfile || undefined,
    },
    session: {
      ttlMs: source.session.ttlHours * 60 * 60 * 1000,
      historyMaxTurns: source.session.historyMaxTurns,
      promptHistoryTurns: source.session.promptHistoryTurns,
      replayWindow: source.session.replayWindow,
      maxCommitAttempts: source.session.maxCommitAttempts,
      operationTimeoutMs: source.session.timeoutMs,
      retry: {
        attempts: source.session.retryAttempts,
        baseDelayMs: source.session.retryBaseDelayMs,
        maxDelayMs: source.session.retryBaseDelayMs * 8,
      },
    },
    delivery: {
      timeoutMs: source.delivery.timeoutMs,
      retry: {
        attempts: source.delivery.maxAttempts,
        baseDelayMs: source.delivery.baseDelayMs,
        maxDelayMs: source.delivery.maxDelayMs,
      },
    },
    turnDeadlineMs: source.turnDeadlineMs,
    denylist: source.guardrail.denylist,
  });
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

const DEFAULTS: PipelineConfig = {
  guardrail: { confidenceThreshold: 0.5, scoreThreshold: 0.5 },
  retrieval: { enabled: false, topK: 4, timeoutMs: 1500 },
  inference: {
    timeoutMs: 4000,
    maxAttempts: 2,
    retryDelayMs: 250,
    minAttemptBudgetMs: 500,
    maxOutputTokens: 400,
  },
  session: {
    ttlMs: 72 * 60 * 60 * 1000,
    historyMaxTurns: 20,
    promptHistoryTurns: 6,
    replayWindow: 10,
    maxCommitAttempts: 3,
    operationTimeoutMs: 1000,
    retry: { attempts: 3, baseDelayMs: 50, maxDelayMs: 400 },
  },
  delivery: {
    timeoutMs: 10000,
    retry: { attempts: 4, baseDelayMs: 500, maxDelayMs: 4000 },
  },
  turnDeadlineMs: 10000,
  denylist: ['card number', 'password', 'otp', 'pin'],
};

type Check = [path: string, value: number];

/** Every problem in the config, one line each; empty when it is usable */
export function validatePipelineConfig(config: PipelineConfig): string[] {
  const problems: string[] = [];

  const ratios: Check[] = [
    ['guardrail.confidenceThreshold', config.guardrail.confidenceThreshold],
    ['guardrail.scoreThreshold', config.guardrail.scoreThreshold],
  ];
  for (const [key, value] of ratios) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`${key} must be a number between 0 and 1 (got ${value})`);
    }
  }

  const positive: Check[] = [
    ['retrieval.topK', config.retrieval.topK],
    ['retrieval.timeoutMs', config.retrieval.timeoutMs],
    ['inference.timeoutMs', config.inference.timeoutMs],
    ['inference.maxAttempts', config.inference.maxAttempts],
    ['inference.maxOutputTokens', config.inference.maxOutputTokens],
    ['session.ttlMs', config.session.ttlMs],
    ['session.historyMaxTurns', config.session.historyMaxTurns],
    ['session.replayWindow', config.session.replayWindow],
    ['session.maxCommitAttempts', config.session.maxCommitAttempts],
    ['session.operationTimeoutMs', config.session.operationTimeoutMs],
    ['session.retry.attempts', config.session.retry.attempts],
    ['delivery.timeoutMs', config.delivery.timeoutMs],
    ['delivery.retry.attempts', config.delivery.retry.attempts],
    ['turnDeadlineMs', config.turnDeadlineMs],
  ];
  for (const [key, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      problems.push(`${key} must be a positive integer (got ${value})`);
    }
  }

  const nonNegative: Check[] = [
    ['inference.retryDelayMs', config.inference.retryDelayMs],
    ['inference.minAttemptBudgetMs', config.inference.minAttemptBudgetMs],
    ['session.promptHistoryTurns', config.session.promptHistoryTurns],
    ['session.retry.baseDelayMs', config.session.retry.baseDelayMs],
    ['session.retry.maxDelayMs', config.session.retry.maxDelayMs],
    ['delivery.retry.baseDelayMs', config.delivery.retry.baseDelayMs],
    ['delivery.retry.maxDelayMs', config.delivery.retry.maxDelayMs],
  ];
  for (const [key, value] of nonNegative) {
    if (!Number.isInteger(value) || value < 0) {
      problems.push(`${key} must be a non-negative integer (got ${value})`);
    }
  }

  return problems;
}

/**
 * Build a frozen config from defaults plus overrides; throws on values
 * that would disable a gate or a timeout (NaN thresholds, zero attempts, ...).
 * Tests use this directly instead of going through the environment.
 */
export function createPipelineConfig(overrides: DeepPartial<PipelineConfig> = {}): PipelineConfig {
  const config: PipelineConfig = {
    guardrail: { ...DEFAULTS.guardrail, ...overrides.guardrail },
    retrieval: { ...DEFAULTS.retrieval, ...overrides.retrieval },
    inference: { ...DEFAULTS.inference, ...overrides.inference },
    session: {
      ...DEFAULTS.session,
      ...overrides.session,
      retry: { ...DEFAULTS.session.retry, ...overrides.session?.retry },
    },
    delivery: {
      ...DEFAULTS.delivery,
      ...overrides.delivery,
      retry: { ...DEFAULTS.delivery.retry, ...overrides.delivery?.retry },
    },
    turnDeadlineMs: overrides.turnDeadlineMs ?? DEFAULTS.turnDeadlineMs,
    denylist: [...(overrides.denylist ?? DEFAULTS.denylist)],
  };

  const problems = validatePipelineConfig(config);
  if (problems.length > 0) {
    throw new Error(`Invalid pipeline configuration: ${problems.join('; ')}`);
  }
  return deepFreeze(config);
}
