import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string, fallback: string[]): string[] {
  const val = process.env[key];
  if (!val) return fallback;
  return val.split(',').map((s) => s.trim()).filter(Boolean);
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  projectRoot,

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0.2),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 4000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0.2),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 4000),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
    temperature: optionalFloat('GEMINI_TEMPERATURE', 0.2),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 4000),
  },

  // ───── LLM Routing ─────
  llm: {
    /** Failover order, first entry is the primary */
    providerOrder: optionalList('LLM_PROVIDER_ORDER', ['openai', 'anthropic', 'gemini']),
  },

  redis: {
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'gateway:'),
    commandTimeoutMs: optionalInt('REDIS_COMMAND_TIMEOUT_MS', 1000),
  },

  // ───── Guardrail ─────
  guardrail: {
    confidenceThreshold: optionalFloat('CONFIDENCE_THRESHOLD', 0.5),
    scoreThreshold: optionalFloat('SCORE_THRESHOLD', 0.5),
    denylist: optionalList('DENYLIST_TERMS', ['card number', 'password', 'otp', 'pin']),
    intentRulesPath: optional('INTENT_RULES_PATH', path.join(projectRoot, 'config', 'intents.yaml')),
  },

  // ───── Retrieval ─────
  retrieval: {
    enabled: optionalBool('RETRIEVAL_ENABLED', false),
    endpoint: optional('RETRIEVAL_ENDPOINT', ''),
    apiKey: optional('RETRIEVAL_API_KEY', ''),
    faqPath: optional('RETRIEVAL_FAQ_PATH', ''),
    embeddingModel: optional('RETRIEVAL_EMBEDDING_MODEL', 'text-embedding-3-small'),
    topK: optionalInt('RETRIEVAL_TOP_K', 4),
    timeoutMs: optionalInt('RETRIEVAL_TIMEOUT_MS', 1500),
  },

  // ───── Inference ─────
  inference: {
    timeoutMs: optionalInt('INFERENCE_TIMEOUT_MS', 4000),
    retryDelayMs: optionalInt('INFERENCE_RETRY_DELAY_MS', 250),
    maxOutputTokens: optionalInt('INFERENCE_MAX_OUTPUT_TOKENS', 400),
    safetyProfile: optional('INFERENCE_SAFETY_PROFILE', ''),
  },

  // ───── Sessions ─────
  session: {
    ttlHours: optionalInt('SESSION_TTL_HOURS', 72),
    historyMaxTurns: optionalInt('SESSION_HISTORY_MAX_TURNS', 20),
    promptHistoryTurns: optionalInt('SESSION_PROMPT_HISTORY_TURNS', 6),
    replayWindow: optionalInt('SESSION_REPLAY_WINDOW', 10),
    maxCommitAttempts: optionalInt('SESSION_MAX_COMMIT_ATTEMPTS', 3),
    timeoutMs: optionalInt('SESSION_TIMEOUT_MS', 1000),
    retryAttempts: optionalInt('SESSION_RETRY_ATTEMPTS', 3),
    retryBaseDelayMs: optionalInt('SESSION_RETRY_BASE_DELAY_MS', 50),
  },

  // ───── Outbound delivery ─────
  delivery: {
    timeoutMs: optionalInt('DELIVERY_TIMEOUT_MS', 10000),
    maxAttempts: optionalInt('DELIVERY_MAX_ATTEMPTS', 4),
    baseDelayMs: optionalInt('DELIVERY_BASE_DELAY_MS', 500),
    maxDelayMs: optionalInt('DELIVERY_MAX_DELAY_MS', 4000),
  },

  /** End-to-end budget for channels that reply in the inbound response */
  turnDeadlineMs: optionalInt('TURN_DEADLINE_MS', 10000),

  // ───── Channels ─────
  twilio: {
    authToken: optional('TWILIO_AUTH_TOKEN', ''),
    validateSignature: optionalBool('TWILIO_VALIDATE_SIGNATURE', true),
    publicBaseUrl: optional('PUBLIC_BASE_URL', ''),
  },

  discord: {
    publicKey: optional('DISCORD_PUBLIC_KEY', ''),
    validateSignature: optionalBool('DISCORD_VALIDATE_SIGNATURE', true),
    apiBaseUrl: optional('DISCORD_API_BASE_URL', 'https://discord.com/api/v10'),
  },

  web: {
    signingSecret: optional('WEB_SIGNING_SECRET', ''),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
};

export type Env = typeof env;
