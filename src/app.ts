import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { Channel } from './config/types';
import { PipelineConfig, loadPipelineConfig } from './config/pipeline-config';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { buildProviders, resolveProviderChain } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { InferenceService } from './llm/types';
import { createSessionStore } from './session/session-store';
import { KnowledgeSource } from './retrieval/types';
import { HttpKnowledgeSource, VectorKnowledgeSource, loadFAQFile } from './retrieval/knowledge-source';
import { OpenAIEmbeddingProvider } from './retrieval/embedding-service';
import { RetrievalOrchestrator, retrievalSettings } from './retrieval/retrieval-orchestrator';
import { IntentClassifier, KeywordIntentClassifier } from './guardrail/intent-classifier';
import { GuardrailEngine } from './guardrail/guardrail-engine';
import { ReplyComposer } from './reply/reply-composer';
import { Orchestrator } from './orchestrator/orchestrator';
import { ChannelAdapters, OutboundDispatcher } from './dispatch/outbound-dispatcher';
import { FollowUpTracker } from './dispatch/follow-up-tracker';
import { WhatsAppAdapter } from './channels/whatsapp-adapter';
import { DiscordAdapter } from './channels/discord-adapter';
import { WebAdapter } from './channels/web-adapter';
import { registerRawBodyParsers } from './channels/raw-body';
import { registerWebhookRoutes } from './channels/webhook-routes';
import {
  RequestVerifier,
  createDiscordVerifier,
  createTwilioVerifier,
  createWebVerifier,
} from './security/webhook-verifier';
import { ProviderHealth, registerHealthRoutes } from './health/health-routes';

export interface BuildAppOptions {
  config?: PipelineConfig;
  /** `null` skips Redis entirely; omitted means connect to REDIS_URL */
  redis?: Redis | null;
  inference?: InferenceService;
  /** `null` means no knowledge source even if one is configured */
  knowledgeSource?: KnowledgeSource | null;
  classifier?: IntentClassifier;
  adapters?: Partial<ChannelAdapters>;
  verifiers?: Partial<Record<Channel, RequestVerifier>>;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  orchestrator: Orchestrator;
  followUps: FollowUpTracker;
}

function hasHealthCheck(value: object): value is ProviderHealth {
  return 'healthCheck' in value && typeof value.healthCheck === 'function';
}

async function connectRedis(): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      commandTimeout: env.redis.commandTimeoutMs,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function defaultKnowledgeSource(): KnowledgeSource | undefined {
  if (env.retrieval.endpoint) {
    return new HttpKnowledgeSource(env.retrieval.endpoint, env.retrieval.apiKey || undefined);
  }
  if (env.retrieval.faqPath) {
    return new VectorKnowledgeSource(
      loadFAQFile(env.retrieval.faqPath),
      new OpenAIEmbeddingProvider(env.openai.apiKey, env.retrieval.embeddingModel),
    );
  }
  return undefined;
}

function defaultInference(): ModelRouter {
  const providers = buildProviders(env);
  return new ModelRouter(resolveProviderChain(env.llm.providerOrder, providers), providers);
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const config = options.config ?? loadPipelineConfig(env);

  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  registerRawBodyParsers(app);

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const redis = options.redis === null ? undefined : options.redis ?? (await connectRedis());

  // ───── Pipeline ─────
  const inference = options.inference ?? defaultInference();
  const source = options.knowledgeSource === null ? undefined : options.knowledgeSource ?? defaultKnowledgeSource();
  const classifier = options.classifier ?? KeywordIntentClassifier.fromFile(env.guardrail.intentRulesPath);

  const store = createSessionStore(config, redis, env.redis.keyPrefix);
  const retrieval = new RetrievalOrchestrator(retrievalSettings(config), source);
  const guardrail = new GuardrailEngine(classifier, config.guardrail);
  const composer = new ReplyComposer(config, inference);
  const orchestrator = new Orchestrator({ store, retrieval, guardrail, composer }, config);

  // ───── Channels ─────
  const adapters: ChannelAdapters = {
    whatsapp: options.adapters?.whatsapp ?? new WhatsAppAdapter(),
    discord: options.adapters?.discord ?? new DiscordAdapter({ apiBaseUrl: env.discord.apiBaseUrl }),
    web: options.adapters?.web ?? new WebAdapter(),
  };
  const verifiers: Record<Channel, RequestVerifier> = {
    whatsapp: options.verifiers?.whatsapp
      ?? createTwilioVerifier({ authToken: env.twilio.authToken, enabled: env.twilio.validateSignature }),
    discord: options.verifiers?.discord
      ?? createDiscordVerifier({ publicKey: env.discord.publicKey, enabled: env.discord.validateSignature }),
    web: options.verifiers?.web ?? createWebVerifier({ secret: env.web.signingSecret }),
  };

  const dispatcher = new OutboundDispatcher(adapters, config.delivery);
  const followUps = new FollowUpTracker();

  registerWebhookRoutes(app, {
    config,
    orchestrator,
    composer,
    dispatcher,
    followUps,
    adapters,
    verifiers,
    publicBaseUrl: env.twilio.publicBaseUrl || undefined,
  });

  registerHealthRoutes(app, {
    redis,
    inference: hasHealthCheck(inference) ? inference : undefined,
    enableMetrics: env.observability.enableMetrics,
  });

  // Let deferred replies finish before the server goes away
  app.addHook('onClose', async () => {
    await followUps.drain();
  });

  logger.info(
    {
      retrievalConfigured: retrieval.configured,
      redis: Boolean(redis),
      confidenceThreshold: config.guardrail.confidenceThreshold,
      scoreThreshold: config.guardrail.scoreThreshold,
    },
    'Reply gateway initialized',
  );

  return { app, redis, orchestrator, followUps };
}
