import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { getContentType, getMetrics } from '../observability/metrics';

type CheckStatus = 'ok' | 'error' | 'skipped';

interface CheckResult {
  status: CheckStatus;
  latencyMs?: number;
}

/** Anything that can report per-provider status, e.g. the model router */
export interface ProviderHealth {
  healthCheck(): Promise<Record<string, { status: 'ok' | 'error'; latencyMs: number }>>;
}

export interface HealthRouteOptions {
  redis?: Redis;
  inference?: ProviderHealth;
  enableMetrics: boolean;
}

async function checkRedis(redis: Redis | undefined): Promise<Record<string, CheckResult>> {
  if (!redis) return { redis: { status: 'skipped' } };
  const started = Date.now();
  const status: CheckStatus = await redis.ping().then(() => 'ok' as const, () => 'error' as const);
  return { redis: { status, latencyMs: Date.now() - started } };
}

async function checkInference(inference: ProviderHealth | undefined): Promise<Record<string, CheckResult>> {
  if (!inference) return { llm: { status: 'skipped' } };
  try {
    const report = await inference.healthCheck();
    return Object.fromEntries(Object.entries(report).map(([name, result]) => [`llm_${name}`, result] as const));
  } catch {
    return { llm: { status: 'error' } };
  }
}

export function registerHealthRoutes(app: FastifyInstance, options: HealthRouteOptions): void {
  // Liveness
  app.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  app.get('/ready', async (_req, reply) => {
    const [redis, llm] = await Promise.all([checkRedis(options.redis), checkInference(options.inference)]);
    const checks = { ...redis, ...llm };
    const ready = Object.values(checks).every((c) => c.status !== 'error');

    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  if (!options.enableMetrics) return;

  app.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', getContentType());
    return getMetrics();
  });
}
