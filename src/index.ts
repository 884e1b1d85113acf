import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app, redis, followUps } = await buildApp();
  let stopping = false;

  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal, pendingFollowUps: followUps.pending }, 'Shutting down');
    // onClose drains pending follow-ups before this resolves
    await app.close();
    redis?.disconnect();
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      stop(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: env.port, host: '0.0.0.0' });
  logger.info({ port: env.port, env: env.nodeEnv, providerOrder: env.llm.providerOrder }, 'Reply gateway started');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
