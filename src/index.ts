import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app } = await buildApp();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: env.port, host: env.host });
    logger.info({ port: env.port, env: env.nodeEnv }, 'Ticket allocator started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
