import Fastify, { FastifyInstance } from 'fastify';
import { env } from './config/env';
import { ConfigService, getConfigService } from './config/config-service';
import { AssignmentServiceOptions, createAssignmentService } from './service/assignment-service';
import { registerAssignmentRoutes } from './http/assignment-routes';
import { registerHealthRoutes } from './health/health-routes';
import { logger } from './observability/logger';

export interface AppContext {
  app: FastifyInstance;
  config: ConfigService;
}

export interface BuildAppOptions {
  config?: ConfigService;
  scoring?: AssignmentServiceOptions;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    bodyLimit: env.bodyLimitBytes,
  });

  const config = options.config ?? getConfigService();
  const service = createAssignmentService(config, options.scoring);

  registerHealthRoutes(app);
  registerAssignmentRoutes(app, service, config.getTaxonomy());

  logger.info({ categories: service.categories.length }, 'Routes registered');
  return { app, config };
}
