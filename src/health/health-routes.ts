import { FastifyInstance } from 'fastify';

export function registerHealthRoutes(app: FastifyInstance): void {
  /** Liveness probe — always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });
}
