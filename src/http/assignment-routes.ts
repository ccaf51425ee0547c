import { FastifyInstance } from 'fastify';
import { AssignmentService } from '../service/assignment-service';
import { ValidationError } from '../assignment/errors';
import { SkillTaxonomy } from '../assignment/types';
import { logger } from '../observability/logger';

export function registerAssignmentRoutes(
  app: FastifyInstance,
  service: AssignmentService,
  taxonomy: SkillTaxonomy,
): void {
  /** Allocate every ticket of the posted dataset */
  app.post('/assignments', async (req, reply) => {
    try {
      const output = service.run(req.body, 'api');
      return reply.send(output);
    } catch (err) {
      if (err instanceof ValidationError) {
        return reply.status(400).send({ error: 'validation_failed', issues: err.issues });
      }
      logger.error({ err }, 'Assignment run failed');
      return reply.status(500).send({ error: 'internal_error' });
    }
  });

  /** Skill categories and their trigger terms */
  app.get('/taxonomy', async (_req, reply) => {
    const categories = service.categories.map((name) => ({ name, terms: taxonomy[name] ?? [] }));
    return reply.send({ count: categories.length, categories });
  });
}
