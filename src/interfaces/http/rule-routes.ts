import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Rule and health routes.
 *
 * GET /api/v1/rules — loaded rules, in evaluation order
 * GET /health       — liveness plus engine counters
 */
async function ruleRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/rules',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rules = fastify.ruleManager.rules.map((r) => ({ name: r.name }));
      return reply.status(200).send({ rules });
    },
  );

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        status: 'ok',
        rules: fastify.ruleManager.rules.length,
        inFlightBatches: fastify.ruleManager.inFlight,
      });
    },
  );
}

export default fp(ruleRoutes, {
  name: 'rule-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
