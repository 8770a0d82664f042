import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { fromJson, toJson } from '../../domain/value.js';
import { DecodeError, UndefinedSymbolError } from '../../domain/errors.js';
import { variableBodySchema, variableNameSchema } from '../../application/variable-schema.js';

/**
 * Variable routes.
 *
 * GET /api/v1/variables        — list persisted variable names
 * GET /api/v1/variables/:name  — read one variable
 * PUT /api/v1/variables/:name  — write one variable (triggers rules on change)
 */
async function variableRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/variables ───────────────────────────────
  fastify.get(
    '/api/v1/variables',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const variables = await fastify.variables.names();
      return reply.status(200).send({ variables });
    },
  );

  // ── GET /api/v1/variables/:name ─────────────────────────
  fastify.get(
    '/api/v1/variables/:name',
    async (
      request: FastifyRequest<{ Params: { name: string } }>,
      reply: FastifyReply,
    ) => {
      const { name } = request.params;

      try {
        const value = await fastify.variables.get(name);
        return reply.status(200).send({ name, value: toJson(value) });
      } catch (err: unknown) {
        if (err instanceof UndefinedSymbolError) {
          return reply.status(404).send({ error: err.message });
        }
        if (err instanceof DecodeError) {
          request.log.error({ err, variable: name }, 'Stored variable is unreadable');
          return reply.status(500).send({ error: err.message });
        }
        throw err;
      }
    },
  );

  // ── PUT /api/v1/variables/:name ─────────────────────────
  fastify.put(
    '/api/v1/variables/:name',
    async (
      request: FastifyRequest<{ Params: { name: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const name = variableNameSchema.safeParse(request.params.name);
      if (!name.success) {
        return reply.status(400).send({ error: name.error.flatten() });
      }

      const parsed = variableBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const value = fromJson(parsed.data.value);
      if (value === null) {
        return reply.status(400).send({ error: 'value is outside the supported value domain' });
      }

      const changed = await fastify.variables.set(name.data, value);
      request.log.debug({ variable: name.data, changed }, 'Variable written via API');

      return reply.status(200).send({ name: name.data, value: toJson(value), changed });
    },
  );
}

export default fp(variableRoutes, {
  name: 'variable-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
