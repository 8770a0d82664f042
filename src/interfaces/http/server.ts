import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { VariableManager } from '../../application/variable-manager.js';
import type { RuleManager } from '../../application/rule-manager.js';
import enginePlugin from './engine-plugin.js';
import variableRoutes from './variable-routes.js';
import ruleRoutes from './rule-routes.js';

export interface ServerDeps {
  variables: VariableManager;
  ruleManager: RuleManager;
  logLevel: string;
}

/**
 * Builds the HTTP server without listening, so tests can use `inject()`.
 *
 * Order:
 * 1) Engine decorations
 * 2) Routes
 */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: deps.logLevel,
    },
  });

  await fastify.register(enginePlugin, {
    variables: deps.variables,
    ruleManager: deps.ruleManager,
  });

  await fastify.register(variableRoutes);
  await fastify.register(ruleRoutes);

  return fastify;
}
