import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { VariableManager } from '../../application/variable-manager.js';
import type { RuleManager } from '../../application/rule-manager.js';

export interface EnginePluginOptions {
  variables: VariableManager;
  ruleManager: RuleManager;
}

/**
 * Fastify plugin exposing the running engine to routes.
 *
 * Decorates `fastify.variables` and `fastify.ruleManager`. The engine's
 * lifecycle is owned by the process entry point, not by the server.
 */
async function enginePlugin(fastify: FastifyInstance, opts: EnginePluginOptions): Promise<void> {
  fastify.decorate('variables', opts.variables);
  fastify.decorate('ruleManager', opts.ruleManager);
}

export default fp(enginePlugin, {
  name: 'engine',
  fastify: '5.x',
});

/** Extend Fastify's type system so the engine is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    variables: VariableManager;
    ruleManager: RuleManager;
  }
}
