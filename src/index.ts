import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import type { Redis } from 'ioredis';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { VariableManager, RuleManager } from './application/index.js';
import { MemoryStore, RedisStore, createRedisClient } from './infrastructure/store/index.js';
import type { KeyValueStore } from './infrastructure/store/index.js';
import { buildServer } from './interfaces/http/index.js';

/**
 * Engine process.
 *
 * Order:
 * 1) Config + logger
 * 2) Store (Redis or in-memory)
 * 3) Variable manager + rules
 * 4) HTTP API (optional)
 * 5) Dispatch loop (runs until shutdown)
 */
let config: AppConfig;
try {
  config = loadConfig();
} catch (err: unknown) {
  console.error('Fatal: invalid configuration', err);
  process.exit(1);
}

const log = pino({ level: config.logLevel });

let redis: Redis | null = null;
let server: FastifyInstance | null = null;
let variables: VariableManager | null = null;
let ruleManager: RuleManager | null = null;

async function connectStore(): Promise<KeyValueStore> {
  if (config.store === 'memory') {
    log.warn('Using in-memory store, variables will not survive a restart');
    return new MemoryStore();
  }

  redis = createRedisClient(config.redisUrl);
  await redis.connect();
  log.info('Redis connected');
  return new RedisStore(redis);
}

async function main(): Promise<void> {
  const store = await connectStore();

  variables = new VariableManager(store, log, config.variablePrefix);
  ruleManager = await RuleManager.load(config.rulesDir, variables, log, {
    extension: config.ruleExtension,
    clock: { intervalMs: config.clockIntervalMs },
    batchWarnThreshold: config.batchWarnThreshold,
  });

  if (config.http.enabled) {
    server = await buildServer({ variables, ruleManager, logLevel: config.logLevel });
    await server.listen({ host: config.http.host, port: config.http.port });
  }

  await ruleManager.run();
}

let shuttingDown = false;

// Graceful shutdown on SIGINT / SIGTERM
async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('Shutting down...');

  ruleManager?.stop();
  variables?.close();
  await ruleManager?.idle();

  if (server) {
    await server.close();
  }
  if (redis) {
    await redis.quit();
    log.info('Redis disconnected');
  }
}

function onSignal(): void {
  shutdown()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Engine crashed');
  process.exit(1);
});
