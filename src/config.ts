import { z } from 'zod';
import { ConfigError } from './domain/errors.js';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

/**
 * Environment schema. Every variable is optional and falls back to a
 * default suitable for local development.
 */
const envSchema = z.object({
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  STORE: z.enum(['redis', 'memory']).default('redis'),
  VARIABLE_PREFIX: z.string().min(1).default('var~'),
  RULES_DIR: z.string().min(1).default('./rules'),
  RULE_EXTENSION: z.string().min(1).default('.rule'),
  CLOCK_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
  BATCH_WARN_THRESHOLD: z.coerce.number().int().min(1).default(100),
  HTTP_ENABLED: booleanFromEnv.default('true'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  redisUrl: string;
  store: 'redis' | 'memory';
  variablePrefix: string;
  rulesDir: string;
  ruleExtension: string;
  clockIntervalMs: number;
  batchWarnThreshold: number;
  http: { enabled: boolean; host: string; port: number };
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

/**
 * Reads configuration from environment variables.
 *
 * Empty strings count as unset, so `PORT=` in an env file means "default".
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    redisUrl: e.REDIS_URL,
    store: e.STORE,
    variablePrefix: e.VARIABLE_PREFIX,
    rulesDir: e.RULES_DIR,
    ruleExtension: e.RULE_EXTENSION,
    clockIntervalMs: e.CLOCK_INTERVAL_MS,
    batchWarnThreshold: e.BATCH_WARN_THRESHOLD,
    http: { enabled: e.HTTP_ENABLED, host: e.HOST, port: e.PORT },
    logLevel: e.LOG_LEVEL,
  };
}
