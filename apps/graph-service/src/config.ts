import { z } from 'zod';
import { ConfigurationError } from '@graphrun/shared';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  MAX_ITERATIONS: z.coerce.number().int().positive().default(10),
  SNAPSHOT_EXCLUDE_KEYS: z
    .string()
    .default('code,max_iterations,threshold')
    .transform((value) =>
      value
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    ),
});

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: (typeof LOG_LEVELS)[number];
  corsOrigin: string;
  maxIterations: number;
  snapshotExcludeKeys: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError('Invalid service configuration', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const { data } = parsed;
  return {
    port: data.PORT,
    host: data.HOST,
    logLevel: data.LOG_LEVEL,
    corsOrigin: data.CORS_ORIGIN,
    maxIterations: data.MAX_ITERATIONS,
    snapshotExcludeKeys: data.SNAPSHOT_EXCLUDE_KEYS,
  };
}
