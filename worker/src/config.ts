import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '@flowgraph/component-sdk';

import { LOG_LEVELS } from './utils/logger';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const WorkerEnvSchema = z.object({
  AGENT_SERVICE_URL: z.string().url().default('http://localhost:5000'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
  MAX_EXECUTION_HISTORY: z.coerce.number().int().positive().optional(),
  WORKFLOW_STORAGE_DIR: optionalString,
  DATABASE_URL: optionalString,
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default('info'),
});

export interface WorkerConfig {
  agentServiceUrl: string;
  httpTimeoutMs: number;
  maxConcurrency: number;
  maxExecutionHistory?: number;
  storageDir?: string;
  databaseUrl?: string;
  logLevel: (typeof LOG_LEVELS)[number];
}

export interface LoadConfigOptions {
  /** Variables to read instead of `process.env`; skips `.env` loading. */
  env?: Record<string, string | undefined>;
  envFile?: string;
}

export function loadWorkerConfig(options: LoadConfigOptions = {}): WorkerConfig {
  let env = options.env;
  if (!env) {
    loadDotenv({ path: options.envFile });
    env = process.env;
  }

  const parsed = WorkerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(`Invalid worker configuration: ${keys.join(', ')}`, {
      configKey: keys[0],
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
    });
  }

  const values = parsed.data;
  return {
    agentServiceUrl: values.AGENT_SERVICE_URL,
    httpTimeoutMs: values.HTTP_TIMEOUT_MS,
    maxConcurrency: values.MAX_CONCURRENCY,
    maxExecutionHistory: values.MAX_EXECUTION_HISTORY,
    storageDir: values.WORKFLOW_STORAGE_DIR,
    databaseUrl: values.DATABASE_URL,
    logLevel: values.LOG_LEVEL,
  };
}
