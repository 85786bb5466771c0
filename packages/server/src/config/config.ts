// Server configuration
//
// Read from environment variables and validated with zod. Empty values
// count as unset. Invalid values fail startup with a message naming the
// variable.

import * as path from 'node:path';
import { z } from 'zod';
import type { EntityLogBackend } from '@cmdbridge/repositories';
import { BridgeError } from '@cmdbridge/runtime';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .default('0')
  .transform((value) => value === '1' || value === 'true');

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z
  .object({
    BRIDGE_HOST: z.string().min(1).default('127.0.0.1'),
    BRIDGE_PORT: z.coerce.number().int().min(0).max(65535).default(8001),
    BRIDGE_DATA_DIR: z.string().min(1).default('./.cmdbridge'),
    REGISTRY_BACKEND: z.enum(['file', 'memory', 'postgres']).default('file'),
    DATABASE_URL: z.string().url().optional(),
    REGISTRY_COMPACT_EVERY: z.coerce.number().int().min(0).default(500),
    AWAIT_TIMEOUT_MS: positiveInt.default(10_000),
    MAX_AWAIT_TIMEOUT_MS: positiveInt.default(300_000),
    DRAIN_BATCH_SIZE: positiveInt.max(1000).default(20),
    HANDLER_TIMEOUT_MS: positiveInt.default(60_000),
    RESULT_RETENTION_MS: positiveInt.default(300_000),
    SWEEP_INTERVAL_MS: positiveInt.default(30_000),
    HOST_STALE_AFTER_MS: positiveInt.default(15_000),
    IN_PROCESS_HOST: flag,
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    LOG_PRETTY: flag,
    LOG_FILE: z.string().min(1).optional(),
    NODE_ENV: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.REGISTRY_BACKEND === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'Required when REGISTRY_BACKEND is postgres',
      });
    }
    if (env.AWAIT_TIMEOUT_MS > env.MAX_AWAIT_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AWAIT_TIMEOUT_MS'],
        message: 'Must not exceed MAX_AWAIT_TIMEOUT_MS',
      });
    }
  });

export type RegistryBackend = EntityLogBackend;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type BridgeConfig = {
  host: string;
  port: number;
  dataDir: string;
  registry: {
    backend: RegistryBackend;
    databaseUrl: string | null;
    compactEvery: number;
  };
  awaitTimeoutMs: number;
  maxAwaitTimeoutMs: number;
  drainBatchSize: number;
  handlerTimeoutMs: number;
  resultRetentionMs: number;
  sweepIntervalMs: number;
  hostStaleAfterMs: number;
  inProcessHost: boolean;
  logging: {
    level: LogLevel;
    pretty: boolean;
    file: string | null;
  };
};

export class ConfigError extends BridgeError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Parse configuration from environment variables.
 *
 * @param cwd - Base for a relative BRIDGE_DATA_DIR
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): BridgeConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  const defaultLevel: LogLevel = values.NODE_ENV === 'test' ? 'silent' : 'info';

  return {
    host: values.BRIDGE_HOST,
    port: values.BRIDGE_PORT,
    dataDir: path.resolve(cwd, values.BRIDGE_DATA_DIR),
    registry: {
      backend: values.REGISTRY_BACKEND,
      databaseUrl: values.DATABASE_URL ?? null,
      compactEvery: values.REGISTRY_COMPACT_EVERY,
    },
    awaitTimeoutMs: values.AWAIT_TIMEOUT_MS,
    maxAwaitTimeoutMs: values.MAX_AWAIT_TIMEOUT_MS,
    drainBatchSize: values.DRAIN_BATCH_SIZE,
    handlerTimeoutMs: values.HANDLER_TIMEOUT_MS,
    resultRetentionMs: values.RESULT_RETENTION_MS,
    sweepIntervalMs: values.SWEEP_INTERVAL_MS,
    hostStaleAfterMs: values.HOST_STALE_AFTER_MS,
    inProcessHost: values.IN_PROCESS_HOST,
    logging: {
      level: values.LOG_LEVEL ?? defaultLevel,
      pretty: values.LOG_PRETTY,
      file: values.LOG_FILE ?? null,
    },
  };
}
