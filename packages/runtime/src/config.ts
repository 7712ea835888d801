// Runtime configuration from environment variables
//
// The log backend is either two NDJSON files or two streams of the Postgres
// `log_lines` table. Postgres requires DATABASE_URL.

import { z } from 'zod';
import type { InvariantHandlingMode } from '@ledgerline/protocol';
import type { LogContext } from '@ledgerline/repositories';
import { createFilesystemLogContext, postgres } from '@ledgerline/repositories';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logging.js';

export type LogBackend = 'filesystem' | 'postgres';

export type RuntimeConfig = {
  predictionLogPath: string;
  haltLogPath: string;
  invariantHandlingMode: InvariantHandlingMode;
  logBackend: LogBackend;
  databaseUrl: string | null;
  logLevel: LogLevel;
};

export const DEFAULT_PREDICTION_LOG_PATH = 'artifacts/predictions.jsonl';
export const DEFAULT_HALT_LOG_PATH = 'artifacts/halts.jsonl';

const envSchema = z
  .object({
    LEDGERLINE_PREDICTION_LOG_PATH: z.string().trim().min(1).default(DEFAULT_PREDICTION_LOG_PATH),
    LEDGERLINE_HALT_LOG_PATH: z.string().trim().min(1).default(DEFAULT_HALT_LOG_PATH),
    LEDGERLINE_INVARIANT_HANDLING_MODE: z
      .enum(['strict_halt', 'repair_events'])
      .default('strict_halt'),
    LEDGERLINE_LOG_BACKEND: z.enum(['filesystem', 'postgres']).default('filesystem'),
    LEDGERLINE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    DATABASE_URL: z.string().trim().min(1).optional(),
  })
  .superRefine((env, refinement) => {
    if (env.LEDGERLINE_LOG_BACKEND === 'postgres' && !env.DATABASE_URL) {
      refinement.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'required when LEDGERLINE_LOG_BACKEND is postgres',
      });
    }
  });

/**
 * Read and validate configuration. Empty strings count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env
): RuntimeConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    predictionLogPath: parsed.LEDGERLINE_PREDICTION_LOG_PATH,
    haltLogPath: parsed.LEDGERLINE_HALT_LOG_PATH,
    invariantHandlingMode: parsed.LEDGERLINE_INVARIANT_HANDLING_MODE,
    logBackend: parsed.LEDGERLINE_LOG_BACKEND,
    databaseUrl: parsed.DATABASE_URL ?? null,
    logLevel: parsed.LEDGERLINE_LOG_LEVEL,
  };
}

/**
 * A LogContext plus whatever must be released on shutdown.
 */
export type ConfiguredLogContext = {
  logs: LogContext;
  close(): Promise<void>;
};

/**
 * Build the two logs named by the configuration.
 */
export function createLogContext(config: RuntimeConfig): ConfiguredLogContext {
  if (config.logBackend === 'postgres') {
    if (!config.databaseUrl) {
      throw new ConfigurationError(['DATABASE_URL: required when LEDGERLINE_LOG_BACKEND is postgres']);
    }

    const { db, client } = postgres.createDatabase({ connectionString: config.databaseUrl });
    return {
      logs: postgres.createPgLogContext(db),
      async close() {
        await client.end();
      },
    };
  }

  return {
    logs: createFilesystemLogContext({
      predictionLogPath: config.predictionLogPath,
      haltLogPath: config.haltLogPath,
    }),
    async close() {},
  };
}
