/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for application configuration.
 * It parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { isTestEnvironment } from '../../shared/utils/envFlags';
import {
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  getEffectiveNodeEnv,
  isDevelopment,
  isProduction,
  isTest,
  type EnvValidationResult,
  type RawEnv,
} from './env';

// Load .env into process.env before we read anything from it.
// Skipped in test mode so .env cannot override test-specific env vars.
if (!isTestEnvironment()) {
  dotenv.config();
}

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  games: z.object({
    maxActive: z.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function requireEnv(result: EnvValidationResult): RawEnv {
  if (!result.success || !result.data) {
    const problems = (result.errors ?? [])
      .map((error) => `  - ${error.path || 'root'}: ${error.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${problems}`);
  }
  return result.data;
}

/**
 * Assemble the typed configuration from a raw environment record.
 *
 * Exposed so tests can build a config from a hand-made environment without
 * touching process.env.
 */
export function buildConfig(
  rawEnv: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const env = requireEnv(parseEnv(rawEnv));
  const nodeEnv = getEffectiveNodeEnv(env);

  const logFile = env.LOG_FILE?.trim() || undefined;

  return Object.freeze(
    ConfigSchema.parse({
      nodeEnv,
      isProduction: isProduction(nodeEnv),
      isDevelopment: isDevelopment(nodeEnv),
      isTest: isTest(nodeEnv),
      app: {
        name: 'elimination-chess-api',
        version: env.npm_package_version?.trim() || '1.0.0',
      },
      server: {
        port: env.PORT,
        host: env.HOST,
      },
      logging: {
        level: env.LOG_LEVEL,
        format: env.LOG_FORMAT,
        ...(logFile ? { file: logFile } : {}),
      },
      games: {
        maxActive: env.MAX_ACTIVE_GAMES,
      },
    })
  );
}

export const config = buildConfig();
