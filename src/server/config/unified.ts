/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for all application configuration.
 * It parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 *
 * Usage:
 *   import { config } from './config';
 */

import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { LogFormatSchema, LogLevelSchema, NodeEnvSchema, getEffectiveNodeEnv, parseEnv } from './env';
import type { RawEnv } from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env cannot leak into test runs.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  catalogue: z.object({
    /** Absolute path of the content catalogue JSON. */
    path: z.string().min(1),
  }),
  generation: z.object({
    maxRerolls: z.number().int().min(0).optional(),
    maxPlacementTries: z.number().int().positive(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the typed config from a validated environment.
 */
export function buildConfig(env: RawEnv, cwd: string = process.cwd()): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);

  return Object.freeze(
    ConfigSchema.parse({
      nodeEnv,
      isProduction: nodeEnv === 'production',
      isDevelopment: nodeEnv === 'development',
      isTest: nodeEnv === 'test',
      app: {
        version: env.npm_package_version ?? '0.0.0',
      },
      logging: {
        level: env.LOG_LEVEL,
        format: env.LOG_FORMAT,
        file: env.LOG_FILE?.trim() || undefined,
      },
      catalogue: {
        path: path.resolve(cwd, env.SCENARIO_CATALOGUE_PATH),
      },
      generation: {
        maxRerolls: env.GENERATION_MAX_REROLLS,
        maxPlacementTries: env.GENERATION_MAX_PLACEMENT_TRIES,
      },
    })
  );
}

const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('❌ Invalid environment configuration:');
  for (const error of envResult.errors) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}

export const config: AppConfig = buildConfig(envResult.data);
