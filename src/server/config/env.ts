/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format */
  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Optional file that receives every log entry as JSON */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // SCENARIO CONTENT & GENERATION
  // ===================================================================

  /** Path of the content catalogue JSON, relative to the working directory */
  SCENARIO_CATALOGUE_PATH: z.string().min(1).default('content/catalogue.json'),

  /** Overrides the catalogue's matched-mode re-roll limit */
  GENERATION_MAX_REROLLS: z.coerce.number().int().min(0).max(100).optional(),

  /** Random positions tried per placement candidate */
  GENERATION_MAX_PLACEMENT_TRIES: z.coerce.number().int().min(1).max(10_000).default(200),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

/**
 * Returns true if running inside a Jest worker process.
 */
export function isJestRuntime(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.JEST_WORKER_ID !== undefined;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV to ensure test-specific behavior.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv, env: NodeJS.ProcessEnv = process.env): NodeEnv {
  return isJestRuntime(env) ? 'test' : rawEnv.NODE_ENV;
}

/**
 * Check if running in production mode.
 */
export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

/**
 * Check if running in test mode.
 */
export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}

/**
 * Check if running in a production-like environment (production or staging).
 */
export function isProductionLike(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production' || nodeEnv === 'staging';
}
