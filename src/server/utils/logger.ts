import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { isScenarioError } from '../../shared/errors';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

// ============================================================================
// Error Serialization
// ============================================================================

/**
 * Flatten an error into log metadata. Scenario errors keep their code and
 * context so log queries can filter on them.
 */
export const errorMeta = (error: unknown): LogMeta => {
  if (isScenarioError(error)) {
    return {
      error: {
        name: error.name,
        code: error.code,
        message: error.message,
        context: error.context,
      },
    };
  }
  if (error instanceof Error) {
    return { error: { name: error.name, message: error.message, stack: error.stack } };
  }
  return { error: { message: String(error) } };
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'scenario-engine';

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  // Ensure standard fields are always present
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

/**
 * Create the Winston logger instance.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

// File transport for all logs - always use JSON format
if (config.logging.file) {
  const logFile = path.resolve(config.logging.file);
  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new winston.transports.File({
      filename: logFile,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// ============================================================================
// Exports
// ============================================================================

export { logger };
