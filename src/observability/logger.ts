/**
 * Logger setup utilities for AWS Powertools Logger integration
 *
 * This module creates the Powertools Logger used for the trace logger's own
 * diagnostics: export successes at debug level, export failures at error level.
 */

import { Logger } from '@aws-lambda-powertools/logger';
import { ENV_VARS } from '../constants/index.js';

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_LEVELS: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

/**
 * Configuration options for creating a logger instance.
 */
export interface LoggerConfig {
    /**
     * Service name for the logger (the traced service).
     */
    serviceName: string;

    /**
     * Log level for the logger.
     *
     * @default 'INFO' or value from LOG_LEVEL environment variable
     */
    logLevel?: LogLevelName;

    /**
     * Persistent attributes to include in all log entries.
     */
    persistentLogAttributes?: Record<string, string | number | boolean>;
}

/**
 * Reads a log level name, ignoring case. Unknown values yield undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevelName | undefined {
    const upper = value?.toUpperCase();
    return LOG_LEVELS.find((level) => level === upper);
}

/**
 * Creates a configured AWS Powertools Logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   serviceName: 'payments',
 *   persistentLogAttributes: { environment: 'staging' }
 * });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
    return new Logger({
        serviceName: config.serviceName,
        logLevel: config.logLevel ?? parseLogLevel(process.env[ENV_VARS.LOG_LEVEL]) ?? 'INFO',
        persistentLogAttributes: config.persistentLogAttributes,
    });
}
