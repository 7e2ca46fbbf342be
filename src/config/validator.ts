/**
 * Input validation for trace logger configuration and capture options.
 *
 * Only presence and type are checked. Empty strings are accepted and left to
 * the caller.
 */

import { ErrorCode, ValidationError } from '../errors/index.js';
import type {
    CaptureRequestOptions,
    ResolvedTraceLoggerConfig,
    TraceDirection,
    TraceLoggerConfig,
} from './types.js';

const DIRECTIONS: readonly TraceDirection[] = ['inbound', 'outbound'];

/**
 * Static utility class for validating inputs and configurations.
 *
 * All validation methods throw ValidationError on failure.
 */
export class ConfigValidator {
    /**
     * Validates TraceLoggerConfig to ensure required fields are present
     * and optional fields have the right type.
     *
     * @throws {ValidationError} If validation fails
     *
     * @example
     * ```typescript
     * ConfigValidator.validateTraceLoggerConfig({
     *   serviceName: 'payments',
     *   environment: 'staging'
     * });
     * ```
     */
    static validateTraceLoggerConfig(config: TraceLoggerConfig): void {
        if (!config || typeof config !== 'object') {
            throw new ValidationError(
                'Trace logger configuration is required',
                { field: 'config' },
                undefined,
                ErrorCode.INVALID_CONFIG,
            );
        }

        this.requireString(config.serviceName, 'serviceName', ErrorCode.INVALID_CONFIG);
        this.requireString(config.environment, 'environment', ErrorCode.INVALID_CONFIG);
        this.optionalString(config.apiUrl, 'apiUrl', ErrorCode.INVALID_CONFIG);

        if (config.redactKeys !== undefined) {
            if (!Array.isArray(config.redactKeys)) {
                throw new ValidationError(
                    'redactKeys must be an array of strings',
                    { field: 'redactKeys', value: typeof config.redactKeys },
                    undefined,
                    ErrorCode.INVALID_CONFIG,
                );
            }

            config.redactKeys.forEach((key, index) => {
                if (typeof key !== 'string') {
                    throw new ValidationError(
                        `Redact key at index ${index} must be a string`,
                        { field: 'redactKeys', index, value: key },
                        undefined,
                        ErrorCode.INVALID_CONFIG,
                    );
                }
            });
        }

        if (config.enableConsoleFallback !== undefined && typeof config.enableConsoleFallback !== 'boolean') {
            throw new ValidationError(
                'enableConsoleFallback must be a boolean',
                { field: 'enableConsoleFallback', value: config.enableConsoleFallback },
                undefined,
                ErrorCode.INVALID_CONFIG,
            );
        }

        if (config.enableMetrics !== undefined && typeof config.enableMetrics !== 'boolean') {
            throw new ValidationError(
                'enableMetrics must be a boolean',
                { field: 'enableMetrics', value: config.enableMetrics },
                undefined,
                ErrorCode.INVALID_CONFIG,
            );
        }
    }

    /**
     * Validates the request fields of a capture scope.
     *
     * @throws {ValidationError} If a required field is missing or has the wrong type
     */
    static validateCaptureOptions(options: CaptureRequestOptions): void {
        if (!options || typeof options !== 'object') {
            throw new ValidationError(
                'Capture options are required',
                { field: 'options' },
                undefined,
                ErrorCode.INVALID_CAPTURE_OPTIONS,
            );
        }

        if (!DIRECTIONS.includes(options.direction)) {
            throw new ValidationError(
                `direction must be one of: ${DIRECTIONS.join(', ')}`,
                { field: 'direction', value: options.direction },
                undefined,
                ErrorCode.INVALID_CAPTURE_OPTIONS,
            );
        }

        this.requireString(options.route, 'route', ErrorCode.INVALID_CAPTURE_OPTIONS);
        this.requireString(options.method, 'method', ErrorCode.INVALID_CAPTURE_OPTIONS);
        this.optionalString(options.callerService, 'callerService', ErrorCode.INVALID_CAPTURE_OPTIONS);
        this.optionalString(options.callerUserId, 'callerUserId', ErrorCode.INVALID_CAPTURE_OPTIONS);
        this.optionalString(options.callerIp, 'callerIp', ErrorCode.INVALID_CAPTURE_OPTIONS);
        this.optionalString(options.traceId, 'traceId', ErrorCode.INVALID_CAPTURE_OPTIONS);
    }

    /**
     * Validates and freezes a config. Strips a trailing slash from apiUrl.
     */
    static resolveConfig(config: TraceLoggerConfig): ResolvedTraceLoggerConfig {
        this.validateTraceLoggerConfig(config);

        return Object.freeze({
            serviceName: config.serviceName,
            environment: config.environment,
            apiUrl: config.apiUrl?.replace(/\/+$/, ''),
            redactKeys: Object.freeze((config.redactKeys ?? []).map((key) => String(key))),
            enableConsoleFallback: config.enableConsoleFallback ?? true,
            enableMetrics: config.enableMetrics ?? false,
        });
    }

    private static requireString(value: unknown, field: string, code: ErrorCode): void {
        if (value === undefined || value === null) {
            throw new ValidationError(`${field} is required`, { field }, undefined, code);
        }
        if (typeof value !== 'string') {
            throw new ValidationError(`${field} must be a string`, { field, value }, undefined, code);
        }
    }

    private static optionalString(value: unknown, field: string, code: ErrorCode): void {
        if (value !== undefined && typeof value !== 'string') {
            throw new ValidationError(`${field} must be a string`, { field, value }, undefined, code);
        }
    }
}
