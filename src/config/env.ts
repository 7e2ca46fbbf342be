import { DEFAULTS, ENV_VARS } from '../constants/index.js';
import type { TraceLoggerConfig } from './types.js';

/**
 * Overrides accepted by loadConfigFromEnv. Anything left out is read from the environment.
 */
export interface EnvConfigOverrides {
    serviceName?: string;
    environment?: string;
    apiUrl?: string;
    /** Comma-separated list, same format as TRACE_LOGGER_REDACT_KEYS. */
    redactKeys?: string;
    enabled?: boolean;
    /** Used when neither serviceName nor TRACE_LOGGER_SERVICE_NAME is set. */
    fallbackServiceName?: string;
}

export type EnvSource = Record<string, string | undefined>;

export function parseRedactKeys(value: string | undefined): string[] {
    if (!value) return [];
    return value
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0);
}

export function isTracingEnabled(enabled: boolean | undefined, env: EnvSource = process.env): boolean {
    if (enabled !== undefined) return enabled;
    return (env[ENV_VARS.ENABLED] ?? 'true').toLowerCase() === 'true';
}

/**
 * Builds a TraceLoggerConfig from explicit overrides and environment variables.
 */
export function loadConfigFromEnv(
    overrides: EnvConfigOverrides = {},
    env: EnvSource = process.env,
): TraceLoggerConfig {
    const serviceName =
        overrides.serviceName ||
        env[ENV_VARS.SERVICE_NAME] ||
        overrides.fallbackServiceName ||
        DEFAULTS.SERVICE_NAME;

    const environment = overrides.environment || env[ENV_VARS.ENVIRONMENT] || DEFAULTS.ENVIRONMENT;

    const apiUrl =
        overrides.apiUrl ||
        env[ENV_VARS.API_URL] ||
        env[ENV_VARS.API_BASE_URL] ||
        DEFAULTS.API_URL;

    const redactKeys = overrides.redactKeys
        ? parseRedactKeys(overrides.redactKeys)
        : parseRedactKeys(env[ENV_VARS.REDACT_KEYS]);

    return { serviceName, environment, apiUrl, redactKeys };
}
