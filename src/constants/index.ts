/**
 * Application-wide constants.
 */

/**
 * Default configuration values.
 */
export const DEFAULTS = {
    API_URL: 'http://internal-api:8005',
    REQUEST_TIMEOUT_MS: 5000,
    REDACTED_TEXT: '<<redacted>>',
    INGESTION_VERSION: 1,
    RAW_BODY_MAX_CHARS: 2048,
    METRICS_NAMESPACE: 'TraceLogger',
    SERVICE_NAME: 'unknown_service',
    ENVIRONMENT: 'local',
} as const;

/**
 * Internal observability API routes.
 */
export const ENDPOINTS = {
    LOGS: '/observability/logs',
    ERROR_LOGS: '/observability/error-logs',
} as const;

/**
 * Environment variables read by the package.
 */
export const ENV_VARS = {
    AUTH_SECRET: 'INTERNAL_AUTH_SECRET',
    API_BASE_URL: 'INTERNAL_API_BASE_URL',
    LOG_LEVEL: 'LOG_LEVEL',
    ENABLED: 'TRACE_LOGGER_ENABLED',
    SERVICE_NAME: 'TRACE_LOGGER_SERVICE_NAME',
    API_URL: 'TRACE_LOGGER_API_URL',
    REDACT_KEYS: 'TRACE_LOGGER_REDACT_KEYS',
    ENVIRONMENT: 'ENV',
} as const;

/**
 * Trace propagation headers.
 */
export const HEADERS = {
    TRACE_ID: 'x-trace-id',
    CALLER_SERVICE: 'x-caller-service',
    USER_ID: 'x-user-id',
    USER_AGENT: 'user-agent',
} as const;

/**
 * Metric names emitted when metrics are enabled.
 */
export const METRIC_NAMES = {
    EVENTS_EXPORTED: 'TraceEventsExported',
    EXPORT_FAILURES: 'TraceExportFailures',
} as const;

/**
 * Records at or above this status are also sent to the error-log endpoint.
 */
export const ERROR_STATUS_THRESHOLD = 400;
