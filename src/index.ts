export { TraceLogger } from './trace-logger.js';
export { default } from './trace-logger.js';

export { TraceCapture } from './capture/index.js';
export type { CaptureSnapshot, CaptureState } from './capture/index.js';

export type {
    TraceLoggerConfig,
    ResolvedTraceLoggerConfig,
    CaptureRequestOptions,
    LogEventInput,
    TraceDirection,
    TracePayload,
    EnvConfigOverrides,
    EnvSource,
} from './config/index.js';
export { ConfigValidator, loadConfigFromEnv, parseRedactKeys, isTracingEnabled } from './config/index.js';

export type { TraceRecord, TraceRecordPayload, IngestionBatch } from './models/index.js';
export { toPayload } from './models/index.js';

export { InternalObservabilityService } from './transport/index.js';
export type { TraceTransport, InternalServiceOptions } from './transport/index.js';

export { getTraceId, setTraceId, clearTraceId, runWithTraceId } from './context/index.js';

export { traceLoggingMiddleware, traceErrorHandler, setupObservability, extractRequestPayload } from './integrations/index.js';
export type { SetupObservabilityOptions } from './integrations/index.js';

export { createLogger, createMetrics, buildDefaultDimensions, parseLogLevel } from './observability/index.js';
export type { LoggerConfig, MetricsConfig, LogLevelName, TraceLogLike, TraceMetricsLike } from './observability/index.js';

export {
    ErrorCode,
    TraceLoggerError,
    ValidationError,
    APIError,
    AuthenticationError,
    ExportError,
} from './errors/index.js';

export { redactPayload } from './utils/index.js';
export type { RedactConfig } from './utils/index.js';

export { DEFAULTS, ENDPOINTS, ENV_VARS, HEADERS } from './constants/index.js';
