import { randomUUID } from 'node:crypto';
import { MetricUnit } from '@aws-lambda-powertools/metrics';
import type {
    CaptureRequestOptions,
    LogEventInput,
    ResolvedTraceLoggerConfig,
    TraceLoggerConfig,
} from './config/types.js';
import { ConfigValidator } from './config/validator.js';
import { METRIC_NAMES } from './constants/index.js';
import { clearTraceId, getTraceId, runWithTraceId, setTraceId } from './context/trace-context.js';
import { TraceCapture, type CaptureSnapshot } from './capture/trace-capture.js';
import { ExportError, toError } from './errors/index.js';
import { toPayload, type TraceRecord } from './models/trace-record.js';
import { createLogger } from './observability/logger.js';
import { createMetrics } from './observability/metrics.js';
import type { TraceLogLike, TraceMetricsLike } from './observability/types.js';
import { InternalObservabilityService } from './transport/internal-service.js';
import type { TraceTransport } from './transport/types.js';
import { redactPayload } from './utils/redact.js';
import { getHostName, roundDuration, utcIsoNow } from './utils/time.js';

/**
 * TraceLogger - factory for capture sessions bound to one frozen config.
 *
 * Each capture exports exactly one record when it closes. Export failures are
 * logged and swallowed; errors thrown by the traced code are never altered.
 *
 * @example
 * ```typescript
 * const traceLogger = new TraceLogger({ serviceName: 'payments', environment: 'staging' });
 *
 * await traceLogger.captureRequest(
 *   { direction: 'inbound', route: '/v1/payments/{payment_id}', method: 'POST', requestPayload: { amount: 1200 } },
 *   async (capture) => {
 *     capture.setResponse(201, { status: 'ok' });
 *   },
 * );
 * ```
 */
export class TraceLogger {
    readonly config: ResolvedTraceLoggerConfig;
    readonly hostName: string;
    private readonly logger: TraceLogLike;
    private readonly metrics?: TraceMetricsLike;
    private readonly transport: TraceTransport;

    /**
     * @throws {ValidationError} If configuration is invalid
     */
    constructor(config: TraceLoggerConfig) {
        this.config = ConfigValidator.resolveConfig(config);
        this.logger =
            config.logger ??
            createLogger({
                serviceName: this.config.serviceName,
                persistentLogAttributes: {
                    environment: this.config.environment,
                },
            });
        this.metrics = this.config.enableMetrics
            ? config.metrics ??
              createMetrics({
                  serviceName: this.config.serviceName,
                  environment: this.config.environment,
              })
            : undefined;
        this.transport = config.transport ?? new InternalObservabilityService({ apiUrl: this.config.apiUrl });
        this.hostName = getHostName();
    }

    /**
     * Picks the given trace id, else the ambient one, else a new UUID.
     */
    resolveTraceId(traceId?: string): string {
        return traceId || getTraceId() || randomUUID();
    }

    /**
     * Resolves the trace id for the current request and stores it in the
     * ambient trace context.
     */
    ensureTraceId(traceId?: string): string {
        const current = this.resolveTraceId(traceId);
        setTraceId(current);
        return current;
    }

    clearTrace(): void {
        clearTraceId();
    }

    /**
     * Opens a capture without scoping it. The caller must call close().
     *
     * @throws {ValidationError} If a required request field is missing
     */
    openCapture(options: CaptureRequestOptions): TraceCapture {
        ConfigValidator.validateCaptureOptions(options);
        const traceId = this.resolveTraceId(options.traceId);

        return new TraceCapture(
            options,
            traceId,
            (snapshot) => this.exportSnapshot(snapshot),
            this.logger,
        );
    }

    /**
     * Runs body inside a capture scope. The capture is closed, and its record
     * exported, on every exit path before the result or error is passed on.
     *
     * @throws {ValidationError} If a required request field is missing
     */
    async captureRequest<T>(
        options: CaptureRequestOptions,
        body: (capture: TraceCapture) => T | Promise<T>,
    ): Promise<T> {
        const capture = this.openCapture(options);

        try {
            return await runWithTraceId(capture.traceId, () => body(capture));
        } catch (error) {
            capture.setError(error);
            throw error;
        } finally {
            await capture.close();
        }
    }

    /**
     * Exports a single fully formed event and returns its trace id.
     */
    async logEvent(event: LogEventInput): Promise<string> {
        ConfigValidator.validateCaptureOptions(event);
        const traceId = this.resolveTraceId(event.traceId);

        await this.export(this.buildRecord({ ...event, traceId }));
        return traceId;
    }

    private async exportSnapshot(snapshot: CaptureSnapshot): Promise<void> {
        await this.export(
            this.buildRecord({
                ...snapshot.request,
                traceId: snapshot.traceId,
                route: snapshot.route,
                durationMs: snapshot.durationMs,
                statusCode: snapshot.statusCode,
                responsePayload: snapshot.responsePayload,
                metadata: snapshot.metadata,
                error: snapshot.error,
                failed: snapshot.failed,
            }),
        );
    }

    private buildRecord(event: LogEventInput & { traceId: string }): TraceRecord {
        const { redactKeys } = this.config;
        const error = event.failed || event.error !== undefined ? toError(event.error) : undefined;
        const hasMetadata = event.metadata !== undefined && Object.keys(event.metadata).length > 0;

        return {
            traceId: event.traceId,
            service: this.config.serviceName,
            environment: this.config.environment,
            timestamp: utcIsoNow(),
            direction: event.direction,
            route: event.route,
            method: event.method,
            durationMs: roundDuration(event.durationMs),
            statusCode: event.statusCode,
            callerService: event.callerService,
            callerUserId: event.callerUserId,
            callerIp: event.callerIp,
            requestPayload: event.requestPayload && redactPayload(event.requestPayload, redactKeys),
            responsePayload: event.responsePayload && redactPayload(event.responsePayload, redactKeys),
            metadata: hasMetadata ? event.metadata : undefined,
            errorType: error?.name,
            errorMessage: error?.message,
            errorStack: error?.stack,
            hostName: this.hostName,
        };
    }

    private async export(record: TraceRecord): Promise<void> {
        try {
            await this.transport.send(record);
            this.logger.debug('Trace record exported', {
                traceId: record.traceId,
                route: record.route,
                method: record.method,
            });
            this.countExport(METRIC_NAMES.EVENTS_EXPORTED);
        } catch (error) {
            const cause = toError(error);
            const exportError = new ExportError(record.traceId, cause.message, cause);

            this.logger.error('Failed to export trace record', {
                error: exportError.toJSON(),
                ...(this.config.enableConsoleFallback ? { record: toPayload(record) } : {}),
            });
            this.countExport(METRIC_NAMES.EXPORT_FAILURES);
        }
    }

    private countExport(metricName: string): void {
        if (!this.metrics) return;

        try {
            this.metrics.addMetric(metricName, MetricUnit.Count, 1);
            this.metrics.publishStoredMetrics();
        } catch (error) {
            this.logger.warn('Failed to publish trace metrics', { metricName, error: toError(error).message });
        }
    }
}

export default TraceLogger;
