/**
 * Configuration type definitions for the trace logger.
 *
 * This module contains the configuration interfaces and the option shapes
 * accepted when a request is captured.
 */

import type { TraceLogLike, TraceMetricsLike } from '../observability/types.js';
import type { TraceTransport } from '../transport/types.js';

/**
 * Main configuration interface for creating a TraceLogger instance.
 */
export interface TraceLoggerConfig {
    /**
     * Identifies the emitting service on every record.
     */
    serviceName: string;

    /**
     * Deployment environment name.
     *
     * @example 'prod'
     * @example 'staging'
     */
    environment: string;

    /**
     * Base URL override for the internal observability API.
     * A trailing slash is removed.
     *
     * @default INTERNAL_API_BASE_URL, then 'http://internal-api:8005'
     */
    apiUrl?: string;

    /**
     * Payload keys whose values are replaced before export.
     * Matched case-insensitively at any depth.
     */
    redactKeys?: readonly string[];

    /**
     * Write the failed record into the error log entry when an export fails.
     *
     * @default true
     */
    enableConsoleFallback?: boolean;

    /**
     * Emit CloudWatch EMF counters for exports.
     *
     * @default false
     */
    enableMetrics?: boolean;

    /**
     * AWS Powertools Logger instance.
     * If not provided, a default logger will be created.
     */
    logger?: TraceLogLike;

    /**
     * AWS Powertools Metrics instance, used when enableMetrics is set.
     */
    metrics?: TraceMetricsLike;

    /**
     * Collaborator used to deliver records.
     * If not provided, an InternalObservabilityService is created from apiUrl.
     */
    transport?: TraceTransport;
}

/**
 * Config after validation and normalization. Frozen and shared by every capture.
 */
export interface ResolvedTraceLoggerConfig {
    readonly serviceName: string;
    readonly environment: string;
    readonly apiUrl?: string;
    readonly redactKeys: readonly string[];
    readonly enableConsoleFallback: boolean;
    readonly enableMetrics: boolean;
}

export type TraceDirection = 'inbound' | 'outbound';

/**
 * Structured request or response body. Opaque apart from redaction.
 */
export type TracePayload = Record<string, unknown>;

/**
 * Request fields supplied when a capture scope is opened.
 */
export interface CaptureRequestOptions {
    direction: TraceDirection;
    route: string;
    method: string;
    callerService?: string;
    callerUserId?: string;
    callerIp?: string;
    requestPayload?: TracePayload;
    /** Initial metadata; more can be added via TraceCapture.addMetadata. */
    metadata?: Record<string, unknown>;
    /** Explicit trace id. Falls back to the ambient trace id, then a new UUID. */
    traceId?: string;
}

/**
 * A fully formed event passed to TraceLogger.logEvent.
 */
export interface LogEventInput extends CaptureRequestOptions {
    durationMs: number;
    statusCode?: number;
    responsePayload?: TracePayload;
    error?: unknown;
    /**
     * Marks the event as failed even when error is undefined, as for
     * `throw undefined`.
     */
    failed?: boolean;
}
