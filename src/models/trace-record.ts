import type { TraceDirection, TracePayload } from '../config/types.js';

/**
 * One captured request/response pair as delivered to the observability API.
 */
export interface TraceRecord {
    traceId: string;
    service: string;
    environment: string;
    /** UTC ISO-8601 with milliseconds. */
    timestamp: string;
    direction: TraceDirection;
    route: string;
    method: string;
    durationMs: number;
    /** Present only when a response was recorded. */
    statusCode?: number;
    callerService?: string;
    callerUserId?: string;
    callerIp?: string;
    requestPayload?: TracePayload;
    /** Present only when a response was recorded. */
    responsePayload?: TracePayload;
    metadata?: Record<string, unknown>;
    errorType?: string;
    errorMessage?: string;
    errorStack?: string;
    hostName?: string;
}

/**
 * Wire shape of a record: snake_case keys, absent fields omitted.
 */
export type TraceRecordPayload = Record<string, unknown>;

/**
 * Request body accepted by the log ingestion endpoints.
 */
export interface IngestionBatch {
    records: TraceRecordPayload[];
    ingestion_version: number;
}

const WIRE_KEYS: ReadonlyArray<readonly [keyof TraceRecord, string]> = [
    ['traceId', 'trace_id'],
    ['service', 'service'],
    ['environment', 'environment'],
    ['timestamp', 'timestamp'],
    ['direction', 'direction'],
    ['route', 'route'],
    ['method', 'method'],
    ['durationMs', 'duration_ms'],
    ['statusCode', 'status_code'],
    ['callerService', 'caller_service'],
    ['callerUserId', 'caller_user_id'],
    ['callerIp', 'caller_ip'],
    ['requestPayload', 'request_payload'],
    ['responsePayload', 'response_payload'],
    ['metadata', 'metadata'],
    ['errorType', 'error_type'],
    ['errorMessage', 'error_message'],
    ['errorStack', 'error_stack'],
    ['hostName', 'host_name'],
];

export function toPayload(record: TraceRecord): TraceRecordPayload {
    const payload: TraceRecordPayload = {};
    for (const [key, wireKey] of WIRE_KEYS) {
        const value = record[key];
        if (value !== undefined && value !== null) {
            payload[wireKey] = value;
        }
    }
    return payload;
}

export function isErrorRecord(record: TraceRecord, threshold: number): boolean {
    return (record.statusCode !== undefined && record.statusCode >= threshold) || record.errorType !== undefined;
}
