import type { TraceRecord } from '../models/trace-record.js';

/**
 * Delivers one trace record to the observability backend.
 * Rejects on any transport or authentication failure.
 */
export interface TraceTransport {
    send(record: TraceRecord): Promise<void>;
}
