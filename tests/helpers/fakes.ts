import { vi } from 'vitest';
import type { TraceRecord } from '../../src/models/trace-record.js';

export function createMockLogger() {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    };
}

export function createMockTransport() {
    return {
        send: vi.fn(async (_record: TraceRecord): Promise<void> => undefined),
    };
}

export function createMockMetrics() {
    return {
        addMetric: vi.fn(),
        publishStoredMetrics: vi.fn(),
    };
}

export function buildRecord(overrides: Partial<TraceRecord> = {}): TraceRecord {
    return {
        traceId: 'trace-1',
        service: 'payments',
        environment: 'test',
        timestamp: '2024-05-01T12:00:00.000Z',
        direction: 'inbound',
        route: '/v1/payments/{payment_id}',
        method: 'POST',
        durationMs: 4.5,
        ...overrides,
    };
}
