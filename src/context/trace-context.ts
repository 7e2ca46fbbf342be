/**
 * Ambient trace id propagated across async boundaries for the current request.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

interface TraceContext {
    traceId?: string;
}

const storage = new AsyncLocalStorage<TraceContext>();

export function getTraceId(): string | undefined {
    return storage.getStore()?.traceId;
}

/**
 * Sets the trace id for the current async context. Outside any context a new one
 * is entered for the remainder of the current execution.
 */
export function setTraceId(traceId: string | undefined): void {
    const store = storage.getStore();
    if (store) {
        store.traceId = traceId;
        return;
    }
    storage.enterWith({ traceId });
}

export function clearTraceId(): void {
    setTraceId(undefined);
}

export function runWithTraceId<T>(traceId: string, fn: () => T): T {
    return storage.run({ traceId }, fn);
}
