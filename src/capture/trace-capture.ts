import type { CaptureRequestOptions, TracePayload } from '../config/types.js';
import type { TraceLogLike } from '../observability/types.js';

export type CaptureState = 'open' | 'closed';

/**
 * Everything a capture accumulated, handed to the owner when it closes.
 */
export interface CaptureSnapshot {
    request: CaptureRequestOptions;
    traceId: string;
    /** Route as last set; starts as request.route. */
    route: string;
    durationMs: number;
    statusCode?: number;
    responsePayload?: TracePayload;
    metadata: Record<string, unknown>;
    error?: unknown;
    failed: boolean;
}

/**
 * One traced request/response pair.
 *
 * Open until close() is called; the first close hands a snapshot to the
 * finalizer exactly once. Later calls to close() resolve immediately and
 * mutations after close are ignored.
 */
export class TraceCapture {
    readonly traceId: string;
    private readonly request: CaptureRequestOptions;
    private readonly finalize: (snapshot: CaptureSnapshot) => Promise<void>;
    private readonly logger: TraceLogLike;
    private readonly startedAt: number;
    private state: CaptureState = 'open';
    private closing?: Promise<void>;

    private _route: string;
    private _statusCode?: number;
    private _responsePayload?: TracePayload;
    private _error?: unknown;
    private _failed = false;
    private readonly _metadata: Record<string, unknown>;

    constructor(
        request: CaptureRequestOptions,
        traceId: string,
        finalize: (snapshot: CaptureSnapshot) => Promise<void>,
        logger: TraceLogLike,
    ) {
        this.request = request;
        this.traceId = traceId;
        this.finalize = finalize;
        this.logger = logger;
        this._route = request.route;
        this._metadata = { ...request.metadata };
        this.startedAt = performance.now();
    }

    get isClosed(): boolean {
        return this.state === 'closed';
    }

    get route(): string {
        return this._route;
    }

    get statusCode(): number | undefined {
        return this._statusCode;
    }

    get responsePayload(): TracePayload | undefined {
        return this._responsePayload;
    }

    get error(): unknown {
        return this._error;
    }

    /** True once setError was called, whatever value was thrown. */
    get failed(): boolean {
        return this._failed;
    }

    get metadata(): Readonly<Record<string, unknown>> {
        return this._metadata;
    }

    /**
     * Records the response. Calling it again overwrites the previous values.
     */
    setResponse(statusCode: number, responsePayload?: TracePayload): void {
        if (this.rejectIfClosed('setResponse')) return;
        this._statusCode = statusCode;
        this._responsePayload = responsePayload;
    }

    /**
     * Replaces the route, e.g. with the matched route template once the
     * router has resolved it.
     */
    setRoute(route: string): void {
        if (this.rejectIfClosed('setRoute')) return;
        this._route = route;
    }

    addMetadata(key: string, value: unknown): void {
        if (this.rejectIfClosed('addMetadata')) return;
        this._metadata[key] = value;
    }

    setError(error: unknown): void {
        if (this.rejectIfClosed('setError')) return;
        this._error = error;
        this._failed = true;
    }

    /**
     * Closes the capture and exports its record. Never rejects.
     */
    close(): Promise<void> {
        if (this.closing) {
            return this.closing;
        }

        this.state = 'closed';
        const snapshot: CaptureSnapshot = {
            request: this.request,
            traceId: this.traceId,
            route: this._route,
            durationMs: performance.now() - this.startedAt,
            statusCode: this._statusCode,
            responsePayload: this._responsePayload,
            metadata: { ...this._metadata },
            error: this._error,
            failed: this._failed,
        };

        this.closing = this.finalize(snapshot).catch((error: unknown) => {
            this.logger.error('Trace capture finalizer failed', {
                traceId: this.traceId,
                error,
            });
        });
        return this.closing;
    }

    private rejectIfClosed(operation: string): boolean {
        if (this.state === 'open') return false;
        this.logger.warn(`Ignoring ${operation} on a closed trace capture`, {
            traceId: this.traceId,
            route: this._route,
        });
        return true;
    }
}
