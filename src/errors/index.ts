export enum ErrorCode {
    // Validation errors
    VALIDATION_ERROR = 'VALIDATION_ERROR',
    INVALID_CONFIG = 'INVALID_CONFIG',
    INVALID_CAPTURE_OPTIONS = 'INVALID_CAPTURE_OPTIONS',

    // Collaborator API errors
    API_ERROR = 'API_ERROR',
    API_TIMEOUT = 'API_TIMEOUT',
    API_THROTTLED = 'API_THROTTLED',
    API_UNAUTHORIZED = 'API_UNAUTHORIZED',
    API_FORBIDDEN = 'API_FORBIDDEN',
    API_NOT_FOUND = 'API_NOT_FOUND',
    API_INTERNAL_ERROR = 'API_INTERNAL_ERROR',
    API_NETWORK_ERROR = 'API_NETWORK_ERROR',

    // Export errors
    AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
    EXPORT_ERROR = 'EXPORT_ERROR',

    UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export class TraceLoggerError extends Error {
    public readonly code: ErrorCode;
    public readonly cause?: Error;
    public readonly context?: Record<string, unknown>;
    public readonly timestamp: Date;

    constructor(
        message: string,
        code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
        cause?: Error,
        context?: Record<string, unknown>,
    ) {
        super(message);
        this.name = 'TraceLoggerError';
        this.code = code;
        this.cause = cause;
        this.context = context;
        this.timestamp = new Date();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            context: this.context,
            timestamp: this.timestamp.toISOString(),
            stack: this.stack,
            cause: this.cause
                ? {
                    name: this.cause.name,
                    message: this.cause.message,
                }
                : undefined,
        };
    }
}

export class ValidationError extends TraceLoggerError {
    constructor(
        message: string,
        context?: Record<string, unknown>,
        cause?: Error,
        code: ErrorCode = ErrorCode.VALIDATION_ERROR,
    ) {
        super(message, code, cause, context);
        this.name = 'ValidationError';
    }
}

export class APIError extends TraceLoggerError {
    public readonly statusCode?: number;

    constructor(
        message: string,
        statusCode?: number,
        cause?: Error,
        context?: Record<string, unknown>,
    ) {
        super(message, APIError.getErrorCode(statusCode), cause, context);
        this.name = 'APIError';
        this.statusCode = statusCode;
    }

    private static getErrorCode(statusCode?: number): ErrorCode {
        if (!statusCode) return ErrorCode.API_NETWORK_ERROR;

        switch (statusCode) {
            case 401:
                return ErrorCode.API_UNAUTHORIZED;
            case 403:
                return ErrorCode.API_FORBIDDEN;
            case 404:
                return ErrorCode.API_NOT_FOUND;
            case 429:
                return ErrorCode.API_THROTTLED;
            case 504:
                return ErrorCode.API_TIMEOUT;
            default:
                return statusCode >= 500 ? ErrorCode.API_INTERNAL_ERROR : ErrorCode.API_ERROR;
        }
    }
}

/**
 * Raised by the collaborator when no shared secret is available to sign a request.
 */
export class AuthenticationError extends TraceLoggerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, ErrorCode.AUTHENTICATION_ERROR, undefined, context);
        this.name = 'AuthenticationError';
    }
}

export class ExportError extends TraceLoggerError {
    public readonly traceId: string;

    constructor(traceId: string, message: string, cause?: Error, context?: Record<string, unknown>) {
        super(
            `Trace export failed [${traceId}]: ${message}`,
            ErrorCode.EXPORT_ERROR,
            cause,
            { ...context, traceId },
        );
        this.name = 'ExportError';
        this.traceId = traceId;
    }
}

/**
 * Normalizes an unknown thrown value into an Error instance. Never throws:
 * values that cannot be serialized fall back to String().
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(describeValue(value));
}

function describeValue(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    try {
        const json = JSON.stringify(value);
        if (typeof json === 'string') {
            return json;
        }
    } catch {
        // circular structures and BigInt values are not serializable
    }
    return String(value);
}
