/**
 * Express integration: traces every inbound request handled by an app.
 *
 * Install after any body parser so the parsed body can be captured.
 */

import type { Application, ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { isTracingEnabled, loadConfigFromEnv, type EnvConfigOverrides, type EnvSource } from '../config/env.js';
import type { TraceLoggerConfig, TracePayload } from '../config/types.js';
import { DEFAULTS, HEADERS } from '../constants/index.js';
import { runWithTraceId } from '../context/trace-context.js';
import type { TraceCapture } from '../capture/trace-capture.js';
import { TraceLogger } from '../trace-logger.js';
import { isPlainRecord } from '../utils/redact.js';

// Open captures by request, for traceErrorHandler.
const captures = new WeakMap<Request, TraceCapture>();

/**
 * Opens a capture per request and closes it when the response finishes or the
 * connection closes, whichever comes first.
 *
 * The record's route starts as the request path and becomes the matched route
 * template (e.g. `/v1/payments/:paymentId`) once a route handler has run.
 */
export function traceLoggingMiddleware(traceLogger: TraceLogger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const traceId = traceLogger.resolveTraceId(req.get(HEADERS.TRACE_ID));

        const capture = traceLogger.openCapture({
            direction: 'inbound',
            route: `${req.baseUrl}${req.path}`,
            method: req.method,
            callerService: req.get(HEADERS.CALLER_SERVICE),
            callerUserId: req.get(HEADERS.USER_ID),
            callerIp: req.ip,
            requestPayload: extractRequestPayload(req.body),
            metadata: {
                queryParams: req.query,
                userAgent: req.get(HEADERS.USER_AGENT),
            },
            traceId,
        });

        captures.set(req, capture);
        res.setHeader(HEADERS.TRACE_ID, traceId);

        res.on('finish', () => {
            const template = matchedRouteTemplate(req);
            if (template !== undefined) {
                capture.setRoute(template);
            }
            capture.setResponse(res.statusCode);
            void capture.close();
        });
        // Aborted connections emit close without finish.
        res.on('close', () => {
            void capture.close();
        });

        runWithTraceId(traceId, next);
    };
}

/**
 * Records a handler error on the request's capture, then passes it on.
 * Install after the routes and before the app's own error handlers.
 */
export function traceErrorHandler(): ErrorRequestHandler {
    return (err: unknown, req: Request, _res: Response, next: NextFunction) => {
        captures.get(req)?.setError(err);
        next(err);
    };
}

function matchedRouteTemplate(req: Request): string | undefined {
    // req.route is only set once a route handler matched.
    const routePath: unknown = req.route?.path;
    return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : undefined;
}

/**
 * Reads a parsed body as a trace payload. Strings are truncated into { raw }.
 */
export function extractRequestPayload(body: unknown): TracePayload | undefined {
    if (isPlainRecord(body)) {
        return Object.keys(body).length > 0 ? body : undefined;
    }
    if (typeof body === 'string' && body.length > 0) {
        return { raw: body.slice(0, DEFAULTS.RAW_BODY_MAX_CHARS) };
    }
    if (Buffer.isBuffer(body) && body.length > 0) {
        return { raw: body.subarray(0, DEFAULTS.RAW_BODY_MAX_CHARS).toString('utf8') };
    }
    return undefined;
}

export interface SetupObservabilityOptions extends EnvConfigOverrides {
    /** Extra config merged over the environment-derived one. */
    config?: Partial<TraceLoggerConfig>;
    env?: EnvSource;
}

/**
 * Configures trace logging for an Express app from options and environment
 * variables, and installs the middleware.
 *
 * @returns The TraceLogger, or undefined when TRACE_LOGGER_ENABLED is not 'true'
 */
export function setupObservability(
    app: Application,
    options: SetupObservabilityOptions = {},
): TraceLogger | undefined {
    const env = options.env ?? process.env;

    if (!isTracingEnabled(options.enabled, env)) {
        return undefined;
    }

    const envConfig = loadConfigFromEnv(
        { ...options, fallbackServiceName: options.fallbackServiceName ?? appTitle(app) },
        env,
    );
    const traceLogger = new TraceLogger({ ...envConfig, ...options.config });

    app.use(traceLoggingMiddleware(traceLogger));
    return traceLogger;
}

function appTitle(app: Application): string | undefined {
    const title: unknown = app.get('title');
    if (typeof title !== 'string' || title.length === 0) return undefined;
    return title.toLowerCase().replace(/ /g, '_');
}
