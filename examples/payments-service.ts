import express from 'express';
import { TraceLogger, setupObservability, traceErrorHandler } from '../src/index.js';

/**
 * Example 1: Tracing an outbound call by hand
 *
 * Wraps a call to another internal service in a capture scope. The record is
 * exported when the scope exits, even if the call throws.
 */
async function traceOutboundCall() {
    console.log('=== Example 1: Outbound capture ===\n');

    const traceLogger = new TraceLogger({
        serviceName: 'payments',
        environment: process.env.ENV || 'local',
        redactKeys: ['cardNumber'],
    });

    const quote = await traceLogger.captureRequest(
        {
            direction: 'outbound',
            route: '/v1/fx/quotes',
            method: 'POST',
            callerService: 'payments',
            requestPayload: { from: 'EUR', to: 'USD', amount: 1200 },
        },
        async (capture) => {
            const result = { rate: 1.08, amount: 1296 };
            capture.setResponse(200, result);
            return result;
        },
    );

    console.log('Quote:', quote);
}

/**
 * Example 2: Tracing every request of an Express app
 *
 * Reads TRACE_LOGGER_* variables and installs the middleware after the JSON body parser.
 */
function tracedExpressApp() {
    console.log('\n=== Example 2: Express middleware ===\n');

    const app = express();
    app.set('title', 'Payments API');
    app.use(express.json());

    const traceLogger = setupObservability(app);
    console.log('Tracing enabled:', traceLogger !== undefined);

    app.post('/v1/payments/:paymentId', (_req, res) => {
        res.status(201).json({ status: 'ok' });
    });
    // After the routes, so handler errors reach the trace record.
    app.use(traceErrorHandler());

    return app;
}

async function main() {
    await traceOutboundCall();
    tracedExpressApp();
}

main().catch((error: unknown) => {
    console.error('Example failed:', error);
    process.exitCode = 1;
});
