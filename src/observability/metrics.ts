import { Metrics } from '@aws-lambda-powertools/metrics';
import { DEFAULTS } from '../constants/index.js';

export interface MetricsConfig {
    /** @default 'TraceLogger' */
    namespace?: string;
    serviceName: string;
    /** Added as the `environment` dimension on every export counter. */
    environment?: string;
    /** Extra dimensions; these win over `environment` on a name clash. */
    defaultDimensions?: Record<string, string>;
}

/**
 * Dimensions attached to every trace export metric.
 */
export function buildDefaultDimensions(config: MetricsConfig): Record<string, string> {
    return {
        ...(config.environment ? { environment: config.environment } : {}),
        ...config.defaultDimensions,
    };
}

/**
 * Metrics for the trace exporter: `TraceEventsExported` and
 * `TraceExportFailures` counters, dimensioned by service and environment.
 */
export function createMetrics(config: MetricsConfig): Metrics {
    return new Metrics({
        namespace: config.namespace || DEFAULTS.METRICS_NAMESPACE,
        serviceName: config.serviceName,
        defaultDimensions: buildDefaultDimensions(config),
    });
}
