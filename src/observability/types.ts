import type { Logger } from '@aws-lambda-powertools/logger';
import type { Metrics } from '@aws-lambda-powertools/metrics';

/**
 * The subset of the Powertools Logger the trace logger writes to.
 */
export type TraceLogLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * The subset of Powertools Metrics used to count exports.
 */
export type TraceMetricsLike = Pick<Metrics, 'addMetric' | 'publishStoredMetrics'>;
