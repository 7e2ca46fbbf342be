/**
 * Observability module exports.
 * Provides logging and metrics for the trace logger itself via AWS Powertools.
 */

export * from './logger.js';
export * from './metrics.js';
export * from './types.js';
