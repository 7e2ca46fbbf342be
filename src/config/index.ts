/**
 * Configuration module exports.
 * Provides types, validators and environment loading for the trace logger.
 */

export * from './types.js';
export * from './validator.js';
export * from './env.js';
