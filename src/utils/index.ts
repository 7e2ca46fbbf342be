/**
 * Utilities module exports.
 * Payload redaction, timestamps and host identification.
 */

export * from './redact.js';
export * from './time.js';
