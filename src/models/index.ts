export * from './trace-record.js';
