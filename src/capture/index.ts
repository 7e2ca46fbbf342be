export * from './trace-capture.js';
