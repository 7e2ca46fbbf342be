export * from './types.js';
export * from './internal-service.js';
