export * from './types.js';
export * from './duration.js';
export * from './config.js';
export * from './rate-limiter.js';
export * from './client.js';
export * from './operations.js';
export * from './tools.js';
