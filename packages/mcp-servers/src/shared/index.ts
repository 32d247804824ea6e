/**
 * Shared building blocks for MCP servers in this package
 */

export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './clock.js';
export * from './session.js';
export * from './server.js';
