#!/usr/bin/env node
/**
 * Tempo MCP Server
 *
 * Exposes Tempo worklogs, accounts and work attributes as MCP tools and
 * resources.
 *
 * Protocol: JSON-RPC 2.0 over stdin/stdout (stdio MCP)
 *
 * Required env vars:
 * - TEMPO_API_TOKEN: Tempo API token
 *
 * See ./config.ts for the optional settings.
 *
 * @version 1.0.0
 */

import { ConfigurationError } from '../shared/errors.js';
import { createLogger, serializeError } from '../shared/logger.js';
import { loadConfig, type TempoConfig } from './config.js';
import { SERVER_NAME, createTempoServer } from './tools.js';

let config: TempoConfig;
try {
  config = loadConfig();
} catch (err) {
  const logger = createLogger(SERVER_NAME);
  if (err instanceof ConfigurationError) {
    logger.error(err.message, { issues: err.issues });
  } else {
    logger.error('Failed to load configuration', { error: serializeError(err) });
  }
  process.exit(1);
}

const logger = createLogger(SERVER_NAME, { level: config.logLevel });
const { server } = createTempoServer(config, { logger });
const connection = server.start();

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  connection.close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error('Shutdown failed', { error: serializeError(err) });
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

connection.closed
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    logger.error('Connection failed', { error: serializeError(err) });
    process.exit(1);
  });
