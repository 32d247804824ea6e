/**
 * Structured logger for MCP servers
 *
 * Emits one JSON object per line. Everything goes to stderr: stdout is
 * reserved for JSON-RPC traffic on stdio servers.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  '@timestamp': string;
  level: LogLevel;
  service: string;
  message: string;
  error?: { message: string; stack?: string; type?: string };
  [key: string]: unknown;
}

export const LOG_LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  /** Fields added to every entry */
  context?: Record<string, unknown>;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Serialize an Error into the `error` field shape; anything else is stringified.
 */
export function serializeError(err: unknown): LogEntry['error'] {
  if (err instanceof Error) {
    return { message: err.message, stack: err.stack, type: err.name };
  }
  return { message: String(err) };
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const minLevel = LOG_LEVELS[level];
  const sink = options.sink ?? process.stderr;
  const bound = options.context ?? {};

  function log(entryLevel: LogLevel, message: string, context?: Record<string, unknown>) {
    if (LOG_LEVELS[entryLevel] < minLevel) {return;}

    const entry: LogEntry = {
      '@timestamp': new Date().toISOString(),
      level: entryLevel,
      service,
      message,
      ...bound,
      ...context,
    };

    sink.write(`${JSON.stringify(entry)}\n`);
  }

  return {
    level,
    debug: (msg, ctx) => log('debug', msg, ctx),
    info: (msg, ctx) => log('info', msg, ctx),
    warn: (msg, ctx) => log('warn', msg, ctx),
    error: (msg, ctx) => log('error', msg, ctx),
    child: (context) => createLogger(service, { level, sink, context: { ...bound, ...context } }),
  };
}

/**
 * Logger that drops everything. Default for components built without one.
 */
export const silentLogger: Logger = createLogger('silent', {
  level: 'error',
  sink: { write: () => true },
});
