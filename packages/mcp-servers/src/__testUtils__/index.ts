/**
 * Shared Test Utilities for the Tempo MCP server
 *
 * Deterministic time, in-memory protocol streams and response parsing.
 * The fake Tempo remote lives in ./fake-tempo.ts, data factories in
 * ./fixtures.ts.
 *
 * @module __testUtils__
 */

import { PassThrough, Writable } from 'stream';
import { z } from 'zod';
import { abortError, type Clock } from '../shared/clock.js';

export * from './fake-tempo.js';
export * from './fixtures.js';

// ============================================================================
// Virtual Time
// ============================================================================

/** 2024-01-15T09:00:00Z, a Monday */
export const TEST_EPOCH = Date.UTC(2024, 0, 15, 9, 0, 0);

/**
 * Clock whose `sleep` jumps time forward instead of waiting. Every sleep is
 * recorded so tests can assert the delays that were requested.
 *
 * @example
 * ```typescript
 * const clock = new VirtualClock();
 * const limiter = new RateLimiter({ requestsPerSecond: 5, clock });
 * ```
 */
export class VirtualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: number = TEST_EPOCH) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
    return Promise.resolve();
  }
}

// ============================================================================
// Protocol Streams
// ============================================================================

const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.unknown().optional(),
  error: z.object({
    code: z.number(),
    message: z.string(),
    data: z.unknown().optional(),
  }).optional(),
});

export type TestResponse = z.infer<typeof JsonRpcResponseSchema>;

const ToolCallResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
  isError: z.boolean().optional(),
});

const ResourceReadResultSchema = z.object({
  contents: z.array(z.object({ uri: z.string(), mimeType: z.string().optional(), text: z.string() })).min(1),
});

/**
 * Writable that records every newline-delimited message written to it.
 * Writes are captured synchronously.
 */
export class LineCollector extends Writable {
  readonly lines: string[] = [];
  private partial = '';

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = this.partial + chunk.toString();
    const parts = text.split('\n');
    this.partial = parts.pop() ?? '';
    this.lines.push(...parts.filter((line) => line.trim() !== ''));
    callback();
  }

  /** Every message written so far, parsed as JSON-RPC responses */
  responses(): TestResponse[] {
    return this.lines.map((line) => JsonRpcResponseSchema.parse(JSON.parse(line)));
  }

  lastResponse(): TestResponse {
    const responses = this.responses();
    const last = responses[responses.length - 1];
    if (!last) {
      throw new Error('No response was written');
    }
    return last;
  }
}

export interface TestStreams {
  input: PassThrough;
  output: LineCollector;
}

export function createTestStreams(): TestStreams {
  return { input: new PassThrough(), output: new LineCollector() };
}

export interface ParsedToolResult {
  isError: boolean;
  payload: unknown;
}

/**
 * Decode the JSON text inside a successful `tools/call` response.
 */
export function parseToolResult(response: TestResponse): ParsedToolResult {
  if (response.error) {
    throw new Error(`Expected a tool result, got error ${response.error.code}: ${response.error.message}`);
  }
  const result = ToolCallResultSchema.parse(response.result);
  return { isError: result.isError ?? false, payload: JSON.parse(result.content[0].text) };
}

/**
 * Decode the JSON text inside a `resources/read` response.
 */
export function parseResourceResult(response: TestResponse): unknown {
  if (response.error) {
    throw new Error(`Expected a resource result, got error ${response.error.code}: ${response.error.message}`);
  }
  const result = ResourceReadResultSchema.parse(response.result);
  return JSON.parse(result.contents[0].text);
}

/**
 * Build a newline-free JSON-RPC request line.
 */
export function requestLine(id: string | number, method: string, params?: unknown): string {
  return JSON.stringify(params === undefined ? { jsonrpc: '2.0', id, method } : { jsonrpc: '2.0', id, method, params });
}

export function toolCallLine(id: string | number, name: string, args: Record<string, unknown> = {}): string {
  return requestLine(id, 'tools/call', { name, arguments: args });
}
