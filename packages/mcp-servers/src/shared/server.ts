/**
 * Base MCP Server implementation
 *
 * Provides a reusable foundation for MCP servers with:
 * - JSON-RPC 2.0 protocol handling over newline-delimited streams
 * - MCP protocol methods (initialize, ping, tools/*, resources/*)
 * - Per-connection sessions with strictly sequential request processing
 * - Cancellation via notifications/cancelled and connection close
 * - Input validation with Zod before any handler runs
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { z, type ZodTypeAny } from 'zod';
import { InvalidArgumentError, errorMessage, toToolError } from './errors.js';
import { silentLogger, serializeError, type Logger } from './logger.js';
import { Session } from './session.js';
import {
  JsonRpcRequestSchema,
  McpCancelledParamsSchema,
  McpResourceReadParamsSchema,
  McpToolCallParamsSchema,
  JSON_RPC_ERRORS,
  MCP_PROTOCOL_VERSION,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpInitializeResult,
  type McpResourceDefinition,
  type McpResourceReadResult,
  type McpToolCallResult,
  type McpToolDefinition,
  type ToolErrorBody,
  type ToolInvocation,
} from './types.js';

// ============================================================================
// Tool and Resource Descriptors
// ============================================================================

export interface ToolContext {
  /** Aborted when the caller cancels the request or disconnects */
  signal: AbortSignal;
  session: Session;
  invocation: ToolInvocation;
  logger: Logger;
}

export interface ToolHandler<TSchema extends ZodTypeAny, TResult = unknown> {
  name: string;
  description: string;
  schema: TSchema;
  handler(args: z.output<TSchema>, context: ToolContext): TResult | Promise<TResult>;
}

export type ParsedToolCall =
  | { success: true; execute(context: ToolContext): Promise<unknown> }
  | { success: false; error: z.ZodError };

/**
 * Tool with its argument type erased, as held by the registry. The typed
 * handler is only reachable through `parse`, so a handler never sees
 * arguments that failed its schema.
 */
export interface AnyToolHandler {
  readonly name: string;
  readonly description: string;
  readonly schema: ZodTypeAny;
  parse(args: unknown): ParsedToolCall;
}

export function defineTool<TSchema extends ZodTypeAny, TResult>(
  tool: ToolHandler<TSchema, TResult>,
): AnyToolHandler {
  return {
    name: tool.name,
    description: tool.description,
    schema: tool.schema,
    parse(args) {
      const result = tool.schema.safeParse(args);
      if (!result.success) {
        return { success: false, error: result.error };
      }
      const data: z.output<TSchema> = result.data;
      return {
        success: true,
        execute: async (context) => tool.handler(data, context),
      };
    },
  };
}

export interface ResourceContext {
  signal: AbortSignal;
  session: Session;
  logger: Logger;
}

export interface ResourceHandler extends McpResourceDefinition {
  read(context: ResourceContext): Promise<unknown>;
}

export interface McpServerOptions {
  name: string;
  version: string;
  tools: AnyToolHandler[];
  resources?: ResourceHandler[];
  logger?: Logger;
  /** Clock for session start times; defaults to Date.now */
  now?: () => number;
}

// ============================================================================
// Schema Conversion
// ============================================================================

function describe(result: Record<string, unknown>, description: string | undefined): Record<string, unknown> {
  if (description) {result.description = description;}
  return result;
}

function unwrapEffects(schema: ZodTypeAny): ZodTypeAny {
  return schema instanceof z.ZodEffects ? unwrapEffects(schema.innerType()) : schema;
}

/**
 * Convert a Zod field schema to JSON Schema.
 * This is a simplified conversion covering the types tool schemas use.
 */
export function zodTypeToJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
  // Wrappers keep the outer description when present
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    const inner = zodTypeToJsonSchema(schema.unwrap());
    return describe(inner, schema.description);
  }

  if (schema instanceof z.ZodDefault) {
    const inner = zodTypeToJsonSchema(schema._def.innerType);
    return describe({ ...inner, default: schema._def.defaultValue() }, schema.description);
  }

  if (schema instanceof z.ZodEffects) {
    return describe(zodTypeToJsonSchema(schema.innerType()), schema.description);
  }

  if (schema instanceof z.ZodString) {
    const result: Record<string, unknown> = { type: 'string' };
    for (const check of schema._def.checks) {
      if (check.kind === 'regex') {result.pattern = check.regex.source;}
      if (check.kind === 'min') {result.minLength = check.value;}
      if (check.kind === 'max') {result.maxLength = check.value;}
    }
    return describe(result, schema.description);
  }

  if (schema instanceof z.ZodNumber) {
    const result: Record<string, unknown> = { type: schema.isInt ? 'integer' : 'number' };
    for (const check of schema._def.checks) {
      if (check.kind === 'min') {
        result[check.inclusive ? 'minimum' : 'exclusiveMinimum'] = check.value;
      }
      if (check.kind === 'max') {
        result[check.inclusive ? 'maximum' : 'exclusiveMaximum'] = check.value;
      }
    }
    return describe(result, schema.description);
  }

  if (schema instanceof z.ZodBoolean) {
    return describe({ type: 'boolean' }, schema.description);
  }

  if (schema instanceof z.ZodArray) {
    return describe({ type: 'array', items: zodTypeToJsonSchema(schema.element) }, schema.description);
  }

  if (schema instanceof z.ZodEnum) {
    return describe({ type: 'string', enum: schema.options }, schema.description);
  }

  if (schema instanceof z.ZodRecord) {
    return describe(
      { type: 'object', additionalProperties: zodTypeToJsonSchema(schema.valueSchema) },
      schema.description,
    );
  }

  if (schema instanceof z.ZodObject) {
    return describe({ ...objectToJsonSchema(schema) }, schema.description);
  }

  // Fallback
  return describe({ type: 'string' }, schema.description);
}

function objectToJsonSchema(schema: z.AnyZodObject): McpToolDefinition['inputSchema'] {
  const shape: Record<string, ZodTypeAny> = schema.shape;
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(shape)) {
    properties[key] = zodTypeToJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return {
    type: 'object',
    properties,
    required: required.length > 0 ? required : undefined,
  };
}

/**
 * Convert a tool's argument schema to the JSON Schema published by tools/list.
 * @throws {Error} If the schema is not an object schema
 */
export function toolInputSchema(tool: AnyToolHandler): McpToolDefinition['inputSchema'] {
  const schema = unwrapEffects(tool.schema);
  if (!(schema instanceof z.ZodObject)) {
    throw new Error(`Tool ${tool.name}: argument schema must be a z.object()`);
  }
  return objectToJsonSchema(schema);
}

function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

// ============================================================================
// Server
// ============================================================================

export class McpServer {
  readonly name: string;
  readonly version: string;
  private readonly tools: ReadonlyMap<string, AnyToolHandler>;
  private readonly toolDefinitions: readonly McpToolDefinition[];
  private readonly resources: ReadonlyMap<string, ResourceHandler>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: McpServerOptions) {
    this.name = options.name;
    this.version = options.version;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;

    const tools = new Map<string, AnyToolHandler>();
    const definitions: McpToolDefinition[] = [];
    for (const tool of options.tools) {
      if (tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      tools.set(tool.name, tool);
      definitions.push({
        name: tool.name,
        description: tool.description,
        inputSchema: toolInputSchema(tool),
      });
    }

    const resources = new Map<string, ResourceHandler>();
    for (const resource of options.resources ?? []) {
      if (resources.has(resource.uri)) {
        throw new Error(`Duplicate resource URI: ${resource.uri}`);
      }
      resources.set(resource.uri, resource);
    }

    this.tools = tools;
    this.toolDefinitions = Object.freeze(definitions);
    this.resources = resources;
  }

  get toolNames(): string[] {
    return [...this.tools.keys()];
  }

  getTool(name: string): AnyToolHandler | undefined {
    return this.tools.get(name);
  }

  listTools(): McpToolDefinition[] {
    return [...this.toolDefinitions];
  }

  getResource(uri: string): ResourceHandler | undefined {
    return this.resources.get(uri);
  }

  listResources(): McpResourceDefinition[] {
    return [...this.resources.values()].map(({ uri, name, description, mimeType }) => ({
      uri,
      name,
      description,
      mimeType,
    }));
  }

  initializeResult(): McpInitializeResult {
    return {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: this.resources.size > 0 ? { tools: {}, resources: {} } : { tools: {} },
      serverInfo: { name: this.name, version: this.version },
    };
  }

  /**
   * Open a connection over a pair of streams. Each connection gets its own
   * session and processes its requests one at a time.
   */
  connect(input: Readable, output: Writable): Connection {
    const connection = new Connection(this, output, {
      session: new Session(this.now()),
      logger: this.logger,
    });
    connection.listen(input);
    return connection;
  }

  /**
   * Start the server on stdin/stdout
   */
  public start(): Connection {
    this.logger.info(`${this.name} MCP Server v${this.version} running`, {
      tools: this.toolNames.length,
      resources: this.resources.size,
    });
    return this.connect(process.stdin, process.stdout);
  }
}

// ============================================================================
// Connection
// ============================================================================

export type ConnectionState = 'idle' | 'dispatching' | 'executing';

interface ConnectionOptions {
  session: Session;
  logger: Logger;
}

function requestKey(id: string | number): string {
  return `${typeof id}:${id}`;
}

export class Connection {
  readonly session: Session;
  readonly closed: Promise<void>;
  private readonly server: McpServer;
  private readonly output: Writable;
  private readonly logger: Logger;
  private readonly pending = new Map<string, AbortController>();
  private queue: Promise<void> = Promise.resolve();
  private currentState: ConnectionState = 'idle';
  private isClosed = false;
  private resolveClosed: () => void = () => undefined;

  constructor(server: McpServer, output: Writable, options: ConnectionOptions) {
    this.server = server;
    this.output = output;
    this.session = options.session;
    this.logger = options.logger.child({ session: options.session.id });
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Requests received but not yet answered (queued or running) */
  get pendingRequests(): number {
    return this.pending.size;
  }

  /**
   * Read newline-delimited JSON-RPC messages from `input` until it ends
   */
  listen(input: Readable): void {
    const rl = readline.createInterface({ input, terminal: false });

    rl.on('line', (line) => {
      this.handleLine(line).catch((err: unknown) => {
        this.logger.error('Unhandled error processing message', { error: serializeError(err) });
      });
    });

    input.on('error', (err) => {
      this.logger.error('Input stream error', { error: serializeError(err) });
      rl.close();
    });

    rl.on('close', () => {
      this.close().catch((err: unknown) => {
        this.logger.error('Error while closing connection', { error: serializeError(err) });
      });
    });
  }

  /**
   * Handle one raw line. Resolves once the message has been fully processed
   * (for requests: after its response was written or it was cancelled).
   */
  async handleLine(line: string): Promise<void> {
    // Skip empty lines
    if (!line.trim()) {return;}

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (jsonErr) {
      this.logger.warn('JSON parse error', { error: errorMessage(jsonErr) });
      this.sendError(null, JSON_RPC_ERRORS.PARSE_ERROR, 'Parse error');
      return;
    }

    const parseResult = JsonRpcRequestSchema.safeParse(parsed);
    if (!parseResult.success) {
      this.sendError(
        extractId(parsed),
        JSON_RPC_ERRORS.INVALID_REQUEST,
        `Invalid request: ${parseResult.error.message}`,
      );
      return;
    }

    await this.handleMessage(parseResult.data);
  }

  async handleMessage(message: JsonRpcRequest): Promise<void> {
    if (message.method === 'notifications/cancelled') {
      this.handleCancelled(message.params);
      return;
    }

    // Notifications carry no id and get no response
    if (message.id === undefined) {
      this.logger.debug('Notification received', { method: message.method });
      return;
    }

    if (this.isClosed) {return;}

    const { id } = message;
    const controller = new AbortController();
    const key = id === null ? null : requestKey(id);
    if (key !== null) {
      if (this.pending.has(key)) {
        this.sendError(id, JSON_RPC_ERRORS.INVALID_REQUEST, `Duplicate request id: ${String(id)}`);
        return;
      }
      this.pending.set(key, controller);
    }

    const done = this.queue
      .then(async () => {
        try {
          if (controller.signal.aborted) {
            this.logger.debug('Skipping cancelled request', { id, method: message.method });
            return;
          }
          await this.dispatch(id, message, controller.signal);
        } finally {
          if (key !== null) {this.pending.delete(key);}
        }
      })
      .catch((err: unknown) => {
        // Keep the queue usable for the next request
        this.logger.error('Request processing failed', { id, error: serializeError(err) });
      });
    this.queue = done;
    await done;
  }

  /**
   * Stop accepting requests, abort everything in flight and wait for the
   * queue to drain.
   */
  async close(): Promise<void> {
    if (this.isClosed) {
      await this.closed;
      return;
    }
    this.isClosed = true;
    for (const controller of this.pending.values()) {
      controller.abort();
    }
    await this.queue;
    this.logger.debug('Connection closed');
    this.resolveClosed();
  }

  private handleCancelled(params: unknown): void {
    const parsed = McpCancelledParamsSchema.safeParse(params);
    if (!parsed.success) {
      this.logger.warn('Ignoring malformed cancellation', { error: parsed.error.message });
      return;
    }
    const controller = this.pending.get(requestKey(parsed.data.requestId));
    if (!controller) {return;}
    this.logger.info('Request cancelled by client', {
      id: parsed.data.requestId,
      reason: parsed.data.reason,
    });
    controller.abort();
  }

  private async dispatch(id: JsonRpcId, request: JsonRpcRequest, signal: AbortSignal): Promise<void> {
    this.currentState = 'dispatching';
    try {
      switch (request.method) {
        case 'initialize':
          this.sendSuccess(id, this.server.initializeResult());
          break;

        case 'ping':
          this.sendSuccess(id, {});
          break;

        case 'tools/list':
          this.sendSuccess(id, { tools: this.server.listTools() });
          break;

        case 'tools/call':
          await this.handleToolCall(id, request.params, signal);
          break;

        case 'resources/list':
          this.sendSuccess(id, { resources: this.server.listResources() });
          break;

        case 'resources/read':
          await this.handleResourceRead(id, request.params, signal);
          break;

        default:
          this.sendError(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown method: ${request.method}`);
      }
    } catch (err) {
      if (!signal.aborted) {
        this.sendError(id, JSON_RPC_ERRORS.INTERNAL_ERROR, errorMessage(err));
      }
    } finally {
      this.currentState = 'idle';
    }
  }

  /**
   * Handle a tool call
   */
  private async handleToolCall(id: JsonRpcId, params: unknown, signal: AbortSignal): Promise<void> {
    const parseResult = McpToolCallParamsSchema.safeParse(params);
    if (!parseResult.success) {
      this.sendError(id, JSON_RPC_ERRORS.INVALID_PARAMS, `Invalid tool call params: ${parseResult.error.message}`);
      return;
    }

    const { name, arguments: args } = parseResult.data;
    const tool = this.server.getTool(name);

    if (!tool) {
      const err = new InvalidArgumentError(`Unknown tool: ${name}`, { tool: name });
      this.sendError(id, JSON_RPC_ERRORS.INVALID_PARAMS, err.message, err.toJSON());
      return;
    }

    const invocation: ToolInvocation = { id, tool: name, arguments: args ?? {} };
    const call = tool.parse(invocation.arguments);
    if (!call.success) {
      const err = new InvalidArgumentError(`Invalid arguments for ${name}`, formatIssues(call.error));
      this.logger.debug('Rejected tool arguments', { tool: name, issues: err.details });
      this.sendError(id, JSON_RPC_ERRORS.INVALID_PARAMS, err.message, err.toJSON());
      return;
    }

    this.currentState = 'executing';
    const started = Date.now();
    const logger = this.logger.child({ tool: name, requestId: id });
    logger.debug('Tool call started');

    let result: McpToolCallResult;
    try {
      const toolResult = await call.execute({ signal, session: this.session, invocation, logger });
      result = {
        content: [{ type: 'text', text: JSON.stringify(toolResult ?? null, null, 2) }],
      };
      logger.debug('Tool call finished', { durationMs: Date.now() - started });
    } catch (err) {
      const body: ToolErrorBody = { error: toToolError(err) };
      logger.warn('Tool call failed', { durationMs: Date.now() - started, error: body.error });
      result = {
        content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
        isError: true,
      };
    }

    if (signal.aborted) {
      logger.debug('Dropping response for cancelled request');
      return;
    }
    this.sendSuccess(id, result);
  }

  private async handleResourceRead(id: JsonRpcId, params: unknown, signal: AbortSignal): Promise<void> {
    const parseResult = McpResourceReadParamsSchema.safeParse(params);
    if (!parseResult.success) {
      this.sendError(id, JSON_RPC_ERRORS.INVALID_PARAMS, `Invalid resource read params: ${parseResult.error.message}`);
      return;
    }

    const { uri } = parseResult.data;
    const resource = this.server.getResource(uri);
    if (!resource) {
      const err = new InvalidArgumentError(`Unknown resource: ${uri}`, { uri });
      this.sendError(id, JSON_RPC_ERRORS.INVALID_PARAMS, err.message, err.toJSON());
      return;
    }

    this.currentState = 'executing';
    try {
      const data = await resource.read({ signal, session: this.session, logger: this.logger });
      const result: McpResourceReadResult = {
        contents: [{ uri, mimeType: resource.mimeType, text: JSON.stringify(data, null, 2) }],
      };
      if (!signal.aborted) {this.sendSuccess(id, result);}
    } catch (err) {
      if (signal.aborted) {return;}
      const payload = toToolError(err);
      this.logger.warn('Resource read failed', { uri, error: payload });
      this.sendError(id, JSON_RPC_ERRORS.SERVER_ERROR, payload.message, payload);
    }
  }

  /**
   * Send a JSON-RPC response to the output stream
   */
  private sendResponse(response: JsonRpcResponse): void {
    if (this.output.writableEnded || this.output.destroyed) {return;}
    this.output.write(`${JSON.stringify(response)}\n`);
  }

  private sendSuccess(id: JsonRpcId, result: unknown): void {
    this.sendResponse({ jsonrpc: '2.0', id, result });
  }

  private sendError(id: JsonRpcId, code: number, message: string, data?: unknown): void {
    this.sendResponse({
      jsonrpc: '2.0',
      id,
      error: data === undefined ? { code, message } : { code, message, data },
    });
  }
}

/**
 * Recover the id of an invalid request so the error can still be correlated
 */
function extractId(parsed: unknown): JsonRpcId {
  if (typeof parsed !== 'object' || parsed === null || !('id' in parsed)) {return null;}
  const { id } = parsed;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}
