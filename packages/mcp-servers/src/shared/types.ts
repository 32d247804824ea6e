/**
 * Shared types for MCP servers
 *
 * These types define the JSON-RPC 2.0 and MCP protocol interfaces
 * used by the protocol server in this package.
 */

import { z } from 'zod';
import type { ToolErrorPayload } from './errors.js';

// ============================================================================
// JSON-RPC 2.0 Types
// ============================================================================

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

// Standard JSON-RPC error codes
export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  SERVER_ERROR: -32000, // For application-specific errors
} as const;

export const MCP_PROTOCOL_VERSION = '2024-11-05';

// ============================================================================
// MCP Protocol Types
// ============================================================================

export interface McpToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface McpResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface McpInitializeResult {
  protocolVersion: string;
  capabilities: {
    tools?: Record<string, unknown>;
    resources?: Record<string, unknown>;
  };
  serverInfo: {
    name: string;
    version: string;
  };
}

export interface McpToolsListResult {
  tools: McpToolDefinition[];
}

export interface McpResourcesListResult {
  resources: McpResourceDefinition[];
}

export interface McpResourceReadResult {
  contents: Array<{
    uri: string;
    mimeType: string;
    text: string;
  }>;
}

export interface McpToolCallParams {
  name: string;
  arguments?: Record<string, unknown>;
}

export interface McpToolCallResult {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
}

/**
 * One inbound `tools/call`, alive until its response is written.
 */
export interface ToolInvocation {
  id: JsonRpcId;
  tool: string;
  arguments: Record<string, unknown>;
}

export interface ToolErrorBody {
  error: ToolErrorPayload;
}

// ============================================================================
// Zod Schemas for Request Validation
// ============================================================================

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

export const McpToolCallParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).optional(),
});

export const McpResourceReadParamsSchema = z.object({
  uri: z.string(),
});

export const McpCancelledParamsSchema = z.object({
  requestId: z.union([z.string(), z.number()]),
  reason: z.string().optional(),
});
