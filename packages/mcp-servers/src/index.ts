/**
 * Tempo worklog MCP server package
 *
 * Exposes Tempo worklogs, accounts and work attributes to MCP clients over
 * stdio. The executable entry point is `tempo/server.ts`; this module
 * exports the building blocks for embedding and testing.
 *
 * @packageDocumentation
 */

// Protocol, errors, logging and session primitives
export * from './shared/index.js';

// Tempo client, operations and tool registry
export * from './tempo/index.js';
