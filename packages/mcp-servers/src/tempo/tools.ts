/**
 * Tempo MCP tool and resource registry.
 */

import { systemClock, type Clock } from '../shared/clock.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import {
  McpServer,
  defineTool,
  type AnyToolHandler,
  type ResourceHandler,
} from '../shared/server.js';
import { TempoClient, type FetchLike } from './client.js';
import type { TempoConfig } from './config.js';
import { WorklogOperations } from './operations.js';
import { RateLimiter } from './rate-limiter.js';
import {
  CreateWorklogArgsSchema,
  DeleteWorklogArgsSchema,
  GetAccountsArgsSchema,
  GetTodaySummaryArgsSchema,
  GetWorkAttributesArgsSchema,
  GetWorklogSummaryArgsSchema,
  GetWorklogsArgsSchema,
  SearchWorklogsArgsSchema,
  UpdateWorklogArgsSchema,
} from './types.js';

export const SERVER_NAME = 'tempo-mcp-server';
export const SERVER_VERSION = '1.0.0';

// ============================================================================
// Tools
// ============================================================================

export function createTempoTools(ops: WorklogOperations): AnyToolHandler[] {
  return [
    defineTool({
      name: 'get_worklogs',
      description: 'Retrieve worklogs for a date range, optionally filtered by author, project or issue.',
      schema: GetWorklogsArgsSchema,
      handler: (args, { session, signal }) => ops.getWorklogs(args, { session, signal }),
    }),
    defineTool({
      name: 'create_worklog',
      description: 'Log time against a Jira issue. time_spent accepts formats like "2h 30m", "1.5h" or "90m".',
      schema: CreateWorklogArgsSchema,
      handler: (args, { session, signal }) => ops.createWorklog(args, { session, signal }),
    }),
    defineTool({
      name: 'update_worklog',
      description: 'Change fields of an existing worklog. Fields left out keep their current values.',
      schema: UpdateWorklogArgsSchema,
      handler: (args, { session, signal }) => ops.updateWorklog(args, { session, signal }),
    }),
    defineTool({
      name: 'delete_worklog',
      description: 'Delete a worklog by its Tempo worklog ID.',
      schema: DeleteWorklogArgsSchema,
      handler: (args, { session, signal }) => ops.deleteWorklog(args, { session, signal }),
    }),
    defineTool({
      name: 'search_worklogs',
      description: 'Search worklogs by date range, project, issue, author or account, optionally matching description text. At least one filter besides query is required.',
      schema: SearchWorklogsArgsSchema,
      handler: (args, { session, signal }) => ops.searchWorklogs(args, { session, signal }),
    }),
    defineTool({
      name: 'get_accounts',
      description: 'List Tempo accounts available for time logging.',
      schema: GetAccountsArgsSchema,
      handler: async (_args, { session, signal }) => {
        const accounts = await ops.getAccounts({ session, signal });
        return { count: accounts.length, accounts };
      },
    }),
    defineTool({
      name: 'get_work_attributes',
      description: 'List the work attributes (custom worklog fields) configured in Tempo.',
      schema: GetWorkAttributesArgsSchema,
      handler: async (_args, { session, signal }) => {
        const attributes = await ops.getWorkAttributes({ session, signal });
        return { count: attributes.length, attributes };
      },
    }),
    defineTool({
      name: 'get_today_summary',
      description: "Summarize today's logged time grouped by issue.",
      schema: GetTodaySummaryArgsSchema,
      handler: (args, { session, signal }) => ops.getTodaySummary(args, { session, signal }),
    }),
  ];
}

// ============================================================================
// Resources
// ============================================================================

export function createTempoResources(ops: WorklogOperations): ResourceHandler[] {
  return [
    {
      uri: 'tempo://worklog-summary',
      name: 'Worklog Summary',
      description: 'Daily totals of worklogs from the last 7 days',
      mimeType: 'application/json',
      read: ({ session, signal }) => ops.getWorklogSummary({ days: 7 }, { session, signal }),
    },
    {
      uri: 'tempo://accounts',
      name: 'Tempo Accounts',
      description: 'Accounts available for time logging',
      mimeType: 'application/json',
      read: ({ session, signal }) => ops.getAccounts({ session, signal }),
    },
    {
      uri: 'tempo://work-attributes',
      name: 'Work Attributes',
      description: 'Custom work attribute definitions',
      mimeType: 'application/json',
      read: ({ session, signal }) => ops.getWorkAttributes({ session, signal }),
    },
  ];
}

// ============================================================================
// Composition
// ============================================================================

export interface TempoServerDeps {
  logger?: Logger;
  clock?: Clock;
  fetch?: FetchLike;
}

export interface TempoServer {
  server: McpServer;
  client: TempoClient;
  limiter: RateLimiter;
  operations: WorklogOperations;
}

/**
 * Wire the limiter, client, operations and protocol server from config.
 */
export function createTempoServer(config: TempoConfig, deps: TempoServerDeps = {}): TempoServer {
  const logger = deps.logger ?? silentLogger;
  const clock = deps.clock ?? systemClock;

  const limiter = new RateLimiter({
    requestsPerSecond: config.rateLimitPerSecond,
    clock,
    logger: logger.child({ component: 'rate-limiter' }),
  });
  const client = new TempoClient({
    apiToken: config.apiToken,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    maxAttempts: config.maxAttempts,
    rateLimiter: limiter,
    clock,
    fetch: deps.fetch,
    logger: logger.child({ component: 'tempo-client' }),
  });
  const operations = new WorklogOperations({ client, clock, logger });
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools: createTempoTools(operations),
    resources: createTempoResources(operations),
    logger,
    now: () => clock.now(),
  });

  return { server, client, limiter, operations };
}
