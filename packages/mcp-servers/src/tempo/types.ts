/**
 * Tempo MCP Server Types
 *
 * Tool argument schemas, domain entities and the wire shapes of the
 * Tempo Cloud REST API v4.
 */

import { z } from 'zod';

// ============================================================================
// Common Schemas
// ============================================================================

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

export const MAX_WORKLOG_LIMIT = 1000;

/**
 * True when a YYYY-MM-DD string names a real calendar day.
 */
export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {return false;}
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

const IsoDateSchema = z.string()
  .regex(DATE_PATTERN, 'Expected a date in YYYY-MM-DD format')
  .refine(isCalendarDate, 'Not a valid calendar date');

const StartTimeSchema = z.string()
  .regex(TIME_PATTERN, 'Expected a time in HH:MM or HH:MM:SS format');

const WorklogIdSchema = z.number().int().positive();

const AttributeValuesSchema = z.record(z.string())
  .describe('Work attribute values keyed by attribute key (see get_work_attributes)');

const LimitSchema = z.number()
  .int()
  .min(1)
  .max(MAX_WORKLOG_LIMIT)
  .default(50)
  .describe(`Maximum number of worklogs to return (default: 50, max: ${MAX_WORKLOG_LIMIT})`);

// ============================================================================
// Tool Argument Schemas
// ============================================================================

export const GetWorklogsArgsSchema = z.object({
  from_date: IsoDateSchema.describe('Start date (YYYY-MM-DD format)'),
  to_date: IsoDateSchema.describe('End date (YYYY-MM-DD format), inclusive'),
  account_id: z.string().min(1).optional().describe('Author account ID to filter by'),
  project_id: z.number().int().positive().optional().describe('Jira project ID to filter by'),
  issue_id: z.number().int().positive().optional().describe('Jira issue ID to filter by'),
  limit: LimitSchema,
});

export const CreateWorklogArgsSchema = z.object({
  issue_id: z.number().int().positive().describe('Jira issue ID'),
  time_spent: z.string().min(1).describe("Time spent (e.g., '2h 30m', '1.5h', '90m')"),
  description: z.string().describe('Work description'),
  start_date: IsoDateSchema.optional().describe('Work date (YYYY-MM-DD format, defaults to today)'),
  start_time: StartTimeSchema.optional().describe('Start time (HH:MM format)'),
  billable: z.boolean().optional().describe('Whether the time is billable (default: true)'),
  author_account_id: z.string().min(1).optional().describe('Account ID of the worklog author'),
  attributes: AttributeValuesSchema.optional(),
});

export const UpdateWorklogArgsSchema = z.object({
  worklog_id: WorklogIdSchema.describe('Tempo worklog ID'),
  time_spent: z.string().min(1).optional().describe("New time spent (e.g., '2h 30m')"),
  description: z.string().optional().describe('New work description'),
  start_date: IsoDateSchema.optional().describe('New work date (YYYY-MM-DD format)'),
  start_time: StartTimeSchema.optional().describe('New start time (HH:MM format)'),
  billable: z.boolean().optional().describe('Whether the time is billable'),
  attributes: AttributeValuesSchema.optional(),
});

export const DeleteWorklogArgsSchema = z.object({
  worklog_id: WorklogIdSchema.describe('Tempo worklog ID to delete'),
});

export const SearchWorklogsArgsSchema = z.object({
  query: z.string().optional().describe('Text to match against worklog descriptions (case-insensitive)'),
  from_date: IsoDateSchema.optional().describe('Start date (YYYY-MM-DD format)'),
  to_date: IsoDateSchema.optional().describe('End date (YYYY-MM-DD format), inclusive'),
  project_id: z.number().int().positive().optional().describe('Jira project ID'),
  issue_id: z.number().int().positive().optional().describe('Jira issue ID'),
  account_id: z.string().min(1).optional().describe('Author account ID'),
  account_key: z.string().min(1).optional().describe('Tempo account key'),
  limit: LimitSchema,
});

export const GetAccountsArgsSchema = z.object({});

export const GetWorkAttributesArgsSchema = z.object({});

export const GetTodaySummaryArgsSchema = z.object({
  account_id: z.string().min(1).optional().describe('User account ID (optional, defaults to all authors the token can see)'),
});

export const GetWorklogSummaryArgsSchema = z.object({
  days: z.number().int().min(1).max(31).default(7).describe('Number of days before today to cover; the range also includes today (default: 7)'),
});

export type GetWorklogsArgs = z.infer<typeof GetWorklogsArgsSchema>;
export type CreateWorklogArgs = z.infer<typeof CreateWorklogArgsSchema>;
export type UpdateWorklogArgs = z.infer<typeof UpdateWorklogArgsSchema>;
export type DeleteWorklogArgs = z.infer<typeof DeleteWorklogArgsSchema>;
export type SearchWorklogsArgs = z.infer<typeof SearchWorklogsArgsSchema>;
export type GetTodaySummaryArgs = z.infer<typeof GetTodaySummaryArgsSchema>;
export type GetWorklogSummaryArgs = z.infer<typeof GetWorklogSummaryArgsSchema>;

// ============================================================================
// Domain Entities
// ============================================================================

/** Work attribute key Tempo uses to link a worklog to an account */
export const ACCOUNT_ATTRIBUTE_KEY = '_Account_';

export interface IssueRef {
  id: number;
  key?: string;
}

export interface Worklog {
  id: number;
  issue: IssueRef;
  authorAccountId: string;
  timeSpentSeconds: number;
  billableSeconds: number;
  billable: boolean;
  startDate: string;
  startTime?: string;
  description: string;
  attributes: Record<string, string>;
  accountKey?: string;
  createdAt?: string;
  updatedAt?: string;
}

export type AccountStatus = 'OPEN' | 'CLOSED' | 'ARCHIVED';

export interface Account {
  id: number;
  key: string;
  name: string;
  status: AccountStatus;
  global: boolean;
}

export interface WorkAttribute {
  key: string;
  name: string;
  type: string;
  required: boolean;
  /** Allowed values; empty when the attribute takes free-form input */
  values: string[];
}

export interface Page<T> {
  results: T[];
  /** Continuation URL for the next page, absent on the last page */
  next?: string;
}

/** Filters accepted by the worklog list endpoint */
export interface WorklogQuery {
  from?: string;
  to?: string;
  projectId?: number;
  issueId?: number;
  authorAccountId?: string;
  accountKey?: string;
  /** Page size */
  limit?: number;
}

/** Body of a worklog create or full update */
export interface WorklogPayload {
  issueId: number;
  authorAccountId?: string;
  timeSpentSeconds: number;
  billableSeconds: number;
  startDate: string;
  startTime?: string;
  description: string;
  attributes?: Array<{ key: string; value: string }>;
}

// ============================================================================
// Tempo API v4 Wire Schemas
// ============================================================================

export const RemoteWorklogSchema = z.object({
  tempoWorklogId: z.number().int(),
  issue: z.object({
    id: z.number().int(),
    key: z.string().optional(),
  }),
  timeSpentSeconds: z.number().int().nonnegative(),
  billableSeconds: z.number().int().nonnegative().optional(),
  startDate: z.string(),
  startTime: z.string().optional(),
  description: z.string().nullish(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  author: z.object({
    accountId: z.string(),
  }),
  attributes: z.object({
    values: z.array(z.object({ key: z.string(), value: z.string() })),
  }).optional(),
});

export const RemoteAccountSchema = z.object({
  id: z.number().int(),
  key: z.string(),
  name: z.string(),
  status: z.enum(['OPEN', 'CLOSED', 'ARCHIVED']),
  global: z.boolean().optional(),
});

export const RemoteWorkAttributeSchema = z.object({
  key: z.string(),
  name: z.string(),
  type: z.string(),
  required: z.boolean(),
  values: z.array(z.string()).optional(),
});

export const PageMetadataSchema = z.object({
  count: z.number().int().optional(),
  offset: z.number().int().optional(),
  limit: z.number().int().optional(),
  next: z.string().optional(),
});

export function remotePageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    results: z.array(item),
    metadata: PageMetadataSchema.optional(),
  });
}

export type RemoteWorklog = z.infer<typeof RemoteWorklogSchema>;
export type RemoteAccount = z.infer<typeof RemoteAccountSchema>;
export type RemoteWorkAttribute = z.infer<typeof RemoteWorkAttributeSchema>;

// ============================================================================
// Tool Results
// ============================================================================

export interface WorklogView extends Worklog {
  timeSpent: string;
}

export interface WorklogListResult {
  count: number;
  totalSeconds: number;
  totalTime: string;
  worklogs: WorklogView[];
  /** True when the limit cut the result short */
  truncated: boolean;
}

export interface DeleteWorklogResult {
  deleted: true;
  worklogId: number;
}

export interface IssueSummary {
  issue: string;
  totalSeconds: number;
  totalTime: string;
  entries: Array<{ worklogId: number; timeSpent: string; description: string }>;
}

export interface TodaySummaryResult {
  date: string;
  totalSeconds: number;
  totalTime: string;
  byIssue: IssueSummary[];
}

export interface DailyBreakdown {
  count: number;
  timeSeconds: number;
  timeFormatted: string;
}

export interface WorklogSummaryResult {
  period: { from: string; to: string };
  totalWorklogs: number;
  totalTimeSeconds: number;
  totalTimeFormatted: string;
  dailyBreakdown: Record<string, DailyBreakdown>;
}
