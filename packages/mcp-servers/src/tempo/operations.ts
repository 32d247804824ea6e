/**
 * Worklog operations behind the Tempo MCP tools.
 *
 * Arguments arrive already shape-checked by the tool schemas; this layer
 * adds the checks a schema cannot express (durations, date order, known
 * work attributes), pages through list results and shapes the output.
 */

import { isoDate, systemClock, type Clock } from '../shared/clock.js';
import { InvalidArgumentError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { SessionSlot, type Session } from '../shared/session.js';
import type { TempoClient } from './client.js';
import { formatDuration, normalizeStartTime, parseDuration } from './duration.js';
import {
  MAX_WORKLOG_LIMIT,
  type Account,
  type CreateWorklogArgs,
  type DailyBreakdown,
  type DeleteWorklogArgs,
  type DeleteWorklogResult,
  type GetTodaySummaryArgs,
  type GetWorklogSummaryArgs,
  type GetWorklogsArgs,
  type IssueSummary,
  type SearchWorklogsArgs,
  type TodaySummaryResult,
  type UpdateWorklogArgs,
  type WorkAttribute,
  type Worklog,
  type WorklogListResult,
  type WorklogPayload,
  type WorklogQuery,
  type WorklogSummaryResult,
  type WorklogView,
} from './types.js';

/** Largest page requested from the remote */
export const PAGE_SIZE = 50;

/** Upper bound on worklogs scanned by one description search */
export const SEARCH_SCAN_LIMIT = 5000;

/** Upper bound on worklogs read for a summary */
const SUMMARY_LIMIT = MAX_WORKLOG_LIMIT;

const DAY_MS = 24 * 60 * 60 * 1000;

const ACCOUNTS = new SessionSlot<Account[]>('accounts');
const WORK_ATTRIBUTES = new SessionSlot<WorkAttribute[]>('work-attributes');

export interface OperationContext {
  session: Session;
  signal?: AbortSignal;
}

export interface WorklogOperationsOptions {
  client: TempoClient;
  clock?: Clock;
  logger?: Logger;
}

export interface SearchWorklogsResult extends WorklogListResult {
  query?: string;
}

interface Collected {
  worklogs: Worklog[];
  truncated: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

export function toView(worklog: Worklog): WorklogView {
  return { ...worklog, timeSpent: formatDuration(worklog.timeSpentSeconds) };
}

function toListResult({ worklogs, truncated }: Collected): WorklogListResult {
  const totalSeconds = worklogs.reduce((sum, worklog) => sum + worklog.timeSpentSeconds, 0);
  return {
    count: worklogs.length,
    totalSeconds,
    totalTime: formatDuration(totalSeconds),
    worklogs: worklogs.map(toView),
    truncated,
  };
}

function requireDuration(field: string, text: string): number {
  const seconds = parseDuration(text);
  if (seconds === null || seconds <= 0) {
    throw new InvalidArgumentError(
      `Invalid ${field} "${text}": expected a positive duration such as '2h 30m', '1.5h' or '90m'`,
      { field, value: text },
    );
  }
  return seconds;
}

function requireDateOrder(from: string | undefined, to: string | undefined): void {
  if (from !== undefined && to !== undefined && from > to) {
    throw new InvalidArgumentError(`from_date (${from}) must not be after to_date (${to})`, { from_date: from, to_date: to });
  }
}

function toAttributeList(values: Record<string, string>): Array<{ key: string; value: string }> {
  return Object.entries(values).map(([key, value]) => ({ key, value }));
}

// ============================================================================
// Operations
// ============================================================================

export class WorklogOperations {
  private readonly client: TempoClient;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: WorklogOperationsOptions) {
    this.client = options.client;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  today(): string {
    return isoDate(this.clock.now());
  }

  async getWorklogs(args: GetWorklogsArgs, ctx: OperationContext): Promise<WorklogListResult> {
    requireDateOrder(args.from_date, args.to_date);
    const collected = await this.collect(
      {
        from: args.from_date,
        to: args.to_date,
        authorAccountId: args.account_id,
        projectId: args.project_id,
        issueId: args.issue_id,
      },
      args.limit,
      ctx.signal,
    );
    return toListResult(collected);
  }

  async createWorklog(args: CreateWorklogArgs, ctx: OperationContext): Promise<WorklogView> {
    const timeSpentSeconds = requireDuration('time_spent', args.time_spent);
    const attributes = args.attributes ?? {};
    await this.validateAttributes(attributes, ctx, true);

    const payload: WorklogPayload = {
      issueId: args.issue_id,
      timeSpentSeconds,
      billableSeconds: args.billable === false ? 0 : timeSpentSeconds,
      startDate: args.start_date ?? this.today(),
      description: args.description,
    };
    if (args.author_account_id !== undefined) {payload.authorAccountId = args.author_account_id;}
    if (args.start_time !== undefined) {payload.startTime = normalizeStartTime(args.start_time);}
    if (Object.keys(attributes).length > 0) {payload.attributes = toAttributeList(attributes);}

    const created = await this.client.createWorklog(payload, { signal: ctx.signal });
    this.logger.info('Worklog created', { worklogId: created.id, issueId: created.issue.id, timeSpentSeconds });
    return toView(created);
  }

  /**
   * Change selected fields of a worklog. The remote replaces the whole
   * record, so the current state is read first and merged.
   */
  async updateWorklog(args: UpdateWorklogArgs, ctx: OperationContext): Promise<WorklogView> {
    const { worklog_id: worklogId, ...changes } = args;
    const changed = Object.values(changes).some((value) => value !== undefined);
    if (!changed) {
      throw new InvalidArgumentError(
        'update_worklog needs at least one field to change: time_spent, description, start_date, start_time, billable or attributes',
        { worklog_id: worklogId },
      );
    }

    const newSeconds = changes.time_spent === undefined ? undefined : requireDuration('time_spent', changes.time_spent);
    if (changes.attributes !== undefined) {
      await this.validateAttributes(changes.attributes, ctx, false);
    }

    const current = await this.client.getWorklog(worklogId, { signal: ctx.signal });
    const timeSpentSeconds = newSeconds ?? current.timeSpentSeconds;
    const billable = changes.billable ?? current.billable;
    const attributes = { ...current.attributes, ...changes.attributes };

    const payload: WorklogPayload = {
      issueId: current.issue.id,
      authorAccountId: current.authorAccountId,
      timeSpentSeconds,
      billableSeconds: billable ? timeSpentSeconds : 0,
      startDate: changes.start_date ?? current.startDate,
      description: changes.description ?? current.description,
    };
    const startTime = changes.start_time === undefined ? current.startTime : normalizeStartTime(changes.start_time);
    if (startTime !== undefined) {payload.startTime = startTime;}
    if (Object.keys(attributes).length > 0) {payload.attributes = toAttributeList(attributes);}

    const updated = await this.client.updateWorklog(worklogId, payload, { signal: ctx.signal });
    this.logger.info('Worklog updated', { worklogId });
    return toView(updated);
  }

  async deleteWorklog(args: DeleteWorklogArgs, ctx: OperationContext): Promise<DeleteWorklogResult> {
    await this.client.deleteWorklog(args.worklog_id, { signal: ctx.signal });
    this.logger.info('Worklog deleted', { worklogId: args.worklog_id });
    return { deleted: true, worklogId: args.worklog_id };
  }

  /**
   * Filter worklogs by date range, project, issue, author or account, with
   * an optional description substring. At least one filter besides the text
   * is required so a search never walks the whole instance.
   */
  async searchWorklogs(args: SearchWorklogsArgs, ctx: OperationContext): Promise<SearchWorklogsResult> {
    const query: WorklogQuery = {
      from: args.from_date,
      to: args.to_date,
      projectId: args.project_id,
      issueId: args.issue_id,
      authorAccountId: args.account_id,
      accountKey: args.account_key,
    };
    if (Object.values(query).every((value) => value === undefined)) {
      throw new InvalidArgumentError(
        'search_worklogs needs at least one filter: from_date, to_date, project_id, issue_id, account_id or account_key',
      );
    }
    requireDateOrder(args.from_date, args.to_date);

    const text = args.query?.trim().toLowerCase();
    const matches = text
      ? (worklog: Worklog) => worklog.description.toLowerCase().includes(text)
      : undefined;

    const collected = await this.collect(query, args.limit, ctx.signal, matches);
    const result: SearchWorklogsResult = toListResult(collected);
    if (args.query !== undefined) {result.query = args.query;}
    return result;
  }

  getAccounts(ctx: OperationContext): Promise<Account[]> {
    return ctx.session.cached(ACCOUNTS, () => {
      this.logger.debug('Loading accounts', { session: ctx.session.id });
      return this.client.listAccounts({ signal: ctx.signal });
    });
  }

  getWorkAttributes(ctx: OperationContext): Promise<WorkAttribute[]> {
    return ctx.session.cached(WORK_ATTRIBUTES, () => {
      this.logger.debug('Loading work attributes', { session: ctx.session.id });
      return this.client.listWorkAttributes({ signal: ctx.signal });
    });
  }

  async getTodaySummary(args: GetTodaySummaryArgs, ctx: OperationContext): Promise<TodaySummaryResult> {
    const date = this.today();
    const { worklogs } = await this.collect(
      { from: date, to: date, authorAccountId: args.account_id },
      SUMMARY_LIMIT,
      ctx.signal,
    );

    const byIssue = new Map<string, IssueSummary>();
    for (const worklog of worklogs) {
      const issue = worklog.issue.key ?? `#${worklog.issue.id}`;
      let summary = byIssue.get(issue);
      if (!summary) {
        summary = { issue, totalSeconds: 0, totalTime: '', entries: [] };
        byIssue.set(issue, summary);
      }
      summary.totalSeconds += worklog.timeSpentSeconds;
      summary.entries.push({
        worklogId: worklog.id,
        timeSpent: formatDuration(worklog.timeSpentSeconds),
        description: worklog.description,
      });
    }

    const issues = [...byIssue.values()].map((summary) => ({
      ...summary,
      totalTime: formatDuration(summary.totalSeconds),
    }));
    const totalSeconds = issues.reduce((sum, summary) => sum + summary.totalSeconds, 0);
    return { date, totalSeconds, totalTime: formatDuration(totalSeconds), byIssue: issues };
  }

  /**
   * Per-day totals from `days` days ago through today.
   */
  async getWorklogSummary(args: GetWorklogSummaryArgs, ctx: OperationContext): Promise<WorklogSummaryResult> {
    const now = this.clock.now();
    const to = isoDate(now);
    const from = isoDate(now - args.days * DAY_MS);
    const { worklogs } = await this.collect({ from, to }, SUMMARY_LIMIT, ctx.signal);

    const daily = new Map<string, DailyBreakdown>();
    let totalTimeSeconds = 0;
    for (const worklog of worklogs) {
      const day = daily.get(worklog.startDate) ?? { count: 0, timeSeconds: 0, timeFormatted: '' };
      day.count += 1;
      day.timeSeconds += worklog.timeSpentSeconds;
      daily.set(worklog.startDate, day);
      totalTimeSeconds += worklog.timeSpentSeconds;
    }

    const dailyBreakdown: Record<string, DailyBreakdown> = {};
    for (const date of [...daily.keys()].sort()) {
      const day = daily.get(date);
      if (day) {
        dailyBreakdown[date] = { ...day, timeFormatted: formatDuration(day.timeSeconds) };
      }
    }

    return {
      period: { from, to },
      totalWorklogs: worklogs.length,
      totalTimeSeconds,
      totalTimeFormatted: formatDuration(totalTimeSeconds),
      dailyBreakdown,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Follow continuation pages until `limit` worklogs are kept or the remote
   * runs out. With a filter, full pages are read regardless of `limit`, up
   * to SEARCH_SCAN_LIMIT worklogs.
   */
  private async collect(
    query: WorklogQuery,
    limit: number,
    signal: AbortSignal | undefined,
    filter?: (worklog: Worklog) => boolean,
  ): Promise<Collected> {
    const pageSize = filter ? PAGE_SIZE : Math.min(limit, PAGE_SIZE);
    const kept: Worklog[] = [];
    let scanned = 0;
    let cursor: string | undefined;

    do {
      const page = await this.client.listWorklogs({ ...query, limit: pageSize }, { cursor, signal });
      scanned += page.results.length;
      for (const worklog of page.results) {
        if (!filter || filter(worklog)) {kept.push(worklog);}
      }
      cursor = page.next;
    } while (cursor !== undefined && kept.length < limit && (!filter || scanned < SEARCH_SCAN_LIMIT));

    const truncated = kept.length > limit || cursor !== undefined;
    if (truncated) {
      this.logger.debug('Worklog listing truncated', { limit, scanned });
    }
    return { worklogs: kept.slice(0, limit), truncated };
  }

  /**
   * Check attribute keys and values against the instance's work attributes.
   */
  private async validateAttributes(
    supplied: Record<string, string>,
    ctx: OperationContext,
    requireAll: boolean,
  ): Promise<void> {
    if (!requireAll && Object.keys(supplied).length === 0) {return;}

    const known = await this.getWorkAttributes(ctx);
    const byKey = new Map(known.map((attribute) => [attribute.key, attribute]));
    const problems: string[] = [];

    for (const [key, value] of Object.entries(supplied)) {
      const attribute = byKey.get(key);
      if (!attribute) {
        problems.push(`Unknown work attribute: ${key}`);
        continue;
      }
      if (attribute.values.length > 0 && !attribute.values.includes(value)) {
        problems.push(`${key}: "${value}" is not one of ${attribute.values.join(', ')}`);
      }
    }

    if (requireAll) {
      for (const attribute of known) {
        if (attribute.required && supplied[attribute.key] === undefined) {
          problems.push(`Missing required work attribute: ${attribute.key}`);
        }
      }
    }

    if (problems.length > 0) {
      throw new InvalidArgumentError(`Invalid work attributes: ${problems.join('; ')}`, problems);
    }
  }
}
