/**
 * Tempo REST API v4 client.
 * Docs: https://apidocs.tempo.io/
 *
 * Every HTTP attempt takes a rate-limiter permit first, so retries are
 * admitted like any other request. Transient failures (429, 5xx, network
 * errors, timeouts) are retried with exponential backoff; a 429
 * Retry-After header replaces the computed delay.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import { abortError, systemClock, type Clock } from '../shared/clock.js';
import {
  NotFoundError,
  RateLimitedError,
  RemoteError,
  RemoteProtocolError,
  RemoteRequestError,
  TransientRemoteError,
  errorMessage,
} from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { DEFAULT_BASE_URL } from './config.js';
import type { RateLimiter } from './rate-limiter.js';
import {
  ACCOUNT_ATTRIBUTE_KEY,
  RemoteAccountSchema,
  RemoteWorkAttributeSchema,
  RemoteWorklogSchema,
  remotePageSchema,
  type Account,
  type Page,
  type RemoteAccount,
  type RemoteWorkAttribute,
  type RemoteWorklog,
  type WorkAttribute,
  type Worklog,
  type WorklogPayload,
  type WorklogQuery,
} from './types.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface TempoClientOptions {
  apiToken: string;
  rateLimiter: RateLimiter;
  baseUrl?: string;
  /** Per-attempt timeout */
  timeoutMs?: number;
  /** Attempts per call, including the first */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  clock?: Clock;
  fetch?: FetchLike;
  logger?: Logger;
  /** Jitter source in [0, 1); defaults to Math.random */
  random?: () => number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ListWorklogsOptions extends CallOptions {
  /** Continuation URL from a previous page */
  cursor?: string;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface RequestPlan<T> {
  operation: string;
  method: HttpMethod;
  url: string;
  body?: unknown;
  /** Decoder for the response body; an empty body decodes as undefined */
  schema: ZodType<T, ZodTypeDef, unknown>;
  signal?: AbortSignal;
}

const MAX_ERROR_TEXT = 500;

// ============================================================================
// Entity Mapping
// ============================================================================

export function toWorklog(remote: RemoteWorklog): Worklog {
  const attributes: Record<string, string> = {};
  for (const { key, value } of remote.attributes?.values ?? []) {
    attributes[key] = value;
  }
  const billableSeconds = remote.billableSeconds ?? remote.timeSpentSeconds;

  const worklog: Worklog = {
    id: remote.tempoWorklogId,
    issue: remote.issue.key === undefined ? { id: remote.issue.id } : { id: remote.issue.id, key: remote.issue.key },
    authorAccountId: remote.author.accountId,
    timeSpentSeconds: remote.timeSpentSeconds,
    billableSeconds,
    billable: billableSeconds > 0,
    startDate: remote.startDate,
    description: remote.description ?? '',
    attributes,
  };
  if (remote.startTime !== undefined) {worklog.startTime = remote.startTime;}
  if (attributes[ACCOUNT_ATTRIBUTE_KEY] !== undefined) {worklog.accountKey = attributes[ACCOUNT_ATTRIBUTE_KEY];}
  if (remote.createdAt !== undefined) {worklog.createdAt = remote.createdAt;}
  if (remote.updatedAt !== undefined) {worklog.updatedAt = remote.updatedAt;}
  return worklog;
}

export function toAccount(remote: RemoteAccount): Account {
  return {
    id: remote.id,
    key: remote.key,
    name: remote.name,
    status: remote.status,
    global: remote.global ?? false,
  };
}

export function toWorkAttribute(remote: RemoteWorkAttribute): WorkAttribute {
  return {
    key: remote.key,
    name: remote.name,
    type: remote.type,
    required: remote.required,
    values: remote.values ?? [],
  };
}

// ============================================================================
// Response Helpers
// ============================================================================

/**
 * Pull a human-readable message out of a Tempo error body
 */
function extractRemoteMessage(text: string): string {
  try {
    const data: unknown = JSON.parse(text);
    if (typeof data === 'object' && data !== null) {
      if ('errors' in data && Array.isArray(data.errors)) {
        const messages = data.errors
          .map((entry: unknown) =>
            typeof entry === 'object' && entry !== null && 'message' in entry && typeof entry.message === 'string'
              ? entry.message
              : null)
          .filter((message): message is string => message !== null);
        if (messages.length > 0) {return messages.join('; ');}
      }
      if ('message' in data && typeof data.message === 'string') {return data.message;}
    }
  } catch {
    // Not JSON; fall through to the raw text
  }
  const trimmed = text.trim();
  return trimmed.length > MAX_ERROR_TEXT ? `${trimmed.slice(0, MAX_ERROR_TEXT)}...` : trimmed;
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now: number): number | undefined {
  if (header === null || header.trim() === '') {return undefined;}
  const value = header.trim();
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Math.round(Number(value) * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {return undefined;}
  return Math.max(0, date - now);
}

// ============================================================================
// Client
// ============================================================================

export class TempoClient {
  readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly limiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly clock: Clock;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(options: TempoClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.authHeader = `Bearer ${options.apiToken}`;
    this.limiter = options.rateLimiter;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 8_000;
    this.clock = options.clock ?? systemClock;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
    this.random = options.random ?? Math.random;
  }

  /**
   * List one page of worklogs. Pass the previous page's `next` as `cursor`
   * to continue.
   */
  async listWorklogs(query: WorklogQuery, options: ListWorklogsOptions = {}): Promise<Page<Worklog>> {
    const url = options.cursor === undefined
      ? this.url('/worklogs', {
        from: query.from,
        to: query.to,
        project: query.projectId,
        issue: query.issueId,
        accountId: query.authorAccountId,
        accountKey: query.accountKey,
        limit: query.limit,
      })
      : this.continuation('listWorklogs', options.cursor);

    const page = await this.request({
      operation: 'listWorklogs',
      method: 'GET',
      url,
      schema: remotePageSchema(RemoteWorklogSchema),
      signal: options.signal,
    });
    return { results: page.results.map(toWorklog), next: page.metadata?.next };
  }

  async getWorklog(worklogId: number, options: CallOptions = {}): Promise<Worklog> {
    const remote = await this.request({
      operation: 'getWorklog',
      method: 'GET',
      url: this.url(`/worklogs/${worklogId}`),
      schema: RemoteWorklogSchema,
      signal: options.signal,
    });
    return toWorklog(remote);
  }

  async createWorklog(payload: WorklogPayload, options: CallOptions = {}): Promise<Worklog> {
    const remote = await this.request({
      operation: 'createWorklog',
      method: 'POST',
      url: this.url('/worklogs'),
      body: payload,
      schema: RemoteWorklogSchema,
      signal: options.signal,
    });
    return toWorklog(remote);
  }

  /**
   * Replace a worklog. Tempo v4 expects the full record on PUT.
   */
  async updateWorklog(worklogId: number, payload: WorklogPayload, options: CallOptions = {}): Promise<Worklog> {
    const remote = await this.request({
      operation: 'updateWorklog',
      method: 'PUT',
      url: this.url(`/worklogs/${worklogId}`),
      body: payload,
      schema: RemoteWorklogSchema,
      signal: options.signal,
    });
    return toWorklog(remote);
  }

  async deleteWorklog(worklogId: number, options: CallOptions = {}): Promise<void> {
    await this.request({
      operation: 'deleteWorklog',
      method: 'DELETE',
      url: this.url(`/worklogs/${worklogId}`),
      schema: z.unknown(),
      signal: options.signal,
    });
  }

  async listAccounts(options: CallOptions = {}): Promise<Account[]> {
    const accounts = await this.collectAll('listAccounts', '/accounts', RemoteAccountSchema, options.signal);
    return accounts.map(toAccount);
  }

  async listWorkAttributes(options: CallOptions = {}): Promise<WorkAttribute[]> {
    const attributes = await this.collectAll('listWorkAttributes', '/work-attributes', RemoteWorkAttributeSchema, options.signal);
    return attributes.map(toWorkAttribute);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private url(path: string, params: Record<string, string | number | undefined> = {}): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * Continuation URLs come from the remote; only follow them to the API host
   * so the bearer token never leaves it.
   */
  private continuation(operation: string, cursor: string): string {
    let next: URL;
    try {
      next = new URL(cursor, `${this.baseUrl}/`);
    } catch (err) {
      throw new RemoteProtocolError(`Invalid continuation URL: ${cursor}`, { operation, cause: err });
    }
    if (next.origin !== new URL(this.baseUrl).origin) {
      throw new RemoteProtocolError(`Continuation URL points outside ${this.baseUrl}: ${cursor}`, { operation });
    }
    return next.toString();
  }

  private async collectAll<T>(
    operation: string,
    path: string,
    item: ZodType<T, ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T[]> {
    const results: T[] = [];
    let url: string | undefined = this.url(path);
    while (url !== undefined) {
      const page: z.infer<ReturnType<typeof remotePageSchema<ZodType<T, ZodTypeDef, unknown>>>> = await this.request({
        operation,
        method: 'GET',
        url,
        schema: remotePageSchema(item),
        signal,
      });
      results.push(...page.results);
      url = page.metadata?.next === undefined ? undefined : this.continuation(operation, page.metadata.next);
    }
    return results;
  }

  private backoffDelay(attempt: number): number {
    const delay = Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
    return Math.round(delay + delay * 0.1 * this.random());
  }

  /**
   * Issue a request with rate limiting, timeout and retries.
   */
  private async request<T>(plan: RequestPlan<T>): Promise<T> {
    const { operation, signal } = plan;

    for (let attempt = 1; ; attempt++) {
      const permit = await this.limiter.acquire(signal);
      this.logger.debug('Tempo request', {
        operation,
        method: plan.method,
        url: plan.url,
        attempt,
        permit: permit.sequence,
      });

      let failure: RemoteError;
      try {
        return await this.attempt(plan);
      } catch (err) {
        if (signal?.aborted) {throw abortError(signal);}
        if (!(err instanceof RemoteError)) {throw err;}
        failure = err;
      }

      if (!failure.retryable || attempt >= this.maxAttempts) {
        throw failure;
      }

      const delay = failure instanceof RateLimitedError && failure.retryAfterMs !== undefined
        ? failure.retryAfterMs
        : this.backoffDelay(attempt);
      this.logger.warn('Retrying Tempo request', {
        operation,
        attempt,
        maxAttempts: this.maxAttempts,
        delayMs: delay,
        status: failure.status,
        error: failure.message,
      });
      await this.clock.sleep(delay, signal);
    }
  }

  /**
   * One HTTP round trip. Every failure leaves as a RemoteError, except a
   * caller abort which the retry loop rethrows.
   */
  private async attempt<T>(plan: RequestPlan<T>): Promise<T> {
    const { operation } = plan;
    if (plan.signal?.aborted) {throw abortError(plan.signal);}

    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), this.timeoutMs);
    const onCallerAbort = () => timeout.abort();
    plan.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(plan.url, {
          method: plan.method,
          headers: {
            Authorization: this.authHeader,
            Accept: 'application/json',
            'Content-Type': 'application/json',
          },
          body: plan.body === undefined ? undefined : JSON.stringify(plan.body),
          signal: timeout.signal,
        });
        text = await response.text();
      } catch (err) {
        if (plan.signal?.aborted) {throw err;}
        if (timeout.signal.aborted) {
          throw new TransientRemoteError(`Tempo request timed out after ${this.timeoutMs}ms`, { operation, cause: err });
        }
        throw new TransientRemoteError(`Tempo request failed: ${errorMessage(err)}`, { operation, cause: err });
      }

      if (!response.ok) {
        throw this.toRemoteError(operation, response, text);
      }

      return this.decode(plan, text);
    } finally {
      clearTimeout(timer);
      plan.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private decode<T>(plan: RequestPlan<T>, text: string): T {
    const { operation, schema } = plan;

    let data: unknown;
    try {
      data = text.trim() === '' ? undefined : JSON.parse(text);
    } catch (err) {
      throw new RemoteProtocolError(`Tempo returned a malformed response body for ${operation}`, { operation, cause: err });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new RemoteProtocolError(`Unexpected response shape for ${operation}: ${issues}`, { operation, cause: parsed.error });
    }
    return parsed.data;
  }

  private toRemoteError(operation: string, response: Response, text: string): RemoteError {
    const { status } = response;
    const remoteMessage = extractRemoteMessage(text) || response.statusText || 'no details';
    const message = `Tempo API error ${status} during ${operation}: ${remoteMessage}`;

    if (status === 404) {
      return new NotFoundError(message, { operation });
    }
    if (status === 429) {
      return new RateLimitedError(message, {
        operation,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after'), this.clock.now()),
      });
    }
    if (status >= 500) {
      return new TransientRemoteError(message, { operation, status });
    }
    if (status === 401) {
      return new RemoteRequestError('Authentication failed. Please check your API token.', { operation, status });
    }
    if (status === 403) {
      return new RemoteRequestError('Access forbidden. Check your API token permissions.', { operation, status });
    }
    return new RemoteRequestError(message, { operation, status });
  }
}
