/**
 * In-memory stand-in for the Tempo REST API v4, exposed as a `fetch`
 * implementation. Holds worklogs, accounts and work attributes, pages list
 * results with `metadata.next` and can be scripted to fail.
 *
 * @module __testUtils__/fake-tempo
 */

import { z } from 'zod';
import type { FetchLike } from '../tempo/client.js';
import {
  ACCOUNT_ATTRIBUTE_KEY,
  type RemoteAccount,
  type RemoteWorkAttribute,
  type RemoteWorklog,
} from '../tempo/types.js';
import { TEST_AUTHOR, TEST_BASE_URL } from './fixtures.js';

export interface RecordedRequest {
  method: string;
  url: URL;
  /** Path below the API root, e.g. `/worklogs/12` */
  path: string;
  headers: Headers;
  body: unknown;
}

export interface ScriptedResponse {
  status: number;
  body?: unknown;
  /** Sent verbatim instead of a JSON-encoded `body` */
  rawBody?: string;
  headers?: Record<string, string>;
}

export interface FakeTempoOptions {
  baseUrl?: string;
  worklogs?: RemoteWorklog[];
  accounts?: RemoteAccount[];
  workAttributes?: RemoteWorkAttribute[];
  /** Jira project of each issue id, for the `project` filter */
  issueProjects?: Record<number, number>;
  /** Issue keys reported on created worklogs */
  issueKeys?: Record<number, string>;
  /** Page size when the request names none */
  defaultPageSize?: number;
}

const WorklogBodySchema = z.object({
  issueId: z.number().int(),
  authorAccountId: z.string().optional(),
  timeSpentSeconds: z.number().int().positive(),
  billableSeconds: z.number().int().nonnegative().optional(),
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  startTime: z.string().optional(),
  description: z.string().optional(),
  attributes: z.array(z.object({ key: z.string(), value: z.string() })).optional(),
});

const FAKE_TIMESTAMP = '2024-01-15T09:00:00Z';

function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function tempoError(status: number, message: string): Response {
  return json(status, { errors: [{ message }] });
}

export class FakeTempo {
  readonly baseUrl: URL;
  readonly requests: RecordedRequest[] = [];
  readonly worklogs = new Map<number, RemoteWorklog>();
  accounts: RemoteAccount[];
  workAttributes: RemoteWorkAttribute[];
  private readonly issueProjects: Record<number, number>;
  private readonly issueKeys: Record<number, string>;
  private readonly defaultPageSize: number;
  private readonly script: Array<ScriptedResponse | Error> = [];
  private nextId = 5000;

  /** Pass this to the client as its `fetch` */
  readonly fetch: FetchLike = (url, init) => this.handle(url, init);

  constructor(options: FakeTempoOptions = {}) {
    this.baseUrl = new URL(options.baseUrl ?? TEST_BASE_URL);
    for (const worklog of options.worklogs ?? []) {
      this.worklogs.set(worklog.tempoWorklogId, worklog);
    }
    this.accounts = options.accounts ?? [];
    this.workAttributes = options.workAttributes ?? [];
    this.issueProjects = options.issueProjects ?? {};
    this.issueKeys = options.issueKeys ?? {};
    this.defaultPageSize = options.defaultPageSize ?? 50;
  }

  /**
   * Queue responses returned, in order, before normal routing resumes.
   * An Error is thrown from fetch as a network failure.
   */
  respondWith(...responses: Array<ScriptedResponse | Error>): this {
    this.script.push(...responses);
    return this;
  }

  /** Requests whose method and path match */
  requestsTo(method: string, path: string | RegExp): RecordedRequest[] {
    return this.requests.filter((request) =>
      request.method === method && (typeof path === 'string' ? request.path === path : path.test(request.path)));
  }

  private async handle(input: string, init: RequestInit = {}): Promise<Response> {
    if (init.signal?.aborted) {
      throw init.signal.reason;
    }

    const url = new URL(input);
    const method = init.method ?? 'GET';
    const path = url.pathname.startsWith(this.baseUrl.pathname)
      ? url.pathname.slice(this.baseUrl.pathname.length)
      : url.pathname;
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
    this.requests.push({ method, url, path, headers: new Headers(init.headers), body });

    const scripted = this.script.shift();
    if (scripted instanceof Error) {
      throw scripted;
    }
    if (scripted) {
      if (scripted.rawBody !== undefined) {
        return new Response(scripted.rawBody, { status: scripted.status, headers: scripted.headers });
      }
      return scripted.body === undefined
        ? new Response(null, { status: scripted.status, headers: scripted.headers })
        : json(scripted.status, scripted.body, scripted.headers);
    }

    return this.route(method, path, url, body);
  }

  private route(method: string, path: string, url: URL, body: unknown): Response {
    if (path === '/worklogs') {
      if (method === 'GET') {return this.listWorklogs(url);}
      if (method === 'POST') {return this.createWorklog(body);}
    }

    const match = /^\/worklogs\/(\d+)$/.exec(path);
    if (match) {
      const id = Number(match[1]);
      const existing = this.worklogs.get(id);
      if (!existing) {return tempoError(404, `Worklog ${id} not found`);}
      if (method === 'GET') {return json(200, existing);}
      if (method === 'PUT') {return this.replaceWorklog(existing, body);}
      if (method === 'DELETE') {
        this.worklogs.delete(id);
        return new Response(null, { status: 204 });
      }
    }

    if (path === '/accounts' && method === 'GET') {return this.page(url, this.accounts);}
    if (path === '/work-attributes' && method === 'GET') {return this.page(url, this.workAttributes);}

    return tempoError(404, `No route for ${method} ${path}`);
  }

  private listWorklogs(url: URL): Response {
    const params = url.searchParams;
    const from = params.get('from');
    const to = params.get('to');
    const project = params.get('project');
    const issue = params.get('issue');
    const accountId = params.get('accountId');
    const accountKey = params.get('accountKey');

    const matches = [...this.worklogs.values()]
      .filter((worklog) => from === null || worklog.startDate >= from)
      .filter((worklog) => to === null || worklog.startDate <= to)
      .filter((worklog) => project === null || this.issueProjects[worklog.issue.id] === Number(project))
      .filter((worklog) => issue === null || worklog.issue.id === Number(issue))
      .filter((worklog) => accountId === null || worklog.author.accountId === accountId)
      .filter((worklog) => accountKey === null
        || (worklog.attributes?.values ?? []).some((value) => value.key === ACCOUNT_ATTRIBUTE_KEY && value.value === accountKey))
      .sort((a, b) => a.startDate.localeCompare(b.startDate) || a.tempoWorklogId - b.tempoWorklogId);

    return this.page(url, matches);
  }

  private page<T>(url: URL, items: T[]): Response {
    const offset = Number(url.searchParams.get('offset') ?? 0);
    const limit = Number(url.searchParams.get('limit') ?? this.defaultPageSize);
    const results = items.slice(offset, offset + limit);

    const metadata: { count: number; offset: number; limit: number; next?: string } = {
      count: results.length,
      offset,
      limit,
    };
    if (offset + limit < items.length) {
      const next = new URL(url);
      next.searchParams.set('offset', String(offset + limit));
      next.searchParams.set('limit', String(limit));
      metadata.next = next.toString();
    }
    return json(200, { self: url.toString(), metadata, results });
  }

  private createWorklog(body: unknown): Response {
    const parsed = WorklogBodySchema.safeParse(body);
    if (!parsed.success) {
      return tempoError(400, parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    const worklog = this.toRemote(this.nextId++, parsed.data);
    this.worklogs.set(worklog.tempoWorklogId, worklog);
    return json(200, worklog);
  }

  private replaceWorklog(existing: RemoteWorklog, body: unknown): Response {
    const parsed = WorklogBodySchema.safeParse(body);
    if (!parsed.success) {
      return tempoError(400, parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    const worklog = this.toRemote(existing.tempoWorklogId, parsed.data, existing.createdAt);
    this.worklogs.set(worklog.tempoWorklogId, worklog);
    return json(200, worklog);
  }

  private toRemote(id: number, body: z.infer<typeof WorklogBodySchema>, createdAt: string = FAKE_TIMESTAMP): RemoteWorklog {
    const key = this.issueKeys[body.issueId];
    const worklog: RemoteWorklog = {
      tempoWorklogId: id,
      issue: key === undefined ? { id: body.issueId } : { id: body.issueId, key },
      timeSpentSeconds: body.timeSpentSeconds,
      billableSeconds: body.billableSeconds ?? body.timeSpentSeconds,
      startDate: body.startDate,
      description: body.description ?? '',
      createdAt,
      updatedAt: FAKE_TIMESTAMP,
      author: { accountId: body.authorAccountId ?? TEST_AUTHOR },
      attributes: { values: body.attributes ?? [] },
    };
    if (body.startTime !== undefined) {worklog.startTime = body.startTime;}
    return worklog;
  }
}
