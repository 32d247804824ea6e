/**
 * Unit tests for the Tempo API client
 *
 * The client talks to the in-memory FakeTempo through its fetch option and
 * waits on a VirtualClock, so retry delays are recorded instead of slept.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  NotFoundError,
  RateLimitedError,
  RemoteProtocolError,
  RemoteRequestError,
  TransientRemoteError,
} from '../../shared/errors.js';
import { TempoClient, parseRetryAfter, toWorklog, type FetchLike } from '../client.js';
import { RateLimiter, type Permit } from '../rate-limiter.js';
import {
  FakeTempo,
  TEST_BASE_URL,
  TEST_EPOCH,
  TEST_TOKEN,
  VirtualClock,
  createRemoteAccount,
  createRemoteWorklog,
} from '../../__testUtils__/index.js';

describe('TempoClient', () => {
  let clock: VirtualClock;
  let limiter: RateLimiter;
  let fake: FakeTempo;
  let client: TempoClient;

  const createClient = (overrides: { fetch?: FetchLike; maxAttempts?: number; timeoutMs?: number } = {}) =>
    new TempoClient({
      apiToken: TEST_TOKEN,
      baseUrl: TEST_BASE_URL,
      rateLimiter: limiter,
      clock,
      fetch: overrides.fetch ?? fake.fetch,
      maxAttempts: overrides.maxAttempts,
      timeoutMs: overrides.timeoutMs,
      random: () => 0,
    });

  beforeEach(() => {
    clock = new VirtualClock();
    limiter = new RateLimiter({ requestsPerSecond: 5, clock });
    fake = new FakeTempo({
      worklogs: [
        createRemoteWorklog({ tempoWorklogId: 1, startDate: '2024-01-14' }),
        createRemoteWorklog({ tempoWorklogId: 2, startDate: '2024-01-15' }),
        createRemoteWorklog({ tempoWorklogId: 3, startDate: '2024-01-15', issue: { id: 10002, key: 'OPS-2' } }),
      ],
      accounts: [
        createRemoteAccount({ id: 1, key: 'ACME' }),
        createRemoteAccount({ id: 2, key: 'GLOBEX', name: 'Globex' }),
        createRemoteAccount({ id: 3, key: 'INITECH', name: 'Initech', status: 'CLOSED' }),
      ],
      defaultPageSize: 2,
    });
    client = createClient();
  });

  // ==========================================================================
  // Requests
  // ==========================================================================

  describe('Requests', () => {
    it('should send the bearer token and JSON headers', async () => {
      await client.getWorklog(1);

      const [request] = fake.requests;
      expect(request.headers.get('authorization')).toBe('Bearer test-secret');
      expect(request.headers.get('accept')).toBe('application/json');
      expect(request.headers.get('content-type')).toBe('application/json');
    });

    it('should pass worklog filters as query parameters', async () => {
      await client.listWorklogs({
        from: '2024-01-01',
        to: '2024-01-31',
        projectId: 10000,
        issueId: 10001,
        authorAccountId: 'test-account-1',
        accountKey: 'ACME',
        limit: 25,
      });

      const params = fake.requests[0].url.searchParams;
      expect(params.get('from')).toBe('2024-01-01');
      expect(params.get('to')).toBe('2024-01-31');
      expect(params.get('project')).toBe('10000');
      expect(params.get('issue')).toBe('10001');
      expect(params.get('accountId')).toBe('test-account-1');
      expect(params.get('accountKey')).toBe('ACME');
      expect(params.get('limit')).toBe('25');
    });

    it('should leave out filters that are not set', async () => {
      await client.listWorklogs({ from: '2024-01-15' });

      expect([...fake.requests[0].url.searchParams.keys()]).toEqual(['from']);
    });

    it('should take one rate-limit permit per request', async () => {
      await client.getWorklog(1);
      await client.getWorklog(2);

      expect(limiter.issued).toBe(2);
    });

    it('should hold the sixth to tenth of ten simultaneous calls for the next window', async () => {
      const grants: Permit[] = [];
      const acquire = limiter.acquire.bind(limiter);
      vi.spyOn(limiter, 'acquire').mockImplementation(async (signal) => {
        const permit = await acquire(signal);
        grants.push(permit);
        return permit;
      });
      fake.accounts = [createRemoteAccount()];

      await Promise.all(Array.from({ length: 10 }, () => client.listAccounts()));

      const offsets = grants.map((permit) => permit.grantedAt - TEST_EPOCH).sort((a, b) => a - b);
      expect(offsets).toEqual([0, 0, 0, 0, 0, 1000, 1000, 1000, 1000, 1000]);
      expect(fake.requests).toHaveLength(10);
    });
  });

  // ==========================================================================
  // Decoding
  // ==========================================================================

  describe('Decoding', () => {
    it('should map a remote worklog to the domain shape', () => {
      const worklog = toWorklog(createRemoteWorklog({
        tempoWorklogId: 42,
        timeSpentSeconds: 1800,
        billableSeconds: 0,
        description: null,
        attributes: { values: [{ key: '_Account_', value: 'ACME' }, { key: '_Activity_', value: 'Review' }] },
      }));

      expect(worklog).toMatchObject({
        id: 42,
        issue: { id: 10001, key: 'PROJ-1' },
        authorAccountId: 'test-account-1',
        timeSpentSeconds: 1800,
        billableSeconds: 0,
        billable: false,
        description: '',
        accountKey: 'ACME',
        attributes: { _Account_: 'ACME', _Activity_: 'Review' },
      });
    });

    it('should treat a worklog without billable seconds as fully billable', () => {
      const worklog = toWorklog(createRemoteWorklog({ timeSpentSeconds: 600, billableSeconds: undefined }));

      expect(worklog.billableSeconds).toBe(600);
      expect(worklog.billable).toBe(true);
    });

    it('should fail with RemoteProtocolError on an unexpected body shape', async () => {
      fake.respondWith({ status: 200, body: { tempoWorklogId: 'one' } });

      const error = await client.getWorklog(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RemoteProtocolError);
      expect(error).toMatchObject({ kind: 'RemoteProtocolError', operation: 'getWorklog', retryable: false });
      expect(fake.requests).toHaveLength(1);
    });

    it('should fail with RemoteProtocolError on a body that is not JSON', async () => {
      fake.respondWith({ status: 200, rawBody: '<html>maintenance</html>' });

      await expect(client.getWorklog(1)).rejects.toBeInstanceOf(RemoteProtocolError);
      expect(fake.requests).toHaveLength(1);
    });
  });

  // ==========================================================================
  // Pagination
  // ==========================================================================

  describe('Pagination', () => {
    it('should return the continuation URL and follow it', async () => {
      const first = await client.listWorklogs({ from: '2024-01-01', limit: 2 });

      expect(first.results.map((worklog) => worklog.id)).toEqual([1, 2]);
      expect(first.next).toBeDefined();

      const second = await client.listWorklogs({ from: '2024-01-01', limit: 2 }, { cursor: first.next });

      expect(second.results.map((worklog) => worklog.id)).toEqual([3]);
      expect(second.next).toBeUndefined();
      expect(fake.requests[1].url.searchParams.get('offset')).toBe('2');
    });

    it('should refuse a continuation URL on another host', async () => {
      const request = client.listWorklogs({}, { cursor: 'https://elsewhere.test/4/worklogs?offset=2' });

      await expect(request).rejects.toBeInstanceOf(RemoteProtocolError);
      expect(fake.requests).toHaveLength(0);
    });

    it('should collect every page of accounts', async () => {
      const accounts = await client.listAccounts();

      expect(accounts.map((account) => account.key)).toEqual(['ACME', 'GLOBEX', 'INITECH']);
      expect(accounts[2]).toEqual({ id: 3, key: 'INITECH', name: 'Initech', status: 'CLOSED', global: false });
      expect(fake.requestsTo('GET', '/accounts')).toHaveLength(2);
    });
  });

  // ==========================================================================
  // Writes
  // ==========================================================================

  describe('Writes', () => {
    it('should create a worklog and return the stored record', async () => {
      const created = await client.createWorklog({
        issueId: 10001,
        authorAccountId: 'test-account-1',
        timeSpentSeconds: 5400,
        billableSeconds: 5400,
        startDate: '2024-01-15',
        description: 'Pairing session',
      });

      expect(created.id).toBe(5000);
      expect(created.description).toBe('Pairing session');
      expect(fake.worklogs.has(5000)).toBe(true);
      expect(fake.requests[0].body).toMatchObject({ issueId: 10001, timeSpentSeconds: 5400 });
    });

    it('should replace a worklog with PUT', async () => {
      const updated = await client.updateWorklog(2, {
        issueId: 10001,
        authorAccountId: 'test-account-1',
        timeSpentSeconds: 900,
        billableSeconds: 0,
        startDate: '2024-01-15',
        description: 'Shorter',
      });

      expect(updated).toMatchObject({ id: 2, timeSpentSeconds: 900, billable: false, description: 'Shorter' });
      expect(fake.requestsTo('PUT', '/worklogs/2')).toHaveLength(1);
    });

    it('should delete a worklog on a 204 response', async () => {
      await expect(client.deleteWorklog(3)).resolves.toBeUndefined();

      expect(fake.worklogs.has(3)).toBe(false);
    });
  });

  // ==========================================================================
  // Failures and Retries
  // ==========================================================================

  describe('Failures and Retries', () => {
    it('should retry a 429 once after the Retry-After delay with a new permit', async () => {
      fake.respondWith({ status: 429, body: { errors: [{ message: 'Too many requests' }] }, headers: { 'Retry-After': '2' } });

      const worklog = await client.getWorklog(1);

      expect(worklog.id).toBe(1);
      expect(fake.requests).toHaveLength(2);
      expect(clock.sleeps).toEqual([2000]);
      expect(limiter.issued).toBe(2);
    });

    it('should fail with RateLimitedError when 429s outlast the attempts', async () => {
      fake.respondWith({ status: 429 }, { status: 429 }, { status: 429 });

      const error = await client.getWorklog(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ status: 429, retryable: true });
      expect(fake.requests).toHaveLength(3);
      expect(clock.sleeps).toEqual([500, 1000]);
    });

    it('should retry a 500 up to the maximum attempts then fail with TransientRemoteError', async () => {
      const failure = { status: 500, body: { errors: [{ message: 'Internal failure' }] } };
      fake.respondWith(failure, failure, failure);

      const error = await client.getWorklog(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransientRemoteError);
      expect(error).toMatchObject({
        status: 500,
        operation: 'getWorklog',
        message: 'Tempo API error 500 during getWorklog: Internal failure',
      });
      expect(fake.requests).toHaveLength(3);
      expect(clock.sleeps).toEqual([500, 1000]);
      expect(limiter.issued).toBe(3);
    });

    it('should honour a lower attempt limit', async () => {
      client = createClient({ maxAttempts: 1 });
      fake.respondWith({ status: 503 });

      await expect(client.getWorklog(1)).rejects.toBeInstanceOf(TransientRemoteError);
      expect(fake.requests).toHaveLength(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('should retry a network failure', async () => {
      fake.respondWith(new TypeError('fetch failed'));

      const worklog = await client.getWorklog(1);

      expect(worklog.id).toBe(1);
      expect(fake.requests).toHaveLength(2);
    });

    it('should report a persistent network failure as TransientRemoteError', async () => {
      fake.respondWith(new TypeError('fetch failed'), new TypeError('fetch failed'), new TypeError('fetch failed'));

      const error = await client.getWorklog(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransientRemoteError);
      expect(error).toMatchObject({ message: 'Tempo request failed: fetch failed', operation: 'getWorklog' });
    });

    it('should fail with NotFoundError on a 404 without retrying', async () => {
      const error = await client.getWorklog(999).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        kind: 'NotFound',
        status: 404,
        message: 'Tempo API error 404 during getWorklog: Worklog 999 not found',
      });
      expect(fake.requests).toHaveLength(1);
    });

    it('should report authentication failures', async () => {
      fake.respondWith({ status: 401, body: { errors: [{ message: 'Unauthorized' }] } });

      const error = await client.getWorklog(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RemoteRequestError);
      expect(error).toMatchObject({
        status: 401,
        message: 'Authentication failed. Please check your API token.',
      });
      expect(fake.requests).toHaveLength(1);
    });

    it('should report permission failures', async () => {
      fake.respondWith({ status: 403 });

      await expect(client.getWorklog(1)).rejects.toMatchObject({
        kind: 'RemoteRequestError',
        status: 403,
        message: 'Access forbidden. Check your API token permissions.',
      });
    });

    it('should carry the remote message of a rejected payload', async () => {
      fake.respondWith({ status: 400, body: { errors: [{ message: 'Issue not found' }, { message: 'Bad date' }] } });

      await expect(client.createWorklog({
        issueId: 1,
        timeSpentSeconds: 60,
        billableSeconds: 60,
        startDate: '2024-01-15',
        description: '',
      })).rejects.toMatchObject({
        kind: 'RemoteRequestError',
        status: 400,
        message: 'Tempo API error 400 during createWorklog: Issue not found; Bad date',
      });
    });

    it('should time out a request that never answers', async () => {
      const hanging: FetchLike = (_url, init) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
      client = createClient({ fetch: hanging, maxAttempts: 1, timeoutMs: 5 });

      const error = await client.getWorklog(1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransientRemoteError);
      expect(error).toMatchObject({ message: 'Tempo request timed out after 5ms' });
    });

    it('should stop without retrying when the caller aborts', async () => {
      const controller = new AbortController();
      const hanging: FetchLike = (_url, init) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
      client = createClient({ fetch: hanging });

      const request = client.getWorklog(1, { signal: controller.signal });
      controller.abort();

      await expect(request).rejects.toMatchObject({ name: 'AbortError' });
      expect(limiter.issued).toBe(1);
      expect(clock.sleeps).toEqual([]);
    });
  });
});

describe('parseRetryAfter', () => {
  it('should read delta-seconds', () => {
    expect(parseRetryAfter('3', 0)).toBe(3000);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.UTC(2024, 0, 15, 9, 0, 0);
    expect(parseRetryAfter('Mon, 15 Jan 2024 09:00:05 GMT', now)).toBe(5000);
  });

  it('should clamp a date in the past to zero', () => {
    const now = Date.UTC(2024, 0, 15, 9, 0, 0);
    expect(parseRetryAfter('Mon, 15 Jan 2024 08:00:00 GMT', now)).toBe(0);
  });

  it('should ignore a missing or unreadable header', () => {
    expect(parseRetryAfter(null, 0)).toBeUndefined();
    expect(parseRetryAfter('soon', 0)).toBeUndefined();
  });
});
