/**
 * Test Data Fixtures for the Tempo MCP server
 *
 * Factory functions for remote Tempo records and configuration with
 * sensible defaults.
 *
 * @module __testUtils__/fixtures
 */

import type { TempoConfig } from '../tempo/config.js';
import type { RemoteAccount, RemoteWorkAttribute, RemoteWorklog } from '../tempo/types.js';

export const TEST_BASE_URL = 'https://tempo.test/4';
export const TEST_TOKEN = 'test-secret';
export const TEST_AUTHOR = 'test-account-1';

// ============================================================================
// Configuration
// ============================================================================

export function createConfig(overrides: Partial<TempoConfig> = {}): TempoConfig {
  return {
    apiToken: TEST_TOKEN,
    baseUrl: TEST_BASE_URL,
    debug: false,
    rateLimitPerSecond: 5,
    timeoutMs: 30_000,
    maxAttempts: 3,
    logLevel: 'error',
    ...overrides,
  };
}

// ============================================================================
// Remote Records
// ============================================================================

let worklogSequence = 1;

/**
 * Creates a worklog as Tempo returns it.
 *
 * @example
 * ```typescript
 * const worklog = createRemoteWorklog({ startDate: '2024-01-15' });
 * const other = createRemoteWorklog({ issue: { id: 10002, key: 'OPS-7' } });
 * ```
 */
export function createRemoteWorklog(overrides: Partial<RemoteWorklog> = {}): RemoteWorklog {
  const id = worklogSequence++;
  return {
    tempoWorklogId: id,
    issue: { id: 10001, key: 'PROJ-1' },
    timeSpentSeconds: 3600,
    billableSeconds: 3600,
    startDate: '2024-01-15',
    startTime: '09:00:00',
    description: `Worklog ${id}`,
    createdAt: '2024-01-15T09:00:00Z',
    updatedAt: '2024-01-15T09:00:00Z',
    author: { accountId: TEST_AUTHOR },
    attributes: { values: [] },
    ...overrides,
  };
}

export function createRemoteAccount(overrides: Partial<RemoteAccount> = {}): RemoteAccount {
  return {
    id: 1,
    key: 'ACME',
    name: 'Acme Corp',
    status: 'OPEN',
    global: false,
    ...overrides,
  };
}

export function createRemoteWorkAttribute(overrides: Partial<RemoteWorkAttribute> = {}): RemoteWorkAttribute {
  return {
    key: '_Activity_',
    name: 'Activity',
    type: 'STATIC_LIST',
    required: false,
    values: ['Development', 'Meeting', 'Review'],
    ...overrides,
  };
}
