/**
 * Unit tests for the error taxonomy
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  InvalidArgumentError,
  NotFoundError,
  RateLimitedError,
  RemoteProtocolError,
  RemoteRequestError,
  TransientRemoteError,
  WorklogError,
  isAbortError,
  toToolError,
} from '../errors.js';
import { abortError } from '../clock.js';

describe('errors', () => {
  describe('kinds and retryability', () => {
    it.each([
      [new ConfigurationError('bad'), 'ConfigurationError', false],
      [new InvalidArgumentError('bad'), 'InvalidArgument', false],
      [new NotFoundError('gone', { operation: 'op' }), 'NotFound', false],
      [new RateLimitedError('slow down', { operation: 'op' }), 'RateLimited', true],
      [new TransientRemoteError('flaky', { operation: 'op', status: 502 }), 'TransientRemoteError', true],
      [new RemoteProtocolError('garbled', { operation: 'op' }), 'RemoteProtocolError', false],
      [new RemoteRequestError('refused', { operation: 'op', status: 400 }), 'RemoteRequestError', false],
    ])('%s should have kind %s', (error, kind, retryable) => {
      expect(error).toBeInstanceOf(WorklogError);
      expect(error.kind).toBe(kind);
      expect(error.retryable).toBe(retryable);
    });

    it('should fix the status of NotFound and RateLimited errors', () => {
      expect(new NotFoundError('gone', { operation: 'op' }).status).toBe(404);
      expect(new RateLimitedError('slow', { operation: 'op', retryAfterMs: 1500 })).toMatchObject({
        status: 429,
        retryAfterMs: 1500,
      });
    });
  });

  describe('toToolError', () => {
    it('should include operation and status for remote errors', () => {
      const error = new TransientRemoteError('Upstream failed', { operation: 'listWorklogs', status: 503 });

      expect(toToolError(error)).toEqual({
        kind: 'TransientRemoteError',
        message: 'Upstream failed',
        retryable: true,
        operation: 'listWorklogs',
        status: 503,
      });
    });

    it('should omit status when no response arrived', () => {
      const error = new TransientRemoteError('Timed out', { operation: 'getWorklog' });

      expect(toToolError(error)).toEqual({
        kind: 'TransientRemoteError',
        message: 'Timed out',
        retryable: true,
        operation: 'getWorklog',
      });
    });

    it('should include details for invalid arguments and configuration issues', () => {
      expect(toToolError(new InvalidArgumentError('Bad', [{ path: 'x', message: 'y' }]))).toEqual({
        kind: 'InvalidArgument',
        message: 'Bad',
        retryable: false,
        details: [{ path: 'x', message: 'y' }],
      });
      expect(toToolError(new ConfigurationError('Bad config', ['TEMPO_API_TOKEN: Required']))).toMatchObject({
        details: ['TEMPO_API_TOKEN: Required'],
      });
    });

    it('should report aborts as Cancelled', () => {
      expect(toToolError(abortError())).toEqual({
        kind: 'Cancelled',
        message: 'The operation was aborted',
        retryable: false,
      });
    });

    it('should report anything else as InternalError', () => {
      expect(toToolError(new TypeError('x is undefined'))).toEqual({
        kind: 'InternalError',
        message: 'x is undefined',
        retryable: false,
      });
      expect(toToolError('plain string')).toMatchObject({ kind: 'InternalError', message: 'plain string' });
    });

    it('should keep the cause of a remote error', () => {
      const cause = new Error('socket hang up');
      const error = new TransientRemoteError('Request failed', { operation: 'getWorklog', cause });

      expect(error.cause).toBe(cause);
    });
  });

  describe('isAbortError', () => {
    it('should recognise errors named AbortError', () => {
      const controller = new AbortController();
      controller.abort();

      expect(isAbortError(abortError(controller.signal))).toBe(true);
      expect(isAbortError(new Error('nope'))).toBe(false);
      expect(isAbortError('AbortError')).toBe(false);
    });
  });
});
