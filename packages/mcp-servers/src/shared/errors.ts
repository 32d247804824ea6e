/**
 * Error taxonomy shared by the protocol layer and the Tempo tools.
 *
 * Every failure a tool can report is one of these classes. The protocol
 * server turns them into structured tool errors via `toToolError`; nothing
 * else crosses the wire.
 */

export type ErrorKind =
  | 'ConfigurationError'
  | 'InvalidArgument'
  | 'NotFound'
  | 'RateLimited'
  | 'TransientRemoteError'
  | 'RemoteProtocolError'
  | 'RemoteRequestError'
  | 'Cancelled'
  | 'InternalError';

export interface ToolErrorPayload {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  status?: number;
  operation?: string;
  details?: unknown;
}

export class WorklogError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(message: string, kind: ErrorKind, retryable: boolean, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WorklogError';
    this.kind = kind;
    this.retryable = retryable;
  }

  toJSON(): ToolErrorPayload {
    return { kind: this.kind, message: this.message, retryable: this.retryable };
  }
}

export class ConfigurationError extends WorklogError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, 'ConfigurationError', false, options);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  override toJSON(): ToolErrorPayload {
    return { ...super.toJSON(), details: this.issues };
  }
}

export class InvalidArgumentError extends WorklogError {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'InvalidArgument', false);
    this.name = 'InvalidArgumentError';
    this.details = details;
  }

  override toJSON(): ToolErrorPayload {
    const payload = super.toJSON();
    return this.details === undefined ? payload : { ...payload, details: this.details };
  }
}

export interface RemoteErrorInit {
  operation: string;
  status?: number;
  cause?: unknown;
}

/**
 * Failure talking to the remote API. Always names the client operation that
 * issued the request and, when a response arrived, its HTTP status.
 */
export class RemoteError extends WorklogError {
  readonly operation: string;
  readonly status?: number;

  constructor(message: string, kind: ErrorKind, retryable: boolean, init: RemoteErrorInit) {
    super(message, kind, retryable, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'RemoteError';
    this.operation = init.operation;
    this.status = init.status;
  }

  override toJSON(): ToolErrorPayload {
    const payload: ToolErrorPayload = { ...super.toJSON(), operation: this.operation };
    if (this.status !== undefined) {payload.status = this.status;}
    return payload;
  }
}

export class NotFoundError extends RemoteError {
  constructor(message: string, init: RemoteErrorInit) {
    super(message, 'NotFound', false, { status: 404, ...init });
    this.name = 'NotFoundError';
  }
}

export class RateLimitedError extends RemoteError {
  /** Delay the remote asked for, in milliseconds */
  readonly retryAfterMs?: number;

  constructor(message: string, init: RemoteErrorInit & { retryAfterMs?: number }) {
    super(message, 'RateLimited', true, { status: 429, ...init });
    this.name = 'RateLimitedError';
    this.retryAfterMs = init.retryAfterMs;
  }
}

export class TransientRemoteError extends RemoteError {
  constructor(message: string, init: RemoteErrorInit) {
    super(message, 'TransientRemoteError', true, init);
    this.name = 'TransientRemoteError';
  }
}

export class RemoteProtocolError extends RemoteError {
  constructor(message: string, init: RemoteErrorInit) {
    super(message, 'RemoteProtocolError', false, init);
    this.name = 'RemoteProtocolError';
  }
}

/** Any other 4xx: bad payload, authentication, permissions. */
export class RemoteRequestError extends RemoteError {
  constructor(message: string, init: RemoteErrorInit) {
    super(message, 'RemoteRequestError', false, init);
    this.name = 'RemoteRequestError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {return error.message;}
  return String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Map any thrown value to the payload reported inside a failed tool result.
 */
export function toToolError(error: unknown): ToolErrorPayload {
  if (error instanceof WorklogError) {return error.toJSON();}
  if (isAbortError(error)) {
    return { kind: 'Cancelled', message: errorMessage(error), retryable: false };
  }
  return { kind: 'InternalError', message: errorMessage(error), retryable: false };
}
