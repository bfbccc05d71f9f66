/**
 * Error taxonomy for the gateway.
 *
 * Every failure that reaches a caller is one of four kinds:
 * - ConnectionFailure: the request never produced an HTTP response
 * - AuthenticationFailure: the platform rejected the credentials
 * - ProtocolError: the reply did not have the expected shape
 * - RemoteOperationError: the platform reported a business error
 */

// ============================================================================
// Base Class
// ============================================================================

export type ErrorKind = 'connection' | 'authentication' | 'protocol' | 'remote';

interface ApiErrorOptions {
  code?: string;
  requestId?: string;
  details?: unknown;
}

export abstract class ApiError extends Error {
  abstract readonly kind: ErrorKind;
  readonly status: number;
  readonly statusText: string;
  readonly code: string;
  readonly requestId: string;
  readonly details: unknown;

  constructor(status: number, statusText: string, message: string, options?: ApiErrorOptions) {
    super(message);
    this.status = status;
    this.statusText = statusText;
    this.code = options?.code || 'UNKNOWN_ERROR';
    this.requestId = options?.requestId || '';
    this.details = options?.details;
  }

  get isUnauthorized() {
    return this.status === 401;
  }
  get isForbidden() {
    return this.status === 403;
  }
  get isServerError() {
    return this.status >= 500;
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      statusText: this.statusText,
      code: this.code,
      requestId: this.requestId,
      details: this.details,
    };
  }
}

// ============================================================================
// Kinds
// ============================================================================

export class ConnectionFailure extends ApiError {
  readonly kind = 'connection';
  readonly isTimeout: boolean;

  constructor(message: string, options: ApiErrorOptions & { isTimeout?: boolean } = {}) {
    super(0, 'Network Error', message, {
      code: options.isTimeout ? 'TIMEOUT' : 'NETWORK_ERROR',
      ...options,
    });
    this.name = 'ConnectionFailure';
    this.isTimeout = options.isTimeout || false;
  }
}

export class AuthenticationFailure extends ApiError {
  readonly kind = 'authentication';

  constructor(status: number, statusText: string, options?: ApiErrorOptions) {
    super(status, statusText, `API Error: HTTP Code ${status} (${statusText || 'Unauthorized'})`, {
      code: `HTTP_${status}`,
      ...options,
    });
    this.name = 'AuthenticationFailure';
  }
}

export class ProtocolError extends ApiError {
  readonly kind = 'protocol';
  readonly rawBody: string;

  constructor(message: string, rawBody: string, options: ApiErrorOptions & { status?: number } = {}) {
    super(options.status ?? 200, 'Unexpected Response', message, {
      code: 'PROTOCOL_ERROR',
      ...options,
    });
    this.name = 'ProtocolError';
    this.rawBody = rawBody;
  }
}

export class RemoteOperationError extends ApiError {
  readonly kind = 'remote';

  constructor(status: number, statusText: string, code: string, message: string, options?: Omit<ApiErrorOptions, 'code'>) {
    super(status, statusText, message, { ...options, code });
    this.name = 'RemoteOperationError';
  }
}

/** Raised by `getResponse` when the platform no longer returns the response. */
export const RESPONSE_DELETED = 'RESPONSE_DELETED';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Wraps a rejection from `fetch` (or from reading its body).
 * Aborts and timeouts are flagged so callers can tell them apart.
 */
export function toConnectionFailure(err: unknown, requestId: string): ConnectionFailure {
  const isTimeout = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
  const reason = err instanceof Error ? err.message : String(err);
  return new ConnectionFailure(
    isTimeout ? `Request timed out: ${reason}` : `Unable to connect to server: ${reason}`,
    { requestId, isTimeout, details: err }
  );
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
