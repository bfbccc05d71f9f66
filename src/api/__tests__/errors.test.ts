import { describe, it, expect } from 'vitest';
import {
  ApiError,
  AuthenticationFailure,
  ConnectionFailure,
  ProtocolError,
  RemoteOperationError,
  isApiError,
  toConnectionFailure,
} from '../errors.js';
import { data, empty, isEmpty, settle, unwrapOr } from '../outcome.js';

describe('Error taxonomy', () => {
  it('gives every kind a name, kind and code', () => {
    const errors = [
      new ConnectionFailure('Unable to connect to server: refused'),
      new AuthenticationFailure(401, 'Unauthorized'),
      new ProtocolError('Unexpected response from Qualtrics: not a JSON document', 'oops'),
      new RemoteOperationError(200, 'OK', 'QM_BAD', 'Bad request'),
    ];

    expect(errors.map((err) => [err.name, err.kind, err.code])).toEqual([
      ['ConnectionFailure', 'connection', 'NETWORK_ERROR'],
      ['AuthenticationFailure', 'authentication', 'HTTP_401'],
      ['ProtocolError', 'protocol', 'PROTOCOL_ERROR'],
      ['RemoteOperationError', 'remote', 'QM_BAD'],
    ]);
    expect(errors.every((err) => err instanceof ApiError && isApiError(err))).toBe(true);
  });

  it('formats authentication failures like the platform reports them', () => {
    const error = new AuthenticationFailure(403, 'Forbidden');
    expect(error.message).toBe('API Error: HTTP Code 403 (Forbidden)');
    expect(error.isForbidden).toBe(true);
    expect(error.isUnauthorized).toBe(false);
  });

  it('keeps the raw body of a protocol error', () => {
    const error = new ProtocolError('bad shape', '{"x":1}', { status: 502 });
    expect(error.rawBody).toBe('{"x":1}');
    expect(error.isServerError).toBe(true);
  });

  it('serializes to JSON', () => {
    const error = new RemoteOperationError(200, 'OK', 'QM_BAD', 'Bad request', { requestId: 'rid-1' });
    expect(error.toJSON()).toEqual({
      name: 'RemoteOperationError',
      kind: 'remote',
      message: 'Bad request',
      status: 200,
      statusText: 'OK',
      code: 'QM_BAD',
      requestId: 'rid-1',
      details: undefined,
    });
  });

  it('wraps fetch rejections', () => {
    const refused = toConnectionFailure(new TypeError('fetch failed'), 'rid-2');
    expect(refused).toMatchObject({
      message: 'Unable to connect to server: fetch failed',
      requestId: 'rid-2',
      isTimeout: false,
    });

    const aborted = toConnectionFailure(Object.assign(new Error('aborted'), { name: 'AbortError' }), 'rid-3');
    expect(aborted.isTimeout).toBe(true);
    expect(aborted.code).toBe('TIMEOUT');
  });

  it('does not treat plain errors as gateway errors', () => {
    expect(isApiError(new Error('boom'))).toBe(false);
  });
});

describe('Outcomes', () => {
  it('tells empty from data', () => {
    expect(isEmpty(empty('no-content'))).toBe(true);
    expect(isEmpty(data([]))).toBe(false);
    expect(unwrapOr(data(3), 0)).toBe(3);
    expect(unwrapOr(empty('unauthorized'), null)).toBeNull();
  });

  it('folds gateway errors into an error result', async () => {
    const failure = new AuthenticationFailure(401, 'Unauthorized');
    const result = await settle(Promise.reject(failure));
    expect(result).toEqual({ kind: 'error', error: failure });
  });

  it('passes outcomes through and rethrows other errors', async () => {
    await expect(settle(Promise.resolve(data('x')))).resolves.toEqual({ kind: 'data', data: 'x' });
    await expect(settle(Promise.reject(new RangeError('bug')))).rejects.toThrow('bug');
  });
});
