/**
 * REST API (v3), used by response exports.
 *
 * JSON bodies, token in the `X-API-TOKEN` header, replies shaped
 * `{ meta: { httpStatus, error? }, result }`.
 */

import type { z } from 'zod';
import { AuthenticationFailure, ProtocolError, RemoteOperationError } from './errors.js';
import { parseJson, validateReply } from './http.js';
import type { HttpMethod, Transport, WireResponse } from './http.js';
import { v3EnvelopeSchema } from './schemas/index.js';

export interface V3Call {
  method: HttpMethod;
  /** Path under `/API/v3`, or an absolute `https://` URL handed out by the API. */
  path: string;
  body?: Record<string, unknown>;
}

export function buildV3Url(transport: Transport, path: string): string {
  if (/^https:\/\//i.test(path)) {
    return path;
  }
  return `${transport.config.baseUrl}/API/v3${path.startsWith('/') ? '' : '/'}${path}`;
}

function checkStatus(response: WireResponse): void {
  if (response.status === 401 || response.status === 403) {
    throw new AuthenticationFailure(response.status, response.statusText, { requestId: response.requestId });
  }
  if (response.ok) return;

  const parsed = v3EnvelopeSchema.safeParse(parseJson(response.text));
  const error = parsed.success ? parsed.data.meta?.error : undefined;
  throw new RemoteOperationError(
    response.status,
    response.statusText,
    error?.errorCode ?? `HTTP_${response.status}`,
    error?.errorMessage ?? `HTTP Code ${response.status}`,
    { requestId: response.requestId, details: parsed.success ? parsed.data : response.text }
  );
}

/** One request; non-2xx replies raise. */
export async function sendV3(transport: Transport, call: V3Call): Promise<WireResponse> {
  const headers: Record<string, string> = { 'X-API-TOKEN': transport.config.token };
  if (call.body) {
    headers['Content-Type'] = 'application/json';
  }
  const response = await transport.send({
    method: call.method,
    url: buildV3Url(transport, call.path),
    headers,
    body: call.body ? JSON.stringify(call.body) : undefined,
  });
  checkStatus(response);
  return response;
}

/** One JSON call; returns the validated `result` block. */
export async function callV3<T>(
  transport: Transport,
  call: V3Call,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  return decodeV3(transport, await sendV3(transport, call), schema);
}

/** Validates the `result` block of a JSON reply. */
export function decodeV3<T>(
  transport: Transport,
  response: WireResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const envelope = v3EnvelopeSchema.safeParse(parseJson(response.text));
  if (!envelope.success) {
    throw new ProtocolError('Malformed response from server: expected a JSON document with a result', response.text, {
      status: response.status,
      requestId: response.requestId,
    });
  }
  return validateReply(schema, envelope.data.result, response, transport.config.debug);
}
