/**
 * Control-panel API (v2.x).
 *
 * Every call is `<baseUrl>/WRAPI/<product>/api.php` with the request name and
 * credentials in the query string. Success replies are `{ Meta, Result }`,
 * except for the bare-reply requests and the XML survey document.
 */

import type { z } from 'zod';
import { AuthenticationFailure, ProtocolError, RemoteOperationError } from './errors.js';
import { parseJson, validateReply } from './http.js';
import type { Transport, WireRequest, WireResponse } from './http.js';
import { data, empty } from './outcome.js';
import type { Outcome } from './outcome.js';
import { appendParams } from './params.js';
import type { EmbeddedData, WireParams } from './params.js';
import { v2EnvelopeSchema } from './schemas/index.js';

// ============================================================================
// Types
// ============================================================================

export type Product = 'RS' | 'TA';

const PRODUCT_PATHS: Record<Product, string> = {
  RS: '/WRAPI/ControlPanel/api.php',
  TA: '/WRAPI/Contacts/api.php',
};

export type V2Body =
  | { kind: 'csv'; text: string }
  | { kind: 'form'; files: Record<string, string> };

export interface V2Call {
  request: string;
  product?: Product;
  params?: WireParams;
  embeddedData?: EmbeddedData;
  body?: V2Body;
  /** Success replies carry no Meta block (getPanel, getLegacyResponseData, getListContacts). */
  bare?: boolean;
  /** The survey document request takes no Format parameter. */
  omitFormat?: boolean;
}

// ============================================================================
// Request Building
// ============================================================================

export function buildV2Url(transport: Transport, call: V2Call): string {
  const { config } = transport;
  const url = new URL(`${config.baseUrl}${PRODUCT_PATHS[call.product ?? 'RS']}`);
  appendParams(url.searchParams, {
    User: config.user,
    Token: config.token,
    Format: call.omitFormat ? undefined : 'JSON',
    Version: config.apiVersion,
    Request: call.request,
  });
  appendParams(url.searchParams, call.params ?? {}, call.embeddedData);
  return url.toString();
}

function buildRequest(transport: Transport, call: V2Call): WireRequest {
  const url = buildV2Url(transport, call);
  if (!call.body) {
    return { method: 'GET', url };
  }
  if (call.body.kind === 'csv') {
    return { method: 'POST', url, headers: { 'Content-Type': 'text/csv' }, body: call.body.text };
  }
  const form = new FormData();
  for (const [name, contents] of Object.entries(call.body.files)) {
    form.set(name, new Blob([contents]), name);
  }
  return { method: 'POST', url, body: form };
}

// ============================================================================
// Status Handling
// ============================================================================

function remoteFailure(response: WireResponse): RemoteOperationError {
  const parsed = v2EnvelopeSchema.safeParse(parseJson(response.text));
  if (parsed.success && parsed.data.Meta.ErrorMessage) {
    const { Meta } = parsed.data;
    return new RemoteOperationError(
      response.status,
      response.statusText,
      String(Meta.ErrorCode ?? `HTTP_${response.status}`),
      Meta.ErrorMessage ?? '',
      { requestId: response.requestId, details: parsed.data }
    );
  }
  return new RemoteOperationError(
    response.status,
    response.statusText,
    `HTTP_${response.status}`,
    `HTTP Code ${response.status}${response.statusText ? ` (${response.statusText})` : ''}`,
    { requestId: response.requestId, details: response.text }
  );
}

function checkStatus(response: WireResponse): void {
  if (response.status === 401 || response.status === 403) {
    throw new AuthenticationFailure(response.status, response.statusText, { requestId: response.requestId });
  }
  if (!response.ok) {
    throw remoteFailure(response);
  }
}

function hasMeta(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'Meta' in value;
}

function checkMeta(json: unknown, response: WireResponse): unknown {
  const envelope = v2EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new ProtocolError('Unexpected response from Qualtrics: no Meta.Status in JSON response', response.text, {
      status: response.status,
      requestId: response.requestId,
      details: envelope.error.issues,
    });
  }
  const { Meta, Result } = envelope.data;
  if (Meta.Status !== 'Success') {
    throw new RemoteOperationError(
      response.status,
      response.statusText,
      String(Meta.ErrorCode ?? 'REMOTE_ERROR'),
      Meta.ErrorMessage ?? `Request failed with status ${Meta.Status}`,
      { requestId: response.requestId, details: envelope.data }
    );
  }
  return Result;
}

// ============================================================================
// Calls
// ============================================================================

/**
 * Issues one request and returns its validated payload: the `Result` block,
 * or the whole document for bare-reply requests.
 */
export async function callV2<T>(
  transport: Transport,
  call: V2Call,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const response = await transport.send(buildRequest(transport, call));
  checkStatus(response);

  const json = parseJson(response.text);
  if (json === undefined) {
    throw new ProtocolError('Unexpected response from Qualtrics: not a JSON document', response.text, {
      status: response.status,
      requestId: response.requestId,
    });
  }

  const payload = call.bare && !hasMeta(json) ? json : checkMeta(json, response);
  return validateReply(schema, payload, response, transport.config.debug);
}

/**
 * Fetches a document that comes back as XML instead of the JSON envelope.
 * A 401 is the platform's answer for a token it refuses and yields an empty
 * outcome rather than an error.
 */
export async function callV2Document(transport: Transport, call: V2Call): Promise<Outcome<string>> {
  const response = await transport.send(buildRequest(transport, { ...call, omitFormat: true }));
  if (response.status === 401) {
    return empty('unauthorized');
  }
  checkStatus(response);
  const document = response.text.trim();

  if (document.startsWith('<')) {
    return data(response.text);
  }

  const json = parseJson(response.text);
  if (json !== undefined && hasMeta(json)) {
    checkMeta(json, response);
  }
  throw new ProtocolError('Unexpected response from Qualtrics: expected an XML document', response.text, {
    status: response.status,
    requestId: response.requestId,
  });
}
