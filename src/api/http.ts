/**
 * HTTP transport shared by both protocol versions.
 *
 * Features:
 * - Automatic request-id generation and propagation
 * - Per-call timeout from the client configuration
 * - Transport failures translated to ConnectionFailure
 * - Request/response logging when `debug` is on
 *
 * Exactly one `fetch` per call. No retries.
 */

import type { z } from 'zod';
import type { QualtricsConfig } from '../config.js';
import { ProtocolError, toConnectionFailure } from './errors.js';

// ============================================================================
// Request ID Generation
// ============================================================================

export function generateRequestId(): string {
  return `qg-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

export interface WireRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | FormData;
}

export interface WireResponse {
  status: number;
  statusText: string;
  ok: boolean;
  contentType: string;
  requestId: string;
  bytes: Uint8Array;
  text: string;
}

export interface Transport {
  readonly config: QualtricsConfig;
  send(request: WireRequest): Promise<WireResponse>;
}

// ============================================================================
// Logging
// ============================================================================

const SECRET_PARAMS = ['Token'];

/** URL safe for logs: credentials in the query string are masked. */
export function redactUrl(url: string): string {
  const parsed = new URL(url);
  for (const name of SECRET_PARAMS) {
    if (parsed.searchParams.has(name)) {
      parsed.searchParams.set(name, '***');
    }
  }
  return parsed.toString();
}

// ============================================================================
// Transport
// ============================================================================

export function createTransport(config: QualtricsConfig): Transport {
  async function send(request: WireRequest): Promise<WireResponse> {
    const requestId = generateRequestId();
    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      ...request.headers,
    };

    if (config.debug) {
      // eslint-disable-next-line no-console
      console.log(`[API] ${request.method} ${redactUrl(request.url)} [${requestId}]`);
    }

    let response: Response;
    let bytes: Uint8Array;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers,
        body: request.body,
        signal: config.timeoutMs ? AbortSignal.timeout(config.timeoutMs) : undefined,
      });
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      throw toConnectionFailure(err, requestId);
    }

    // Server may override the request-id
    const serverRequestId = response.headers.get('X-Request-ID') || requestId;

    if (config.debug) {
      // eslint-disable-next-line no-console
      console.log(`[API] ${response.ok ? '✓' : response.status} ${redactUrl(request.url)} [${serverRequestId}]`);
    }

    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      contentType: response.headers.get('content-type') ?? '',
      requestId: serverRequestId,
      bytes,
      text: new TextDecoder().decode(bytes),
    };
  }

  return { config, send };
}

/** Parses a JSON body; `undefined` when it is not a JSON document. */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Validates a decoded reply. A mismatch is never partially returned:
 * it raises ProtocolError with the raw body attached.
 */
export function validateReply<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  response: WireResponse,
  debug: boolean
): T {
  const parseResult = schema.safeParse(value);
  if (!parseResult.success) {
    if (debug) {
      console.error(`[API] Schema validation failed [${response.requestId}]:`, parseResult.error.issues);
    }
    const first = parseResult.error.issues[0];
    const where = first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new ProtocolError(`Unexpected response from Qualtrics: ${first.message}${where}`, response.text, {
      status: response.status,
      requestId: response.requestId,
      details: parseResult.error.issues,
    });
  }
  return parseResult.data;
}
