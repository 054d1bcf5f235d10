/**
 * Request execution
 *
 * One round trip per call: send, check the status, parse the body, check for
 * a server-reported error. The timeout covers connecting and reading the body.
 */

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import {
  TransportError,
  TimeoutError,
  HttpStatusError,
  ServerError,
  ParseError,
  type OllamaClientError,
} from '../types/errors.js';
import { isJsonObject, type JsonValue } from '../types/json.js';
import { getErrorMessage } from '../services/error-utils.js';
import type { ILogService } from '../services/log-service.js';
import { MAX_TIMEOUT_MS } from './config.js';
import type { RequestBody } from './types.js';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  body?: RequestBody;
  /** Discard a successful body and resolve to `{}` */
  stream?: boolean;
  timeoutMs: number;
  log: ILogService;
}

interface RawResponse {
  status: number;
  statusText: string;
  text: string;
}

/**
 * Pull a message out of an `error` field: a plain string (native endpoints)
 * or `{ message }` (OpenAI-compatible endpoints).
 */
export function extractErrorMessage(error: JsonValue | undefined): string | undefined {
  if (typeof error === 'string') {
    return error.length > 0 ? error : undefined;
  }
  if (isJsonObject(error) && typeof error.message === 'string' && error.message.length > 0) {
    return error.message;
  }
  return undefined;
}

/**
 * Message of a failed fetch. Node rejects with a bare "fetch failed" and keeps
 * the socket-level reason (ECONNREFUSED, ENOTFOUND, ...) in `cause`.
 */
export function describeTransportFailure(error: unknown): string {
  const message = getErrorMessage(error);
  if (!(error instanceof Error) || !(error.cause instanceof Error)) {
    return message;
  }
  const { cause } = error;
  const detail = cause.message || ('code' in cause && typeof cause.code === 'string' ? cause.code : '');
  return detail && detail !== message ? `${message} (${detail})` : message;
}

function parseJson(text: string): Result<JsonValue, ParseError> {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(new ParseError(text, { cause: error }));
  }
}

function hasErrorField(body: JsonValue): body is { error: JsonValue } {
  return isJsonObject(body) && body.error !== undefined && body.error !== null;
}

function buildInit(request: HttpRequest, signal: AbortSignal): RequestInit {
  if (request.method === 'GET') {
    return { method: 'GET', signal };
  }
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(request.body ?? {}),
    signal,
  };
}

/**
 * Send the request and read the body. Resolves to null when a streamed body was dropped.
 */
async function transmit(
  request: HttpRequest,
  signal: AbortSignal
): Promise<RawResponse | null> {
  const startedAt = Date.now();
  const response = await fetch(request.url, buildInit(request, signal));
  request.log.debug(`${request.method} ${request.url} -> ${response.status}`, {
    durationMs: Date.now() - startedAt,
  });

  if (response.status === 200 && request.stream) {
    await response.body?.cancel();
    return null;
  }

  return {
    status: response.status,
    statusText: response.statusText,
    text: await response.text(),
  };
}

/**
 * Execute one request against the server
 */
export async function executeRequest(
  request: HttpRequest
): Promise<Result<JsonValue, OllamaClientError>> {
  const operation = `${request.method} ${request.url}`;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), Math.min(request.timeoutMs, MAX_TIMEOUT_MS));

  request.log.debug(operation, { stream: request.stream ?? false, timeoutMs: request.timeoutMs });

  let raw: RawResponse | null;
  try {
    raw = await transmit(request, controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      return err(new TimeoutError(operation, request.timeoutMs, { cause: error }));
    }
    return err(new TransportError(request.url, describeTransportFailure(error), { cause: error }));
  } finally {
    clearTimeout(timeoutId);
  }

  if (raw === null) {
    return ok({});
  }

  if (raw.status !== 200) {
    const parsed = parseJson(raw.text);
    const serverMessage =
      parsed.ok && isJsonObject(parsed.value) ? extractErrorMessage(parsed.value.error) : undefined;
    return err(new HttpStatusError(raw.status, raw.statusText, { serverMessage }));
  }

  const parsed = parseJson(raw.text);
  if (!parsed.ok) {
    return parsed;
  }

  if (hasErrorField(parsed.value)) {
    return err(new ServerError(extractErrorMessage(parsed.value.error)));
  }

  return parsed;
}
