import { ApiError, AuthError, TransportError, describeError } from '../errors.js';
import type { HttpMethod } from '../types/index.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/defaults.js';

export type FetchLike = (input: URL, init: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequest {
  method: HttpMethod;
  baseUrl: string;
  path: string;
  query?: QueryParams | undefined;
  body?: unknown;
  headers?: Record<string, string> | undefined;
}

export interface TransportOptions {
  fetch?: FetchLike | undefined;
  timeoutMs?: number | undefined;
}

export function buildUrl(baseUrl: string, path: string, query?: QueryParams): URL {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`);
  for (const [name, value] of Object.entries(query ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(name, String(value));
    }
  }
  return url;
}

/**
 * Sends one JSON request. Resolves the parsed body, or undefined for an empty
 * successful body; rejects with AuthError, ApiError or TransportError.
 */
export async function sendJson(request: HttpRequest, options: TransportOptions = {}): Promise<unknown> {
  const fetchImpl = options.fetch ?? fetch;
  const url = buildUrl(request.baseUrl, request.path, request.query);
  const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
  const init: RequestInit = {
    method: request.method,
    headers,
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
  };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    init.body = JSON.stringify(request.body);
  }

  let response: Response;
  let text: string;
  try {
    response = await fetchImpl(url, init);
    text = await response.text();
  } catch (error) {
    // the query string may carry credentials, so only the path is reported
    throw new TransportError(
      `${request.method} ${url.pathname} failed: ${describeError(error)}`,
      { path: request.path },
      { cause: error },
    );
  }

  if (!response.ok) {
    const message = extractErrorMessage(text, response.statusText);
    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`Authentication rejected (${response.status}): ${message}`, response.status, {
        path: request.path,
      });
    }
    throw new ApiError(response.status, message, { path: request.path });
  }

  if (text.trim() === '') {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ApiError(response.status, `Response from ${request.path} is not valid JSON`, { path: request.path });
  }
}

export function extractErrorMessage(body: string, fallback: string): string {
  const parsed = tryParseJson(body);
  if (parsed && typeof parsed === 'object' && 'detail' in parsed) {
    const { detail } = parsed;
    if (Array.isArray(detail)) {
      return JSON.stringify(detail);
    }
    if (typeof detail === 'string' && detail.length > 0) {
      return detail;
    }
  }
  return body.trim() || fallback;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
