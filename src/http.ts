import type { z } from 'zod';
import {
  AuthenticationError,
  ProviderApiError,
  TransientNetworkError,
  errorMessage,
  type UpdaterError,
} from './errors.js';

/** Per-request limit for provider and IP detection calls */
export const REQUEST_TIMEOUT_MS = 30_000;

export interface ProviderRequest {
  provider: string;
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ProviderResponse {
  ok: boolean;
  status: number;
  body: string;
}

/**
 * Send one request with a timeout. Network failures and timeouts become
 * `TransientNetworkError`; cancellation through `signal` propagates as is.
 * Non-2xx responses are returned, not thrown, so each adapter can read its
 * own error format first.
 */
export async function sendRequest(
  request: ProviderRequest
): Promise<ProviderResponse> {
  const { provider, url, signal } = request;
  signal?.throwIfAborted();

  const timeout = AbortSignal.timeout(request.timeoutMs ?? REQUEST_TIMEOUT_MS);
  const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

  let res: Response;
  try {
    res = await fetch(url, {
      method: request.method ?? 'GET',
      headers: request.headers,
      body: request.body,
      signal: combined,
    });
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new TransientNetworkError(
      `${provider}: request to ${url} failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  let body: string;
  try {
    body = await res.text();
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new TransientNetworkError(
      `${provider}: reading response from ${url} failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  return { ok: res.ok, status: res.status, body };
}

/** Map a failed HTTP status to the error taxonomy */
export function statusError(
  provider: string,
  status: number,
  detail: string,
  code?: string
): UpdaterError {
  if (status === 401 || status === 403) {
    return new AuthenticationError(
      `${provider}: unauthorized (HTTP ${status}): ${detail}`
    );
  }
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientNetworkError(
      `${provider}: API error ${status}: ${detail}`
    );
  }
  return new ProviderApiError(
    `${provider}: API error ${status}: ${detail}`,
    status,
    code
  );
}

function parseJsonBody(provider: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new ProviderApiError(
      `${provider}: response is not valid JSON: ${body.slice(0, 200)}`
    );
  }
}

/** Parse and validate a JSON response body */
export function parseBody<S extends z.ZodTypeAny>(
  provider: string,
  schema: S,
  body: string
): z.infer<S> {
  const result = schema.safeParse(parseJsonBody(provider, body));
  if (!result.success) {
    throw new ProviderApiError(
      `${provider}: unexpected response: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
        .join(', ')}`
    );
  }
  return result.data;
}

/** Like `parseBody` but returns undefined instead of throwing */
export function tryParseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: string
): z.infer<S> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = schema.safeParse(json);
  return result.success ? result.data : undefined;
}
