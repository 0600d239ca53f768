/**
 * LNURL HTTP helpers
 * GET with query parameters, timeout and LNURL status handling
 */

import { LNURLDecodeError, LNURLErrorResponse, TimeoutError, TransportError, errorMessage } from '@lnurl-wallet/core';

export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Append query parameters, keeping any the URL already carries.
 */
export function withQuery(url: string, params: Record<string, string>): URL {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, value);
  }
  return target;
}

/**
 * GET a JSON object. Network failures and non-2xx statuses raise
 * TransportError regardless of the body. The timeout covers the whole
 * exchange, body included.
 */
export async function getJson(url: URL | string, timeoutMs = DEFAULT_HTTP_TIMEOUT_MS): Promise<JsonObject> {
  const href = url.toString();
  const host = new URL(href).host;
  const controller = new AbortController();
  let timeout: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timeout = setTimeout(() => {
      reject(new TimeoutError(`request to ${host} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });
  // only observed through Promise.race; keeps a late rejection from going unhandled
  expired.catch(() => undefined);

  try {
    let res: Response;
    try {
      res = await Promise.race([
        fetch(href, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        }),
        expired,
      ]);
    } catch (error) {
      if (error instanceof TimeoutError) throw error;
      if (controller.signal.aborted) throw new TimeoutError(`request to ${host} timed out after ${timeoutMs}ms`);
      throw new TransportError(`request to ${host} failed: ${errorMessage(error)}`, href);
    }

    if (res.status >= 300) {
      await res.body?.cancel();
      // query strings may carry signatures or invoices; keep them out of messages
      const { origin, pathname } = new URL(href);
      throw new TransportError(`Got status ${res.status} on callback ${origin}${pathname}`, href, res.status);
    }

    let body: unknown;
    try {
      body = await Promise.race([res.json(), expired]);
    } catch (error) {
      if (error instanceof TimeoutError) throw error;
      if (controller.signal.aborted) throw new TimeoutError(`request to ${host} timed out after ${timeoutMs}ms`);
      throw new LNURLDecodeError(`${host} returned invalid JSON`);
    }

    if (!isJsonObject(body)) {
      throw new LNURLDecodeError(`${host} returned a non-object JSON body`);
    }
    return body;
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Raise LNURLErrorResponse for `{status: "ERROR"}` bodies.
 */
export function assertLNURLOk(body: JsonObject, host: string): void {
  if (typeof body.status === 'string' && body.status.toUpperCase() === 'ERROR') {
    const reason = typeof body.reason === 'string' ? body.reason : 'unknown reason';
    throw new LNURLErrorResponse(host, reason);
  }
}

/**
 * GET an LNURL callback and check its status field.
 */
export async function callLNURL(url: URL, timeoutMs = DEFAULT_HTTP_TIMEOUT_MS): Promise<JsonObject> {
  const body = await getJson(url, timeoutMs);
  assertLNURLOk(body, url.host);
  return body;
}
