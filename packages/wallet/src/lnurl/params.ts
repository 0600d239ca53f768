/**
 * LNURL params fetcher
 *
 * Resolves LNURL text to one of the four handshake variants. Auth URLs
 * carry everything in their query; other kinds take exactly one GET.
 */

import {
  LNURLDecodeError,
  LNURLUnsupportedError,
  type LNURLAuthParams,
  type LNURLParams,
  type LNURLPayParams,
  type LNURLPayValues,
  type LNURLWithdrawParams,
} from '@lnurl-wallet/core';
import { DEFAULT_HTTP_TIMEOUT_MS, assertLNURLOk, getJson, type JsonObject } from '../lib/http';
import { decodeLNURL } from './codec';
import { parseMetadata } from './metadata';
import { parseSuccessAction } from './success-action';

const UNSUPPORTED_TAGS = new Set(['channelRequest', 'hostedChannelRequest']);

export interface FetchParamsOptions {
  timeoutMs?: number;
}

function str(body: JsonObject, field: string, host: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value === '') {
    throw new LNURLDecodeError(`${host} response is missing "${field}"`);
  }
  return value;
}

function msat(body: JsonObject, field: string, host: string): number {
  const value = body[field];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new LNURLDecodeError(`${host} response has invalid "${field}"`);
  }
  return parsed;
}

function callbackURL(body: JsonObject, host: string): URL {
  const raw = str(body, 'callback', host);
  try {
    return new URL(raw);
  } catch {
    throw new LNURLDecodeError(`${host} returned an invalid callback URL`);
  }
}

export function authParamsFromURL(url: URL): LNURLAuthParams {
  const k1 = url.searchParams.get('k1') ?? '';
  if (!/^[0-9a-f]{64}$/i.test(k1)) {
    throw new LNURLDecodeError('lnurl-auth k1 must be 32 bytes of hex');
  }
  return { tag: 'login', host: url.host, k1: k1.toLowerCase(), callback: url.toString() };
}

function withdrawParams(body: JsonObject, host: string): LNURLWithdrawParams {
  const callback = callbackURL(body, host);
  const minWithdrawable = body.minWithdrawable === undefined ? 0 : msat(body, 'minWithdrawable', host);
  const maxWithdrawable = msat(body, 'maxWithdrawable', host);
  if (maxWithdrawable < minWithdrawable) {
    throw new LNURLDecodeError(`${host} offers maxWithdrawable below minWithdrawable`);
  }

  return {
    tag: 'withdrawRequest',
    callback: callback.toString(),
    callbackHost: callback.host,
    k1: str(body, 'k1', host),
    minWithdrawable,
    maxWithdrawable,
    defaultDescription: typeof body.defaultDescription === 'string' ? body.defaultDescription : '',
  };
}

function payParams(body: JsonObject, host: string): LNURLPayParams {
  const callback = callbackURL(body, host);
  const minSendable = msat(body, 'minSendable', host);
  const maxSendable = msat(body, 'maxSendable', host);
  if (minSendable === 0 || maxSendable < minSendable) {
    throw new LNURLDecodeError(`${host} offers an invalid sendable range`);
  }

  return {
    tag: 'payRequest',
    callback: callback.toString(),
    callbackHost: callback.host,
    minSendable,
    maxSendable,
    metadata: parseMetadata(str(body, 'metadata', host)),
    commentAllowed: typeof body.commentAllowed === 'number' ? body.commentAllowed : 0,
  };
}

/**
 * Second-stage pay response: the invoice plus an optional success action.
 */
export function payValues(body: JsonObject, host: string): LNURLPayValues {
  assertLNURLOk(body, host);
  return {
    tag: 'payRequest2',
    pr: str(body, 'pr', host),
    successAction: parseSuccessAction(body.successAction),
    status: 'OK',
    reason: '',
    disposable: body.disposable !== false,
  };
}

/**
 * Classify a JSON body returned by an LNURL endpoint.
 */
export function parseLNURLResponse(body: JsonObject, host: string): LNURLParams {
  assertLNURLOk(body, host);

  const tag = body.tag;
  if (tag === 'withdrawRequest') return withdrawParams(body, host);
  if (tag === 'payRequest') return payParams(body, host);
  if (typeof tag === 'string' && UNSUPPORTED_TAGS.has(tag)) {
    throw new LNURLUnsupportedError(tag);
  }
  if (tag === undefined && typeof body.pr === 'string') return payValues(body, host);

  throw new LNURLDecodeError(`${host} returned an unknown lnurl response${typeof tag === 'string' ? ` (${tag})` : ''}`);
}

export async function fetchLNURLParams(text: string, options: FetchParamsOptions = {}): Promise<LNURLParams> {
  const url = decodeLNURL(text);

  if (url.searchParams.get('tag') === 'login') {
    return authParamsFromURL(url);
  }

  const body = await getJson(url, options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS);
  return parseLNURLResponse(body, url.host);
}
