import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  LNURLDecodeError,
  LNURLErrorResponse,
  LNURLUnsupportedError,
  TimeoutError,
  TransportError,
} from '@lnurl-wallet/core';
import { fetchLNURLParams, parseLNURLResponse, payValues } from '../params';
import { jsonResponse, stubFetch } from '../../flows/__tests__/fakes';

const k1 = 'ab'.repeat(32);

describe('fetchLNURLParams', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reads login params from the URL without a request', async () => {
    const calls = stubFetch(() => jsonResponse({}));
    const url = `https://auth.test/login?tag=login&k1=${k1}`;

    await expect(fetchLNURLParams(url)).resolves.toEqual({ tag: 'login', host: 'auth.test', k1, callback: url });
    expect(calls).toEqual([]);
  });

  it('rejects login URLs with a malformed k1', async () => {
    await expect(fetchLNURLParams('https://auth.test/login?tag=login&k1=xyz')).rejects.toBeInstanceOf(LNURLDecodeError);
  });

  it('parses withdraw requests', async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        tag: 'withdrawRequest',
        callback: 'https://w.test/cb?id=1',
        k1: 'withdraw-k1',
        minWithdrawable: 1000,
        maxWithdrawable: 5000,
        defaultDescription: 'payout',
      })
    );

    await expect(fetchLNURLParams('https://service.test/lnurl')).resolves.toEqual({
      tag: 'withdrawRequest',
      callback: 'https://w.test/cb?id=1',
      callbackHost: 'w.test',
      k1: 'withdraw-k1',
      minWithdrawable: 1000,
      maxWithdrawable: 5000,
      defaultDescription: 'payout',
    });
    expect(calls.map((u) => u.toString())).toEqual(['https://service.test/lnurl']);
  });

  it('parses pay requests and keeps the metadata string verbatim', async () => {
    const metadata = '[["text/plain", "Tip jar"]]';
    stubFetch(() =>
      jsonResponse({
        tag: 'payRequest',
        callback: 'https://pay.test/cb',
        minSendable: '1000',
        maxSendable: 2000,
        metadata,
        commentAllowed: 140,
      })
    );

    await expect(fetchLNURLParams('https://service.test/lnurl')).resolves.toEqual({
      tag: 'payRequest',
      callback: 'https://pay.test/cb',
      callbackHost: 'pay.test',
      minSendable: 1000,
      maxSendable: 2000,
      metadata: { encoded: metadata, entries: [['text/plain', 'Tip jar']] },
      commentAllowed: 140,
    });
  });

  it('rejects pay requests with an inverted range', async () => {
    stubFetch(() =>
      jsonResponse({ tag: 'payRequest', callback: 'https://pay.test/cb', minSendable: 5000, maxSendable: 1000, metadata: '[]' })
    );

    await expect(fetchLNURLParams('https://service.test/lnurl')).rejects.toThrow(
      'service.test offers an invalid sendable range'
    );
  });

  it('surfaces server errors with host and reason', async () => {
    stubFetch(() => jsonResponse({ status: 'ERROR', reason: 'no balance' }));

    const error = await fetchLNURLParams('https://service.test/lnurl').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LNURLErrorResponse);
    expect(error).toMatchObject({ host: 'service.test', reason: 'no balance' });
  });

  it('treats non-2xx as a transport failure and hides the query', async () => {
    stubFetch(() => jsonResponse({ status: 'OK' }, 404));

    const error = await fetchLNURLParams('https://service.test/lnurl?token=hidden').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'Got status 404 on callback https://service.test/lnurl',
      status: 404,
    });
  });

  it('wraps network failures', async () => {
    vi.stubGlobal('fetch', async () => {
      throw new Error('connect ECONNREFUSED');
    });

    await expect(fetchLNURLParams('https://service.test/lnurl')).rejects.toThrow(
      new TransportError('request to service.test failed: connect ECONNREFUSED', 'https://service.test/lnurl')
    );
  });

  it('times out slow servers', async () => {
    vi.stubGlobal(
      'fetch',
      (input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    await expect(fetchLNURLParams('https://service.test/lnurl', { timeoutMs: 10 })).rejects.toBeInstanceOf(TimeoutError);
  });

  it('times out servers that stall after sending headers', async () => {
    vi.stubGlobal('fetch', async () => ({
      status: 200,
      body: null,
      json: () => new Promise<unknown>(() => {}),
    }));

    await expect(fetchLNURLParams('https://slow.test/lnurl', { timeoutMs: 20 })).rejects.toThrow(
      new TimeoutError('request to slow.test timed out after 20ms')
    );
  });

  it('rejects bodies that are not JSON', async () => {
    stubFetch(() => new Response('<html>', { status: 200 }));

    await expect(fetchLNURLParams('https://service.test/lnurl')).rejects.toThrow('service.test returned invalid JSON');
  });

  it('flags channel requests as unsupported', async () => {
    stubFetch(() => jsonResponse({ tag: 'channelRequest', uri: 'node@host:9735', callback: 'https://c.test', k1: 'x' }));

    await expect(fetchLNURLParams('https://service.test/lnurl')).rejects.toBeInstanceOf(LNURLUnsupportedError);
  });

  it('rejects unknown tags', async () => {
    stubFetch(() => jsonResponse({ tag: 'somethingElse' }));

    await expect(fetchLNURLParams('https://service.test/lnurl')).rejects.toThrow(
      'service.test returned an unknown lnurl response (somethingElse)'
    );
  });
});

describe('parseLNURLResponse', () => {
  it('classifies a bare invoice body as second-stage pay values', () => {
    expect(parseLNURLResponse({ pr: 'lnbc1x', routes: [] }, 'pay.test')).toEqual({
      tag: 'payRequest2',
      pr: 'lnbc1x',
      successAction: null,
      status: 'OK',
      reason: '',
      disposable: true,
    });
  });
});

describe('payValues', () => {
  it('keeps a message success action', () => {
    expect(
      payValues({ pr: 'lnbc1x', successAction: { tag: 'message', message: 'Thanks!' }, disposable: false }, 'pay.test')
    ).toEqual({
      tag: 'payRequest2',
      pr: 'lnbc1x',
      successAction: { tag: 'message', message: 'Thanks!' },
      status: 'OK',
      reason: '',
      disposable: false,
    });
  });

  it('requires an invoice', () => {
    expect(() => payValues({ status: 'OK' }, 'pay.test')).toThrow('pay.test response is missing "pr"');
  });
});
