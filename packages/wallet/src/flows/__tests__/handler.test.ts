import { describe, it, expect, afterEach, vi } from 'vitest';
import { LNURLHandler } from '../handler';
import { deriveLinkingKey } from '../../lnurl/auth-key';
import { encodeLNURL } from '../../lnurl/codec';
import { createHarness, jsonResponse, stubFetch, user } from './fakes';

const k1 = '0f'.repeat(32);

describe('LNURLHandler', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('signs login URLs without fetching params first', async () => {
    const calls = stubFetch(() => jsonResponse({ status: 'OK' }));
    const h = createHarness();

    await new LNURLHandler(h.ctx).handle(user, `https://auth.test/login?tag=login&k1=${k1}`);

    expect(calls).toHaveLength(1);
    expect(calls[0].searchParams.get('key')).toBe(deriveLinkingKey(7, 'test-secret').publicKey);
    expect(h.transport.notifications().map((n) => n.kind)).toEqual(['lnurl-auth-success']);
  });

  it('routes bech32 withdraw links to the withdraw flow', async () => {
    const calls = stubFetch((url) =>
      url.pathname === '/withdraw'
        ? jsonResponse({
            tag: 'withdrawRequest',
            callback: 'https://w.test/cb',
            k1: 'abc',
            minWithdrawable: 0,
            maxWithdrawable: 3000,
            defaultDescription: 'gift',
          })
        : jsonResponse({ status: 'OK' })
    );
    const h = createHarness();

    await new LNURLHandler(h.ctx).handle(user, `lightning:${encodeLNURL('https://w.test/withdraw')}`);

    expect(calls.map((u) => u.pathname)).toEqual(['/withdraw', '/cb']);
    expect(h.wallet.invoices[0]).toMatchObject({ msatoshi: 3000, description: 'gift' });
    expect(h.tracker.events).toEqual([['lnurl-withdraw', { sats: 3 }]]);
  });

  it('prompts for pay requests', async () => {
    stubFetch(() =>
      jsonResponse({
        tag: 'payRequest',
        callback: 'https://pay.test/cb',
        minSendable: 1000,
        maxSendable: 2000,
        metadata: '[["text/plain","Tip jar"]]',
      })
    );
    const h = createHarness();

    await new LNURLHandler(h.ctx).handle(user, 'alice@pay.test', { promptMessageId: 12 });

    expect(h.transport.sent[0].notification).toMatchObject({ kind: 'lnurl-pay-prompt', text: 'Tip jar' });
    expect(h.transport.sent[0].options).toEqual({ replyTo: 12 });
    expect(JSON.parse(h.replies.entries.get('reply:7:100')?.value ?? '{}')).toMatchObject({ lnurl: 'alice@pay.test' });
  });

  it('reports server errors with host and reason', async () => {
    stubFetch(() => jsonResponse({ status: 'ERROR', reason: 'link expired' }));
    const h = createHarness();

    await new LNURLHandler(h.ctx).handle(user, 'https://service.test/lnurl');

    expect(h.transport.notifications()).toEqual([
      { kind: 'lnurl-error', host: 'service.test', reason: 'link expired' },
    ]);
  });

  it('prefixes fetch failures', async () => {
    stubFetch(() => jsonResponse({}, 500));
    const h = createHarness();

    await new LNURLHandler(h.ctx).handle(user, 'https://service.test/lnurl?session=s3cr3t');

    expect(h.transport.notifications()).toEqual([
      { kind: 'error', err: 'failed to fetch lnurl params: Got status 500 on callback https://service.test/lnurl' },
    ]);
  });

  it('reports channel requests as unsupported', async () => {
    stubFetch(() => jsonResponse({ tag: 'channelRequest', uri: 'node@host:9735', callback: 'https://c.test/cb', k1: 'x' }));
    const h = createHarness();

    await new LNURLHandler(h.ctx).handle(user, 'https://c.test/lnurl');

    expect(h.transport.notifications()).toEqual([{ kind: 'lnurl-unsupported' }]);
  });

  it('replies to the prompt message when the fetched subtype is unsupported', async () => {
    stubFetch(() => jsonResponse({ tag: 'hostedChannelRequest', uri: 'node@host:9735', k1: 'x' }));
    const h = createHarness();

    await new LNURLHandler(h.ctx).handle(user, 'https://c.test/lnurl', { promptMessageId: 9 });

    expect(h.transport.sent).toEqual([{ user, notification: { kind: 'lnurl-unsupported' }, options: { replyTo: 9 } }]);
  });

  it('answers second-stage pay values as unsupported, as a reply', async () => {
    const h = createHarness();

    await new LNURLHandler(h.ctx).dispatch(
      user,
      { tag: 'payRequest2', pr: 'lnbc1x', successAction: null, status: 'OK', reason: '', disposable: true },
      'https://pay.test/cb',
      { promptMessageId: 4 }
    );

    expect(h.transport.sent).toEqual([{ user, notification: { kind: 'lnurl-unsupported' }, options: { replyTo: 4 } }]);
  });

  describe('handleScannedText', () => {
    it('hands bolt11 invoices back to the caller', async () => {
      const h = createHarness();

      const result = await new LNURLHandler(h.ctx).handleScannedText(user, 'lightning:LNBC10U1PTEST');

      expect(result).toEqual({ type: 'bolt11', bolt11: 'lnbc10u1ptest' });
      expect(h.transport.sent).toEqual([]);
    });

    it('prefers an invoice over an lnurl in the same text', async () => {
      const calls = stubFetch(() => jsonResponse({ status: 'OK' }));
      const h = createHarness();
      const lnurl = encodeLNURL(`https://auth.test/login?tag=login&k1=${k1}`);

      const result = await new LNURLHandler(h.ctx).handleScannedText(user, `${lnurl} lnbc10u1pboth`);

      expect(result).toEqual({ type: 'bolt11', bolt11: 'lnbc10u1pboth' });
      expect(calls).toEqual([]);
    });

    it('starts a flow for an lnurl found in the text', async () => {
      const calls = stubFetch(() => jsonResponse({ status: 'OK' }));
      const h = createHarness();
      const lnurl = encodeLNURL(`https://auth.test/login?tag=login&k1=${k1}`);

      const result = await new LNURLHandler(h.ctx).handleScannedText(user, `scan: ${lnurl}`);

      expect(result).toEqual({ type: 'lnurl', lnurl });
      expect(calls).toHaveLength(1);
    });

    it('reports text with nothing payable', async () => {
      const h = createHarness();

      const result = await new LNURLHandler(h.ctx).handleScannedText(user, 'hello there', { promptMessageId: 2 });

      expect(result).toEqual({ type: 'none' });
      expect(h.transport.sent).toEqual([
        { user, notification: { kind: 'qr-code-fail', err: 'no lnurl or invoice found' }, options: { replyTo: 2 } },
      ]);
    });
  });
});
