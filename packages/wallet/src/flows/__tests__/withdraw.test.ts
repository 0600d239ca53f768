import { describe, it, expect, afterEach, vi } from 'vitest';
import type { LNURLWithdrawParams } from '@lnurl-wallet/core';
import { WithdrawFlow } from '../withdraw';
import { createHarness, jsonResponse, stubFetch, user } from './fakes';

const params: LNURLWithdrawParams = {
  tag: 'withdrawRequest',
  callback: 'https://w.test/cb?id=1',
  callbackHost: 'w.test',
  k1: 'withdraw-k1',
  minWithdrawable: 1000,
  maxWithdrawable: 5000,
  defaultDescription: 'payout',
};

describe('WithdrawFlow', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('invoices the full amount and hands it to the callback', async () => {
    const calls = stubFetch(() => jsonResponse({ status: 'OK' }));
    const h = createHarness();
    h.wallet.makeInvoiceResult = { bolt11: 'lnbc50n1withdraw', paymentHash: 'cd'.repeat(32) };

    await new WithdrawFlow(h.ctx).run(user, params, { promptMessageId: 9 });

    expect(h.wallet.invoices).toEqual([
      { msatoshi: 5000, description: 'payout', messageId: 9, ignoreInvoiceSizeLimit: true, skipQR: true },
    ]);
    expect(calls).toHaveLength(1);
    expect(calls[0].searchParams.get('id')).toBe('1');
    expect(calls[0].searchParams.get('k1')).toBe('withdraw-k1');
    expect(calls[0].searchParams.get('pr')).toBe('lnbc50n1withdraw');
    expect(h.tracker.events).toEqual([['lnurl-withdraw', { sats: 5 }]]);
    expect(h.transport.sent).toEqual([]);
  });

  it('stops before the callback when no invoice can be made', async () => {
    const calls = stubFetch(() => jsonResponse({ status: 'OK' }));
    const h = createHarness();
    h.wallet.makeInvoiceResult = new Error('wallet is locked');

    await new WithdrawFlow(h.ctx).run(user, params);

    expect(calls).toEqual([]);
    expect(h.transport.notifications()).toEqual([{ kind: 'error', err: 'wallet is locked' }]);
    expect(h.tracker.events).toEqual([]);
  });

  it('reports the callback host when the server refuses', async () => {
    stubFetch(() => jsonResponse({ status: 'ERROR', reason: 'already claimed' }));
    const h = createHarness();

    await new WithdrawFlow(h.ctx).run(user, params);

    expect(h.transport.notifications()).toEqual([
      { kind: 'lnurl-error', host: 'w.test', reason: 'already claimed' },
    ]);
    expect(h.tracker.events).toEqual([]);
  });
});
