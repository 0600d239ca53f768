import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger } from '@lnurl-wallet/core';
import { DollarRateService } from '../dollar-rate';
import { jsonResponse, stubFetch } from '../../flows/__tests__/fakes';

const url = 'https://ticker.test/btcusd';

describe('DollarRateService', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function service(now: () => number) {
    return new DollarRateService({ url, now, maxAgeMs: 3600000 }, new Logger({ output: 'silent' }));
  }

  it('converts the ticker price to msat per dollar', async () => {
    stubFetch(() => jsonResponse({ last: '50000.00' }));

    await expect(service(() => 0).getRate()).resolves.toBe(2_000_000);
  });

  it('refreshes at most once per hour', async () => {
    let now = 0;
    const calls = stubFetch(() => jsonResponse({ last: '50000' }));
    const rates = service(() => now);

    await rates.getRate();
    now = 3599999;
    await rates.getRate();
    expect(calls).toHaveLength(1);

    now = 3600000;
    await rates.getRate();
    expect(calls).toHaveLength(2);
  });

  it('keeps the last good rate when a refresh fails', async () => {
    let now = 0;
    let fail = false;
    stubFetch(() => (fail ? jsonResponse({}, 502) : jsonResponse({ last: '40000' })));
    const rates = service(() => now);

    await expect(rates.getRate()).resolves.toBe(2_500_000);
    now = 7200000;
    fail = true;
    await expect(rates.getRate()).resolves.toBe(2_500_000);
  });

  it('fails without any cached rate', async () => {
    stubFetch(() => jsonResponse({ last: 'n/a' }));

    await expect(service(() => 0).getRate()).rejects.toThrow('ticker returned invalid price: n/a');
  });

  it('formats prices with two decimals', async () => {
    stubFetch(() => jsonResponse({ last: '50000' }));

    await expect(service(() => 0).formatDollarPrice(1_000_000)).resolves.toBe('0.50 USD');
  });

  it('falls back to a placeholder when no rate is available', async () => {
    stubFetch(() => jsonResponse({}, 500));

    await expect(service(() => 0).formatDollarPrice(1_000_000)).resolves.toBe('~ USD');
  });
});
