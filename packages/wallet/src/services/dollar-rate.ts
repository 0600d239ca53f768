/**
 * Dollar-rate cache
 *
 * msat-per-USD rate refreshed lazily at most once per hour. Stale reads
 * are fine; a failed refresh falls back to the last good rate.
 */

import { Logger, errorMeta } from '@lnurl-wallet/core';
import { getJson } from '../lib/http';
import { DEFAULT_DOLLAR_RATE_URL } from '../lib/config';

export interface DollarRateOptions {
  url?: string;
  maxAgeMs?: number;
  timeoutMs?: number;
  now?: () => number;
}

const MSAT_PER_BTC = 100_000_000_000;

export class DollarRateService {
  private rate = 0;
  private lastUpdate = 0;
  private url: string;
  private maxAgeMs: number;
  private timeoutMs: number;
  private now: () => number;

  constructor(
    options: DollarRateOptions = {},
    private logger: Logger = new Logger({ serviceName: 'lnurl-wallet:rates' })
  ) {
    this.url = options.url ?? DEFAULT_DOLLAR_RATE_URL;
    this.maxAgeMs = options.maxAgeMs ?? 60 * 60 * 1000;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Millisatoshi per US dollar. Throws only when no rate was ever fetched.
   */
  async getRate(): Promise<number> {
    if (this.rate > 0 && this.now() - this.lastUpdate < this.maxAgeMs) {
      return this.rate;
    }

    try {
      const body = await getJson(this.url, this.timeoutMs);
      const btcusd = Number(body.last);
      if (!Number.isFinite(btcusd) || btcusd <= 0) {
        throw new Error(`ticker returned invalid price: ${String(body.last)}`);
      }

      this.rate = MSAT_PER_BTC / btcusd;
      this.lastUpdate = this.now();
      return this.rate;
    } catch (error) {
      if (this.rate > 0) {
        this.logger.warn('Dollar rate refresh failed, using cached rate', errorMeta(error));
        return this.rate;
      }
      throw error;
    }
  }

  async formatDollarPrice(msats: number): Promise<string> {
    try {
      const rate = await this.getRate();
      return `${(msats / rate).toFixed(2)} USD`;
    } catch (error) {
      this.logger.warn('Dollar rate unavailable', errorMeta(error));
      return '~ USD';
    }
  }
}
