/**
 * lnurl-withdraw (LUD-03)
 *
 * The server sets the amount, so the invoice is made for the full
 * maxWithdrawable and skips the per-invoice size cap. Completion is the
 * server's job once it accepts the invoice; nothing waits on it here.
 */

import { notificationForError, type LNURLWithdrawParams, type WalletUser } from '@lnurl-wallet/core';
import { callLNURL, withQuery } from '../lib/http';
import { notify, type FlowContext, type HandleOptions } from './context';

export class WithdrawFlow {
  constructor(private ctx: FlowContext) {}

  async run(user: WalletUser, params: LNURLWithdrawParams, opts: HandleOptions = {}): Promise<void> {
    let bolt11: string;
    try {
      const made = await this.ctx.wallet.makeInvoice(user, {
        msatoshi: params.maxWithdrawable,
        description: params.defaultDescription,
        messageId: opts.promptMessageId,
        ignoreInvoiceSizeLimit: true,
        skipQR: true,
      });
      bolt11 = made.bolt11;
    } catch (error) {
      await notify(this.ctx, user, notificationForError(error));
      return;
    }

    this.ctx.logger.debug('Sending invoice to lnurl callback', {
      userId: user.id,
      host: params.callbackHost,
      bolt11,
      k1: params.k1,
    });

    try {
      await callLNURL(withQuery(params.callback, { k1: params.k1, pr: bolt11 }), this.ctx.httpTimeoutMs);
    } catch (error) {
      await notify(this.ctx, user, notificationForError(error));
      return;
    }

    this.ctx.tracker.track(user, 'lnurl-withdraw', { sats: params.maxWithdrawable / 1000 });
  }
}
