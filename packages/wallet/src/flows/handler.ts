/**
 * LNURL dispatcher
 *
 * Fetches params for LNURL text and routes each variant to its flow.
 */

import { LNURLUnsupportedError, notificationForError, type LNURLParams, type WalletUser } from '@lnurl-wallet/core';
import { fetchLNURLParams } from '../lnurl/params';
import { findBolt11InText, findLNURLInText, isLightningAddress } from '../lnurl/codec';
import { AuthFlow } from './auth';
import { notify, type FlowContext, type HandleOptions } from './context';
import { PayFlow } from './pay';
import { WithdrawFlow } from './withdraw';

export type ScanResult =
  | { type: 'lnurl'; lnurl: string }
  | { type: 'bolt11'; bolt11: string }
  | { type: 'none' };

export class LNURLHandler {
  readonly auth: AuthFlow;
  readonly withdraw: WithdrawFlow;
  readonly pay: PayFlow;

  constructor(private ctx: FlowContext) {
    this.auth = new AuthFlow(ctx);
    this.withdraw = new WithdrawFlow(ctx);
    this.pay = new PayFlow(ctx);
  }

  async handle(user: WalletUser, text: string, opts: HandleOptions = {}): Promise<void> {
    let params: LNURLParams;
    try {
      params = await fetchLNURLParams(text, { timeoutMs: this.ctx.httpTimeoutMs });
    } catch (error) {
      const options = error instanceof LNURLUnsupportedError ? { replyTo: opts.promptMessageId } : undefined;
      await notify(this.ctx, user, notificationForError(error, 'failed to fetch lnurl params'), options);
      return;
    }

    this.ctx.logger.debug('Got lnurl params', { userId: user.id, tag: params.tag });
    await this.dispatch(user, params, text, opts);
  }

  async dispatch(user: WalletUser, params: LNURLParams, text: string, opts: HandleOptions = {}): Promise<void> {
    switch (params.tag) {
      case 'login':
        await this.auth.run(user, params, opts);
        return;
      case 'withdrawRequest':
        await this.withdraw.run(user, params, opts);
        return;
      case 'payRequest':
        await this.pay.negotiate(user, params, text, opts);
        return;
      default:
        await notify(this.ctx, user, { kind: 'lnurl-unsupported' }, { replyTo: opts.promptMessageId });
    }
  }

  /**
   * Route text read from a QR code or pasted by the user. A bolt11
   * invoice is handed back to the caller to pay; LNURLs start a flow.
   */
  async handleScannedText(user: WalletUser, text: string, opts: HandleOptions = {}): Promise<ScanResult> {
    const trimmed = text.trim();
    const bolt11 = findBolt11InText(trimmed);
    if (bolt11) {
      return { type: 'bolt11', bolt11 };
    }

    const lnurl = findLNURLInText(trimmed) ?? (isLightningAddress(trimmed) ? trimmed : null);
    if (lnurl) {
      await this.handle(user, lnurl, opts);
      return { type: 'lnurl', lnurl };
    }

    await notify(this.ctx, user, { kind: 'qr-code-fail', err: 'no lnurl or invoice found' }, { replyTo: opts.promptMessageId });
    return { type: 'none' };
  }
}
