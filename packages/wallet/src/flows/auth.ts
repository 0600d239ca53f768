/**
 * lnurl-auth (LUD-04)
 */

import { notificationForError, type LNURLAuthParams, type WalletUser } from '@lnurl-wallet/core';
import { callLNURL, withQuery } from '../lib/http';
import { deriveLinkingKey, signChallenge } from '../lnurl/auth-key';
import { notify, type FlowContext, type HandleOptions } from './context';

export class AuthFlow {
  constructor(private ctx: FlowContext) {}

  async run(user: WalletUser, params: LNURLAuthParams, opts: HandleOptions = {}): Promise<void> {
    let sig: string;
    let publicKey: string;
    try {
      const key = deriveLinkingKey(user.id, this.ctx.authSecret);
      sig = signChallenge(params.k1, key);
      publicKey = key.publicKey;
    } catch (error) {
      await notify(this.ctx, user, notificationForError(error));
      return;
    }

    try {
      await callLNURL(withQuery(params.callback, { sig, key: publicKey }), this.ctx.httpTimeoutMs);
    } catch (error) {
      await notify(this.ctx, user, notificationForError(error));
      return;
    }

    this.ctx.logger.debug('lnurl-auth accepted', { userId: user.id, host: params.host });

    if (!opts.loginSilently) {
      await notify(this.ctx, user, { kind: 'lnurl-auth-success', host: params.host, publicKey });
      this.ctx.tracker.track(user, 'lnurl-auth', { domain: params.host });
    }
  }
}
