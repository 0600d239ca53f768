/**
 * lnurl-pay (LUD-06)
 *
 * negotiate: first-stage params -> prompt (or fast path)
 * settle: callback -> invoice checks -> payment -> confirmation
 * resume: pending reply from a prompt -> settle
 */

import {
  PaymentSubmissionError,
  ProtocolViolationError,
  TimeoutError,
  errorMessage,
  errorMeta,
  notificationForError,
  type Invoice,
  type LNURLPayParams,
  type LNURLPayValues,
  type PendingPayRequest,
  type WalletUser,
} from '@lnurl-wallet/core';
import { callLNURL, isJsonObject, withQuery } from '../lib/http';
import { replyKey } from '../lib/redis-client';
import { calculateHash, encodeLNURL } from '../lnurl/codec';
import { metadataDescription, metadataImage } from '../lnurl/metadata';
import { payValues } from '../lnurl/params';
import { resolveSuccessAction } from '../lnurl/success-action';
import type { PaymentWaiter } from '../services/payment-broker';
import { notify, sleep, type FlowContext, type HandleOptions } from './context';

/** Prompts stay answerable for an hour */
export const PENDING_REPLY_TTL_SECONDS = 3600;

/** Fixed amounts within this many msat above the threshold skip the prompt */
export const FAST_PATH_GRACE_MSAT = 3000;

export interface SettleInput {
  user: WalletUser;
  msats: number;
  callback: string;
  /** Encoded metadata exactly as the service sent it */
  metadata: string;
  lnurl: string;
  /** Message the outcome replies to */
  messageId?: number;
}

export type SettleResult = { status: 'failed' } | { status: 'submitted'; paymentHash: string };

export type NegotiateResult =
  | { status: 'prompted'; messageId: number }
  | { status: 'prompt-failed' }
  | SettleResult;

interface Confirmation {
  user: WalletUser;
  waiter: PaymentWaiter;
  invoice: Invoice;
  values: LNURLPayValues;
  domain: string;
  encodedLnurl: string;
  metadata: string;
  messageId?: number;
}

function fixedAmountOf(params: LNURLPayParams): number {
  return params.maxSendable === params.minSendable ? params.maxSendable : 0;
}

/**
 * Whether a fixed-price offer may be paid without asking.
 * Variable-amount offers always prompt.
 */
export function shouldPayWithoutPrompt(params: LNURLPayParams, threshold?: number): boolean {
  const fixed = fixedAmountOf(params);
  return fixed > 0 && threshold !== undefined && fixed < threshold + FAST_PATH_GRACE_MSAT;
}

/**
 * Reject an invoice that does not commit to the negotiated metadata and amount.
 */
export function checkInvoice(invoice: Invoice, metadata: string, msats: number): void {
  if (invoice.descriptionHash !== calculateHash(metadata)) {
    throw new ProtocolViolationError('Got invoice with wrong description_hash', 'description_hash');
  }
  if (invoice.msatoshi !== msats) {
    throw new ProtocolViolationError('Got invoice with wrong amount.', 'amount');
  }
}

export function parsePendingPayRequest(raw: string): PendingPayRequest | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    !isJsonObject(data) ||
    data.type !== 'lnurlpay' ||
    typeof data.metadata !== 'string' ||
    typeof data.url !== 'string' ||
    typeof data.lnurl !== 'string'
  ) {
    return null;
  }
  return { type: 'lnurlpay', metadata: data.metadata, url: data.url, lnurl: data.lnurl };
}

export class PayFlow {
  constructor(private ctx: FlowContext) {}

  async negotiate(
    user: WalletUser,
    params: LNURLPayParams,
    lnurl: string,
    opts: HandleOptions = {}
  ): Promise<NegotiateResult> {
    const fixedAmount = fixedAmountOf(params);

    this.ctx.tracker.track(user, 'lnurl-pay', {
      domain: params.callbackHost,
      fixed: fixedAmount / 1000,
      max: params.maxSendable / 1000,
      min: params.minSendable / 1000,
    });

    if (shouldPayWithoutPrompt(params, opts.payWithoutPromptIf)) {
      this.ctx.logger.debug('Paying fixed lnurl-pay amount without prompt', {
        userId: user.id,
        domain: params.callbackHost,
        msats: fixedAmount,
      });
      return this.settle({
        user,
        msats: fixedAmount,
        callback: params.callback,
        metadata: params.metadata.encoded,
        lnurl,
        messageId: opts.promptMessageId,
      });
    }

    const image = metadataImage(params.metadata);
    const sent = await notify(
      this.ctx,
      user,
      {
        kind: 'lnurl-pay-prompt',
        domain: params.callbackHost,
        text: metadataDescription(params.metadata),
        fixedAmount: fixedAmount / 1000,
        min: params.minSendable / 1000,
        max: params.maxSendable / 1000,
        usd: await this.ctx.rates.formatDollarPrice(fixedAmount || params.minSendable),
        ...(image ? { image: { bytes: image.bytes, mimeType: image.mimeType } } : {}),
        choice: fixedAmount > 0 ? { type: 'confirm', msatoshi: fixedAmount } : { type: 'amount-input' },
      },
      { replyTo: opts.promptMessageId }
    );
    if (!sent) {
      return { status: 'prompt-failed' };
    }

    const pending: PendingPayRequest = {
      type: 'lnurlpay',
      metadata: params.metadata.encoded,
      url: params.callback,
      lnurl,
    };
    try {
      await this.ctx.replies.put(replyKey(user.id, sent.messageId), JSON.stringify(pending), PENDING_REPLY_TTL_SECONDS);
    } catch (error) {
      this.ctx.logger.error('Failed to store pending lnurl-pay reply', { userId: user.id, ...errorMeta(error) });
      await notify(this.ctx, user, notificationForError(error, 'failed to store lnurl-pay prompt'));
      return { status: 'prompt-failed' };
    }

    return { status: 'prompted', messageId: sent.messageId };
  }

  /**
   * Continue from a prompt the user answered (button press or amount reply).
   */
  async resume(user: WalletUser, promptMessageId: number, msats: number, replyTo?: number): Promise<SettleResult> {
    const key = replyKey(user.id, promptMessageId);

    let raw: string | null;
    try {
      raw = await this.ctx.replies.get(key);
      if (raw !== null) {
        await this.ctx.replies.delete(key);
      }
    } catch (error) {
      await notify(this.ctx, user, notificationForError(error));
      return { status: 'failed' };
    }

    const pending = raw === null ? null : parsePendingPayRequest(raw);
    if (!pending) {
      await notify(this.ctx, user, { kind: 'error', err: 'lnurl-pay prompt expired or is invalid' });
      return { status: 'failed' };
    }

    return this.settle({
      user,
      msats,
      callback: pending.url,
      metadata: pending.metadata,
      lnurl: pending.lnurl,
      messageId: replyTo,
    });
  }

  async settle(input: SettleInput): Promise<SettleResult> {
    const { user, msats, callback, metadata, messageId } = input;

    // display and filenames only
    let encodedLnurl = input.lnurl;
    try {
      encodedLnurl = encodeLNURL(input.lnurl);
    } catch (error) {
      this.ctx.logger.debug('Could not encode lnurl, using it as given', { userId: user.id, ...errorMeta(error) });
    }

    let domain: string;
    let values: LNURLPayValues;
    let invoice: Invoice;
    try {
      const url = withQuery(callback, { amount: String(msats) });
      domain = url.host;
      values = payValues(await callLNURL(url, this.ctx.httpTimeoutMs), domain);
      this.ctx.logger.debug('Got lnurl-pay values', { userId: user.id, domain, pr: values.pr });

      invoice = this.ctx.decodeInvoice(values.pr);
      checkInvoice(invoice, metadata, msats);
    } catch (error) {
      await notify(this.ctx, user, notificationForError(error));
      return { status: 'failed' };
    }

    const processing = await notify(this.ctx, user, { kind: 'processing', invoice: values.pr });

    let paymentHash: string;
    try {
      paymentHash = await this.ctx.wallet.payInvoice(user, values.pr, messageId);
    } catch (error) {
      const failure = new PaymentSubmissionError(errorMessage(error));
      this.ctx.logger.warn('lnurl-pay submission failed', { userId: user.id, domain, ...errorMeta(failure) });
      await notify(this.ctx, user, notificationForError(failure), { replyTo: processing?.messageId });
      return { status: 'failed' };
    }

    if (processing) {
      try {
        await this.ctx.transport.deleteMessage(user, processing.messageId);
      } catch (error) {
        this.ctx.logger.warn('Failed to delete processing message', { userId: user.id, ...errorMeta(error) });
      }
    }

    const waiter = this.ctx.broker.waitForPayment(paymentHash);
    this.ctx.tasks.spawn('lnurl-pay-confirmation', () =>
      this.confirm({ user, waiter, invoice, values, domain, encodedLnurl, metadata, messageId })
    );

    return { status: 'submitted', paymentHash };
  }

  private async confirm(c: Confirmation): Promise<void> {
    let preimage: string;
    try {
      preimage = await c.waiter.receive(this.ctx.confirmationTimeoutMs);
    } catch (error) {
      const message = error instanceof TimeoutError ? 'Gave up waiting for lnurl-pay confirmation' : 'lnurl-pay confirmation not delivered';
      this.ctx.logger.warn(message, { userId: c.user.id, hash: c.waiter.hash, ...errorMeta(error) });
      return;
    }

    const hash = c.invoice.paymentHash;
    await notify(this.ctx, c.user, {
      kind: 'lnurl-pay-metadata',
      domain: c.domain,
      lnurl: c.encodedLnurl,
      hash,
      hashFirstChars: hash.slice(0, 5),
      document: { filename: `${c.encodedLnurl}.json`, content: c.metadata, mimeType: 'text/json' },
    });

    const action = c.values.successAction;
    if (!action) {
      return;
    }

    const resolved = resolveSuccessAction(action, Buffer.from(preimage, 'hex'));
    if (resolved.decipherError) {
      this.ctx.logger.warn('Failed to decrypt lnurl-pay success action', {
        userId: c.user.id,
        domain: c.domain,
        error: resolved.decipherError,
      });
    }

    // keeps the outcome last in the chat
    await sleep(this.ctx.successActionDelayMs);

    await notify(
      this.ctx,
      c.user,
      {
        kind: 'lnurl-pay-success',
        domain: c.domain,
        text: resolved.text,
        ...(resolved.url !== undefined ? { url: resolved.url } : {}),
        ...(resolved.decipherError !== undefined ? { decipherError: resolved.decipherError } : {}),
      },
      { replyTo: c.messageId }
    );
  }
}
