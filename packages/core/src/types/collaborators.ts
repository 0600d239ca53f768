/**
 * External collaborators
 * Chat transport, wallet/account backend, tracking and pending-reply cache
 */

import type { Notification } from './notification';

export interface WalletUser {
  id: number;
  locale?: string;
}

export interface SentMessage {
  messageId: number;
}

export interface SendOptions {
  replyTo?: number;
}

/** Delivers structured notifications to a user's chat */
export interface ChatTransport {
  send(user: WalletUser, notification: Notification, options?: SendOptions): Promise<SentMessage>;
  deleteMessage(user: WalletUser, messageId: number): Promise<void>;
}

export interface MakeInvoiceArgs {
  msatoshi: number;
  description: string;
  messageId?: number;
  /** Server-set amounts (lnurl-withdraw) bypass the per-invoice cap */
  ignoreInvoiceSizeLimit?: boolean;
  skipQR?: boolean;
}

export interface MadeInvoice {
  bolt11: string;
  paymentHash: string;
}

/** Account capabilities the LNURL flows rely on */
export interface WalletBackend {
  makeInvoice(user: WalletUser, args: MakeInvoiceArgs): Promise<MadeInvoice>;
  /** Submits the payment; resolves with the payment hash once accepted */
  payInvoice(user: WalletUser, bolt11: string, messageId?: number): Promise<string>;
}

export interface Tracker {
  track(user: WalletUser, event: string, properties: Record<string, unknown>): void;
}

/** Pending-reply cache: `reply:<userId>:<messageId>` keys with TTL */
export interface ReplyStore {
  put(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  delete(key: string): Promise<void>;
}
