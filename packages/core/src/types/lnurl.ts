/**
 * LNURL Type Definitions
 * LUD-04 (auth), LUD-03 (withdraw), LUD-06/09/10 (pay + success actions)
 *
 * All amounts are millisatoshi unless a field name says otherwise.
 */

export interface LNURLAuthParams {
  tag: 'login';
  host: string;
  k1: string; // 32-byte challenge, hex
  callback: string;
}

export interface LNURLWithdrawParams {
  tag: 'withdrawRequest';
  callback: string;
  callbackHost: string;
  k1: string;
  minWithdrawable: number;
  maxWithdrawable: number;
  defaultDescription: string;
}

export type MetadataEntry = [type: string, value: string];

export interface PayMetadata {
  /** Exact metadata string as received; hashed for the invoice description_hash */
  encoded: string;
  entries: MetadataEntry[];
}

export interface LNURLPayParams {
  tag: 'payRequest';
  callback: string;
  callbackHost: string;
  minSendable: number;
  maxSendable: number;
  metadata: PayMetadata;
  commentAllowed: number;
}

export interface MessageSuccessAction {
  tag: 'message';
  message: string;
}

export interface UrlSuccessAction {
  tag: 'url';
  description: string;
  url: string;
}

export interface AesSuccessAction {
  tag: 'aes';
  description: string;
  ciphertext: string; // base64
  iv: string; // base64
}

export type SuccessAction = MessageSuccessAction | UrlSuccessAction | AesSuccessAction;

export interface LNURLPayValues {
  tag: 'payRequest2';
  pr: string;
  successAction: SuccessAction | null;
  status: 'OK' | 'ERROR';
  reason: string;
  disposable: boolean;
}

/** Exactly one variant per handshake */
export type LNURLParams =
  | LNURLAuthParams
  | LNURLWithdrawParams
  | LNURLPayParams
  | LNURLPayValues;

/** Decoded bolt11 fields needed to validate a pay callback invoice */
export interface Invoice {
  bolt11: string;
  msatoshi: number;
  /** Hex, present only when the invoice commits to hashed metadata */
  descriptionHash?: string;
  paymentHash: string;
}

/** Stored between the amount prompt and the user's confirmation */
export interface PendingPayRequest {
  type: 'lnurlpay';
  metadata: string;
  url: string;
  lnurl: string;
}
