/**
 * Outbound notification contract
 *
 * The chat transport renders each kind from its named fields; nothing here
 * is a final display string.
 */

export interface ErrorNotification {
  kind: 'error';
  err: string;
}

export interface LNURLErrorNotification {
  kind: 'lnurl-error';
  host: string;
  reason: string;
}

export interface AuthSuccessNotification {
  kind: 'lnurl-auth-success';
  host: string;
  publicKey: string;
}

export type PayPromptChoice =
  | { type: 'confirm'; msatoshi: number } // confirm/cancel buttons
  | { type: 'amount-input' }; // force a free-text reply

export interface PayPromptNotification {
  kind: 'lnurl-pay-prompt';
  domain: string;
  text: string;
  fixedAmount: number; // sats
  min: number; // sats
  max: number; // sats
  usd: string;
  image?: { bytes: Buffer; mimeType: string };
  choice: PayPromptChoice;
}

export interface ProcessingNotification {
  kind: 'processing';
  invoice: string;
}

export interface PayMetadataNotification {
  kind: 'lnurl-pay-metadata';
  domain: string;
  lnurl: string;
  hash: string;
  hashFirstChars: string;
  document: { filename: string; content: string; mimeType: string };
}

export interface PaySuccessNotification {
  kind: 'lnurl-pay-success';
  domain: string;
  text: string;
  url?: string;
  decipherError?: string;
}

export interface UnsupportedNotification {
  kind: 'lnurl-unsupported';
}

export interface QRFailureNotification {
  kind: 'qr-code-fail';
  err: string;
}

export type Notification =
  | ErrorNotification
  | LNURLErrorNotification
  | AuthSuccessNotification
  | PayPromptNotification
  | ProcessingNotification
  | PayMetadataNotification
  | PaySuccessNotification
  | UnsupportedNotification
  | QRFailureNotification;

export type NotificationKind = Notification['kind'];
