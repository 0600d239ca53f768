/**
 * Wallet Error Classes
 * Error taxonomy for LNURL handshakes, settlement and ledger checks
 */

export class WalletError extends Error {
  constructor(
    message: string,
    public code: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'WalletError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed LNURL text, bech32 payload or server JSON */
export class LNURLDecodeError extends WalletError {
  constructor(message: string) {
    super(message, 'LNURL_DECODE_ERROR', false);
    this.name = 'LNURLDecodeError';
  }
}

/** DNS, connect, timeout or non-2xx failure talking to a remote endpoint */
export class TransportError extends WalletError {
  constructor(
    message: string,
    public url: string,
    public status?: number
  ) {
    super(message, 'TRANSPORT_ERROR', true);
    this.name = 'TransportError';
  }
}

/** The remote service answered `{status: "ERROR", reason}` */
export class LNURLErrorResponse extends WalletError {
  constructor(
    public host: string,
    public reason: string
  ) {
    super(`${host} returned an error: ${reason}`, 'LNURL_ERROR_RESPONSE', false);
    this.name = 'LNURLErrorResponse';
  }
}

/** A well-formed LNURL of a subtype this wallet does not handle */
export class LNURLUnsupportedError extends WalletError {
  constructor(public subtype: string) {
    super(`unsupported lnurl subtype: ${subtype}`, 'LNURL_UNSUPPORTED', false);
    this.name = 'LNURLUnsupportedError';
  }
}

/** Invoice does not match the negotiated amount or metadata */
export class ProtocolViolationError extends WalletError {
  constructor(
    message: string,
    public invariant: 'description_hash' | 'amount'
  ) {
    super(message, 'PROTOCOL_VIOLATION', false);
    this.name = 'ProtocolViolationError';
  }
}

export class PaymentSubmissionError extends WalletError {
  constructor(message: string) {
    super(message, 'PAYMENT_SUBMISSION_ERROR', false);
    this.name = 'PaymentSubmissionError';
  }
}

export class DecipherError extends WalletError {
  constructor(message: string) {
    super(message, 'DECIPHER_ERROR', false);
    this.name = 'DecipherError';
  }
}

/**
 * Clearing account does not net to zero.
 * Signals a defect in the accounting system; never shown to users.
 */
export class LedgerInvariantError extends WalletError {
  constructor(
    public accountId: number,
    public balance: bigint
  ) {
    super(`clearing account ${accountId} balance isn't 0 (got ${balance})`, 'LEDGER_INVARIANT', false);
    this.name = 'LedgerInvariantError';
  }
}

export class ConfigError extends WalletError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }
}

export class TimeoutError extends WalletError {
  constructor(message: string, retryable: boolean = true) {
    super(message, 'TIMEOUT', retryable);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
