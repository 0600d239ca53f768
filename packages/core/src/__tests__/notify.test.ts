import { describe, it, expect } from 'vitest';
import { notificationForError } from '../notify';
import {
  LNURLErrorResponse,
  LNURLUnsupportedError,
  LedgerInvariantError,
  ProtocolViolationError,
  TransportError,
  WalletError,
} from '../errors';

describe('notificationForError', () => {
  it('keeps host and reason for server rejections', () => {
    expect(notificationForError(new LNURLErrorResponse('pay.example.com', 'no balance'))).toEqual({
      kind: 'lnurl-error',
      host: 'pay.example.com',
      reason: 'no balance',
    });
  });

  it('maps unsupported subtypes to the unsupported notification', () => {
    expect(notificationForError(new LNURLUnsupportedError('channelRequest'))).toEqual({
      kind: 'lnurl-unsupported',
    });
  });

  it('prefixes generic errors when asked', () => {
    const err = new TransportError('Got status 502 on callback https://x.test/cb', 'https://x.test/cb', 502);
    expect(notificationForError(err, 'failed to fetch lnurl params')).toEqual({
      kind: 'error',
      err: 'failed to fetch lnurl params: Got status 502 on callback https://x.test/cb',
    });
  });

  it('names the violated invariant', () => {
    const err = new ProtocolViolationError('Got invoice with wrong amount.', 'amount');
    expect(notificationForError(err)).toEqual({ kind: 'error', err: 'Got invoice with wrong amount.' });
  });

  it('handles non-Error throwables', () => {
    expect(notificationForError('boom')).toEqual({ kind: 'error', err: 'boom' });
  });
});

describe('error classes', () => {
  it('carry code and retryable flags', () => {
    const transport = new TransportError('timeout', 'https://x.test', undefined);
    expect(transport).toBeInstanceOf(WalletError);
    expect(transport.code).toBe('TRANSPORT_ERROR');
    expect(transport.retryable).toBe(true);

    const ledger = new LedgerInvariantError(99, 1n);
    expect(ledger.code).toBe('LEDGER_INVARIANT');
    expect(ledger.message).toBe("clearing account 99 balance isn't 0 (got 1)");
  });
});
