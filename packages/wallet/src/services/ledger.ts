/**
 * Ledger checks for the wallet
 *
 * The clearing (proxy) account routes funds between users and the node;
 * its credits minus fees must always net to zero. Checks run inside the
 * caller's transaction so they see one consistent snapshot.
 */

import { LedgerInvariantError, Logger } from '@lnurl-wallet/core';
import type { Queryable, TransactionRunner } from '../lib/db-client';

function toBigInt(value: unknown, column: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return BigInt(value.trim());
  throw new Error(`unexpected ${column} value from ledger: ${String(value)}`);
}

export class LedgerService {
  constructor(
    private db: Queryable & TransactionRunner,
    private clearingAccountId: number,
    private logger: Logger = new Logger({ serviceName: 'lnurl-wallet:ledger' })
  ) {}

  /**
   * Net balance of the clearing account: sum(amount) - sum(fees).
   */
  async clearingBalance(tx: Queryable): Promise<bigint> {
    const result = await tx.query(
      `SELECT coalesce(sum(amount), 0)::numeric(13) AS credits,
              coalesce(sum(fees), 0)::numeric(13) AS fees
       FROM lightning.account_txn
       WHERE account_id = $1`,
      [this.clearingAccountId]
    );

    const row = result.rows[0];
    if (!row) return 0n;
    return toBigInt(row.credits, 'credits') - toBigInt(row.fees, 'fees');
  }

  /**
   * Throws LedgerInvariantError when the clearing account does not net
   * to zero. Must be called with a transaction client.
   */
  async checkClearingBalance(tx: Queryable): Promise<void> {
    const balance = await this.clearingBalance(tx);
    if (balance !== 0n) {
      this.logger.error('Clearing account balance is not zero', {
        accountId: this.clearingAccountId,
        balance: balance.toString(),
      });
      throw new LedgerInvariantError(this.clearingAccountId, balance);
    }
  }

  /**
   * Run `fn` in one transaction, checking the clearing account before and
   * after it. A violation rolls the whole transaction back.
   *
   * Settlement checkpoint: the WalletBackend's payInvoice and makeInvoice
   * run their ledger writes through this (reach it as `WalletCore.ledger`).
   */
  async withClearingCheck<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      await this.checkClearingBalance(tx);
      const result = await fn(tx);
      await this.checkClearingBalance(tx);
      return result;
    });
  }

  /**
   * Balance in millisatoshi. An account with no ledger row has 0n;
   * query failures propagate to the caller.
   */
  async getBalance(accountId: number, tx: Queryable = this.db): Promise<bigint> {
    const result = await tx.query(
      'SELECT balance::numeric(13) AS balance FROM lightning.balance WHERE account_id = $1',
      [accountId]
    );

    const row = result.rows[0];
    return row ? toBigInt(row.balance, 'balance') : 0n;
  }
}
