/**
 * Database Client
 * PostgreSQL pool with retrying connect and transaction helper
 */

import { Pool } from 'pg';
import { Logger, errorMeta } from '@lnurl-wallet/core';

/** Anything that runs parameterized SQL: the pool or a transaction client */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

/** Runs a callback inside a single transaction */
export interface TransactionRunner {
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
}

const logger = new Logger({ serviceName: 'lnurl-wallet:db' });

async function connectWithRetry(pool: Pool, retries: number = 3): Promise<void> {
  for (let i = 0; i < retries; i++) {
    try {
      const client = await pool.connect();
      client.release();
      logger.info('Database connected');
      return;
    } catch (err) {
      logger.warn(`Database connection attempt ${i + 1}/${retries} failed`, errorMeta(err));
      if (i === retries - 1) {
        throw err;
      }
      await new Promise((resolve) => setTimeout(resolve, 1000 * (i + 1)));
    }
  }
}

export class DatabaseClient implements Queryable, TransactionRunner {
  public pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
  }

  async connect(): Promise<void> {
    await connectWithRetry(this.pool);
  }

  async isConnected(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async query(text: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }> {
    return this.pool.query(text, params);
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
