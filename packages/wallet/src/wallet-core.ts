/**
 * Wallet core assembly
 *
 * Builds the shared registry objects (broker, rate cache, task group) once
 * and hands them to the flows. The chat transport and the account backend
 * are supplied by the embedding bot.
 */

import type { Server } from 'http';
import type express from 'express';
import { Logger, errorMeta, type ChatTransport, type Tracker, type WalletBackend } from '@lnurl-wallet/core';
import { createApp } from './app';
import type { WalletConfig } from './lib/config';
import { DatabaseClient } from './lib/db-client';
import { RedisReplyStore } from './lib/redis-client';
import { TaskGroup } from './lib/tasks';
import { decodeInvoice, type InvoiceDecoder } from './lnurl/invoice';
import { LNURLHandler } from './flows/handler';
import type { FlowContext } from './flows/context';
import { DollarRateService } from './services/dollar-rate';
import { LedgerService } from './services/ledger';
import { PaymentBroker } from './services/payment-broker';

export interface WalletCollaborators {
  transport: ChatTransport;
  wallet: WalletBackend;
  tracker?: Tracker;
}

export interface WalletCoreOptions {
  logger?: Logger;
  decodeInvoice?: InvoiceDecoder;
}

export interface WalletCore {
  handler: LNURLHandler;
  broker: PaymentBroker;
  ledger: LedgerService;
  rates: DollarRateService;
  tasks: TaskGroup;
  db: DatabaseClient;
  replies: RedisReplyStore;
  app: express.Application;
  start(): Promise<void>;
  stop(): Promise<void>;
}

const noopTracker: Tracker = { track: () => undefined };

export function createWalletCore(
  config: WalletConfig,
  collaborators: WalletCollaborators,
  options: WalletCoreOptions = {}
): WalletCore {
  const logger =
    options.logger ?? new Logger({ serviceName: 'lnurl-wallet', level: config.logLevel, format: config.logFormat });

  const db = new DatabaseClient(config.databaseUrl);
  const replies = new RedisReplyStore({ url: config.redisUrl }, logger.child({ component: 'redis' }));
  const broker = new PaymentBroker(logger.child({ component: 'broker' }));
  const tasks = new TaskGroup(logger.child({ component: 'tasks' }));
  const rates = new DollarRateService(
    { url: config.dollarRateUrl, timeoutMs: config.httpTimeoutMs },
    logger.child({ component: 'rates' })
  );
  const ledger = new LedgerService(db, config.clearingAccountId, logger.child({ component: 'ledger' }));

  const ctx: FlowContext = {
    transport: collaborators.transport,
    wallet: collaborators.wallet,
    tracker: collaborators.tracker ?? noopTracker,
    replies,
    broker,
    rates,
    tasks,
    logger: logger.child({ component: 'lnurl' }),
    decodeInvoice: options.decodeInvoice ?? decodeInvoice,
    authSecret: config.authSecret,
    httpTimeoutMs: config.httpTimeoutMs,
    confirmationTimeoutMs: config.confirmationTimeoutMs,
    successActionDelayMs: config.successActionDelayMs,
  };

  const handler = new LNURLHandler(ctx);
  const app = createApp({ broker, db, redis: replies, hookSecret: config.paymentHookSecret, logger });
  let server: Server | undefined;

  return {
    handler,
    broker,
    ledger,
    rates,
    tasks,
    db,
    replies,
    app,

    async start() {
      await db.connect();
      await replies.connect();
      await new Promise<void>((resolve) => {
        server = app.listen(config.port, () => resolve());
      });
      logger.info('Wallet core listening', { port: config.port });
    },

    async stop() {
      const running = server;
      server = undefined;
      if (running) {
        await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
      }
      if (tasks.size > 0) {
        logger.warn('Stopping with payment confirmations still pending', { pending: tasks.size });
      }
      broker.close();
      await tasks.idle();
      try {
        await replies.close();
      } catch (error) {
        logger.warn('Failed to close redis', errorMeta(error));
      }
      await db.disconnect();
    },
  };
}
