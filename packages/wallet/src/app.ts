/**
 * HTTP surface: health and payment-engine hooks
 */

import express from 'express';
import { Logger } from '@lnurl-wallet/core';
import { createHealthRoutes, type ConnectionProbe } from './routes/health';
import { createPaymentHookRoutes } from './routes/payments';
import type { PaymentBroker } from './services/payment-broker';

export interface AppDeps {
  broker: PaymentBroker;
  db: ConnectionProbe;
  redis: ConnectionProbe;
  hookSecret?: string;
  logger?: Logger;
}

export function createApp(deps: AppDeps): express.Application {
  const app = express();
  app.use(express.json());

  app.use(createHealthRoutes(deps.broker, deps.db, deps.redis));
  app.use('/hooks', createPaymentHookRoutes(deps.broker, deps.hookSecret, deps.logger));

  app.use((req, res) => {
    res.status(404).json({ error: 'NOT_FOUND', message: `${req.method} ${req.path} not found` });
  });

  return app;
}
