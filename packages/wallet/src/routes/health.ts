/**
 * Health Check Routes
 */

import { Router } from 'express';
import type { PaymentBroker } from '../services/payment-broker';

export interface ConnectionProbe {
  isConnected(): Promise<boolean>;
}

export function createHealthRoutes(broker: PaymentBroker, db: ConnectionProbe, redis: ConnectionProbe): Router {
  const router = Router();

  router.get('/health', async (req, res) => {
    const [dbOk, redisOk] = await Promise.all([
      db.isConnected().catch(() => false),
      redis.isConnected().catch(() => false),
    ]);

    const healthy = dbOk && redisOk;
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      connections: { db: dbOk, redis: redisOk },
      broker: { pendingPayments: broker.size },
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
