/**
 * Payment hook routes
 * The payment-engine integration reports settled payments here
 */

import { Router } from 'express';
import { Logger, errorMessage } from '@lnurl-wallet/core';
import { calculatePreimageHash } from '../lnurl/codec';
import { hookAuthMiddleware } from '../middleware/hook-auth';
import type { PaymentBroker } from '../services/payment-broker';

const HEX32 = /^[0-9a-f]{64}$/i;

export function createPaymentHookRoutes(
  broker: PaymentBroker,
  hookSecret: string | undefined,
  logger: Logger = new Logger({ serviceName: 'lnurl-wallet:hooks' })
): Router {
  const router = Router();

  router.post('/payments/:hash/settled', hookAuthMiddleware(hookSecret), (req, res) => {
    try {
      const hash = req.params.hash.toLowerCase();
      const preimage: unknown = req.body?.preimage;

      if (!HEX32.test(hash)) {
        return res.status(400).json({ error: 'INVALID_REQUEST', message: 'hash must be 32 bytes of hex' });
      }
      if (typeof preimage !== 'string' || !HEX32.test(preimage)) {
        return res.status(400).json({ error: 'INVALID_REQUEST', message: 'preimage must be 32 bytes of hex' });
      }
      if (calculatePreimageHash(preimage) !== hash) {
        return res.status(422).json({ error: 'PREIMAGE_MISMATCH', message: 'preimage does not hash to payment hash' });
      }

      const delivered = broker.resolvePayment(hash, preimage.toLowerCase());
      logger.info('Payment settled', { hash, delivered });
      res.json({ ok: true, delivered });
    } catch (error) {
      res.status(500).json({ error: 'INTERNAL_ERROR', message: errorMessage(error) });
    }
  });

  return router;
}
