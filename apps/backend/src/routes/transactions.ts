import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { ConfigurationError, TransactionHashSchema } from '@token-relay/core';
import type { ChainServices } from '../services/chain.js';
import { serializeReceipt } from '../utils/serialize.js';
import { chainUnavailable } from './chain-unavailable.js';

export function createTransactionRoutes(chain: ChainServices | undefined): Router {
  const router = express.Router();
  if (!chain) {
    router.use(chainUnavailable);
    return router;
  }
  const services = chain;

  // Single lookup, no waiting: a pending transaction is a 404 the client can retry
  router.get('/:hash/receipt', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const hash = TransactionHashSchema.safeParse(req.params.hash);
      if (!hash.success) {
        throw new ConfigurationError(`Invalid transaction hash: ${req.params.hash ?? ''}`, 'INVALID_HASH');
      }

      const receipt = await services.connector.getTransactionReceipt(hash.data);
      if (!receipt) {
        res.status(404).json({
          success: false,
          error: 'No receipt yet; the transaction is pending or unknown',
          errorCode: 'RECEIPT_NOT_FOUND',
        });
        return;
      }

      res.json({ success: true, receipt: serializeReceipt(receipt) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
