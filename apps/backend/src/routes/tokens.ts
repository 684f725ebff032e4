import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import { parseTransactionOverrides } from '@token-relay/chain-adapter';
import { AddressSchema, AmountSchema, ConfigurationError, formatZodIssues } from '@token-relay/core';
import type { ChainServices } from '../services/chain.js';
import { serializeBalance } from '../utils/serialize.js';
import { chainUnavailable } from './chain-unavailable.js';

const transferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
  overrides: z.unknown().optional(),
});

function parseAddress(value: string | undefined, field: string) {
  const result = AddressSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${field} address: ${value ?? ''}`, 'INVALID_ADDRESS');
  }
  return result.data;
}

export function createTokenRoutes(chain: ChainServices | undefined): Router {
  const router = express.Router();
  if (!chain) {
    router.use(chainUnavailable);
    return router;
  }
  const services = chain;

  router.get('/:token/balance/:holder', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = parseAddress(req.params.token, 'token');
      const holder = parseAddress(req.params.holder, 'holder');

      const balance = await services.tokens.balanceOf(token, holder);
      res.json({ success: true, balance: serializeBalance(balance) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:token/transfer', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = parseAddress(req.params.token, 'token');
      const body = transferSchema.safeParse(req.body);
      if (!body.success) {
        throw new ConfigurationError(`Invalid transfer request: ${formatZodIssues(body.error)}`, 'INVALID_REQUEST');
      }

      const { to, data, ...overrides } = parseTransactionOverrides(body.data.overrides);
      if (to !== undefined || data !== undefined) {
        throw new ConfigurationError('Transfer overrides cannot set "to" or "data"', 'INVALID_TRANSACTION_FIELD');
      }

      const hash = await services.tokens.transfer({ token, to: body.data.to, amount: body.data.amount, overrides });
      res.status(202).json({ success: true, hash });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
