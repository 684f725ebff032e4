import express, { type Router } from 'express';
import { describeEndpoint } from '@token-relay/chain-adapter';
import type { ChainServices } from '../services/chain.js';

export function createHealthRoutes(chain: ChainServices | undefined, options: { queueEnabled: boolean }): Router {
  const router = express.Router();

  router.get('/', async (_req, res) => {
    const connected = chain ? await chain.connector.isConnected() : false;

    res.json({
      success: true,
      status: !chain || connected ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      network: chain ? describeEndpoint(chain.connector.endpoint) : null,
      services: {
        chain: connected,
        signer: chain ? chain.orchestrator.address : null,
        queue: options.queueEnabled,
      },
    });
  });

  return router;
}
