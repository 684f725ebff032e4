import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { BlockchainEventPublisher } from '@token-relay/queue';
import { createErrorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createTokenRoutes } from './routes/tokens.js';
import { createTransactionRoutes } from './routes/transactions.js';
import { createWebhookRoutes } from './routes/webhooks.js';
import type { ChainServices } from './services/chain.js';

export interface AppDependencies {
  chain?: ChainServices;
  publishEvents: BlockchainEventPublisher;
  queueEnabled?: boolean;
  webhookSigningKey?: string;
  webhookPublishTimeoutMs?: number;
  corsOrigin?: string;
  isProduction?: boolean;
  rateLimit?: { windowMs: number; limit: number };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));

  // Webhooks parse their own raw body and are exempt from the client rate limit
  app.use(
    '/api/webhooks',
    createWebhookRoutes({
      publish: deps.publishEvents,
      signingKey: deps.webhookSigningKey,
      publishTimeoutMs: deps.webhookPublishTimeoutMs,
    })
  );

  const limiter = rateLimit({
    windowMs: deps.rateLimit?.windowMs ?? 15 * 60 * 1000,
    limit: deps.rateLimit?.limit ?? 100,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
  });
  app.use('/api/', limiter);

  app.use(express.json());

  app.use('/api/health', createHealthRoutes(deps.chain, { queueEnabled: deps.queueEnabled ?? false }));
  app.use('/api/tokens', createTokenRoutes(deps.chain));
  app.use('/api/transactions', createTransactionRoutes(deps.chain));

  app.use((req, res) => {
    res.status(404).json({ success: false, error: `Cannot ${req.method} ${req.path}`, errorCode: 'NOT_FOUND' });
  });

  app.use(createErrorHandler({ isProduction: deps.isProduction ?? false }));

  return app;
}
