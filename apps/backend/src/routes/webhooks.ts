import express, { type Router } from 'express';
import { createHmac, timingSafeEqual } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import { ConnectivityError, createLogger, errorMessage } from '@token-relay/core';
import {
  BlockchainWebhookPayloadSchema,
  type BlockchainEventPublisher,
  type BlockchainWebhookPayload,
} from '@token-relay/queue';

const logger = createLogger('webhooks');

export const SIGNATURE_HEADER = 'x-alchemy-signature';
export const DEFAULT_PUBLISH_TIMEOUT_MS = 5000;

export interface WebhookRouteOptions {
  publish: BlockchainEventPublisher;
  /** When set, requests must carry a matching HMAC-SHA256 of the raw body */
  signingKey?: string;
  /** The provider is answered with `queued: false` once an enqueue takes longer than this */
  publishTimeoutMs?: number;
}

export function signWebhookBody(body: string, signingKey: string): string {
  return createHmac('sha256', signingKey).update(body, 'utf8').digest('hex');
}

function hasValidSignature(body: string, signature: string | undefined, signingKey: string): boolean {
  if (!signature) return false;
  const expected = Buffer.from(signWebhookBody(body, signingKey), 'utf8');
  const received = Buffer.from(signature.trim().toLowerCase(), 'utf8');
  return expected.length === received.length && timingSafeEqual(expected, received);
}

async function publishWithin(
  publish: BlockchainEventPublisher,
  payload: BlockchainWebhookPayload,
  timeoutMs: number
): Promise<string> {
  const timer = new AbortController();
  try {
    return await Promise.race([
      publish(payload),
      delay(timeoutMs, undefined, { signal: timer.signal }).then((): never => {
        throw new ConnectivityError(`Enqueue did not finish within ${timeoutMs}ms`);
      }),
    ]);
  } finally {
    timer.abort();
  }
}

export function createWebhookRoutes(options: WebhookRouteOptions): Router {
  const router = express.Router();

  const publishTimeoutMs = options.publishTimeoutMs ?? DEFAULT_PUBLISH_TIMEOUT_MS;

  // Raw text, with or without a content type: the signature covers the exact bytes
  router.use(express.text({ type: () => true, limit: '1mb' }));

  router.post('/blockchain-events', async (req, res) => {
    const body = typeof req.body === 'string' ? req.body : '';

    if (options.signingKey && !hasValidSignature(body, req.get(SIGNATURE_HEADER), options.signingKey)) {
      logger.warn('Rejected webhook with an invalid signature', { ip: req.ip });
      res.status(401).json({ success: false, error: 'Invalid webhook signature', errorCode: 'INVALID_SIGNATURE' });
      return;
    }

    // Unusable bodies are still acknowledged with 200
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      logger.warn('Invalid JSON in webhook body', { error: errorMessage(error), length: body.length });
      res.json({ success: true, queued: false });
      return;
    }

    const parsed = BlockchainWebhookPayloadSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Unexpected webhook payload shape', { issues: parsed.error.issues.length });
      res.json({ success: true, queued: false });
      return;
    }

    const { network, data } = parsed.data.event;
    if (data.block.logs.length === 0) {
      logger.debug('Webhook carried no logs', { network });
      res.json({ success: true, queued: false });
      return;
    }

    try {
      const jobId = await publishWithin(options.publish, parsed.data, publishTimeoutMs);
      logger.info('Webhook events queued', { network, logCount: data.block.logs.length, jobId });
      res.json({ success: true, queued: true, jobId });
    } catch (error) {
      logger.error('Failed to queue webhook events', { network, error: errorMessage(error) });
      res.json({ success: true, queued: false });
    }
  });

  return router;
}
