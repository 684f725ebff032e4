import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { request, type Server } from 'node:http';
import axios, { type AxiosInstance } from 'axios';
import {
  ChainConnector,
  Credential,
  TokenOperations,
  TransactionOrchestrator,
} from '@token-relay/chain-adapter';
import { InMemoryChain, ManualClock, TEST_PRIVATE_KEY } from '@token-relay/chain-adapter/test-utils';
import type { BlockchainWebhookPayload } from '@token-relay/queue';
import { createApp, type AppDependencies } from './app.js';
import { signWebhookBody, SIGNATURE_HEADER } from './routes/webhooks.js';
import type { ChainServices } from './services/chain.js';

const TOKEN = '0x0000000000000000000000000000000000000c0c';
const RECIPIENT = '0x00000000000000000000000000000000000000bb';
const SIGNING_KEY = 'test-signing-key';

async function startApp(deps: AppDependencies): Promise<{ server: Server; http: AxiosInstance }> {
  const app = createApp(deps);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;
  const http = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
  return { server, http };
}

// node:http sends exactly the headers given, so the request can omit Content-Type
async function postRaw(
  server: Server,
  path: string,
  body: string,
  headers: Record<string, string> = {}
): Promise<{ status: number; body: string }> {
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;
  return new Promise((resolve, reject) => {
    const req = request(
      { host: '127.0.0.1', port, path, method: 'POST', headers: { 'Content-Length': Buffer.byteLength(body), ...headers } },
      (res) => {
        let text = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          text += chunk;
        });
        res.on('end', () => resolve({ status: res.statusCode ?? 0, body: text }));
      }
    );
    req.on('error', reject);
    req.end(body);
  });
}

async function stopApp(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

async function createInMemoryServices(chain: InMemoryChain): Promise<ChainServices> {
  const connector = await ChainConnector.connect(
    { chain: 'ethereum', network: 'sepolia', alchemyApiKey: 'test-key' },
    { adapterFactory: () => chain }
  );
  const orchestrator = new TransactionOrchestrator(connector, Credential.fromPrivateKey(TEST_PRIVATE_KEY), {
    clock: new ManualClock(),
  });
  return { connector, orchestrator, tokens: new TokenOperations(connector, orchestrator) };
}

const webhookBody = JSON.stringify({
  webhookId: 'wh_test',
  type: 'GRAPHQL',
  event: {
    network: 'ETH_SEPOLIA',
    data: { block: { number: 5, logs: [{ account: { address: TOKEN }, topics: ['0x01'] }] } },
  },
});

describe('webhook ingress', () => {
  let server: Server;
  let http: AxiosInstance;
  let published: BlockchainWebhookPayload[];
  let failPublish: boolean;

  beforeAll(async () => {
    ({ server, http } = await startApp({
      publishEvents: async (payload) => {
        if (failPublish) throw new Error('Connection is closed.');
        published.push(payload);
        return String(published.length);
      },
    }));
  });

  beforeEach(() => {
    published = [];
    failPublish = false;
  });

  afterAll(async () => {
    await stopApp(server);
  });

  it('queues events that carry logs', async () => {
    const response = await http.post('/api/webhooks/blockchain-events', webhookBody, {
      headers: { 'Content-Type': 'application/json' },
    });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ success: true, queued: true, jobId: '1' });
    expect(published).toHaveLength(1);
    expect(published[0]?.event.network).toBe('ETH_SEPOLIA');
  });

  it('acknowledges malformed JSON without queueing', async () => {
    const response = await http.post('/api/webhooks/blockchain-events', '{"event": ', {
      headers: { 'Content-Type': 'text/plain' },
    });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ success: true, queued: false });
    expect(published).toEqual([]);
  });

  it('acknowledges an unexpected shape without queueing', async () => {
    const response = await http.post('/api/webhooks/blockchain-events', JSON.stringify({ hello: 'world' }), {
      headers: { 'Content-Type': 'application/json' },
    });
    expect(response.data).toEqual({ success: true, queued: false });
  });

  it('does not queue an empty log list', async () => {
    const body = JSON.stringify({ event: { network: 'ETH_SEPOLIA', data: { block: { logs: [] } } } });
    const response = await http.post('/api/webhooks/blockchain-events', body, {
      headers: { 'Content-Type': 'application/json' },
    });
    expect(response.data).toEqual({ success: true, queued: false });
    expect(published).toEqual([]);
  });

  it('still answers 200 when the queue is down', async () => {
    failPublish = true;
    const response = await http.post('/api/webhooks/blockchain-events', webhookBody, {
      headers: { 'Content-Type': 'application/json' },
    });
    expect(response.status).toBe(200);
    expect(response.data).toEqual({ success: true, queued: false });
  });
});

describe('webhook signatures', () => {
  let server: Server;
  let http: AxiosInstance;

  beforeAll(async () => {
    ({ server, http } = await startApp({
      publishEvents: async () => 'job-1',
      webhookSigningKey: SIGNING_KEY,
    }));
  });

  afterAll(async () => {
    await stopApp(server);
  });

  it('accepts a body signed with the key', async () => {
    const response = await http.post('/api/webhooks/blockchain-events', webhookBody, {
      headers: { 'Content-Type': 'application/json', [SIGNATURE_HEADER]: signWebhookBody(webhookBody, SIGNING_KEY) },
    });
    expect(response.status).toBe(200);
    expect(response.data).toEqual({ success: true, queued: true, jobId: 'job-1' });
  });

  it('verifies a body sent without a content type', async () => {
    const response = await postRaw(server, '/api/webhooks/blockchain-events', webhookBody, {
      [SIGNATURE_HEADER]: signWebhookBody(webhookBody, SIGNING_KEY),
    });
    expect(response.status).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ success: true, queued: true, jobId: 'job-1' });
  });

  it('rejects a missing or wrong signature', async () => {
    const unsigned = await http.post('/api/webhooks/blockchain-events', webhookBody, {
      headers: { 'Content-Type': 'application/json' },
    });
    const wrong = await http.post('/api/webhooks/blockchain-events', webhookBody, {
      headers: { 'Content-Type': 'application/json', [SIGNATURE_HEADER]: signWebhookBody(webhookBody, 'other-key') },
    });

    expect(unsigned.status).toBe(401);
    expect(wrong.status).toBe(401);
    expect(wrong.data.errorCode).toBe('INVALID_SIGNATURE');
  });
});

describe('webhook delivery limits', () => {
  it('answers when the queue never settles', async () => {
    const { server, http } = await startApp({
      publishEvents: () => new Promise<string>(() => undefined),
      webhookPublishTimeoutMs: 50,
    });
    try {
      const response = await http.post('/api/webhooks/blockchain-events', webhookBody, {
        headers: { 'Content-Type': 'application/json' },
        timeout: 2000,
      });
      expect(response.status).toBe(200);
      expect(response.data).toEqual({ success: true, queued: false });
    } finally {
      await stopApp(server);
    }
  });

  it('keeps webhooks outside the API rate limit', async () => {
    const { server, http } = await startApp({
      publishEvents: async () => 'job-1',
      rateLimit: { windowMs: 60_000, limit: 2 },
    });
    try {
      const statuses: number[] = [];
      for (let i = 0; i < 4; i++) {
        const response = await http.post('/api/webhooks/blockchain-events', webhookBody, {
          headers: { 'Content-Type': 'application/json' },
        });
        statuses.push(response.status);
      }
      expect(statuses).toEqual([200, 200, 200, 200]);

      const health: number[] = [];
      for (let i = 0; i < 3; i++) {
        health.push((await http.get('/api/health')).status);
      }
      expect(health).toEqual([200, 200, 429]);
    } finally {
      await stopApp(server);
    }
  });
});

describe('token endpoints', () => {
  let server: Server;
  let http: AxiosInstance;
  let chain: InMemoryChain;
  let signer: string;

  beforeAll(async () => {
    chain = new InMemoryChain();
    const services = await createInMemoryServices(chain);
    signer = services.orchestrator.address;
    chain.addToken(TOKEN, 6, { [signer]: 5_000_000n });
    ({ server, http } = await startApp({ chain: services, publishEvents: async () => 'unused', queueEnabled: true }));
  });

  afterAll(async () => {
    await stopApp(server);
  });

  it('reports health with the network and signer', async () => {
    const response = await http.get('/api/health');
    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({
      success: true,
      status: 'healthy',
      network: 'ethereum/sepolia',
      services: { chain: true, signer, queue: true },
    });
  });

  it('returns a formatted balance', async () => {
    const response = await http.get(`/api/tokens/${TOKEN}/balance/${signer}`);
    expect(response.status).toBe(200);
    expect(response.data.balance).toEqual({
      token: TOKEN,
      holder: signer,
      raw: '5000000',
      decimals: 6,
      formatted: '5',
    });
  });

  it('rejects a malformed address with 400', async () => {
    const response = await http.get(`/api/tokens/${TOKEN}/balance/0x1234`);
    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({ success: false, errorCode: 'INVALID_ADDRESS' });
  });

  it('broadcasts a transfer and serves its receipt', async () => {
    const transfer = await http.post(`/api/tokens/${TOKEN}/transfer`, { to: RECIPIENT, amount: '1.25' });
    expect(transfer.status).toBe(202);
    expect(transfer.data.hash).toMatch(/^0x[0-9a-f]{64}$/);
    expect(chain.tokenBalance(TOKEN, RECIPIENT)).toBe(1_250_000n);

    const receipt = await http.get(`/api/transactions/${transfer.data.hash}/receipt`);
    expect(receipt.status).toBe(200);
    expect(receipt.data.receipt).toMatchObject({ transactionHash: transfer.data.hash, status: 'success' });
    expect(typeof receipt.data.receipt.blockNumber).toBe('string');
  });

  it('maps unknown override keys to a 400 listing them', async () => {
    const response = await http.post(`/api/tokens/${TOKEN}/transfer`, {
      to: RECIPIENT,
      amount: '1',
      overrides: { gasLimit: '21000' },
    });
    expect(response.status).toBe(400);
    expect(response.data.errorCode).toBe('INVALID_TRANSACTION_FIELD');
    expect(response.data.context).toEqual({ invalidFields: ['gasLimit'], receivedFields: ['gasLimit'] });
  });

  it('rejects an amount finer than the token precision', async () => {
    const response = await http.post(`/api/tokens/${TOKEN}/transfer`, { to: RECIPIENT, amount: '0.0000001' });
    expect(response.status).toBe(400);
    expect(response.data.errorCode).toBe('INVALID_AMOUNT');
  });

  it('answers 404 for a receipt that does not exist yet', async () => {
    const response = await http.get(`/api/transactions/0x${'ab'.repeat(32)}/receipt`);
    expect(response.status).toBe(404);
    expect(response.data.errorCode).toBe('RECEIPT_NOT_FOUND');
  });
});

describe('without a signing key', () => {
  let server: Server;
  let http: AxiosInstance;

  beforeAll(async () => {
    ({ server, http } = await startApp({ publishEvents: async () => 'unused' }));
  });

  afterAll(async () => {
    await stopApp(server);
  });

  it('answers 503 on token and transaction routes', async () => {
    const balance = await http.get(`/api/tokens/${TOKEN}/balance/${RECIPIENT}`);
    const receipt = await http.get(`/api/transactions/0x${'ab'.repeat(32)}/receipt`);
    expect(balance.status).toBe(503);
    expect(receipt.status).toBe(503);
    expect(balance.data.errorCode).toBe('CHAIN_UNAVAILABLE');
  });

  it('still reports health', async () => {
    const response = await http.get('/api/health');
    expect(response.data).toMatchObject({ status: 'healthy', network: null, services: { chain: false, signer: null } });
  });
});
