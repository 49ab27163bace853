import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import express from 'express';
import { createRelayServer, RelayServer } from '../src/server.js';
import { StaticTokenProvider } from '../src/services/token-provider.js';
import { captureLogger, listen, testConfig, waitFor } from './helpers/fixtures.js';
import type { RunningServer } from './helpers/fixtures.js';

interface StoredSubscription {
  id: string;
  resource: string;
  changeType: string;
  notificationUrl: string;
  expirationDateTime: string;
  clientState?: string;
}

describe('RelayServer', () => {
  let relay: RelayServer;
  let graph: RunningServer;
  let consumer: RunningServer;
  const upstream = new Map<string, StoredSubscription>();
  const received: unknown[] = [];
  const handshakes: string[] = [];
  let clockOffsetMs = 0;

  const relayOrigin = (): string => `http://127.0.0.1:${relay.getPort()}`;

  beforeAll(async () => {
    // Graph stand-in: validates the notification URL before confirming a subscription
    const graphApp = express();
    graphApp.use(express.json());
    graphApp.post('/subscriptions', async (req, res) => {
      if (req.headers.authorization !== 'Bearer test-token') {
        res.status(401).json({ error: { code: 'InvalidAuthenticationToken', message: 'Access token is empty.' } });
        return;
      }
      const { pathname } = new URL(req.body.notificationUrl);
      const token = `validate-${upstream.size + 1}`;
      const echo = await fetch(`${relayOrigin()}${pathname}?validationToken=${token}`, { method: 'POST' });
      const text = await echo.text();
      handshakes.push(text);
      if (text !== token) {
        res.status(400).json({ error: { code: 'ValidationError', message: 'Notification endpoint must respond with 200 OK' } });
        return;
      }
      const subscription: StoredSubscription = { ...req.body, id: `graph-sub-${upstream.size + 1}` };
      upstream.set(subscription.id, subscription);
      res.status(201).json(subscription);
    });
    graphApp.get('/subscriptions', (_req, res) => {
      res.json({ value: [...upstream.values()] });
    });
    graphApp.delete('/subscriptions/:id', (req, res) => {
      upstream.delete(req.params.id);
      res.status(204).end();
    });
    graph = await listen(graphApp);

    const consumerApp = express();
    consumerApp.use(express.json());
    consumerApp.post('/events', (req, res) => {
      received.push(req.body);
      res.status(200).json({ ok: true });
    });
    consumer = await listen(consumerApp);

    const base = testConfig();
    relay = createRelayServer(
      {
        ...base,
        graph: { ...base.graph, baseUrl: graph.url },
        subscriptions: { ...base.subscriptions, targets: [{ account: 'user@example.com', resourceType: 'Email' }] },
        dispatcher: { ...base.dispatcher, consumerUrl: `${consumer.url}/events` }
      },
      {
        tokens: new StaticTokenProvider('test-token'),
        logger: captureLogger('error').logger,
        clock: () => new Date(Date.now() + clockOffsetMs)
      }
    );
    await relay.start();
  });

  afterAll(async () => {
    await relay.stop();
    await consumer.close();
    await graph.close();
  });

  it('creates the configured subscription through the validation handshake', () => {
    expect(handshakes).toEqual(['validate-1']);

    const [subscription] = relay.components.store.list();
    expect(subscription).toMatchObject({
      id: 'graph-sub-1',
      account: 'user@example.com',
      resourceType: 'Email',
      status: 'Active',
      notificationUrl: 'https://relay.example.com/webhooks/email'
    });
    expect(upstream.get('graph-sub-1')?.clientState).toBe(subscription.clientState);
  });

  it('responds to health check', async () => {
    const response = await fetch(`${relayOrigin()}/health`);
    expect(response.status).toBe(200);
  });

  it('forwards a notification once when the provider redelivers it seconds later', async () => {
    const [subscription] = relay.components.store.list();
    const batch = {
      value: [
        {
          subscriptionId: subscription.id,
          clientState: subscription.clientState,
          changeType: 'created',
          resource: "Users/user@example.com/Messages('msg-42')",
          resourceData: { id: 'msg-42' }
        }
      ]
    };
    const post = (): Promise<Response> =>
      fetch(`${relayOrigin()}/webhooks/email`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(batch)
      });

    const first = await post();
    clockOffsetMs += 3000;
    const second = await post();
    expect(first.status).toBe(202);
    expect(second.status).toBe(202);

    await waitFor(() => received.length === 1);
    await relay.components.dispatcher.waitForIdle(2000);
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      subscriptionId: 'graph-sub-1',
      account: 'user@example.com',
      resourceType: 'Email',
      changeType: 'created',
      resourceId: 'msg-42'
    });
  });

  it('leaves nothing to delete when reconciling a consistent state', async () => {
    const result = await relay.components.manager.reconcile();
    expect(result).toEqual({ upstream: 1, orphansDeleted: 0, recreated: 0, failed: 0 });
  });
});
