import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { createRelayServer, RelayServer, VERSION } from '../../src/server.js';
import { FakeProvider, captureLogger, recordingHttp, testConfig } from '../helpers/fixtures.js';

const AUTH = 'Bearer test-admin-token';

describe('Admin API', () => {
  let relay: RelayServer;
  let provider: FakeProvider;

  beforeEach(() => {
    provider = new FakeProvider();
    relay = createRelayServer(testConfig({ admin: { mode: 'static', tokens: ['test-admin-token'] } }), {
      provider,
      logger: captureLogger('error').logger,
      consumerHttp: recordingHttp().http
    });
  });

  afterEach(async () => {
    await relay.stop();
  });

  describe('authentication', () => {
    it('rejects requests without a token', async () => {
      const response = await request(relay.app).get('/admin/subscriptions');

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe('unauthenticated');
      expect(response.body.error.message).toBe('Missing authentication token');
    });

    it('rejects an unknown token', async () => {
      const response = await request(relay.app)
        .get('/admin/subscriptions')
        .set('Authorization', 'Bearer wrong-token');

      expect(response.status).toBe(401);
      expect(response.body.error.message).toBe('Invalid authentication token');
    });

    it('does not guard the webhook endpoints', async () => {
      const response = await request(relay.app).post('/webhooks/email?validationToken=open');
      expect(response.status).toBe(200);
    });
  });

  describe('GET /admin/subscriptions', () => {
    beforeEach(async () => {
      await relay.components.manager.ensureSubscription('alice@example.com', 'Email');
      await relay.components.manager.ensureSubscription('bob@example.com', 'Email');
      await relay.components.manager.ensureSubscription('alice@example.com', 'TeamsChat');
    });

    it('lists subscriptions without their client state', async () => {
      const response = await request(relay.app).get('/admin/subscriptions').set('Authorization', AUTH);

      expect(response.status).toBe(200);
      expect(response.body.value).toHaveLength(3);
      for (const subscription of response.body.value) {
        expect(subscription).not.toHaveProperty('clientState');
        expect(subscription.status).toBe('Active');
      }
    });

    it('filters by account and resource type', async () => {
      const response = await request(relay.app)
        .get('/admin/subscriptions')
        .query({ account: 'alice@example.com', resourceType: 'TeamsChat' })
        .set('Authorization', AUTH);

      expect(response.body.value).toHaveLength(1);
      expect(response.body.value[0]).toMatchObject({
        account: 'alice@example.com',
        resourceType: 'TeamsChat',
        resourcePath: '/users/alice@example.com/chats/getAllMessages'
      });
    });

    it('rejects an unknown status', async () => {
      const response = await request(relay.app)
        .get('/admin/subscriptions?status=Sleeping')
        .set('Authorization', AUTH);

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Unknown status: Sleeping');
    });
  });

  describe('POST /admin/subscriptions', () => {
    it('creates a subscription', async () => {
      const response = await request(relay.app)
        .post('/admin/subscriptions')
        .set('Authorization', AUTH)
        .send({ account: 'user@example.com', resourceType: 'Email' });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        id: 'sub-1',
        status: 'Active',
        notificationUrl: 'https://relay.example.com/webhooks/email'
      });
      expect(response.body).not.toHaveProperty('clientState');
      expect(provider.calls).toEqual(["create:/users/user@example.com/mailFolders('Inbox')/messages"]);
    });

    it('returns the existing subscription for the same tuple', async () => {
      const body = { account: 'user@example.com', resourceType: 'Email' };
      await request(relay.app).post('/admin/subscriptions').set('Authorization', AUTH).send(body);
      const second = await request(relay.app).post('/admin/subscriptions').set('Authorization', AUTH).send(body);

      expect(second.body.id).toBe('sub-1');
      expect(provider.calls).toHaveLength(1);
    });

    it('rejects an unknown resource type', async () => {
      const response = await request(relay.app)
        .post('/admin/subscriptions')
        .set('Authorization', AUTH)
        .send({ account: 'user@example.com', resourceType: 'Calendar' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('resourceType must be one of Email, TeamsChat, TeamsChannel');
    });

    it('requires a resource path for channel subscriptions', async () => {
      const response = await request(relay.app)
        .post('/admin/subscriptions')
        .set('Authorization', AUTH)
        .send({ account: 'user@example.com', resourceType: 'TeamsChannel' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('TeamsChannel subscriptions need an explicit resourcePath');
    });

    it('subscribes to every channel of a team', async () => {
      provider.channels.set('team-1', [{ id: 'channel-1' }, { id: 'channel-2' }]);

      const response = await request(relay.app)
        .post('/admin/subscriptions')
        .set('Authorization', AUTH)
        .send({ account: 'team-1', resourceType: 'TeamsChannel', allChannels: true });

      expect(response.status).toBe(201);
      expect(response.body.value.map((s: { resourcePath: string }) => s.resourcePath)).toEqual([
        '/teams/team-1/channels/channel-1/messages',
        '/teams/team-1/channels/channel-2/messages'
      ]);
      expect(provider.calls[0]).toBe('channels:team-1');
    });

    it('rejects allChannels for other resource types', async () => {
      const response = await request(relay.app)
        .post('/admin/subscriptions')
        .set('Authorization', AUTH)
        .send({ account: 'user@example.com', resourceType: 'Email', allChannels: true });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('allChannels only applies to TeamsChannel subscriptions');
    });

    it('requires an account', async () => {
      const response = await request(relay.app)
        .post('/admin/subscriptions')
        .set('Authorization', AUTH)
        .send({ resourceType: 'Email' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('account is required');
    });
  });

  describe('renew, revoke and reconcile', () => {
    it('renews a subscription on demand', async () => {
      await relay.components.manager.ensureSubscription('user@example.com', 'Email');

      const response = await request(relay.app).post('/admin/subscriptions/sub-1/renew').set('Authorization', AUTH);

      expect(response.status).toBe(200);
      expect(response.body.id).toBe('sub-1');
      expect(provider.calls).toContain('renew:sub-1');
    });

    it('returns 404 when renewing an unknown subscription', async () => {
      const response = await request(relay.app).post('/admin/subscriptions/missing/renew').set('Authorization', AUTH);

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe('itemNotFound');
      expect(response.body.error.message).toBe('Subscription missing was not found');
    });

    it('revokes the subscriptions of an account', async () => {
      await relay.components.manager.ensureSubscription('user@example.com', 'Email');

      const response = await request(relay.app)
        .post('/admin/subscriptions/revoke')
        .set('Authorization', AUTH)
        .send({ account: 'user@example.com', resourceType: 'Email' });

      expect(response.status).toBe(200);
      expect(response.body.value).toHaveLength(1);
      expect(response.body.value[0]).toMatchObject({ id: 'sub-1', status: 'Expired', lastError: 'Revoked' });
      expect(provider.subscriptions.has('sub-1')).toBe(false);
    });

    it('lists revoked targets as holds until they are ensured again', async () => {
      await relay.components.manager.ensureSubscription('user@example.com', 'Email');
      await request(relay.app)
        .post('/admin/subscriptions/revoke')
        .set('Authorization', AUTH)
        .send({ account: 'user@example.com', resourceType: 'Email' });

      const held = await request(relay.app).get('/admin/holds').set('Authorization', AUTH);
      expect(held.status).toBe(200);
      expect(held.body.value).toHaveLength(1);
      expect(held.body.value[0]).toMatchObject({
        account: 'user@example.com',
        resourceType: 'Email',
        resourcePath: "/users/user@example.com/mailFolders('Inbox')/messages",
        reason: 'Revoked'
      });

      await request(relay.app)
        .post('/admin/subscriptions')
        .set('Authorization', AUTH)
        .send({ account: 'user@example.com', resourceType: 'Email' });
      const released = await request(relay.app).get('/admin/holds').set('Authorization', AUTH);
      expect(released.body.value).toEqual([]);
    });

    it('reconciles against the provider', async () => {
      provider.seed({
        id: 'stray-1',
        resource: '/users/ghost@example.com/messages',
        changeType: 'created',
        notificationUrl: 'https://relay.example.com/webhooks/email',
        expirationDateTime: '2024-05-01T11:00:00.000Z'
      });

      const response = await request(relay.app).post('/admin/reconcile').set('Authorization', AUTH);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ upstream: 1, orphansDeleted: 1, recreated: 0, failed: 0 });
    });

    it('reports dispatcher statistics', async () => {
      const response = await request(relay.app).get('/admin/dispatcher').set('Authorization', AUTH);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        accepting: true,
        queued: 0,
        inFlight: 0,
        tracked: 0,
        delivered: 0,
        failed: 0,
        abandoned: 0
      });
    });
  });

  describe('other routes', () => {
    it('serves the health check without authentication', async () => {
      const response = await request(relay.app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
      expect(response.body.version).toBe(VERSION);
    });

    it('returns 404 for unknown routes', async () => {
      const response = await request(relay.app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body.error.message).toBe('Cannot GET /nope');
    });
  });
});
