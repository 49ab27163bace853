import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDatabase, Database } from '../../src/services/database.js';
import { SubscriptionStore } from '../../src/services/subscription-store.js';
import { T0, makeSubscription, minutesAfter } from '../helpers/fixtures.js';

describe('SubscriptionStore', () => {
  let db: Database;
  let store: SubscriptionStore;

  beforeEach(() => {
    db = createDatabase(':memory:');
    store = new SubscriptionStore(db.raw);
  });

  afterEach(() => {
    db.close();
  });

  it('round-trips a subscription', () => {
    const subscription = makeSubscription({ lastError: 'previous failure' });
    store.insert(subscription);
    expect(store.get('sub-1')).toEqual(subscription);
  });

  it('returns undefined for unknown ids', () => {
    expect(store.get('missing')).toBeUndefined();
  });

  it('rejects a second Active subscription for the same tuple', () => {
    store.insert(makeSubscription({ id: 'sub-1' }));
    expect(() => store.insert(makeSubscription({ id: 'sub-2' }))).toThrow(/UNIQUE constraint failed/);
  });

  it('allows Active subscriptions for different paths of one account', () => {
    store.insert(makeSubscription({ id: 'sub-1' }));
    store.insert(makeSubscription({ id: 'sub-2', resourcePath: '/users/user@example.com/messages' }));
    expect(store.listLiveForAccount('user@example.com', 'Email').map(s => s.id).sort()).toEqual(['sub-1', 'sub-2']);
  });

  it('finds the live subscription for a target, Active first', () => {
    store.insert(makeSubscription({ id: 'sub-pending', status: 'Pending', expiresAt: minutesAfter(T0, 90) }));
    store.insert(makeSubscription({ id: 'sub-active' }));
    store.insert(makeSubscription({ id: 'sub-failed', status: 'Failed' }));

    const target = makeSubscription();
    expect(store.listLive(target).map(s => s.id)).toEqual(['sub-active', 'sub-pending']);
    expect(store.findLive(target)?.id).toBe('sub-active');
  });

  it('lists subscriptions by filter, newest first', () => {
    store.insert(makeSubscription({ id: 'a', createdAt: T0 }));
    store.insert(makeSubscription({ id: 'b', status: 'Failed', createdAt: minutesAfter(T0, 1) }));
    store.insert(
      makeSubscription({ id: 'c', resourceType: 'TeamsChat', resourcePath: '/chats', createdAt: minutesAfter(T0, 2) })
    );

    expect(store.list().map(s => s.id)).toEqual(['c', 'b', 'a']);
    expect(store.list({ status: 'Failed' }).map(s => s.id)).toEqual(['b']);
    expect(store.list({ resourceType: 'TeamsChat' }).map(s => s.id)).toEqual(['c']);
    expect(store.list({ account: 'nobody@example.com' })).toEqual([]);
  });

  it('lists Active and Expiring subscriptions whose check is due', () => {
    store.insert(makeSubscription({ id: 'due', nextCheckAt: minutesAfter(T0, 48) }));
    store.insert(
      makeSubscription({
        id: 'later',
        resourcePath: '/users/user@example.com/messages',
        nextCheckAt: minutesAfter(T0, 50)
      })
    );
    store.insert(makeSubscription({ id: 'expiring', status: 'Expiring', nextCheckAt: minutesAfter(T0, 10) }));
    store.insert(makeSubscription({ id: 'failed', status: 'Failed', nextCheckAt: minutesAfter(T0, 10) }));

    expect(store.listDue(minutesAfter(T0, 48)).map(s => s.id)).toEqual(['expiring', 'due']);
  });

  it('records a renewal and clears the last error', () => {
    store.insert(makeSubscription({ status: 'Expiring', lastError: 'timeout' }));
    const now = minutesAfter(T0, 48);

    const renewed = store.recordRenewal(
      'sub-1',
      { expiresAt: minutesAfter(now, 60), renewedAt: now, nextCheckAt: minutesAfter(now, 48) },
      now
    );

    expect(renewed.status).toBe('Active');
    expect(renewed.expiresAt).toEqual(minutesAfter(T0, 108));
    expect(renewed.renewedAt).toEqual(now);
    expect(renewed.lastError).toBeUndefined();
    expect(renewed.updatedAt).toEqual(now);
  });

  it('keeps the previous error when a status change gives none', () => {
    store.insert(makeSubscription());
    store.setStatus('sub-1', 'Failed', T0, 'renewal failed');
    const expired = store.setStatus('sub-1', 'Expired', T0);
    expect(expired.lastError).toBe('renewal failed');
  });

  it('activating a subscription displaces the current Active one', () => {
    store.insert(makeSubscription({ id: 'old' }));
    store.insert(makeSubscription({ id: 'new', status: 'Pending' }));
    const now = minutesAfter(T0, 5);

    const { subscription, displaced } = store.activate('new', now);

    expect(subscription.status).toBe('Active');
    expect(displaced).toHaveLength(1);
    expect(displaced[0].id).toBe('old');
    expect(displaced[0].status).toBe('Expired');
    expect(displaced[0].lastError).toBe('Superseded by new');
    expect(store.get('old')?.status).toBe('Expired');
  });

  it('purges only retired records older than the cutoff', () => {
    store.insert(makeSubscription({ id: 'old-failed', status: 'Failed', updatedAt: T0 }));
    store.insert(makeSubscription({ id: 'old-expired', status: 'Expired', updatedAt: T0 }));
    store.insert(makeSubscription({ id: 'recent-failed', status: 'Failed', updatedAt: minutesAfter(T0, 120) }));
    store.insert(makeSubscription({ id: 'active', updatedAt: T0 }));

    expect(store.purgeRetired(minutesAfter(T0, 60))).toBe(2);
    expect(store.list().map(s => s.id).sort()).toEqual(['active', 'recent-failed']);
  });

  it('keeps one hold per target and releases it', () => {
    const target = { account: 'user@example.com', resourceType: 'Email' as const, resourcePath: '/users/user@example.com/messages' };

    store.holdTarget(target, 'Create subscription failed with 403: denied', T0);
    store.holdTarget(target, 'Revoked', minutesAfter(T0, 5));

    expect(store.listHolds()).toEqual([{ ...target, reason: 'Revoked', createdAt: minutesAfter(T0, 5) }]);
    expect(store.findHold({ ...target, resourcePath: '/users/user@example.com/events' })).toBeUndefined();
    expect(store.releaseTarget(target)).toBe(true);
    expect(store.releaseTarget(target)).toBe(false);
    expect(store.findHold(target)).toBeUndefined();
  });
});
