import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import {
  LIVE_STATUSES,
  isResourceType,
  isSubscriptionStatus
} from '../types/index.js';
import type {
  ResourceType,
  Subscription,
  SubscriptionStatus,
  SubscriptionTarget,
  TargetHold
} from '../types/index.js';

interface SubscriptionRow {
  id: string;
  account: string;
  resource_type: string;
  resource_path: string;
  change_type: string;
  notification_url: string;
  client_state: string;
  status: string;
  expires_at: string;
  renewed_at: string;
  next_check_at: string;
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

interface HoldRow {
  resource_type: string;
  account: string;
  resource_path: string;
  reason: string;
  created_at: string;
}

export interface SubscriptionFilter {
  status?: SubscriptionStatus;
  account?: string;
  resourceType?: ResourceType;
}

export interface RenewalUpdate {
  expiresAt: Date;
  renewedAt: Date;
  nextCheckAt: Date;
}

const LIVE_STATUS_SQL = LIVE_STATUSES.map(s => `'${s}'`).join(', ');

/**
 * Durable record of push subscriptions.
 *
 * The subscription manager is the only writer; the gateway only calls `get`.
 * At most one row per (resource_type, account, resource_path) may be Active,
 * enforced by a partial unique index.
 */
export class SubscriptionStore {
  constructor(private db: BetterSqlite3Database) {}

  insert(subscription: Subscription): Subscription {
    this.db.prepare(`
      INSERT INTO subscriptions (
        id, account, resource_type, resource_path, change_type, notification_url,
        client_state, status, expires_at, renewed_at, next_check_at, last_error,
        created_at, updated_at
      ) VALUES (
        @id, @account, @resourceType, @resourcePath, @changeType, @notificationUrl,
        @clientState, @status, @expiresAt, @renewedAt, @nextCheckAt, @lastError,
        @createdAt, @updatedAt
      )
    `).run({
      id: subscription.id,
      account: subscription.account,
      resourceType: subscription.resourceType,
      resourcePath: subscription.resourcePath,
      changeType: subscription.changeType,
      notificationUrl: subscription.notificationUrl,
      clientState: subscription.clientState,
      status: subscription.status,
      expiresAt: subscription.expiresAt.toISOString(),
      renewedAt: subscription.renewedAt.toISOString(),
      nextCheckAt: subscription.nextCheckAt.toISOString(),
      lastError: subscription.lastError ?? null,
      createdAt: subscription.createdAt.toISOString(),
      updatedAt: subscription.updatedAt.toISOString()
    });

    return this.require(subscription.id);
  }

  get(id: string): Subscription | undefined {
    const row = this.db
      .prepare<[string], SubscriptionRow>('SELECT * FROM subscriptions WHERE id = ?')
      .get(id);
    return row ? formatSubscription(row) : undefined;
  }

  /**
   * Live (Pending, Active or Expiring) subscriptions covering a target, Active first
   */
  listLive(target: SubscriptionTarget): Subscription[] {
    const rows = this.db
      .prepare<[string, string, string], SubscriptionRow>(`
        SELECT * FROM subscriptions
        WHERE resource_type = ? AND account = ? AND resource_path = ?
        AND status IN (${LIVE_STATUS_SQL})
        ORDER BY CASE status WHEN 'Active' THEN 0 ELSE 1 END, expires_at DESC
      `)
      .all(target.resourceType, target.account, target.resourcePath);
    return rows.map(formatSubscription);
  }

  findLive(target: SubscriptionTarget): Subscription | undefined {
    return this.listLive(target)[0];
  }

  /**
   * Live subscriptions of one account and resource type, across resource paths
   */
  listLiveForAccount(account: string, resourceType: ResourceType): Subscription[] {
    const rows = this.db
      .prepare<[string, string], SubscriptionRow>(`
        SELECT * FROM subscriptions
        WHERE account = ? AND resource_type = ?
        AND status IN (${LIVE_STATUS_SQL})
        ORDER BY created_at
      `)
      .all(account, resourceType);
    return rows.map(formatSubscription);
  }

  listAllLive(): Subscription[] {
    const rows = this.db
      .prepare<[], SubscriptionRow>(`
        SELECT * FROM subscriptions WHERE status IN (${LIVE_STATUS_SQL}) ORDER BY created_at
      `)
      .all();
    return rows.map(formatSubscription);
  }

  list(filter: SubscriptionFilter = {}): Subscription[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.status) {
      clauses.push('status = ?');
      params.push(filter.status);
    }
    if (filter.account) {
      clauses.push('account = ?');
      params.push(filter.account);
    }
    if (filter.resourceType) {
      clauses.push('resource_type = ?');
      params.push(filter.resourceType);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare<string[], SubscriptionRow>(`SELECT * FROM subscriptions ${where} ORDER BY created_at DESC, id`)
      .all(...params);
    return rows.map(formatSubscription);
  }

  /**
   * Active or Expiring subscriptions whose renewal check is due
   */
  listDue(now: Date): Subscription[] {
    const rows = this.db
      .prepare<[string], SubscriptionRow>(`
        SELECT * FROM subscriptions
        WHERE status IN ('Active', 'Expiring') AND next_check_at <= ?
        ORDER BY next_check_at
      `)
      .all(now.toISOString());
    return rows.map(formatSubscription);
  }

  setStatus(id: string, status: SubscriptionStatus, now: Date, lastError?: string): Subscription {
    this.db.prepare(`
      UPDATE subscriptions
      SET status = ?, last_error = COALESCE(?, last_error), updated_at = ?
      WHERE id = ?
    `).run(status, lastError ?? null, now.toISOString(), id);
    return this.require(id);
  }

  recordRenewal(id: string, update: RenewalUpdate, now: Date): Subscription {
    this.db.prepare(`
      UPDATE subscriptions
      SET expires_at = ?, renewed_at = ?, next_check_at = ?, status = 'Active',
          last_error = NULL, updated_at = ?
      WHERE id = ?
    `).run(
      update.expiresAt.toISOString(),
      update.renewedAt.toISOString(),
      update.nextCheckAt.toISOString(),
      now.toISOString(),
      id
    );
    return this.require(id);
  }

  /**
   * Mark a subscription Active. Any other Active subscription for the same
   * target is demoted to Expired and returned so the caller can delete it upstream.
   */
  activate(id: string, now: Date): { subscription: Subscription; displaced: Subscription[] } {
    const activateTx = this.db.transaction((subscriptionId: string) => {
      const current = this.require(subscriptionId);
      const displaced = this.listLive(current)
        .filter(s => s.id !== subscriptionId && s.status === 'Active')
        .map(loser => this.setStatus(loser.id, 'Expired', now, `Superseded by ${subscriptionId}`));
      const subscription = this.setStatus(subscriptionId, 'Active', now);
      return { subscription, displaced };
    });
    return activateTx(id);
  }

  /**
   * Delete Expired and Failed records last touched before the cutoff
   */
  purgeRetired(cutoff: Date): number {
    const result = this.db.prepare(`
      DELETE FROM subscriptions
      WHERE status IN ('Expired', 'Failed') AND updated_at < ?
    `).run(cutoff.toISOString());
    return result.changes;
  }

  /**
   * Keep the renewal loop from recreating a target until it is released
   */
  holdTarget(target: SubscriptionTarget, reason: string, now: Date): TargetHold {
    this.db.prepare(`
      INSERT INTO target_holds (resource_type, account, resource_path, reason, created_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT (resource_type, account, resource_path)
      DO UPDATE SET reason = excluded.reason, created_at = excluded.created_at
    `).run(target.resourceType, target.account, target.resourcePath, reason, now.toISOString());
    return { ...pickTarget(target), reason, createdAt: now };
  }

  /**
   * Returns true when a hold existed
   */
  releaseTarget(target: SubscriptionTarget): boolean {
    const result = this.db.prepare(`
      DELETE FROM target_holds WHERE resource_type = ? AND account = ? AND resource_path = ?
    `).run(target.resourceType, target.account, target.resourcePath);
    return result.changes > 0;
  }

  findHold(target: SubscriptionTarget): TargetHold | undefined {
    const row = this.db
      .prepare<[string, string, string], HoldRow>(`
        SELECT * FROM target_holds WHERE resource_type = ? AND account = ? AND resource_path = ?
      `)
      .get(target.resourceType, target.account, target.resourcePath);
    return row ? formatHold(row) : undefined;
  }

  listHolds(): TargetHold[] {
    const rows = this.db
      .prepare<[], HoldRow>('SELECT * FROM target_holds ORDER BY created_at, account, resource_path')
      .all();
    return rows.map(formatHold);
  }

  private require(id: string): Subscription {
    const subscription = this.get(id);
    if (!subscription) {
      throw new Error(`Subscription ${id} is not in the store`);
    }
    return subscription;
  }
}

function formatSubscription(row: SubscriptionRow): Subscription {
  if (!isResourceType(row.resource_type)) {
    throw new Error(`Subscription ${row.id} has unknown resource type ${row.resource_type}`);
  }
  if (!isSubscriptionStatus(row.status)) {
    throw new Error(`Subscription ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    account: row.account,
    resourceType: row.resource_type,
    resourcePath: row.resource_path,
    changeType: row.change_type,
    notificationUrl: row.notification_url,
    clientState: row.client_state,
    status: row.status,
    expiresAt: new Date(row.expires_at),
    renewedAt: new Date(row.renewed_at),
    nextCheckAt: new Date(row.next_check_at),
    lastError: row.last_error ?? undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function pickTarget(target: SubscriptionTarget): SubscriptionTarget {
  return { account: target.account, resourceType: target.resourceType, resourcePath: target.resourcePath };
}

function formatHold(row: HoldRow): TargetHold {
  if (!isResourceType(row.resource_type)) {
    throw new Error(`Hold on ${row.account} has unknown resource type ${row.resource_type}`);
  }
  return {
    account: row.account,
    resourceType: row.resource_type,
    resourcePath: row.resource_path,
    reason: row.reason,
    createdAt: new Date(row.created_at)
  };
}
