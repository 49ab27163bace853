import { DEFAULT_CHANGE_TYPES, WEBHOOK_PATHS } from '../config/types.js';
import type { AccountTarget } from '../config/types.js';
import { RelayError, errorMessage, isRelayError } from '../middleware/error.js';
import { LIVE_STATUSES } from '../types/index.js';
import type {
  ProviderSubscription,
  ResourceType,
  Subscription,
  SubscriptionTarget,
  TargetHold
} from '../types/index.js';
import { targetKey } from '../utils/id.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import type { Logger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';
import { generateClientState } from '../utils/secret.js';
import type { ProviderClient } from './provider-client.js';
import type { SubscriptionFilter, SubscriptionStore } from './subscription-store.js';

export interface SubscriptionManagerOptions {
  store: SubscriptionStore;
  provider: ProviderClient;
  logger: Logger;
  /** Base URL the provider calls back; webhook paths are appended to it */
  publicBaseUrl: string;
  lifetimeMinutes: number;
  renewalWindow: number;
  retentionHours: number;
  renewalRetry: RetryPolicy;
  targets?: AccountTarget[];
  clock?: () => Date;
}

export type RenewalOutcome =
  | { outcome: 'renewed' | 'replaced'; subscription: Subscription }
  | { outcome: 'failed'; error: unknown }
  | { outcome: 'skipped' };

export interface RenewalCycleResult {
  checked: number;
  renewed: number;
  replaced: number;
  failed: number;
  purged: number;
}

export interface ReconcileResult {
  upstream: number;
  orphansDeleted: number;
  recreated: number;
  failed: number;
}

export interface EnsureConfiguredResult {
  ensured: Subscription[];
  failed: AccountTarget[];
  /** Targets left alone because they are on hold */
  held: AccountTarget[];
}

/** Resource path a hold uses to cover every channel of a team */
export const ALL_CHANNELS_PATH = '*';

export function channelMessagesPath(teamId: string, channelId: string): string {
  return `/teams/${teamId}/channels/${channelId}/messages`;
}

/**
 * Graph resource expression used when a target does not name one
 */
export function defaultResourcePath(resourceType: ResourceType, account: string): string | undefined {
  switch (resourceType) {
    case 'Email':
      return `/users/${account}/mailFolders('Inbox')/messages`;
    case 'TeamsChat':
      return `/users/${account}/chats/getAllMessages`;
    case 'TeamsChannel':
      return undefined;
  }
}

/**
 * When the renewal check for a lifetime is due: `renewalWindow` of the
 * lifetime before it ends.
 */
export function computeNextCheck(renewedAt: Date, expiresAt: Date, renewalWindow: number): Date {
  const lifetimeMs = expiresAt.getTime() - renewedAt.getTime();
  return new Date(Math.round(expiresAt.getTime() - renewalWindow * lifetimeMs));
}

/**
 * Owns the lifecycle of push subscriptions: creation, renewal, replacement,
 * reconciliation with the provider and revocation.
 *
 * It is the only writer of the subscription store. Every write for one
 * (resourceType, account, resourcePath) tuple runs under a per-key lock.
 */
export class SubscriptionManager {
  private readonly lock = new KeyedLock();
  /** Resource paths with a create call in flight */
  private readonly creating = new Set<string>();
  private readonly clock: () => Date;

  constructor(private readonly options: SubscriptionManagerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  notificationUrl(resourceType: ResourceType): string {
    return `${this.options.publicBaseUrl}${WEBHOOK_PATHS[resourceType]}`;
  }

  /**
   * Return the live subscription for a tuple, creating one upstream if none
   * exists. This is the operator's way back from a hold, so it releases one.
   */
  async ensureSubscription(
    account: string,
    resourceType: ResourceType,
    resourcePath?: string,
    changeType?: string
  ): Promise<Subscription> {
    const target = this.resolveTarget(account, resourceType, resourcePath);
    this.releaseHold(target);
    return this.lock.run(targetKey(target), () =>
      this.ensureLocked(target, changeType ?? DEFAULT_CHANGE_TYPES[resourceType])
    );
  }

  /**
   * Subscribe to every channel the team has now. Releases the team's holds.
   */
  async ensureTeamChannels(teamId: string, changeType?: string): Promise<Subscription[]> {
    this.releaseHold({ account: teamId, resourceType: 'TeamsChannel', resourcePath: ALL_CHANNELS_PATH });
    const channels = await this.options.provider.listChannels(teamId);
    const ensured: Subscription[] = [];
    for (const channel of channels) {
      ensured.push(
        await this.ensureSubscription(teamId, 'TeamsChannel', channelMessagesPath(teamId, channel.id), changeType)
      );
    }
    return ensured;
  }

  /**
   * Ensure every configured target that is not on hold. One failing target
   * does not stop the rest.
   */
  async ensureConfigured(): Promise<EnsureConfiguredResult> {
    const { store, logger } = this.options;
    const result: EnsureConfiguredResult = { ensured: [], failed: [], held: [] };

    for (const target of this.options.targets ?? []) {
      let tuples: SubscriptionTarget[];
      try {
        tuples = await this.expandTarget(target);
      } catch (error) {
        result.failed.push(target);
        logger.error(`Could not list channels of team ${target.account}: ${errorMessage(error)}`);
        continue;
      }

      let held = false;
      let failed = false;
      for (const tuple of tuples) {
        const hold = store.findHold(tuple);
        if (hold) {
          held = true;
          logger.debug(`${tuple.resourceType} target ${tuple.account} (${tuple.resourcePath}) is on hold: ${hold.reason}`);
          continue;
        }
        try {
          result.ensured.push(
            await this.lock.run(targetKey(tuple), () =>
              this.ensureLocked(tuple, target.changeType ?? DEFAULT_CHANGE_TYPES[tuple.resourceType])
            )
          );
        } catch (error) {
          failed = true;
          logger.error(`Could not ensure ${tuple.resourceType} subscription for ${tuple.account}: ${errorMessage(error)}`);
        }
      }

      if (failed) {
        result.failed.push(target);
      } else if (held) {
        result.held.push(target);
      }
    }
    return result;
  }

  /**
   * One pass of the renewal loop: renew what is due, heal configured targets
   * that lost their subscription (held targets excepted) and purge retired
   * records.
   */
  async runRenewalCycle(): Promise<RenewalCycleResult> {
    const { store, logger } = this.options;
    const due = store.listDue(this.clock());
    const result: RenewalCycleResult = { checked: due.length, renewed: 0, replaced: 0, failed: 0, purged: 0 };

    for (const subscription of due) {
      const renewal = await this.lock.run(targetKey(subscription), () => this.renewLocked(subscription.id));
      if (renewal.outcome === 'renewed') result.renewed++;
      else if (renewal.outcome === 'replaced') result.replaced++;
      else if (renewal.outcome === 'failed') result.failed++;
    }

    if (this.options.targets && this.options.targets.length > 0) {
      const healed = await this.ensureConfigured();
      result.failed += healed.failed.length;
    }

    const cutoff = new Date(this.clock().getTime() - this.options.retentionHours * 60 * 60 * 1000);
    result.purged = store.purgeRetired(cutoff);

    if (result.checked > 0 || result.purged > 0) {
      logger.info(
        `Renewal cycle: ${result.checked} due, ${result.renewed} renewed, ${result.replaced} replaced, ` +
          `${result.failed} failed, ${result.purged} purged`
      );
    }
    return result;
  }

  /**
   * Renew one subscription now, regardless of its next check time
   */
  async forceRenew(id: string): Promise<Subscription> {
    const subscription = this.options.store.get(id);
    if (!subscription) {
      throw RelayError.notFound(`Subscription ${id} was not found`);
    }
    if (subscription.status !== 'Active' && subscription.status !== 'Expiring') {
      throw RelayError.badRequest(`Subscription ${id} is ${subscription.status} and cannot be renewed`);
    }

    const renewal = await this.lock.run(targetKey(subscription), () => this.renewLocked(id));
    switch (renewal.outcome) {
      case 'renewed':
      case 'replaced':
        return renewal.subscription;
      case 'failed':
        throw renewal.error;
      case 'skipped':
        throw RelayError.badRequest(`Subscription ${id} changed state while waiting to be renewed`);
    }
  }

  /**
   * Compare the store with the provider's list. Upstream subscriptions
   * pointing at this relay that the store does not hold as live are deleted;
   * live records the provider no longer has are failed and recreated.
   */
  async reconcile(): Promise<ReconcileResult> {
    const { store, provider, logger } = this.options;
    const listedAt = this.clock();
    const upstream = await provider.list();
    const ownUrls = new Set(Object.values(WEBHOOK_PATHS).map(path => `${this.options.publicBaseUrl}${path}`));
    const upstreamIds = new Set(upstream.map(s => s.id));
    const result: ReconcileResult = { upstream: upstream.length, orphansDeleted: 0, recreated: 0, failed: 0 };

    for (const orphan of upstream) {
      if (!ownUrls.has(orphan.notificationUrl) || this.isLive(orphan.id)) {
        continue;
      }
      if (this.creating.has(orphan.resource)) {
        logger.debug(`Skipping upstream subscription ${orphan.id}: a create for ${orphan.resource} is in flight`);
        continue;
      }
      try {
        await provider.delete(orphan.id);
        result.orphansDeleted++;
        logger.info(`Deleted orphaned upstream subscription ${orphan.id} (${orphan.resource})`);
      } catch (error) {
        result.failed++;
        logger.warn(`Could not delete orphaned subscription ${orphan.id}: ${errorMessage(error)}`);
      }
    }

    for (const missing of store.listAllLive()) {
      if (upstreamIds.has(missing.id)) {
        continue;
      }
      try {
        await this.lock.run(targetKey(missing), async () => {
          const current = store.get(missing.id);
          if (!current || !LIVE_STATUSES.includes(current.status)) {
            return;
          }
          // Written since the listing started, so the listing may predate it
          if (current.updatedAt.getTime() >= listedAt.getTime()) {
            return;
          }
          store.setStatus(missing.id, 'Failed', this.clock(), 'Not listed by the provider during reconciliation');
          logger.warn(`Subscription ${missing.id} is gone upstream; recreating`);
          await this.deleteUpstream(missing.id, 'not listed by the provider');
          await this.ensureLocked(current, current.changeType);
          result.recreated++;
        });
      } catch (error) {
        result.failed++;
        logger.error(
          `Could not recreate ${missing.resourceType} subscription for ${missing.account}: ${errorMessage(error)}`
        );
      }
    }

    logger.info(
      `Reconciled ${result.upstream} upstream subscription(s): ${result.orphansDeleted} orphan(s) deleted, ` +
        `${result.recreated} recreated, ${result.failed} failed`
    );
    return result;
  }

  /**
   * Delete every live subscription of an account and resource type upstream
   * and mark them Expired
   */
  async revoke(account: string, resourceType: ResourceType): Promise<Subscription[]> {
    const { store, provider, logger } = this.options;
    const revoked: Subscription[] = [];
    const live = store.listLiveForAccount(account, resourceType);

    // Hold first so the renewal loop cannot recreate anything mid-revoke
    const now = this.clock();
    for (const subscription of live) {
      store.holdTarget(subscription, 'Revoked', now);
    }
    for (const target of this.options.targets ?? []) {
      if (target.account !== account || target.resourceType !== resourceType) {
        continue;
      }
      const resourcePath = target.allChannels
        ? ALL_CHANNELS_PATH
        : target.resourcePath ?? defaultResourcePath(resourceType, account);
      if (resourcePath) {
        store.holdTarget({ account, resourceType, resourcePath }, 'Revoked', now);
      }
    }

    for (const subscription of live) {
      const updated = await this.lock.run(targetKey(subscription), async () => {
        await provider.delete(subscription.id);
        return store.setStatus(subscription.id, 'Expired', this.clock(), 'Revoked');
      });
      revoked.push(updated);
      logger.info(`Revoked ${resourceType} subscription ${subscription.id} for ${account}`);
    }

    return revoked;
  }

  listSubscriptions(filter: SubscriptionFilter = {}): Subscription[] {
    return this.options.store.list(filter);
  }

  listHolds(): TargetHold[] {
    return this.options.store.listHolds();
  }

  private releaseHold(target: SubscriptionTarget): void {
    if (this.options.store.releaseTarget(target)) {
      this.options.logger.info(`Released hold on ${target.resourceType} target ${target.account} (${target.resourcePath})`);
    }
  }

  private isLive(id: string): boolean {
    const subscription = this.options.store.get(id);
    return subscription !== undefined && LIVE_STATUSES.includes(subscription.status);
  }

  /**
   * Tuples a configured target stands for. A whole-team target under a hold
   * resolves to the held wildcard without asking the provider.
   */
  private async expandTarget(target: AccountTarget): Promise<SubscriptionTarget[]> {
    if (!target.allChannels) {
      return [this.resolveTarget(target.account, target.resourceType, target.resourcePath)];
    }
    const wildcard: SubscriptionTarget = {
      account: target.account,
      resourceType: 'TeamsChannel',
      resourcePath: ALL_CHANNELS_PATH
    };
    if (this.options.store.findHold(wildcard)) {
      return [wildcard];
    }
    const channels = await this.options.provider.listChannels(target.account);
    return channels.map((channel): SubscriptionTarget => ({
      account: target.account,
      resourceType: 'TeamsChannel',
      resourcePath: channelMessagesPath(target.account, channel.id)
    }));
  }

  private resolveTarget(account: string, resourceType: ResourceType, resourcePath?: string): SubscriptionTarget {
    const path = resourcePath ?? defaultResourcePath(resourceType, account);
    if (!path) {
      throw RelayError.badRequest(`${resourceType} subscriptions need an explicit resourcePath`);
    }
    return { account, resourceType, resourcePath: path };
  }

  private async ensureLocked(target: SubscriptionTarget, changeType: string): Promise<Subscription> {
    const existing = this.options.store.findLive(target);
    if (existing) {
      this.options.logger.debug(`${target.resourceType} subscription for ${target.account} already live as ${existing.id}`);
      return existing;
    }

    this.creating.add(target.resourcePath);
    try {
      return await this.createLocked(target, changeType);
    } finally {
      this.creating.delete(target.resourcePath);
    }
  }

  private async createLocked(target: SubscriptionTarget, changeType: string): Promise<Subscription> {
    const { store, provider, logger } = this.options;
    const requestedAt = this.clock();
    const requestedExpiry = new Date(requestedAt.getTime() + this.options.lifetimeMinutes * 60 * 1000);
    const clientState = generateClientState();

    let created: ProviderSubscription;
    try {
      created = await provider.create({
        resource: target.resourcePath,
        changeType,
        notificationUrl: this.notificationUrl(target.resourceType),
        clientState,
        expiresAt: requestedExpiry
      });
    } catch (error) {
      if (isRelayError(error, 'providerRejected')) {
        logger.error(
          `Provider rejected ${target.resourceType} subscription for ${target.account} ` +
            `(${target.resourcePath}): ${error.message}`
        );
        // Not retried automatically; an explicit ensure releases the hold
        store.holdTarget(target, error.message, this.clock());
      } else {
        logger.warn(
          `Creating ${target.resourceType} subscription for ${target.account} failed: ${errorMessage(error)}`
        );
      }
      throw error;
    }

    const expiresAt = parseExpiry(created.expirationDateTime, requestedExpiry);
    try {
      store.insert({
        id: created.id,
        account: target.account,
        resourceType: target.resourceType,
        resourcePath: target.resourcePath,
        changeType,
        notificationUrl: this.notificationUrl(target.resourceType),
        clientState,
        expiresAt,
        renewedAt: requestedAt,
        nextCheckAt: computeNextCheck(requestedAt, expiresAt, this.options.renewalWindow),
        status: 'Pending',
        createdAt: requestedAt,
        updatedAt: requestedAt
      });

      // A 201 from the provider means the validation handshake already succeeded
      const { subscription, displaced } = store.activate(created.id, this.clock());
      for (const loser of displaced) {
        await this.deleteUpstream(loser.id, `superseded by ${created.id}`);
      }

      logger.info(
        `Created ${target.resourceType} subscription ${subscription.id} for ${target.account} ` +
          `(expires ${subscription.expiresAt.toISOString()})`
      );
      return subscription;
    } catch (error) {
      await this.deleteUpstream(created.id, 'could not be recorded locally');
      throw error;
    }
  }

  private async renewLocked(id: string): Promise<RenewalOutcome> {
    const { store, provider, logger, renewalRetry } = this.options;
    const current = store.get(id);
    if (!current || (current.status !== 'Active' && current.status !== 'Expiring')) {
      return { outcome: 'skipped' };
    }

    const startedAt = this.clock();
    let failure: string;

    if (current.expiresAt.getTime() <= startedAt.getTime()) {
      store.setStatus(id, 'Expired', startedAt, 'Lapsed before renewal');
      failure = 'lapsed before renewal';
    } else {
      store.setStatus(id, 'Expiring', startedAt);
      const requestedExpiry = new Date(startedAt.getTime() + this.options.lifetimeMinutes * 60 * 1000);

      try {
        const renewed = await renewalRetry.execute(() => provider.renew(id, requestedExpiry, { retry: false }), {
          deadline: current.expiresAt,
          now: () => this.clock().getTime(),
          delayHint: error => (isRelayError(error) ? error.retryAfterMs : undefined),
          onRetry: ({ attempt, error, delayMs }) => {
            logger.warn(`Renewal attempt ${attempt} for ${id} failed (${errorMessage(error)}); retrying in ${delayMs}ms`);
          }
        });

        const renewedAt = this.clock();
        const expiresAt = parseExpiry(renewed.expirationDateTime, requestedExpiry);
        const subscription = store.recordRenewal(
          id,
          { expiresAt, renewedAt, nextCheckAt: computeNextCheck(renewedAt, expiresAt, this.options.renewalWindow) },
          renewedAt
        );
        logger.info(`Renewed subscription ${id} until ${expiresAt.toISOString()}`);
        return { outcome: 'renewed', subscription };
      } catch (error) {
        failure = errorMessage(error);
        store.setStatus(id, 'Failed', this.clock(), failure);
        logger.error(`Renewal of subscription ${id} failed: ${failure}`);
      }
    }

    await this.deleteUpstream(id, failure);

    try {
      const replacement = await this.ensureLocked(current, current.changeType);
      logger.info(`Replaced subscription ${id} with ${replacement.id}`);
      return { outcome: 'replaced', subscription: replacement };
    } catch (error) {
      logger.error(
        `Could not replace ${current.resourceType} subscription for ${current.account}: ${errorMessage(error)}`
      );
      return { outcome: 'failed', error };
    }
  }

  private async deleteUpstream(id: string, reason: string): Promise<void> {
    try {
      await this.options.provider.delete(id);
      this.options.logger.debug(`Deleted upstream subscription ${id} (${reason})`);
    } catch (error) {
      this.options.logger.warn(`Could not delete upstream subscription ${id}: ${errorMessage(error)}`);
    }
  }
}

function parseExpiry(value: string, fallback: Date): Date {
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? fallback : parsed;
}
