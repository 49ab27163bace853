import { RelayError } from '../middleware/error.js';
import { CHANGE_TYPES, LIVE_STATUSES } from '../types/index.js';
import type {
  CanonicalEvent,
  ChangeType,
  NotificationItem,
  ResourceType,
  Subscription
} from '../types/index.js';
import { computeEventId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { secretsEqual } from '../utils/secret.js';
import type { DedupCache } from './dedup-cache.js';

/**
 * Read access the gateway needs to the subscription store
 */
export interface SubscriptionLookup {
  get(id: string): Subscription | undefined;
}

/**
 * Where accepted events go; the dispatcher in production
 */
export interface EventSink {
  enqueue(event: CanonicalEvent): Promise<void>;
}

export interface BatchResult {
  accepted: number;
  duplicates: number;
  spoofed: number;
  unknown: number;
  invalid: number;
}

export interface NotificationGatewayOptions {
  store: SubscriptionLookup;
  sink: EventSink;
  dedup: DedupCache;
  logger: Logger;
  clock?: () => Date;
}

type ItemOutcome = keyof BatchResult;

/**
 * Authenticates, deduplicates and normalizes inbound change notifications.
 *
 * Application-level problems (unknown subscription, spoofed clientState,
 * duplicates, malformed items) drop the item and never fail the batch. Only
 * a failure to hand an event to the sink fails the batch, so the provider
 * redelivers it.
 */
export class NotificationGateway {
  private readonly clock: () => Date;

  constructor(private readonly options: NotificationGatewayOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validation handshake: the token goes back verbatim
   */
  handleValidation(resourceType: ResourceType, token: string): string {
    this.options.logger.info(`Answered validation handshake on ${resourceType} endpoint`);
    return token;
  }

  async acceptBatch(resourceType: ResourceType, payload: unknown): Promise<BatchResult> {
    if (!isRecord(payload) || !Array.isArray(payload.value)) {
      throw RelayError.badRequest('Notification body must be an object with a value array');
    }

    const result: BatchResult = { accepted: 0, duplicates: 0, spoofed: 0, unknown: 0, invalid: 0 };
    const receivedAt = this.clock().toISOString();

    for (const raw of payload.value) {
      const outcome = await this.acceptItem(resourceType, raw, receivedAt);
      result[outcome]++;
    }

    this.options.logger.info(
      `Processed ${payload.value.length} ${resourceType} notification(s): ` +
        `${result.accepted} accepted, ${result.duplicates} duplicate, ${result.spoofed} spoofed, ` +
        `${result.unknown} unknown, ${result.invalid} invalid`
    );
    return result;
  }

  private async acceptItem(resourceType: ResourceType, raw: unknown, receivedAt: string): Promise<ItemOutcome> {
    const { logger } = this.options;

    if (!isRecord(raw)) {
      logger.warn('Dropped notification item that is not an object');
      return 'invalid';
    }
    const item = parseItem(raw);
    if (!item) {
      logger.warn('Dropped notification item with missing subscriptionId, resource or changeType');
      return 'invalid';
    }

    const subscription = this.options.store.get(item.subscriptionId);
    if (!subscription) {
      logger.warn(`Dropped notification for unknown subscription ${item.subscriptionId}`);
      return 'unknown';
    }
    if (!LIVE_STATUSES.includes(subscription.status)) {
      logger.warn(`Dropped notification for ${subscription.status} subscription ${item.subscriptionId}`);
      return 'unknown';
    }
    if (subscription.resourceType !== resourceType) {
      logger.warn(
        `Dropped notification for subscription ${item.subscriptionId}: ` +
          `registered for ${subscription.resourceType}, received on ${resourceType} endpoint`
      );
      return 'unknown';
    }

    if (!secretsEqual(item.clientState, subscription.clientState)) {
      logger.warn(
        `SECURITY: clientState mismatch for subscription ${item.subscriptionId} ` +
          `(resource ${item.resource}); possible spoofed notification dropped`
      );
      return 'spoofed';
    }

    const resourceId = item.resourceData?.id ?? item.resource;
    const eventId = computeEventId({
      subscriptionId: item.subscriptionId,
      resourceId,
      changeType: item.changeType,
      timestamp: item.eventTime ?? ''
    });

    if (!this.options.dedup.register(eventId)) {
      logger.debug(`Dropped duplicate event ${eventId}`);
      return 'duplicates';
    }

    const event: CanonicalEvent = Object.freeze({
      eventId,
      subscriptionId: subscription.id,
      account: subscription.account,
      resourceType: subscription.resourceType,
      changeType: item.changeType,
      resourceId,
      receivedAt,
      rawPayload: Object.freeze({ ...raw })
    });

    try {
      await this.options.sink.enqueue(event);
    } catch (error) {
      // Not accepted, so a redelivery of this item must not count as a duplicate
      this.options.dedup.forget(eventId);
      throw error;
    }
    return 'accepted';
  }
}

function parseItem(raw: Record<string, unknown>): NotificationItem | undefined {
  const { subscriptionId, changeType, resource, clientState, resourceData, eventTime } = raw;
  if (typeof subscriptionId !== 'string' || subscriptionId.length === 0) return undefined;
  if (typeof resource !== 'string') return undefined;
  if (!isChangeType(changeType)) return undefined;

  const item: NotificationItem = { subscriptionId, changeType, resource };
  if (typeof clientState === 'string') item.clientState = clientState;
  if (typeof eventTime === 'string') item.eventTime = eventTime;
  if (isRecord(resourceData) && typeof resourceData.id === 'string') {
    item.resourceData = { ...resourceData, id: resourceData.id };
  }
  if (typeof raw.tenantId === 'string') item.tenantId = raw.tenantId;
  return item;
}

function isChangeType(value: unknown): value is ChangeType {
  return typeof value === 'string' && (CHANGE_TYPES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
