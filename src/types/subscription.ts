export const RESOURCE_TYPES = ['Email', 'TeamsChat', 'TeamsChannel'] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const SUBSCRIPTION_STATUSES = ['Pending', 'Active', 'Expiring', 'Expired', 'Failed'] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

/** Statuses that still count as covering their (resourceType, account, resourcePath) tuple */
export const LIVE_STATUSES: readonly SubscriptionStatus[] = ['Pending', 'Active', 'Expiring'];

export function isResourceType(value: unknown): value is ResourceType {
  return typeof value === 'string' && (RESOURCE_TYPES as readonly string[]).includes(value);
}

export function isSubscriptionStatus(value: unknown): value is SubscriptionStatus {
  return typeof value === 'string' && (SUBSCRIPTION_STATUSES as readonly string[]).includes(value);
}

/**
 * Locally tracked push subscription
 */
export interface Subscription {
  id: string;
  account: string;
  resourceType: ResourceType;
  resourcePath: string;
  changeType: string;
  notificationUrl: string;
  clientState: string;
  expiresAt: Date;
  renewedAt: Date;
  nextCheckAt: Date;
  status: SubscriptionStatus;
  lastError?: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Identifies the thing a subscription watches
 */
export interface SubscriptionTarget {
  account: string;
  resourceType: ResourceType;
  resourcePath: string;
}

/**
 * A target the renewal loop must not recreate on its own, because the
 * provider rejected it or an operator revoked it
 */
export interface TargetHold extends SubscriptionTarget {
  reason: string;
  createdAt: Date;
}

/**
 * A channel of a team, from GET /teams/{id}/channels
 */
export interface TeamChannel {
  id: string;
  displayName?: string;
}

/**
 * Body of POST /subscriptions
 */
export interface SubscriptionCreationParams {
  changeType: string;
  notificationUrl: string;
  resource: string;
  expirationDateTime: string;
  clientState: string;
  latestSupportedTlsVersion?: string;
}

/**
 * Subscription as Graph returns it
 */
export interface ProviderSubscription {
  id: string;
  resource: string;
  changeType: string;
  notificationUrl: string;
  expirationDateTime: string;
  clientState?: string | null;
  applicationId?: string;
  creatorId?: string;
}

export interface NotificationResourceData {
  '@odata.type'?: string;
  '@odata.id'?: string;
  id: string;
  [key: string]: unknown;
}

/**
 * A single item of a change-notification batch
 */
export interface NotificationItem {
  subscriptionId: string;
  subscriptionExpirationDateTime?: string;
  changeType: ChangeType;
  resource: string;
  resourceData?: NotificationResourceData;
  clientState?: string;
  tenantId?: string;
  eventTime?: string;
}

export interface NotificationPayload {
  value: NotificationItem[];
}

export type ChangeType = 'created' | 'updated' | 'deleted';

export const CHANGE_TYPES: readonly ChangeType[] = ['created', 'updated', 'deleted'];
