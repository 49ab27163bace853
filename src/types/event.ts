import type { ChangeType, ResourceType } from './subscription.js';

/**
 * Normalized, deduplicated change forwarded to the downstream consumer
 */
export interface CanonicalEvent {
  readonly eventId: string;
  readonly subscriptionId: string;
  readonly account: string;
  readonly resourceType: ResourceType;
  readonly changeType: ChangeType;
  readonly resourceId: string;
  readonly receivedAt: string;
  /** The provider's notification item, untouched */
  readonly rawPayload: Readonly<Record<string, unknown>>;
}

export interface DeliveryAttempt {
  eventId: string;
  attemptCount: number;
  nextRetryAt?: Date;
  lastError?: string;
}
