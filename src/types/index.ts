export * from './subscription.js';
export type { CanonicalEvent, DeliveryAttempt } from './event.js';
