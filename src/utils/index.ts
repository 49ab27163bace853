export { computeEventId, targetKey } from './id.js';
export type { EventIdParts } from './id.js';
export { createLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { RetryPolicy, RetryAbortedError, sleep } from './retry.js';
export type { RetryPolicyOptions, RetryInfo, RetryExecuteOptions } from './retry.js';
export { KeyedLock } from './keyed-lock.js';
export { createIntervalPoller } from './poller.js';
export type { Poller } from './poller.js';
export { generateClientState, secretsEqual } from './secret.js';
