import axios, { AxiosInstance } from 'axios';
import { RelayError, isRelayError } from '../middleware/error.js';
import type { CanonicalEvent, DeliveryAttempt } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { RetryAbortedError, RetryPolicy } from '../utils/retry.js';
import { toRelayError } from './http-errors.js';

export interface DispatcherOptions {
  consumerUrl: string;
  consumerApiKey?: string;
  /** Maximum events held at once, queued plus in flight */
  queueCapacity: number;
  /** Maximum subscription lanes delivering at the same time */
  concurrency: number;
  /** How long enqueue waits for room before failing the caller */
  enqueueTimeoutMs: number;
  requestTimeoutMs: number;
  retryPolicy: RetryPolicy;
  logger: Logger;
  http?: AxiosInstance;
}

export interface DispatcherStats {
  accepting: boolean;
  queued: number;
  inFlight: number;
  tracked: number;
  delivered: number;
  failed: number;
  abandoned: number;
}

/** Hint returned to the provider when the queue is full */
const QUEUE_FULL_RETRY_AFTER_MS = 5000;

/**
 * Delivers canonical events to the downstream consumer.
 *
 * Events are grouped into lanes by subscription id. A lane is drained by one
 * worker in arrival order, and at most `concurrency` lanes run at once, so
 * ordering holds per subscription but not across subscriptions.
 */
export class Dispatcher {
  private readonly http: AxiosInstance;
  private readonly lanes = new Map<string, CanonicalEvent[]>();
  private readonly readyLanes: string[] = [];
  private readonly runningLanes = new Set<string>();
  private readonly attempts = new Map<string, DeliveryAttempt>();
  private readonly spaceWaiters = new Set<() => void>();
  private readonly idleWaiters = new Set<() => void>();
  private readonly abortController = new AbortController();
  private pending = 0;
  private inFlight = 0;
  private delivered = 0;
  private failed = 0;
  private abandoned = 0;
  private accepting = true;

  constructor(private readonly options: DispatcherOptions) {
    this.http = options.http ?? axios.create();
  }

  /**
   * Accept an event for delivery. Waits up to `enqueueTimeoutMs` for room
   * and then throws a transient RelayError.
   */
  async enqueue(event: CanonicalEvent): Promise<void> {
    if (!this.accepting) {
      throw RelayError.transient('Dispatcher is shutting down', { retryAfterMs: QUEUE_FULL_RETRY_AFTER_MS });
    }

    if (this.pending >= this.options.queueCapacity) {
      const hasRoom = await this.waitForSpace(this.options.enqueueTimeoutMs);
      if (!hasRoom) {
        throw RelayError.transient(
          this.accepting
            ? `Delivery queue is full (${this.options.queueCapacity} events)`
            : 'Dispatcher is shutting down',
          { retryAfterMs: QUEUE_FULL_RETRY_AFTER_MS }
        );
      }
    }

    this.pending++;
    const lane = this.lanes.get(event.subscriptionId);
    if (lane) {
      lane.push(event);
    } else {
      this.lanes.set(event.subscriptionId, [event]);
      this.readyLanes.push(event.subscriptionId);
    }
    this.options.logger.debug(`Queued event ${event.eventId} (${this.pending}/${this.options.queueCapacity})`);
    this.schedule();
  }

  stats(): DispatcherStats {
    return {
      accepting: this.accepting,
      queued: this.pending - this.inFlight,
      inFlight: this.inFlight,
      tracked: this.attempts.size,
      delivered: this.delivered,
      failed: this.failed,
      abandoned: this.abandoned
    };
  }

  /**
   * Delivery attempt currently tracked for an event, if it is in flight
   */
  attemptFor(eventId: string): DeliveryAttempt | undefined {
    const attempt = this.attempts.get(eventId);
    return attempt ? { ...attempt } : undefined;
  }

  /**
   * Resolves true once nothing is queued or in flight, false on timeout
   */
  async waitForIdle(timeoutMs?: number): Promise<boolean> {
    if (this.pending === 0) {
      return true;
    }
    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onIdle = (): void => {
        if (timer) clearTimeout(timer);
        this.idleWaiters.delete(onIdle);
        resolve(true);
      };
      this.idleWaiters.add(onIdle);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.idleWaiters.delete(onIdle);
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  /**
   * Stop accepting events and give queued deliveries `graceMs` to finish.
   * Whatever is left is abandoned. Returns the number of abandoned events.
   */
  async stop(graceMs: number): Promise<number> {
    this.accepting = false;
    for (const wake of [...this.spaceWaiters]) {
      wake();
    }

    const before = this.abandoned;
    const drained = await this.waitForIdle(graceMs);
    if (!drained) {
      this.options.logger.warn(
        `Shutdown grace period of ${graceMs}ms elapsed with ${this.pending} event(s) undelivered`
      );
      this.abortController.abort();
      await this.waitForIdle();
    }
    return this.abandoned - before;
  }

  private schedule(): void {
    while (this.runningLanes.size < this.options.concurrency && this.readyLanes.length > 0) {
      const key = this.readyLanes.shift();
      if (key === undefined) break;
      this.runningLanes.add(key);
      this.runLane(key).catch((error: unknown) => {
        this.options.logger.error(`Delivery lane ${key} crashed: ${error instanceof Error ? error.message : String(error)}`);
      });
    }
  }

  private async runLane(key: string): Promise<void> {
    const queue = this.lanes.get(key) ?? [];
    try {
      let event = queue.shift();
      while (event) {
        try {
          await this.deliver(event);
        } finally {
          this.settle();
        }
        event = queue.shift();
      }
    } finally {
      // Runs in the same tick as the final empty shift, so no enqueue can slip in between
      this.lanes.delete(key);
      this.runningLanes.delete(key);
      this.schedule();
    }
  }

  private async deliver(event: CanonicalEvent): Promise<void> {
    const signal = this.abortController.signal;
    const policy = this.options.retryPolicy;
    const tracking: DeliveryAttempt = { eventId: event.eventId, attemptCount: 0 };

    if (signal.aborted) {
      this.abandon(event, 0);
      return;
    }

    this.attempts.set(event.eventId, tracking);
    this.inFlight++;
    try {
      await policy.execute(
        async (attempt) => {
          tracking.attemptCount = attempt;
          tracking.nextRetryAt = undefined;
          try {
            await this.http.post(this.options.consumerUrl, event, {
              headers: this.headers(event),
              timeout: this.options.requestTimeoutMs,
              signal
            });
          } catch (error) {
            const relayError = toRelayError(error, `Delivery of event ${event.eventId}`);
            tracking.lastError = relayError.message;
            this.options.logger.warn(
              `Delivery attempt ${attempt}/${policy.maxAttempts} for event ${event.eventId} failed: ${relayError.message}`
            );
            throw relayError;
          }
        },
        {
          signal,
          delayHint: error => (isRelayError(error) ? error.retryAfterMs : undefined),
          onRetry: ({ delayMs }) => {
            tracking.nextRetryAt = new Date(Date.now() + delayMs);
          }
        }
      );

      this.delivered++;
      this.options.logger.info(
        `Delivered event ${event.eventId} (${event.resourceType} ${event.changeType}) after ${tracking.attemptCount} attempt(s)`
      );
    } catch (error) {
      if (error instanceof RetryAbortedError || signal.aborted) {
        this.abandon(event, tracking.attemptCount);
        return;
      }
      this.failed++;
      const failure = RelayError.permanentDeliveryFailure(
        `Event ${event.eventId} permanently failed after ${tracking.attemptCount} attempt(s): ${tracking.lastError ?? 'unknown error'}`,
        { cause: error }
      );
      this.options.logger.error(failure.message);
    } finally {
      this.attempts.delete(event.eventId);
      this.inFlight--;
    }
  }

  private abandon(event: CanonicalEvent, attempts: number): void {
    this.abandoned++;
    this.options.logger.warn(`Abandoned event ${event.eventId} at shutdown after ${attempts} attempt(s)`);
  }

  private headers(event: CanonicalEvent): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Event-Id': event.eventId
    };
    if (this.options.consumerApiKey) {
      headers['X-Api-Key'] = this.options.consumerApiKey;
    }
    return headers;
  }

  private settle(): void {
    this.pending--;
    const [wake] = this.spaceWaiters;
    if (wake) {
      wake();
    }
    if (this.pending === 0) {
      for (const onIdle of [...this.idleWaiters]) {
        onIdle();
      }
    }
  }

  private waitForSpace(timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    const waitOnce = (remaining: number): Promise<void> =>
      new Promise<void>((resolve) => {
        const wake = (): void => {
          clearTimeout(timer);
          this.spaceWaiters.delete(wake);
          resolve();
        };
        const timer = setTimeout(wake, remaining);
        this.spaceWaiters.add(wake);
      });

    const loop = async (): Promise<boolean> => {
      while (this.pending >= this.options.queueCapacity) {
        const remaining = deadline - Date.now();
        if (remaining <= 0 || !this.accepting) {
          return false;
        }
        await waitOnce(remaining);
      }
      return this.accepting;
    };

    return loop();
  }
}
