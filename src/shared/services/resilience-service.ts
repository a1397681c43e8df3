/**
 * Resilience service
 * Retry with exponential backoff, ordered provider fallback and per-provider health tracking
 */

import { EventBridge } from 'aws-sdk';
import { EVENT_DETAIL_TYPES, EVENT_SOURCES } from '../config/constants';
import type { RetryPolicy } from '../config/environment';
import { errorMessage } from '../utils/errors';
import { LogData, Logger } from '../utils/logger';

export enum ServiceStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNAVAILABLE = 'unavailable'
}

export interface ServiceHealth {
  serviceName: string;
  status: ServiceStatus;
  lastSuccessfulCall?: string;
  lastFailure?: string;
  failureCount: number;
  message?: string;
}

export interface DegradedServiceEvent {
  serviceName: string;
  operation: string;
  reason: string;
  status: ServiceStatus;
  failureCount: number;
  timestamp: string;
  severity: 'warning' | 'critical';
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface ResilienceServiceOptions {
  /** Degraded-service events are only published when a bus is named. */
  eventBusName?: string;
  eventBridge?: EventBridge;
  sleep?: Sleep;
  now?: () => number;
}

export interface AttemptOptions<T> {
  operation: string;
  retry: RetryPolicy;
  timeoutMs: number;
  /** Absolute epoch millis after which no new attempt starts. */
  deadline?: number;
  /** Results rejected here count as failed attempts. */
  isUsable: (value: T) => boolean;
  context?: LogData;
}

export interface FallbackChainOptions<T> extends Omit<AttemptOptions<T>, 'deadline'> {
  providers: readonly string[];
  fallbackEnabled: boolean;
  /** Cap on elapsed time across the chain; 0 disables it. */
  deadlineMs: number;
  /** Providers rejected here are never called; an unavailable primary counts as exhausted. */
  isAvailable?: (provider: string) => boolean;
}

export interface FallbackChainResult<T> {
  value: T | null;
  provider?: string;
  providersTried: string[];
  lastError?: string;
}

const FAILURES_BEFORE_UNAVAILABLE = 3;

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class ResilienceService {
  private logger: Logger;
  private eventBridge?: EventBridge;
  private eventBusName?: string;
  private sleep: Sleep;
  private now: () => number;
  private serviceHealthMap: Map<string, ServiceHealth>;

  constructor(logger: Logger, options: ResilienceServiceOptions = {}) {
    this.logger = logger.child({ component: 'ResilienceService' });
    this.eventBusName = options.eventBusName;
    this.eventBridge = options.eventBridge ?? (options.eventBusName ? new EventBridge() : undefined);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.serviceHealthMap = new Map();
  }

  /**
   * Call one service up to `retry.maxAttempts` times with exponential backoff.
   * Errors, timeouts and unusable results are all failed attempts; null is returned once they run out.
   */
  async executeWithRetry<T>(
    serviceName: string,
    call: () => Promise<T | null>,
    options: AttemptOptions<T>
  ): Promise<{ value: T | null; lastError?: string }> {
    const { maxAttempts } = options.retry;
    let lastError: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (options.deadline !== undefined && this.now() >= options.deadline) {
        this.logger.warn('Deadline reached, no further attempts', {
          serviceName,
          operation: options.operation,
          attempt,
          ...options.context,
        });
        break;
      }

      try {
        this.logger.debug('Calling service', { serviceName, operation: options.operation, attempt, ...options.context });

        const value = await this.withTimeout(call(), options.timeoutMs, `${serviceName} ${options.operation}`);
        if (value !== null && options.isUsable(value)) {
          this.recordServiceSuccess(serviceName);
          return { value };
        }

        lastError = 'empty result';
        this.logger.warn('Service returned no usable data', {
          serviceName,
          operation: options.operation,
          attempt,
          maxAttempts,
          ...options.context,
        });
      } catch (error) {
        lastError = errorMessage(error);
        this.logger.warn('Service call failed', {
          serviceName,
          operation: options.operation,
          attempt,
          maxAttempts,
          error: lastError,
          ...options.context,
        });
      }

      await this.recordServiceFailure(serviceName, options.operation, lastError);

      if (attempt < maxAttempts) {
        await this.sleep(this.backoffDelay(attempt, options.retry));
      }
    }

    return { value: null, lastError };
  }

  /**
   * Try the first provider with retries, then each remaining provider once, in order.
   * Stops at the first usable result. Unavailable providers keep their place but are not called.
   */
  async executeWithFallback<T>(
    call: (provider: string) => Promise<T | null>,
    options: FallbackChainOptions<T>
  ): Promise<FallbackChainResult<T>> {
    const [primary, ...fallbacks] = options.providers;
    const providersTried: string[] = [];
    if (primary === undefined) {
      return { value: null, providersTried, lastError: 'no providers configured' };
    }

    const isAvailable = options.isAvailable ?? (() => true);
    const deadline = options.deadlineMs > 0 ? this.now() + options.deadlineMs : undefined;
    let lastError: string | undefined;

    if (isAvailable(primary)) {
      const primaryResult = await this.executeWithRetry(primary, () => call(primary), { ...options, deadline });
      providersTried.push(primary);
      if (primaryResult.value !== null) {
        return { value: primaryResult.value, provider: primary, providersTried };
      }
      lastError = primaryResult.lastError;
    } else {
      lastError = `${primary} is not available`;
      this.logger.warn('Primary provider unavailable', { provider: primary, operation: options.operation, ...options.context });
    }

    if (!options.fallbackEnabled) {
      return { value: null, providersTried, lastError };
    }

    const singleAttempt: RetryPolicy = { ...options.retry, maxAttempts: 1 };
    for (const provider of fallbacks) {
      if (!isAvailable(provider)) {
        continue;
      }
      if (deadline !== undefined && this.now() >= deadline) {
        this.logger.warn('Fallback deadline reached', { operation: options.operation, providersTried, ...options.context });
        break;
      }

      this.logger.info('Trying fallback provider', { provider, operation: options.operation, ...options.context });
      const result = await this.executeWithRetry(provider, () => call(provider), {
        ...options,
        retry: singleAttempt,
        deadline,
      });
      providersTried.push(provider);

      if (result.value !== null) {
        return { value: result.value, provider, providersTried };
      }
      lastError = result.lastError;
    }

    this.logger.error('All providers exhausted', undefined, {
      operation: options.operation,
      providersTried,
      lastError,
      ...options.context,
    });
    return { value: null, providersTried, lastError };
  }

  backoffDelay(attempt: number, retry: RetryPolicy): number {
    return Math.min(retry.initialDelayMs * Math.pow(retry.multiplier, attempt - 1), retry.maxDelayMs);
  }

  async withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Record service failure and update health status
   */
  async recordServiceFailure(serviceName: string, operation: string, reason: string): Promise<void> {
    const health = this.serviceHealthMap.get(serviceName) ?? {
      serviceName,
      status: ServiceStatus.HEALTHY,
      failureCount: 0,
    };
    const previousStatus = health.status;

    health.lastFailure = new Date(this.now()).toISOString();
    health.failureCount += 1;
    health.message = reason;
    health.status = health.failureCount >= FAILURES_BEFORE_UNAVAILABLE
      ? ServiceStatus.UNAVAILABLE
      : ServiceStatus.DEGRADED;

    this.serviceHealthMap.set(serviceName, health);

    if (health.status !== previousStatus) {
      await this.publishDegradedServiceEvent({
        serviceName,
        operation,
        reason,
        status: health.status,
        failureCount: health.failureCount,
        timestamp: new Date(this.now()).toISOString(),
        severity: health.status === ServiceStatus.UNAVAILABLE ? 'critical' : 'warning',
      });
    }
  }

  /**
   * Record successful service call and reset health status
   */
  recordServiceSuccess(serviceName: string): void {
    this.serviceHealthMap.set(serviceName, {
      serviceName,
      status: ServiceStatus.HEALTHY,
      failureCount: 0,
      lastSuccessfulCall: new Date(this.now()).toISOString(),
    });
  }

  getServiceHealth(serviceName: string): ServiceHealth | null {
    const health = this.serviceHealthMap.get(serviceName);
    return health ? { ...health } : null;
  }

  getAllServiceHealth(): ServiceHealth[] {
    return Array.from(this.serviceHealthMap.values(), health => ({ ...health }));
  }

  isSystemDegraded(): boolean {
    return this.getAllServiceHealth().some(s => s.status !== ServiceStatus.HEALTHY);
  }

  clearServiceHealth(serviceName?: string): void {
    if (serviceName) {
      this.serviceHealthMap.delete(serviceName);
    } else {
      this.serviceHealthMap.clear();
    }
  }

  private async publishDegradedServiceEvent(event: DegradedServiceEvent): Promise<void> {
    if (!this.eventBridge || !this.eventBusName) {
      return;
    }

    try {
      await this.eventBridge.putEvents({
        Entries: [
          {
            Source: EVENT_SOURCES.WEATHER,
            DetailType: EVENT_DETAIL_TYPES.PROVIDER_DEGRADED,
            Detail: JSON.stringify(event),
            EventBusName: this.eventBusName,
          },
        ],
      }).promise();

      this.logger.warn('Degraded service event published', { ...event });
    } catch (error) {
      // Publishing must not interrupt the fallback chain
      this.logger.error('Failed to publish degraded service event', error, { serviceName: event.serviceName });
    }
  }
}
