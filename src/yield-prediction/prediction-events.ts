/**
 * Prediction-completed notifications
 * An in-process queue drained by a separate consumer task, or EventBridge when a bus is configured
 */

import { EventBridge } from 'aws-sdk';
import type { PredictionCompletedEvent } from '../types/prediction';
import { EVENT_DETAIL_TYPES, EVENT_SOURCES } from '../shared/config/constants';
import { Logger } from '../shared/utils/logger';

export interface PredictionEventPublisher {
  publish(event: PredictionCompletedEvent): Promise<void>;
}

export type PredictionEventConsumer = (event: PredictionCompletedEvent) => Promise<void>;

/**
 * Producers enqueue and return immediately; consumers run on a later tick.
 * A consumer failure is logged and never reaches the producer or other consumers.
 */
export class PredictionEventQueue implements PredictionEventPublisher {
  private readonly queue: PredictionCompletedEvent[] = [];
  private readonly consumers: PredictionEventConsumer[] = [];
  private readonly logger: Logger;
  private draining?: Promise<void>;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'PredictionEventQueue' });
  }

  subscribe(consumer: PredictionEventConsumer): () => void {
    this.consumers.push(consumer);
    return () => {
      const index = this.consumers.indexOf(consumer);
      if (index >= 0) this.consumers.splice(index, 1);
    };
  }

  async publish(event: PredictionCompletedEvent): Promise<void> {
    this.queue.push(event);
    this.logger.debug('Prediction event queued', { sessionId: event.sessionId, pending: this.queue.length });
    this.scheduleDrain();
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Resolves once the queue is empty and no consumer is running
   */
  async onIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private scheduleDrain(): void {
    if (this.draining) {
      return;
    }

    this.draining = new Promise<void>(resolve => setImmediate(resolve))
      .then(() => this.drain())
      .finally(() => {
        this.draining = undefined;
        if (this.queue.length > 0) {
          this.scheduleDrain();
        }
      });
  }

  private async drain(): Promise<void> {
    let event = this.queue.shift();
    while (event) {
      for (const consumer of [...this.consumers]) {
        try {
          await consumer(event);
        } catch (error) {
          this.logger.error('Prediction event consumer failed', error, {
            sessionId: event.sessionId,
            predictionId: event.prediction.id,
          });
        }
      }
      event = this.queue.shift();
    }
  }
}

export class EventBridgePredictionPublisher implements PredictionEventPublisher {
  private readonly eventBridge: EventBridge;

  constructor(
    private readonly eventBusName: string,
    private readonly logger: Logger,
    eventBridge?: EventBridge
  ) {
    this.eventBridge = eventBridge ?? new EventBridge();
  }

  async publish(event: PredictionCompletedEvent): Promise<void> {
    const result = await this.eventBridge.putEvents({
      Entries: [
        {
          Source: EVENT_SOURCES.PREDICTION,
          DetailType: EVENT_DETAIL_TYPES.PREDICTION_COMPLETED,
          Detail: JSON.stringify(event),
          EventBusName: this.eventBusName,
        },
      ],
    }).promise();

    if (result.FailedEntryCount) {
      const failure = result.Entries?.find(entry => entry.ErrorCode);
      throw new Error(`EventBridge rejected prediction event: ${failure?.ErrorCode ?? 'unknown'} ${failure?.ErrorMessage ?? ''}`.trim());
    }

    this.logger.info('Prediction event published', { sessionId: event.sessionId, predictionId: event.prediction.id });
  }
}
