import { describe, it, expect, vi } from 'vitest';
import { Priority, RecommendationCategory } from '../src/types/core';
import type { Recommendation } from '../src/types/recommendation';
import type { PredictionCompletedEvent } from '../src/types/prediction';
import { PredictionEventQueue } from '../src/yield-prediction/prediction-events';
import { summarizeRecommendations } from '../src/advisory-engine/recommendation-trigger';
import { AS_OF, buildPrediction, seedHealthyFarm, testLogger } from './support/fixtures';
import { createTestAdvisor } from './support/test-advisor';

function predictionEvent(sessionId = 'session-1'): PredictionCompletedEvent {
  return {
    userId: 'user-1',
    sessionId,
    prediction: buildPrediction({ sessionId }),
    timestamp: '2024-06-30T08:00:00.000Z',
  };
}

function recommendation(priority: Priority, category: RecommendationCategory, title: string): Recommendation {
  return {
    id: title,
    sessionId: 'session-1',
    recommendationDate: AS_OF,
    category,
    priority,
    title,
    description: `${title} description`,
    isViewed: false,
    isImplemented: false,
    createdAt: '2024-06-30T09:00:00.000Z',
  };
}

describe('PredictionEventQueue', () => {
  it('returns to the producer before any consumer runs', async () => {
    const queue = new PredictionEventQueue(testLogger());
    const consumer = vi.fn(async (_event: PredictionCompletedEvent) => {});
    queue.subscribe(consumer);

    await queue.publish(predictionEvent());

    expect(consumer).not.toHaveBeenCalled();
    expect(queue.pending).toBe(1);

    await queue.onIdle();

    expect(consumer).toHaveBeenCalledTimes(1);
    expect(queue.pending).toBe(0);
  });

  it('delivers events in order and isolates a failing consumer', async () => {
    const queue = new PredictionEventQueue(testLogger());
    const received: string[] = [];
    queue.subscribe(async () => {
      throw new Error('consumer crashed');
    });
    queue.subscribe(async event => {
      received.push(event.sessionId);
    });

    await queue.publish(predictionEvent('session-1'));
    await queue.publish(predictionEvent('session-2'));
    await queue.onIdle();

    expect(received).toEqual(['session-1', 'session-2']);
  });

  it('stops delivering after unsubscribe', async () => {
    const queue = new PredictionEventQueue(testLogger());
    const consumer = vi.fn(async (_event: PredictionCompletedEvent) => {});
    const unsubscribe = queue.subscribe(consumer);

    await queue.publish(predictionEvent());
    await queue.onIdle();
    unsubscribe();
    await queue.publish(predictionEvent());
    await queue.onIdle();

    expect(consumer).toHaveBeenCalledTimes(1);
  });
});

describe('summarizeRecommendations', () => {
  it('counts priorities and groups by category', () => {
    const items = [
      recommendation(Priority.CRITICAL, RecommendationCategory.EMERGENCY, 'Alert'),
      recommendation(Priority.HIGH, RecommendationCategory.IRRIGATION, 'Irrigate'),
      recommendation(Priority.HIGH, RecommendationCategory.IRRIGATION, 'Irrigate again'),
      recommendation(Priority.MEDIUM, RecommendationCategory.DATA_QUALITY, 'Data'),
    ];

    const summary = summarizeRecommendations(items);

    expect(summary).toMatchObject({
      success: true,
      totalRecommendations: 4,
      criticalCount: 1,
      highPriorityCount: 2,
      mediumPriorityCount: 1,
      lowPriorityCount: 0,
      interventionRequired: true,
    });
    expect(summary.categorized[RecommendationCategory.IRRIGATION]?.map(item => item.title)).toEqual(['Irrigate', 'Irrigate again']);
    expect(Object.keys(summary.categorized)).toEqual(['EMERGENCY', 'IRRIGATION', 'DATA_QUALITY']);
  });

  it('needs no intervention for low and medium items only', () => {
    const summary = summarizeRecommendations([recommendation(Priority.LOW, RecommendationCategory.MONITORING, 'Watch')]);

    expect(summary.interventionRequired).toBe(false);
  });
});

describe('RecommendationTrigger', () => {
  it('stores recommendations for a completed prediction', async () => {
    const advisor = createTestAdvisor();
    seedHealthyFarm(advisor.repositories);

    await advisor.trigger.handlePredictionCompleted(predictionEvent());

    expect(advisor.repositories.recommendations.recommendations.map(item => item.title)).toEqual([
      'Continue Current Management Practices',
      'Regular Crop Monitoring',
    ]);
  });

  it('never throws from the event consumer', async () => {
    const advisor = createTestAdvisor();

    await expect(advisor.trigger.handlePredictionCompleted(predictionEvent('missing'))).resolves.toBeUndefined();
    expect(advisor.repositories.recommendations.recommendations).toEqual([]);
  });

  it('summarizes an on-demand analysis', async () => {
    const advisor = createTestAdvisor();
    seedHealthyFarm(advisor.repositories);

    const result = await advisor.trigger.triggerRecommendationAnalysis('session-1');

    expect(result).toMatchObject({
      success: true,
      totalRecommendations: 2,
      lowPriorityCount: 2,
      interventionRequired: false,
    });
  });

  it('reports a failed analysis instead of throwing', async () => {
    const advisor = createTestAdvisor();

    const result = await advisor.trigger.triggerRecommendationAnalysis('missing');

    expect(result).toMatchObject({
      success: false,
      errorMessage: 'PlantingSession not found: missing',
      totalRecommendations: 0,
      recommendations: [],
    });
  });

  it('counts failures in a batch', async () => {
    const advisor = createTestAdvisor();
    seedHealthyFarm(advisor.repositories);

    const summary = await advisor.trigger.processBatch([predictionEvent(), predictionEvent('missing')]);

    expect(summary).toEqual({ processed: 1, failed: 1 });
  });
});
