/**
 * Recommendation trigger
 * Reacts to completed predictions and exposes an on-demand analysis summary
 */

import type { EventBridgeEvent, Handler } from 'aws-lambda';
import { Priority } from '../types/core';
import type { RecommendationCategory } from '../types/core';
import type { PredictionCompletedEvent } from '../types/prediction';
import type { Recommendation, RecommendationAnalysisResult } from '../types/recommendation';
import { errorMessage } from '../shared/utils/errors';
import { Logger, createLambdaLogger } from '../shared/utils/logger';
import { createYieldAdvisor } from '../app-context';
import type { RecommendationEngine } from './recommendation-engine';

export interface BatchSummary {
  processed: number;
  failed: number;
}

export function summarizeRecommendations(recommendations: Recommendation[]): RecommendationAnalysisResult {
  const count = (priority: Priority) => recommendations.filter(item => item.priority === priority).length;
  const categorized: Partial<Record<RecommendationCategory, Recommendation[]>> = {};

  for (const recommendation of recommendations) {
    const bucket = categorized[recommendation.category] ?? [];
    bucket.push(recommendation);
    categorized[recommendation.category] = bucket;
  }

  const criticalCount = count(Priority.CRITICAL);
  const highPriorityCount = count(Priority.HIGH);

  return {
    success: true,
    recommendations,
    totalRecommendations: recommendations.length,
    criticalCount,
    highPriorityCount,
    mediumPriorityCount: count(Priority.MEDIUM),
    lowPriorityCount: count(Priority.LOW),
    categorized,
    interventionRequired: criticalCount + highPriorityCount > 0,
  };
}

export class RecommendationTrigger {
  private readonly logger: Logger;

  constructor(
    private readonly engine: RecommendationEngine,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'RecommendationTrigger' });
  }

  /**
   * Consumer for prediction-completed events. Never throws.
   */
  async handlePredictionCompleted(event: PredictionCompletedEvent): Promise<void> {
    const logger = this.logger.child({ sessionId: event.sessionId, predictionId: event.prediction.id });

    try {
      const recommendations = await this.engine.generateRecommendations(
        event.sessionId,
        event.prediction,
        event.prediction.predictionDate
      );

      for (const critical of recommendations.filter(item => item.priority === Priority.CRITICAL)) {
        logger.warn('Critical recommendation issued', {
          userId: event.userId,
          title: critical.title,
          category: critical.category,
        });
      }

      logger.info('Recommendations generated from prediction', { count: recommendations.length });
    } catch (error) {
      logger.error('Failed to generate recommendations for prediction', error);
    }
  }

  async triggerRecommendationAnalysis(sessionId: string): Promise<RecommendationAnalysisResult> {
    try {
      const recommendations = await this.engine.generateForSession(sessionId);
      return summarizeRecommendations(recommendations);
    } catch (error) {
      this.logger.error('Recommendation analysis failed', error, { sessionId });
      return {
        ...summarizeRecommendations([]),
        success: false,
        errorMessage: errorMessage(error),
      };
    }
  }

  async processBatch(events: readonly PredictionCompletedEvent[]): Promise<BatchSummary> {
    let failed = 0;

    for (const event of events) {
      try {
        await this.engine.generateRecommendations(event.sessionId, event.prediction, event.prediction.predictionDate);
      } catch (error) {
        failed += 1;
        this.logger.error('Batch recommendation generation failed', error, { sessionId: event.sessionId });
      }
    }

    this.logger.info('Recommendation batch processed', { total: events.length, failed });
    return { processed: events.length - failed, failed };
  }
}

/**
 * EventBridge target for "Yield Prediction Completed" events
 */
export const handler: Handler<EventBridgeEvent<string, PredictionCompletedEvent>, void> = async (event, context) => {
  const logger = createLambdaLogger('recommendation-trigger', context.awsRequestId);
  logger.info('Prediction completed event received', { eventId: event.id, sessionId: event.detail.sessionId });

  const advisor = createYieldAdvisor({ logger });
  await advisor.trigger.handlePredictionCompleted(event.detail);
};
