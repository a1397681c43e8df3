/**
 * Prediction analysis: yield deficit against an expected yield and a 1-5 criticality level
 */

import type { MaizeVariety, PlantingSession } from '../types/agronomy';
import type { YieldPrediction } from '../types/prediction';
import type { PredictionAnalysis } from '../types/recommendation';
import type { CriticalityThresholds } from '../shared/config/environment';
import { average } from '../shared/utils/numbers';
import { Logger } from '../shared/utils/logger';
import type { YieldHistoryRepository } from '../persistence/repositories';

export type AnalyzedPrediction = Pick<YieldPrediction, 'predictedYield' | 'confidence'>;

export interface PredictionAnalyzerDeps {
  yieldHistory: YieldHistoryRepository;
  thresholds: CriticalityThresholds;
  logger: Logger;
}

export class PredictionAnalyzer {
  private readonly yieldHistory: YieldHistoryRepository;
  private readonly thresholds: CriticalityThresholds;
  private readonly logger: Logger;

  constructor(deps: PredictionAnalyzerDeps) {
    this.yieldHistory = deps.yieldHistory;
    this.thresholds = deps.thresholds;
    this.logger = deps.logger.child({ component: 'PredictionAnalyzer' });
  }

  analyze(prediction: AnalyzedPrediction, expectedYield: number): PredictionAnalysis {
    const t = this.thresholds;
    const deficitPercentage =
      expectedYield > 0 ? ((expectedYield - prediction.predictedYield) / expectedYield) * 100 : 0;

    const belowCritical = prediction.predictedYield < t.criticalYield;
    const significantDeficit = deficitPercentage > t.yieldDeficitPercent;
    const lowConfidence = prediction.confidence < t.lowConfidencePercent;

    let criticalityLevel: PredictionAnalysis['criticalityLevel'] = 1;
    if (belowCritical) {
      criticalityLevel = 5;
    } else if (deficitPercentage > t.severeDeficitPercent) {
      criticalityLevel = 4;
    } else if (significantDeficit) {
      criticalityLevel = 3;
    } else if (lowConfidence) {
      criticalityLevel = 2;
    }

    return {
      needsIntervention: belowCritical || significantDeficit || lowConfidence,
      criticalityLevel,
      deficitPercentage,
      expectedYield,
    };
  }

  /**
   * Farm history for the variety first, then the variety's published average, then the optimal target
   */
  async resolveExpectedYield(session: PlantingSession, variety: MaizeVariety): Promise<number> {
    const history = await this.yieldHistory.findByFarmAndVariety(session.farmId, variety.id);
    const historicalAverage = average(history.map(record => record.actualYield));

    if (historicalAverage !== null && historicalAverage > 0) {
      return historicalAverage;
    }
    if (variety.averageYield !== undefined && variety.averageYield > 0) {
      return variety.averageYield;
    }

    this.logger.debug('No yield baseline available, using optimal target', {
      sessionId: session.id,
      varietyId: variety.id,
    });
    return this.thresholds.optimalYieldTarget;
  }
}
