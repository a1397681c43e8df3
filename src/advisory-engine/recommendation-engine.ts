/**
 * Recommendation engine
 * Analyzes a prediction, picks the intervention or maintenance path, escalates severe cases
 * to the advanced provider, then deduplicates by title and persists the batch.
 */

import { v4 as uuidv4 } from 'uuid';
import type { IsoDate } from '../types/core';
import type { MaizeVariety, PlantingSession } from '../types/agronomy';
import type {
  PredictionAnalysis,
  Recommendation,
  RecommendationDraft,
  RecommendationUpdate,
} from '../types/recommendation';
import { Priority } from '../types/core';
import type { CriticalityThresholds } from '../shared/config/environment';
import { todayIsoDate } from '../shared/utils/dates';
import { ResourceNotFoundError, errorMessage } from '../shared/utils/errors';
import { Logger } from '../shared/utils/logger';
import { roundTo } from '../shared/utils/numbers';
import type {
  MaizeVarietyRepository,
  PlantingSessionRepository,
  RecommendationRepository,
  YieldPredictionRepository,
} from '../persistence/repositories';
import type { AdvancedRecommendationProvider } from './advanced-recommendation-provider';
import type { AnalyzedPrediction, PredictionAnalyzer } from './prediction-analyzer';
import type { RiskAssessment, RiskFactorAnalyzer } from './risk-factor-analyzer';
import { GENERAL_TEMPLATES, RISK_FACTOR_TEMPLATES, TemplateContext, fromTemplate } from './recommendation-templates';

const ESCALATION_CRITICALITY = 3;

export interface RecommendationEngineDeps {
  sessions: PlantingSessionRepository;
  varieties: MaizeVarietyRepository;
  predictions: YieldPredictionRepository;
  recommendations: RecommendationRepository;
  riskAnalyzer: RiskFactorAnalyzer;
  predictionAnalyzer: PredictionAnalyzer;
  advancedProvider: AdvancedRecommendationProvider | null;
  thresholds: CriticalityThresholds;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Keep the first item for each title
 */
export function deduplicateByTitle<T extends { title: string }>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  return items.filter(item => {
    if (seen.has(item.title)) {
      return false;
    }
    seen.add(item.title);
    return true;
  });
}

/**
 * Merge a partial update from the CRUD layer into a stored recommendation
 */
export function applyRecommendationUpdate(recommendation: Recommendation, update: RecommendationUpdate): Recommendation {
  return {
    ...recommendation,
    isViewed: update.isViewed ?? recommendation.isViewed,
    isImplemented: update.isImplemented ?? recommendation.isImplemented,
  };
}

export class RecommendationEngine {
  private readonly deps: RecommendationEngineDeps;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: RecommendationEngineDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'RecommendationEngine' });
    this.clock = deps.clock ?? (() => new Date());
  }

  async generateRecommendations(
    sessionId: string,
    prediction: AnalyzedPrediction,
    asOfDate?: IsoDate
  ): Promise<Recommendation[]> {
    const { session, variety } = await this.loadSession(sessionId);
    const date = asOfDate ?? todayIsoDate(this.clock());
    const logger = this.logger.child({ sessionId, farmId: session.farmId });

    const expectedYield = await this.deps.predictionAnalyzer.resolveExpectedYield(session, variety);
    const analysis = this.deps.predictionAnalyzer.analyze(prediction, expectedYield);

    let drafts: RecommendationDraft[];
    if (analysis.needsIntervention) {
      const assessment = await this.deps.riskAnalyzer.identifyRiskFactors(session, variety, date);
      drafts = this.interventionPath(prediction, analysis, assessment);

      if (analysis.criticalityLevel >= ESCALATION_CRITICALITY) {
        drafts.push(...(await this.escalate(session, variety, assessment, logger)));
      }

      logger.info('Intervention path selected', {
        criticalityLevel: analysis.criticalityLevel,
        deficitPercentage: roundTo(analysis.deficitPercentage, 1),
        riskFactors: assessment.riskFactors,
      });
    } else {
      drafts = this.maintenancePath();
    }

    return this.persist(sessionId, date, drafts, logger);
  }

  /**
   * Generate from the latest stored prediction; without one the crop gets maintenance advice
   */
  async generateForSession(sessionId: string, asOfDate?: IsoDate): Promise<Recommendation[]> {
    const latest = await this.deps.predictions.findLatestBySession(sessionId);
    if (latest) {
      return this.generateRecommendations(sessionId, latest, asOfDate);
    }

    await this.loadSession(sessionId);
    const logger = this.logger.child({ sessionId });
    logger.info('No prediction stored for session, emitting maintenance recommendations');
    return this.persist(sessionId, asOfDate ?? todayIsoDate(this.clock()), this.maintenancePath(), logger);
  }

  getRecommendations(sessionId: string): Promise<Recommendation[]> {
    return this.deps.recommendations.findBySession(sessionId);
  }

  private interventionPath(
    prediction: AnalyzedPrediction,
    analysis: PredictionAnalysis,
    assessment: RiskAssessment
  ): RecommendationDraft[] {
    const thresholds = this.deps.thresholds;
    const context: TemplateContext = {
      soil: assessment.latestSoil,
      daysSincePlanting: assessment.daysSincePlanting,
      maturityDays: assessment.maturityDays,
      predictedYield: prediction.predictedYield,
      expectedYield: roundTo(analysis.expectedYield, 2),
      deficitPercentage: analysis.deficitPercentage,
      confidence: prediction.confidence,
    };
    const drafts: RecommendationDraft[] = [];

    if (analysis.criticalityLevel === 5) {
      drafts.push(fromTemplate(GENERAL_TEMPLATES.emergency, context));
    }

    if (analysis.deficitPercentage > thresholds.yieldDeficitPercent) {
      drafts.push(
        fromTemplate(
          {
            ...GENERAL_TEMPLATES.yieldOptimization,
            priority: analysis.deficitPercentage > thresholds.highPriorityDeficitPercent ? Priority.HIGH : Priority.MEDIUM,
          },
          context
        )
      );
    }

    for (const factor of assessment.riskFactors) {
      drafts.push(fromTemplate(RISK_FACTOR_TEMPLATES[factor], context));
    }

    if (prediction.confidence < thresholds.lowConfidencePercent) {
      drafts.push(fromTemplate(GENERAL_TEMPLATES.dataQuality, context));
    }

    return drafts;
  }

  private maintenancePath(): RecommendationDraft[] {
    const context: TemplateContext = {
      soil: null,
      daysSincePlanting: 0,
      maturityDays: 0,
      predictedYield: 0,
      expectedYield: 0,
      deficitPercentage: 0,
      confidence: 0,
    };
    return [
      fromTemplate(GENERAL_TEMPLATES.maintenance, context),
      fromTemplate(GENERAL_TEMPLATES.monitoring, context),
    ];
  }

  private async escalate(
    session: PlantingSession,
    variety: MaizeVariety,
    assessment: RiskAssessment,
    logger: Logger
  ): Promise<RecommendationDraft[]> {
    const provider = this.deps.advancedProvider;
    if (!provider) {
      return [];
    }

    try {
      const drafts = await provider.generate({
        session,
        variety,
        recentWeather: assessment.recentWeather,
        latestSoil: assessment.latestSoil,
        daysSincePlanting: assessment.daysSincePlanting,
      });
      logger.info('Advanced recommendations added', { provider: provider.name, count: drafts.length });
      return drafts;
    } catch (error) {
      logger.warn('Advanced recommendation provider failed, keeping local recommendations', {
        provider: provider.name,
        error: errorMessage(error),
      });
      return [];
    }
  }

  private async persist(
    sessionId: string,
    date: IsoDate,
    drafts: readonly RecommendationDraft[],
    logger: Logger
  ): Promise<Recommendation[]> {
    const createdAt = this.clock().toISOString();
    const recommendations: Recommendation[] = deduplicateByTitle(drafts).map(draft => ({
      ...draft,
      id: uuidv4(),
      sessionId,
      recommendationDate: date,
      isViewed: false,
      isImplemented: false,
      createdAt,
    }));

    await this.deps.recommendations.saveAll(recommendations);

    logger.info('Recommendations generated', {
      total: recommendations.length,
      dropped: drafts.length - recommendations.length,
      critical: recommendations.filter(item => item.priority === Priority.CRITICAL).length,
    });
    return recommendations;
  }

  private async loadSession(sessionId: string): Promise<{ session: PlantingSession; variety: MaizeVariety }> {
    const session = await this.deps.sessions.findById(sessionId);
    if (!session) {
      throw new ResourceNotFoundError('PlantingSession', sessionId);
    }

    const variety = await this.deps.varieties.findById(session.varietyId);
    if (!variety) {
      throw new ResourceNotFoundError('MaizeVariety', session.varietyId);
    }

    return { session, variety };
  }
}
