/**
 * Yield prediction service
 * Gathers inputs for a planting session, scores them, stores the prediction and announces it
 */

import { v4 as uuidv4 } from 'uuid';
import type { IsoDate } from '../types/core';
import type { MaizeVariety, PlantingSession } from '../types/agronomy';
import type { PredictionQuality, YieldPrediction } from '../types/prediction';
import type { PredictionModelConfig } from '../shared/config/environment';
import { addDays, compareIsoDates, daysBetween, todayIsoDate } from '../shared/utils/dates';
import { PredictionError, ResourceNotFoundError } from '../shared/utils/errors';
import { Logger } from '../shared/utils/logger';
import type {
  MaizeVarietyRepository,
  PlantingSessionRepository,
  SoilSampleRepository,
  WeatherObservationRepository,
  YieldPredictionRepository,
} from '../persistence/repositories';
import { FactorScoringModel } from './factor-scoring-model';
import { growthStageFor } from './growth-stage';
import type { PredictionEventPublisher } from './prediction-events';

export interface YieldPredictionServiceDeps {
  sessions: PlantingSessionRepository;
  varieties: MaizeVarietyRepository;
  soilSamples: SoilSampleRepository;
  weatherObservations: WeatherObservationRepository;
  predictions: YieldPredictionRepository;
  publisher: PredictionEventPublisher;
  config: PredictionModelConfig;
  logger: Logger;
  model?: FactorScoringModel;
  clock?: () => Date;
}

export function predictionQuality(confidence: number): PredictionQuality {
  if (confidence >= 90) return 'HIGH';
  if (confidence >= 70) return 'MEDIUM';
  return 'LOW';
}

export class YieldPredictionService {
  private readonly deps: YieldPredictionServiceDeps;
  private readonly model: FactorScoringModel;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: YieldPredictionServiceDeps) {
    this.deps = deps;
    this.model = deps.model ?? new FactorScoringModel(deps.config.seed);
    this.logger = deps.logger.child({ component: 'YieldPredictionService' });
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Score one planting session as of a date and store the immutable result
   */
  async generatePrediction(sessionId: string, asOfDate?: IsoDate): Promise<YieldPrediction> {
    const session = await this.deps.sessions.findById(sessionId);
    if (!session) {
      throw new ResourceNotFoundError('PlantingSession', sessionId);
    }

    const variety = await this.deps.varieties.findById(session.varietyId);
    if (!variety) {
      throw new ResourceNotFoundError('MaizeVariety', session.varietyId);
    }

    return this.predictForSession(session, variety, asOfDate ?? todayIsoDate(this.clock()));
  }

  /**
   * Predict every active session on a farm; one failing session does not stop the rest
   */
  async generatePredictionsForFarm(farmId: string, asOfDate?: IsoDate): Promise<YieldPrediction[]> {
    const date = asOfDate ?? todayIsoDate(this.clock());
    const sessions = (await this.deps.sessions.findByFarm(farmId)).filter(session => isActiveOn(session, date));
    const predictions: YieldPrediction[] = [];

    for (const session of sessions) {
      try {
        predictions.push(await this.generatePrediction(session.id, date));
      } catch (error) {
        this.logger.error('Failed to generate prediction for session', error, { farmId, sessionId: session.id });
      }
    }

    this.logger.info('Farm predictions generated', { farmId, sessions: sessions.length, generated: predictions.length });
    return predictions;
  }

  async getPredictionHistory(sessionId: string, from?: IsoDate, to?: IsoDate): Promise<YieldPrediction[]> {
    const predictions = await this.deps.predictions.findBySession(sessionId, from, to);
    return [...predictions].sort((a, b) =>
      compareIsoDates(a.predictionDate, b.predictionDate) || a.createdAt.localeCompare(b.createdAt)
    );
  }

  getLatestPrediction(sessionId: string): Promise<YieldPrediction | null> {
    return this.deps.predictions.findLatestBySession(sessionId);
  }

  private async predictForSession(
    session: PlantingSession,
    variety: MaizeVariety,
    asOfDate: IsoDate
  ): Promise<YieldPrediction> {
    const logger = this.logger.child({ sessionId: session.id, farmId: session.farmId });
    const startTime = Date.now();

    let prediction: YieldPrediction;
    try {
      const soilSample = await this.deps.soilSamples.findLatestByFarm(session.farmId);
      const weatherWindow = await this.deps.weatherObservations.findByFarmAndDateRange(
        session.farmId,
        addDays(asOfDate, -this.deps.config.weatherWindowDays),
        asOfDate
      );

      const result = this.model.score({ session, variety, soilSample, weatherWindow, asOfDate });

      prediction = Object.freeze({
        id: uuidv4(),
        sessionId: session.id,
        predictionDate: asOfDate,
        predictedYield: result.predictedYield,
        confidence: result.confidence,
        modelVersion: this.deps.config.modelVersion,
        featuresUsed: Object.freeze([...result.featuresUsed]),
        factors: Object.freeze(result.factors.map(factor => Object.freeze({ ...factor }))),
        createdAt: this.clock().toISOString(),
      });

      await this.deps.predictions.save(prediction);
    } catch (error) {
      logger.error('Prediction model execution failed', error);
      throw new PredictionError('Failed to execute prediction model', error);
    }

    logger.info('Yield prediction generated', {
      predictionId: prediction.id,
      predictedYield: prediction.predictedYield,
      confidence: prediction.confidence,
      quality: predictionQuality(prediction.confidence),
      growthStage: growthStageFor(daysBetween(session.plantingDate, asOfDate)),
      featuresUsed: prediction.featuresUsed,
    });
    logger.performance('prediction.generate', Date.now() - startTime);

    await this.announce(prediction, session, logger);
    return prediction;
  }

  private async announce(prediction: YieldPrediction, session: PlantingSession, logger: Logger): Promise<void> {
    try {
      await this.deps.publisher.publish({
        userId: session.userId,
        sessionId: session.id,
        prediction,
        timestamp: this.clock().toISOString(),
      });
    } catch (error) {
      logger.error('Failed to publish prediction completed event', error, { predictionId: prediction.id });
    }
  }
}

function isActiveOn(session: PlantingSession, date: IsoDate): boolean {
  if (compareIsoDates(session.plantingDate, date) > 0) {
    return false;
  }
  return !session.expectedHarvestDate || compareIsoDates(date, session.expectedHarvestDate) <= 0;
}
