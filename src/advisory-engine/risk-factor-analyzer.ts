/**
 * Risk factor analysis
 * Turns the last week of weather and the latest soil sample into a set of named risk tags
 */

import { RiskFactor } from '../types/core';
import type { IsoDate } from '../types/core';
import type { MaizeVariety, PlantingSession, SoilSample } from '../types/agronomy';
import type { WeatherObservation } from '../types/weather';
import type { RiskThresholds } from '../shared/config/environment';
import { addDays, daysBetween } from '../shared/utils/dates';
import { Logger } from '../shared/utils/logger';
import type { SoilSampleRepository, WeatherObservationRepository } from '../persistence/repositories';

export interface RiskEvaluationInput {
  recentWeather: readonly WeatherObservation[];
  latestSoil: SoilSample | null;
  daysSincePlanting: number;
  maturityDays: number;
}

export interface RiskAssessment extends RiskEvaluationInput {
  riskFactors: RiskFactor[];
}

export interface RiskFactorAnalyzerDeps {
  weatherObservations: WeatherObservationRepository;
  soilSamples: SoilSampleRepository;
  thresholds: RiskThresholds;
  logger: Logger;
}

export class RiskFactorAnalyzer {
  private readonly weatherObservations: WeatherObservationRepository;
  private readonly soilSamples: SoilSampleRepository;
  private readonly thresholds: RiskThresholds;
  private readonly logger: Logger;

  constructor(deps: RiskFactorAnalyzerDeps) {
    this.weatherObservations = deps.weatherObservations;
    this.soilSamples = deps.soilSamples;
    this.thresholds = deps.thresholds;
    this.logger = deps.logger.child({ component: 'RiskFactorAnalyzer' });
  }

  /**
   * Load recent conditions for the session's farm and evaluate them
   */
  async identifyRiskFactors(
    session: PlantingSession,
    variety: MaizeVariety,
    asOfDate: IsoDate
  ): Promise<RiskAssessment> {
    const recentWeather = await this.weatherObservations.findByFarmAndDateRange(
      session.farmId,
      addDays(asOfDate, -this.thresholds.lookbackDays),
      asOfDate
    );
    const latestSoil = await this.soilSamples.findLatestByFarm(session.farmId);

    const input: RiskEvaluationInput = {
      recentWeather,
      latestSoil,
      daysSincePlanting: daysBetween(session.plantingDate, asOfDate),
      maturityDays: variety.maturityDays,
    };
    const riskFactors = this.evaluate(input);

    this.logger.debug('Risk factors identified', {
      sessionId: session.id,
      riskFactors,
      weatherDays: recentWeather.length,
      hasSoil: latestSoil !== null,
    });

    return { ...input, riskFactors };
  }

  /**
   * Risk tags in fixed table order, each at most once
   */
  evaluate(input: RiskEvaluationInput): RiskFactor[] {
    const t = this.thresholds;
    const weather = input.recentWeather;
    const soil = input.latestSoil;

    const checks: Array<[RiskFactor, boolean]> = [
      [RiskFactor.DROUGHT_STRESS, weather.some(day => day.rainfallMm === undefined || day.rainfallMm < t.lowRainfallMm)],
      [RiskFactor.HEAT_STRESS, weather.some(day => day.maxTemperature !== undefined && day.maxTemperature > t.heatStressMaxTemp)],
      [RiskFactor.EXCESSIVE_RAINFALL, weather.some(day => day.rainfallMm !== undefined && day.rainfallMm > t.excessiveRainfallMm)],
      [RiskFactor.PH_IMBALANCE, soil?.ph !== undefined && (soil.ph < t.phMin || soil.ph > t.phMax)],
      [RiskFactor.NITROGEN_DEFICIENCY, soil?.nitrogen !== undefined && soil.nitrogen < t.nitrogenMin],
      [RiskFactor.PHOSPHORUS_DEFICIENCY, soil?.phosphorus !== undefined && soil.phosphorus < t.phosphorusMin],
      [RiskFactor.SOIL_MOISTURE_LOW, soil?.moisture !== undefined && soil.moisture < t.moistureMin],
      [RiskFactor.LATE_SEASON_STRESS, input.daysSincePlanting > input.maturityDays * t.lateSeasonFraction],
    ];

    return checks.filter(([, raised]) => raised).map(([factor]) => factor);
  }
}
