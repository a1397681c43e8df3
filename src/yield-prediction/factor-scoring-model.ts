/**
 * Multi-factor yield scoring.
 *
 * A deterministic heuristic, not a trained estimator: a seeded base yield is scaled by
 * soil, weather, growth-stage and variety factors. Identical inputs and seed always give
 * identical output, which keeps predictions auditable; the seeded base does not represent
 * real agronomic variance.
 */

import type { IsoDate } from '../types/core';
import type { MaizeVariety, PlantingSession, SoilSample } from '../types/agronomy';
import type { WeatherObservation } from '../types/weather';
import type { FactorImportance, PredictionFeature } from '../types/prediction';
import { YIELD_MODEL } from '../shared/config/constants';
import { daysBetween } from '../shared/utils/dates';
import { average, roundTo } from '../shared/utils/numbers';
import { createSeededRandom } from '../shared/utils/seeded-random';
import { growthStageFactor } from './growth-stage';

export interface ScoringInput {
  session: PlantingSession;
  variety: MaizeVariety;
  soilSample?: SoilSample | null;
  weatherWindow: readonly WeatherObservation[];
  asOfDate: IsoDate;
}

export interface FactorScores {
  baseYield: number;
  soil: number;
  weather: number;
  growthStage: number;
  variety: number;
}

export interface ScoringResult {
  predictedYield: number;
  confidence: number;
  featuresUsed: PredictionFeature[];
  factors: FactorImportance[];
  scores: FactorScores;
  daysSincePlanting: number;
  dataCompleteness: number;
}

const NEUTRAL = 1.0;
const OPTIMAL_PH = 6.5;
const DEFAULT_RAINFALL_MM = 5.0;
const DEFAULT_TEMPERATURE_C = 25.0;
const DROUGHT_RESISTANT_FACTOR = 1.1;

export function phTerm(ph: number | undefined): number {
  if (ph === undefined) return 0.9;
  return Math.max(0.7, 1 - Math.abs(ph - OPTIMAL_PH) * 0.1);
}

export function organicMatterTerm(organicMatter: number | undefined): number {
  if (organicMatter === undefined) return NEUTRAL;
  return Math.min(1.2, 0.8 + organicMatter * 0.1);
}

export function nutrientTerm(nitrogen: number | undefined, phosphorus: number | undefined): number {
  if (nitrogen === undefined || phosphorus === undefined) return NEUTRAL;
  return Math.min(1.3, 0.7 + nitrogen * 0.15 + phosphorus * 0.1);
}

export function soilFactor(sample: SoilSample | null | undefined): number {
  if (!sample) return NEUTRAL;
  return phTerm(sample.ph) * organicMatterTerm(sample.organicMatter) * nutrientTerm(sample.nitrogen, sample.phosphorus);
}

/**
 * Optimal between 5 and 15 mm/day average
 */
export function rainfallResponse(avgRainfallMm: number): number {
  if (avgRainfallMm < 1) return 0.6;
  if (avgRainfallMm < 5) return 0.8 + (avgRainfallMm - 1) * 0.05;
  if (avgRainfallMm <= 15) return 1.0;
  if (avgRainfallMm <= 25) return 1.0 - (avgRainfallMm - 15) * 0.02;
  return 0.8;
}

/**
 * Optimal between 20 and 30 °C average
 */
export function temperatureResponse(avgTemperature: number): number {
  if (avgTemperature < 15) return 0.7;
  if (avgTemperature < 20) return 0.7 + (avgTemperature - 15) * 0.06;
  if (avgTemperature <= 30) return 1.0;
  if (avgTemperature <= 35) return 1.0 - (avgTemperature - 30) * 0.06;
  return 0.7;
}

function present(values: ReadonlyArray<number | undefined>): number[] {
  return values.filter((value): value is number => value !== undefined && Number.isFinite(value));
}

export function weatherFactor(window: readonly WeatherObservation[]): number {
  if (window.length === 0) return NEUTRAL;

  const avgRainfall = average(present(window.map(observation => observation.rainfallMm))) ?? DEFAULT_RAINFALL_MM;
  const avgTemperature = average(present(window.map(observation => observation.avgTemperature))) ?? DEFAULT_TEMPERATURE_C;

  return rainfallResponse(avgRainfall) * temperatureResponse(avgTemperature);
}

export function varietyFactor(variety: MaizeVariety): number {
  return variety.droughtResistant ? DROUGHT_RESISTANT_FACTOR : NEUTRAL;
}

export class FactorScoringModel {
  constructor(private readonly seed: number = YIELD_MODEL.SEED) {}

  score(input: ScoringInput): ScoringResult {
    const random = createSeededRandom(this.seed);
    const hasSoil = Boolean(input.soilSample);
    const hasWeather = input.weatherWindow.length > 0;
    const daysSincePlanting = daysBetween(input.session.plantingDate, input.asOfDate);

    const scores: FactorScores = {
      baseYield: YIELD_MODEL.BASE_YIELD_MIN + random() * YIELD_MODEL.BASE_YIELD_SPAN,
      soil: soilFactor(input.soilSample),
      weather: weatherFactor(input.weatherWindow),
      growthStage: growthStageFactor(daysSincePlanting),
      variety: varietyFactor(input.variety),
    };

    const rawYield = scores.baseYield * scores.soil * scores.weather * scores.growthStage * scores.variety;
    const dataCompleteness = (hasSoil ? 0.5 : 0) + (hasWeather ? 0.5 : 0);
    const jitter = random() * YIELD_MODEL.CONFIDENCE_JITTER;

    const featuresUsed: PredictionFeature[] = ['PlantingDate', 'DaysSincePlanting', 'MaizeVariety'];
    if (hasSoil) featuresUsed.push('SoilData');
    if (hasWeather) featuresUsed.push('WeatherData');

    return {
      predictedYield: roundTo(Math.max(0, rawYield), 2),
      confidence: roundTo(
        YIELD_MODEL.CONFIDENCE_BASE + dataCompleteness * YIELD_MODEL.CONFIDENCE_COMPLETENESS_WEIGHT + jitter,
        2
      ),
      featuresUsed,
      factors: this.explain(scores),
      scores,
      daysSincePlanting,
      dataCompleteness,
    };
  }

  private explain(scores: FactorScores): FactorImportance[] {
    return [
      {
        factor: 'Soil Quality',
        importance: roundTo(scores.soil * 0.3, 2),
        effect: scores.soil >= 1.0 ? 'POSITIVE' : 'NEGATIVE',
        description: 'Soil pH, organic matter, and nutrient levels',
      },
      {
        factor: 'Weather Conditions',
        importance: roundTo(scores.weather * 0.4, 2),
        effect: scores.weather >= 1.0 ? 'POSITIVE' : 'NEGATIVE',
        description: 'Recent rainfall and temperature patterns',
      },
      {
        factor: 'Growth Stage',
        importance: roundTo(scores.growthStage * 0.2, 2),
        effect: 'NEUTRAL',
        description: 'Current crop development stage',
      },
      {
        factor: 'Maize Variety',
        importance: roundTo(scores.variety * 0.1, 2),
        effect: scores.variety > 1.0 ? 'POSITIVE' : 'NEUTRAL',
        description: 'Variety-specific characteristics',
      },
    ];
  }
}
