import type { Farm, IsoDate } from '../../src/types/core';
import type { WeatherObservation } from '../../src/types/weather';
import type { MaizeVariety, PlantingSession, SoilSample } from '../../src/types/agronomy';
import type { YieldPrediction } from '../../src/types/prediction';
import { loadEnvironment } from '../../src/shared/config/environment';
import type { EnvironmentConfig } from '../../src/shared/config/environment';
import { Logger, LogLevel } from '../../src/shared/utils/logger';
import type { InMemoryRepositories } from './in-memory-repositories';

// 60 days after the default planting date
export const AS_OF: IsoDate = '2024-06-30';

export function testConfig(env: Record<string, string> = {}): EnvironmentConfig {
  return loadEnvironment(env);
}

export function testLogger(): Logger {
  return new Logger({ service: 'test' }, LogLevel.ERROR);
}

export const noSleep = async (): Promise<void> => {};

export function buildFarm(overrides: Partial<Farm> = {}): Farm {
  return {
    id: 'farm-1',
    name: 'North Field',
    ownerId: 'user-1',
    latitude: -1.29,
    longitude: 36.82,
    ...overrides,
  };
}

export function buildVariety(overrides: Partial<MaizeVariety> = {}): MaizeVariety {
  return {
    id: 'variety-1',
    name: 'Test Hybrid 614',
    maturityDays: 120,
    optimalTempMin: 18,
    optimalTempMax: 30,
    droughtResistant: false,
    averageYield: 6,
    ...overrides,
  };
}

export function buildSession(overrides: Partial<PlantingSession> = {}): PlantingSession {
  return {
    id: 'session-1',
    farmId: 'farm-1',
    varietyId: 'variety-1',
    plantingDate: '2024-05-01',
    userId: 'user-1',
    ...overrides,
  };
}

export function buildSoil(overrides: Partial<SoilSample> = {}): SoilSample {
  return {
    id: 'soil-1',
    farmId: 'farm-1',
    sampleDate: '2024-04-20',
    soilType: 'loam',
    ph: 6.5,
    organicMatter: 3,
    nitrogen: 25,
    phosphorus: 20,
    potassium: 150,
    moisture: 45,
    ...overrides,
  };
}

export function buildObservation(date: IsoDate, overrides: Partial<WeatherObservation> = {}): WeatherObservation {
  return {
    farmId: 'farm-1',
    date,
    minTemperature: 16,
    maxTemperature: 28,
    avgTemperature: 22,
    rainfallMm: 8,
    humidity: 60,
    windSpeedKmh: 12,
    source: 'WeatherAPI',
    ...overrides,
  };
}

export function buildPrediction(overrides: Partial<YieldPrediction> = {}): YieldPrediction {
  return {
    id: 'prediction-1',
    sessionId: 'session-1',
    predictionDate: AS_OF,
    predictedYield: 6.2,
    confidence: 92,
    modelVersion: 'factor-scoring-v1.0',
    featuresUsed: ['PlantingDate', 'DaysSincePlanting', 'MaizeVariety'],
    factors: [],
    createdAt: '2024-06-30T08:00:00.000Z',
    ...overrides,
  };
}

/**
 * One farm, one session on one variety, a healthy soil sample and a week of mild weather
 */
export function seedHealthyFarm(repositories: InMemoryRepositories, variety: MaizeVariety = buildVariety()): void {
  const farm = buildFarm();
  const session = buildSession();
  repositories.farms.farms.set(farm.id, farm);
  repositories.maizeVarieties.varieties.set(variety.id, variety);
  repositories.plantingSessions.sessions.set(session.id, session);
  repositories.soilSamples.samples.push(buildSoil());

  for (const date of ['2024-06-24', '2024-06-25', '2024-06-26', '2024-06-27', '2024-06-28', '2024-06-29', '2024-06-30']) {
    repositories.weatherObservations.observations.set(`farm-1|${date}`, buildObservation(date));
  }
}
