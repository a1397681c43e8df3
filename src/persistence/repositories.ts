/**
 * Storage contracts consumed by the yield advisor.
 * Farms, soil samples, sessions and varieties are owned by the surrounding CRUD layer and only read here.
 */

import type { Farm, IsoDate } from '../types/core';
import type { WeatherObservation } from '../types/weather';
import type { MaizeVariety, PlantingSession, SoilSample, YieldHistoryRecord } from '../types/agronomy';
import type { YieldPrediction } from '../types/prediction';
import type { Recommendation } from '../types/recommendation';

export interface FarmRepository {
  findById(farmId: string): Promise<Farm | null>;
  listFarms(): Promise<Farm[]>;
}

export interface WeatherObservationRepository {
  findByFarmAndDate(farmId: string, date: IsoDate): Promise<WeatherObservation | null>;
  /** Inclusive on both ends, ordered by date. */
  findByFarmAndDateRange(farmId: string, start: IsoDate, end: IsoDate): Promise<WeatherObservation[]>;
  /**
   * Store the observation unless one already exists for (farmId, date).
   * Returns false when an existing record was kept.
   */
  upsert(observation: WeatherObservation): Promise<boolean>;
}

export interface SoilSampleRepository {
  findLatestByFarm(farmId: string): Promise<SoilSample | null>;
}

export interface PlantingSessionRepository {
  findById(sessionId: string): Promise<PlantingSession | null>;
  findByFarm(farmId: string): Promise<PlantingSession[]>;
}

export interface MaizeVarietyRepository {
  findById(varietyId: string): Promise<MaizeVariety | null>;
}

export interface YieldHistoryRepository {
  findByFarmAndVariety(farmId: string, varietyId: string): Promise<YieldHistoryRecord[]>;
}

export interface YieldPredictionRepository {
  save(prediction: YieldPrediction): Promise<void>;
  /** Ordered by prediction date, oldest first. */
  findBySession(sessionId: string, from?: IsoDate, to?: IsoDate): Promise<YieldPrediction[]>;
  findLatestBySession(sessionId: string): Promise<YieldPrediction | null>;
}

export interface RecommendationRepository {
  saveAll(recommendations: Recommendation[]): Promise<void>;
  findBySession(sessionId: string): Promise<Recommendation[]>;
}

export interface Repositories {
  farms: FarmRepository;
  weatherObservations: WeatherObservationRepository;
  soilSamples: SoilSampleRepository;
  plantingSessions: PlantingSessionRepository;
  maizeVarieties: MaizeVarietyRepository;
  yieldHistory: YieldHistoryRepository;
  yieldPredictions: YieldPredictionRepository;
  recommendations: RecommendationRepository;
}
