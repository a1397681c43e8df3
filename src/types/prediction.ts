/**
 * Yield prediction types
 */

import type { IsoDate, IsoTimestamp } from './core';

export type FactorEffect = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL';

export interface FactorImportance {
  factor: string;
  importance: number;
  effect: FactorEffect;
  description: string;
}

export type PredictionFeature =
  | 'PlantingDate'
  | 'DaysSincePlanting'
  | 'MaizeVariety'
  | 'SoilData'
  | 'WeatherData';

export type PredictionQuality = 'HIGH' | 'MEDIUM' | 'LOW';

/**
 * Stored once per prediction run and never modified afterwards.
 */
export interface YieldPrediction {
  readonly id: string;
  readonly sessionId: string;
  readonly predictionDate: IsoDate;
  readonly predictedYield: number;
  readonly confidence: number;
  readonly modelVersion: string;
  readonly featuresUsed: readonly PredictionFeature[];
  readonly factors: readonly FactorImportance[];
  readonly createdAt: IsoTimestamp;
}

export interface PredictionCompletedEvent {
  userId?: string;
  sessionId: string;
  prediction: YieldPrediction;
  timestamp: IsoTimestamp;
}
