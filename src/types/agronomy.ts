/**
 * Agronomic inputs: soil samples, varieties and planting sessions
 */

import type { IsoDate } from './core';

export interface SoilSample {
  id: string;
  farmId: string;
  sampleDate: IsoDate;
  soilType?: string;
  ph?: number;
  organicMatter?: number;
  nitrogen?: number;
  phosphorus?: number;
  potassium?: number;
  moisture?: number;
}

export interface MaizeVariety {
  id: string;
  name: string;
  maturityDays: number;
  optimalTempMin: number;
  optimalTempMax: number;
  droughtResistant: boolean;
  diseaseResistance?: string;
  averageYield?: number; // t/ha
}

export interface PlantingSession {
  id: string;
  farmId: string;
  varietyId: string;
  plantingDate: IsoDate;
  expectedHarvestDate?: IsoDate;
  userId?: string;
}

export interface YieldHistoryRecord {
  farmId: string;
  varietyId: string;
  season: string;
  actualYield: number; // t/ha
}
