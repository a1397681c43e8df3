/**
 * Maize growth stages and the growth-stage scoring factor, both keyed on days since planting
 */

import type { IsoDate } from '../types/core';
import { addDays } from '../shared/utils/dates';

interface StageBand<T> {
  /** Exclusive upper bound in days since planting. */
  before: number;
  value: T;
}

const GROWTH_STAGES: ReadonlyArray<StageBand<string>> = [
  { before: 0, value: 'Not Planted' },
  { before: 15, value: 'Germination & Emergence (VE)' },
  { before: 30, value: 'Vegetative Growth (V1-V5)' },
  { before: 60, value: 'Rapid Growth (V6-V12)' },
  { before: 80, value: 'Tasseling & Silking (VT-R1)' },
  { before: 100, value: 'Kernel Development (R2-R4)' },
  { before: 120, value: 'Maturity (R5-R6)' },
];
const HARVEST_READY = 'Ready for Harvest';

const GROWTH_FACTORS: ReadonlyArray<StageBand<number>> = [
  { before: 0, value: 0 },
  { before: 30, value: 0.3 },
  { before: 60, value: 0.6 },
  { before: 90, value: 0.8 },
];
const FULL_GROWTH_FACTOR = 1.0;

function lookup<T>(bands: ReadonlyArray<StageBand<T>>, days: number, otherwise: T): T {
  return bands.find(band => days < band.before)?.value ?? otherwise;
}

export function growthStageFor(daysSincePlanting: number): string {
  return lookup(GROWTH_STAGES, daysSincePlanting, HARVEST_READY);
}

/**
 * 0 before planting, then 0.3 / 0.6 / 0.8 / 1.0 across the season
 */
export function growthStageFactor(daysSincePlanting: number): number {
  return lookup(GROWTH_FACTORS, daysSincePlanting, FULL_GROWTH_FACTOR);
}

export function expectedHarvestDate(plantingDate: IsoDate, maturityDays: number): IsoDate {
  return addDays(plantingDate, maturityDays);
}
