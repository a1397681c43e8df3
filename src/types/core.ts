/**
 * Core data types shared across the yield advisor
 */

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

/** Date-time in ISO-8601 form. */
export type IsoTimestamp = string;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface Farm {
  id: string;
  name: string;
  ownerId: string;
  latitude?: number;
  longitude?: number;
}

export enum Priority {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL'
}

export enum RecommendationCategory {
  IRRIGATION = 'IRRIGATION',
  FERTILIZATION = 'FERTILIZATION',
  SOIL_MANAGEMENT = 'SOIL_MANAGEMENT',
  DRAINAGE = 'DRAINAGE',
  CROP_PROTECTION = 'CROP_PROTECTION',
  EMERGENCY = 'EMERGENCY',
  YIELD_OPTIMIZATION = 'YIELD_OPTIMIZATION',
  DATA_QUALITY = 'DATA_QUALITY',
  MONITORING = 'MONITORING',
  MAINTENANCE = 'MAINTENANCE',
  HARVEST_PLANNING = 'HARVEST_PLANNING',
  COLD_PROTECTION = 'COLD_PROTECTION',
  DROUGHT_MANAGEMENT = 'DROUGHT_MANAGEMENT',
  WATERLOG_PREVENTION = 'WATERLOG_PREVENTION',
  DISEASE_PREVENTION = 'DISEASE_PREVENTION',
  WIND_PROTECTION = 'WIND_PROTECTION',
  WEED_CONTROL = 'WEED_CONTROL',
  GROWTH_MONITORING = 'GROWTH_MONITORING',
  NUTRITION = 'NUTRITION',
  POLLINATION_SUPPORT = 'POLLINATION_SUPPORT',
  GRAIN_FILLING = 'GRAIN_FILLING',
  VARIETY_OPTIMIZATION = 'VARIETY_OPTIMIZATION'
}

export enum RiskFactor {
  DROUGHT_STRESS = 'DROUGHT_STRESS',
  HEAT_STRESS = 'HEAT_STRESS',
  EXCESSIVE_RAINFALL = 'EXCESSIVE_RAINFALL',
  PH_IMBALANCE = 'PH_IMBALANCE',
  NITROGEN_DEFICIENCY = 'NITROGEN_DEFICIENCY',
  PHOSPHORUS_DEFICIENCY = 'PHOSPHORUS_DEFICIENCY',
  SOIL_MOISTURE_LOW = 'SOIL_MOISTURE_LOW',
  LATE_SEASON_STRESS = 'LATE_SEASON_STRESS'
}

// Validation types
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
