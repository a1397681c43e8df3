/**
 * Application constants and default configuration values
 */

// Default table names, overridable through *_TABLE_NAME
export const TABLE_NAMES = {
  FARMS: 'YieldAdvisor-Farms',
  WEATHER_OBSERVATIONS: 'YieldAdvisor-WeatherObservations',
  SOIL_SAMPLES: 'YieldAdvisor-SoilSamples',
  PLANTING_SESSIONS: 'YieldAdvisor-PlantingSessions',
  MAIZE_VARIETIES: 'YieldAdvisor-MaizeVarieties',
  YIELD_HISTORY: 'YieldAdvisor-YieldHistory',
  YIELD_PREDICTIONS: 'YieldAdvisor-YieldPredictions',
  RECOMMENDATIONS: 'YieldAdvisor-Recommendations',
} as const;

export const TABLE_INDEXES = {
  SESSIONS_BY_FARM: 'FarmIdIndex',
} as const;

// Default values
export const DEFAULT_VALUES = {
  LOG_LEVEL: 'INFO',
  AWS_REGION: 'us-east-1',
  STAGE: 'development',
  EVENT_BUS_NAME: 'YieldAdvisor-Events',
  WEATHER_RETENTION_DAYS: 730,
} as const;

export const EVENT_SOURCES = {
  PREDICTION: 'yield-advisor.prediction',
  WEATHER: 'yield-advisor.weather',
} as const;

export const EVENT_DETAIL_TYPES = {
  PREDICTION_COMPLETED: 'Yield Prediction Completed',
  PROVIDER_DEGRADED: 'Weather Provider Degraded',
} as const;

export const WEATHER_DEFAULTS = {
  PRIMARY_PROVIDER: 'weatherapi',
  FALLBACK_PROVIDERS: ['openweather', 'weatherstack'],
  MAX_ATTEMPTS: 3,
  INITIAL_DELAY_MS: 1000,
  BACKOFF_MULTIPLIER: 2.0,
  MAX_DELAY_MS: 10000,
  PROVIDER_TIMEOUT_MS: 30000,
  CACHE_TTL_MINUTES: 30,
  MAX_FORECAST_DAYS: 10,
  BACKFILL_DAYS: 7,
  BACKFILL_DELAY_MS: 100,
} as const;

// Inclusive plausibility bounds for fetched observations
export const WEATHER_VALIDATION_RANGES = {
  temperature: { min: -60, max: 60 },
  rainfallMm: { min: 0, max: 1000 },
  humidity: { min: 0, max: 100 },
  windSpeedKmh: { min: 0, max: 500 },
  solarRadiation: { min: 0, max: 50 },
} as const;

export const YIELD_MODEL = {
  MODEL_VERSION: 'factor-scoring-v1.0',
  SEED: 1234,
  WEATHER_WINDOW_DAYS: 30,
  BASE_YIELD_MIN: 4.5,
  BASE_YIELD_SPAN: 1.5,
  CONFIDENCE_BASE: 70,
  CONFIDENCE_COMPLETENESS_WEIGHT: 20,
  CONFIDENCE_JITTER: 5,
} as const;

export const RISK_THRESHOLDS = {
  LOOKBACK_DAYS: 7,
  LOW_RAINFALL_MM: 5,
  HEAT_STRESS_MAX_TEMP: 35,
  EXCESSIVE_RAINFALL_MM: 50,
  PH_MIN: 5.5,
  PH_MAX: 7.5,
  NITROGEN_MIN: 20,
  PHOSPHORUS_MIN: 15,
  MOISTURE_MIN: 30,
  LATE_SEASON_FRACTION: 0.8,
} as const;

export const CRITICALITY_THRESHOLDS = {
  YIELD_DEFICIT_PERCENT: 15,
  SEVERE_DEFICIT_PERCENT: 30,
  HIGH_PRIORITY_DEFICIT_PERCENT: 25,
  LOW_CONFIDENCE_PERCENT: 65,
  CRITICAL_YIELD: 2.0,
  OPTIMAL_YIELD_TARGET: 6.0,
} as const;
