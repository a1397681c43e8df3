/**
 * Environment configuration for the yield advisor
 * Loaded once per process into an immutable struct and passed to components by reference
 */

import { ValidationError } from '../utils/validation';
import {
  CRITICALITY_THRESHOLDS,
  DEFAULT_VALUES,
  RISK_THRESHOLDS,
  TABLE_NAMES,
  WEATHER_DEFAULTS,
  WEATHER_VALIDATION_RANGES,
  YIELD_MODEL,
} from './constants';

export type Stage = 'development' | 'staging' | 'production';
export type AdvancedRecommendationMode = 'disabled' | 'local' | 'remote';

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;
}

export interface ValidationRange {
  readonly min: number;
  readonly max: number;
}

export interface WeatherValidationRanges {
  readonly temperature: ValidationRange;
  readonly rainfallMm: ValidationRange;
  readonly humidity: ValidationRange;
  readonly windSpeedKmh: ValidationRange;
  readonly solarRadiation: ValidationRange;
}

export interface WeatherAcquisitionConfig {
  readonly primaryProvider: string;
  readonly fallbackProviders: readonly string[];
  readonly fallbackEnabled: boolean;
  readonly retry: RetryPolicy;
  readonly providerTimeoutMs: number;
  /** Cap on elapsed time across the whole provider chain; 0 disables it. */
  readonly fallbackDeadlineMs: number;
  readonly validationEnabled: boolean;
  readonly validationRanges: WeatherValidationRanges;
  readonly cacheTtlMinutes: number;
  readonly apiKeys: {
    readonly weatherapi?: string;
    readonly openweather?: string;
    readonly weatherstack?: string;
  };
}

export interface RiskThresholds {
  readonly lookbackDays: number;
  readonly lowRainfallMm: number;
  readonly heatStressMaxTemp: number;
  readonly excessiveRainfallMm: number;
  readonly phMin: number;
  readonly phMax: number;
  readonly nitrogenMin: number;
  readonly phosphorusMin: number;
  readonly moistureMin: number;
  readonly lateSeasonFraction: number;
}

export interface CriticalityThresholds {
  readonly yieldDeficitPercent: number;
  readonly severeDeficitPercent: number;
  readonly highPriorityDeficitPercent: number;
  readonly lowConfidencePercent: number;
  readonly criticalYield: number;
  readonly optimalYieldTarget: number;
}

export interface AgronomyThresholds {
  readonly risk: RiskThresholds;
  readonly criticality: CriticalityThresholds;
}

export interface PredictionModelConfig {
  readonly modelVersion: string;
  readonly seed: number;
  readonly weatherWindowDays: number;
}

export interface AdvancedRecommendationConfig {
  readonly mode: AdvancedRecommendationMode;
  readonly baseUrl?: string;
  readonly apiKey?: string;
  readonly timeoutMs: number;
}

export interface TableConfig {
  readonly farms: string;
  readonly weatherObservations: string;
  readonly soilSamples: string;
  readonly plantingSessions: string;
  readonly maizeVarieties: string;
  readonly yieldHistory: string;
  readonly yieldPredictions: string;
  readonly recommendations: string;
}

export interface EnvironmentConfig {
  readonly region: string;
  readonly stage: Stage;
  readonly logLevel: string;
  /** When unset, prediction events go to the in-process queue. */
  readonly eventBusName?: string;
  readonly tables: TableConfig;
  readonly weatherRetentionDays: number;
  readonly weather: WeatherAcquisitionConfig;
  readonly prediction: PredictionModelConfig;
  readonly thresholds: AgronomyThresholds;
  readonly advancedRecommendations: AdvancedRecommendationConfig;
}

type EnvSource = Record<string, string | undefined>;

const VALID_STAGES: readonly Stage[] = ['development', 'staging', 'production'];
const VALID_MODES: readonly AdvancedRecommendationMode[] = ['disabled', 'local', 'remote'];
const VALID_LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

class EnvironmentReader {
  readonly errors: string[] = [];

  constructor(private readonly env: EnvSource) {}

  string(name: string, fallback: string): string {
    const value = this.env[name];
    return value && value.trim().length > 0 ? value.trim() : fallback;
  }

  optionalString(name: string): string | undefined {
    const value = this.env[name];
    return value && value.trim().length > 0 ? value.trim() : undefined;
  }

  number(name: string, fallback: number, min: number, max: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.errors.push(`${name} must be a number, got "${raw}"`);
      return fallback;
    }
    if (value < min || value > max) {
      this.errors.push(`${name} must be between ${min} and ${max}`);
    }
    return value;
  }

  integer(name: string, fallback: number, min: number, max: number): number {
    const value = this.number(name, fallback, min, max);
    if (!Number.isInteger(value)) {
      this.errors.push(`${name} must be an integer`);
    }
    return value;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    this.errors.push(`${name} must be "true" or "false"`);
    return fallback;
  }

  list(name: string, fallback: readonly string[]): string[] {
    const raw = this.env[name];
    if (raw === undefined) {
      return [...fallback];
    }
    return raw
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }

  oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
    const raw = this.string(name, fallback);
    const match = allowed.find((candidate) => candidate === raw);
    if (!match) {
      this.errors.push(`${name} must be one of: ${allowed.join(', ')}`);
      return fallback;
    }
    return match;
  }
}

/**
 * Build and validate the configuration from an environment map.
 * Every problem is collected before a single ValidationError is thrown.
 */
export function loadEnvironment(env: EnvSource = process.env): EnvironmentConfig {
  const read = new EnvironmentReader(env);

  const logLevel = read.string('LOG_LEVEL', DEFAULT_VALUES.LOG_LEVEL);
  if (!VALID_LOG_LEVELS.includes(logLevel.toUpperCase())) {
    read.errors.push(`LOG_LEVEL must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
  }

  const primaryProvider = read.string('WEATHER_PRIMARY_PROVIDER', WEATHER_DEFAULTS.PRIMARY_PROVIDER);
  const fallbackProviders = read
    .list('WEATHER_FALLBACK_PROVIDERS', WEATHER_DEFAULTS.FALLBACK_PROVIDERS)
    .filter((provider) => provider !== primaryProvider);

  const retry: RetryPolicy = Object.freeze({
    maxAttempts: read.integer('WEATHER_RETRY_MAX_ATTEMPTS', WEATHER_DEFAULTS.MAX_ATTEMPTS, 1, 10),
    initialDelayMs: read.integer('WEATHER_RETRY_INITIAL_DELAY_MS', WEATHER_DEFAULTS.INITIAL_DELAY_MS, 0, 60000),
    multiplier: read.number('WEATHER_RETRY_MULTIPLIER', WEATHER_DEFAULTS.BACKOFF_MULTIPLIER, 1, 10),
    maxDelayMs: read.integer('WEATHER_RETRY_MAX_DELAY_MS', WEATHER_DEFAULTS.MAX_DELAY_MS, 0, 300000),
  });

  const weather: WeatherAcquisitionConfig = Object.freeze({
    primaryProvider,
    fallbackProviders: Object.freeze(fallbackProviders),
    fallbackEnabled: read.boolean('WEATHER_FALLBACK_ENABLED', true),
    retry,
    providerTimeoutMs: read.integer('WEATHER_PROVIDER_TIMEOUT_MS', WEATHER_DEFAULTS.PROVIDER_TIMEOUT_MS, 1000, 900000),
    fallbackDeadlineMs: read.integer('WEATHER_FALLBACK_DEADLINE_MS', 0, 0, 900000),
    validationEnabled: read.boolean('WEATHER_VALIDATION_ENABLED', true),
    validationRanges: WEATHER_VALIDATION_RANGES,
    cacheTtlMinutes: read.number('WEATHER_CACHE_TTL_MINUTES', WEATHER_DEFAULTS.CACHE_TTL_MINUTES, 0, 1440),
    apiKeys: Object.freeze({
      weatherapi: read.optionalString('WEATHERAPI_KEY'),
      openweather: read.optionalString('OPENWEATHER_API_KEY'),
      weatherstack: read.optionalString('WEATHERSTACK_API_KEY'),
    }),
  });

  const prediction: PredictionModelConfig = Object.freeze({
    modelVersion: read.string('PREDICTION_MODEL_VERSION', YIELD_MODEL.MODEL_VERSION),
    seed: read.integer('PREDICTION_SEED', YIELD_MODEL.SEED, 0, Number.MAX_SAFE_INTEGER),
    weatherWindowDays: read.integer('PREDICTION_WEATHER_WINDOW_DAYS', YIELD_MODEL.WEATHER_WINDOW_DAYS, 1, 365),
  });

  const thresholds: AgronomyThresholds = Object.freeze({
    risk: Object.freeze({
      lookbackDays: RISK_THRESHOLDS.LOOKBACK_DAYS,
      lowRainfallMm: RISK_THRESHOLDS.LOW_RAINFALL_MM,
      heatStressMaxTemp: RISK_THRESHOLDS.HEAT_STRESS_MAX_TEMP,
      excessiveRainfallMm: RISK_THRESHOLDS.EXCESSIVE_RAINFALL_MM,
      phMin: RISK_THRESHOLDS.PH_MIN,
      phMax: RISK_THRESHOLDS.PH_MAX,
      nitrogenMin: RISK_THRESHOLDS.NITROGEN_MIN,
      phosphorusMin: RISK_THRESHOLDS.PHOSPHORUS_MIN,
      moistureMin: RISK_THRESHOLDS.MOISTURE_MIN,
      lateSeasonFraction: RISK_THRESHOLDS.LATE_SEASON_FRACTION,
    }),
    criticality: Object.freeze({
      yieldDeficitPercent: read.number('YIELD_DEFICIT_THRESHOLD_PERCENT', CRITICALITY_THRESHOLDS.YIELD_DEFICIT_PERCENT, 0, 100),
      severeDeficitPercent: CRITICALITY_THRESHOLDS.SEVERE_DEFICIT_PERCENT,
      highPriorityDeficitPercent: CRITICALITY_THRESHOLDS.HIGH_PRIORITY_DEFICIT_PERCENT,
      lowConfidencePercent: read.number('LOW_CONFIDENCE_THRESHOLD_PERCENT', CRITICALITY_THRESHOLDS.LOW_CONFIDENCE_PERCENT, 0, 100),
      criticalYield: read.number('CRITICAL_YIELD_THRESHOLD', CRITICALITY_THRESHOLDS.CRITICAL_YIELD, 0, 50),
      optimalYieldTarget: read.number('OPTIMAL_YIELD_TARGET', CRITICALITY_THRESHOLDS.OPTIMAL_YIELD_TARGET, 0.1, 50),
    }),
  });

  const advancedRecommendations: AdvancedRecommendationConfig = Object.freeze({
    mode: read.oneOf('ADVANCED_RECOMMENDATIONS_MODE', VALID_MODES, 'local'),
    baseUrl: read.optionalString('ADVANCED_RECOMMENDATIONS_URL'),
    apiKey: read.optionalString('ADVANCED_RECOMMENDATIONS_API_KEY'),
    timeoutMs: read.integer('ADVANCED_RECOMMENDATIONS_TIMEOUT_MS', WEATHER_DEFAULTS.PROVIDER_TIMEOUT_MS, 1000, 900000),
  });

  if (advancedRecommendations.mode === 'remote' && !advancedRecommendations.baseUrl) {
    read.errors.push('ADVANCED_RECOMMENDATIONS_URL is required when ADVANCED_RECOMMENDATIONS_MODE is remote');
  }

  const tables: TableConfig = Object.freeze({
    farms: read.string('FARMS_TABLE_NAME', TABLE_NAMES.FARMS),
    weatherObservations: read.string('WEATHER_OBSERVATIONS_TABLE_NAME', TABLE_NAMES.WEATHER_OBSERVATIONS),
    soilSamples: read.string('SOIL_SAMPLES_TABLE_NAME', TABLE_NAMES.SOIL_SAMPLES),
    plantingSessions: read.string('PLANTING_SESSIONS_TABLE_NAME', TABLE_NAMES.PLANTING_SESSIONS),
    maizeVarieties: read.string('MAIZE_VARIETIES_TABLE_NAME', TABLE_NAMES.MAIZE_VARIETIES),
    yieldHistory: read.string('YIELD_HISTORY_TABLE_NAME', TABLE_NAMES.YIELD_HISTORY),
    yieldPredictions: read.string('YIELD_PREDICTIONS_TABLE_NAME', TABLE_NAMES.YIELD_PREDICTIONS),
    recommendations: read.string('RECOMMENDATIONS_TABLE_NAME', TABLE_NAMES.RECOMMENDATIONS),
  });

  const config: EnvironmentConfig = Object.freeze({
    region: read.string('AWS_REGION', DEFAULT_VALUES.AWS_REGION),
    stage: read.oneOf('STAGE', VALID_STAGES, DEFAULT_VALUES.STAGE),
    logLevel: logLevel.toUpperCase(),
    eventBusName: read.optionalString('EVENT_BUS_NAME'),
    tables,
    weatherRetentionDays: read.integer('WEATHER_RETENTION_DAYS', DEFAULT_VALUES.WEATHER_RETENTION_DAYS, 1, 3650),
    weather,
    prediction,
    thresholds,
    advancedRecommendations,
  });

  if (read.errors.length > 0) {
    throw new ValidationError(`Environment configuration errors:\n${read.errors.join('\n')}`, read.errors);
  }

  return config;
}

// Singleton instance
let environment: EnvironmentConfig | undefined;

export function getEnvironment(): EnvironmentConfig {
  if (!environment) {
    environment = loadEnvironment(process.env);
  }
  return environment;
}

/**
 * Drop the cached configuration so the next read reloads it
 */
export function resetEnvironment(): void {
  environment = undefined;
}
