import { describe, it, expect, afterEach } from 'vitest';
import { getEnvironment, loadEnvironment, resetEnvironment } from '../src/shared/config/environment';
import { ValidationError } from '../src/shared/utils/validation';

function configErrors(env: Record<string, string>): string[] {
  try {
    loadEnvironment(env);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.errors;
    }
    throw error;
  }
  return [];
}

describe('loadEnvironment', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadEnvironment({});

    expect(config.stage).toBe('development');
    expect(config.region).toBe('us-east-1');
    expect(config.logLevel).toBe('INFO');
    expect(config.eventBusName).toBeUndefined();
    expect(config.weather.primaryProvider).toBe('weatherapi');
    expect(config.weather.fallbackProviders).toEqual(['openweather', 'weatherstack']);
    expect(config.weather.fallbackEnabled).toBe(true);
    expect(config.weather.retry).toEqual({ maxAttempts: 3, initialDelayMs: 1000, multiplier: 2, maxDelayMs: 10000 });
    expect(config.weather.fallbackDeadlineMs).toBe(0);
    expect(config.weather.apiKeys).toEqual({ weatherapi: undefined, openweather: undefined, weatherstack: undefined });
    expect(config.prediction).toEqual({ modelVersion: 'factor-scoring-v1.0', seed: 1234, weatherWindowDays: 30 });
    expect(config.advancedRecommendations.mode).toBe('local');
    expect(config.tables.recommendations).toBe('YieldAdvisor-Recommendations');
  });

  it('returns a frozen configuration', () => {
    const config = loadEnvironment({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.weather.retry)).toBe(true);
    expect(Object.isFrozen(config.thresholds.criticality)).toBe(true);
  });

  it('reads overrides and drops the primary from the fallback list', () => {
    const config = loadEnvironment({
      STAGE: 'production',
      LOG_LEVEL: 'debug',
      EVENT_BUS_NAME: 'test-bus',
      WEATHER_PRIMARY_PROVIDER: 'openweather',
      WEATHER_FALLBACK_PROVIDERS: 'weatherstack, openweather ,weatherapi',
      WEATHER_FALLBACK_ENABLED: 'false',
      WEATHER_RETRY_MAX_ATTEMPTS: '5',
      WEATHER_FALLBACK_DEADLINE_MS: '20000',
      OPENWEATHER_API_KEY: 'test-key',
      CRITICAL_YIELD_THRESHOLD: '2.5',
    });

    expect(config.stage).toBe('production');
    expect(config.logLevel).toBe('DEBUG');
    expect(config.eventBusName).toBe('test-bus');
    expect(config.weather.primaryProvider).toBe('openweather');
    expect(config.weather.fallbackProviders).toEqual(['weatherstack', 'weatherapi']);
    expect(config.weather.fallbackEnabled).toBe(false);
    expect(config.weather.retry.maxAttempts).toBe(5);
    expect(config.weather.fallbackDeadlineMs).toBe(20000);
    expect(config.weather.apiKeys.openweather).toBe('test-key');
    expect(config.thresholds.criticality.criticalYield).toBe(2.5);
  });

  it('collects every problem before failing', () => {
    expect(
      configErrors({
        WEATHER_RETRY_MAX_ATTEMPTS: '20',
        STAGE: 'qa',
        WEATHER_VALIDATION_ENABLED: 'yes',
        PREDICTION_SEED: 'abc',
      })
    ).toEqual([
      'WEATHER_RETRY_MAX_ATTEMPTS must be between 1 and 10',
      'WEATHER_VALIDATION_ENABLED must be "true" or "false"',
      'PREDICTION_SEED must be a number, got "abc"',
      'STAGE must be one of: development, staging, production',
    ]);
  });

  it('rejects fractional integers and unknown log levels', () => {
    expect(configErrors({ WEATHER_RETRY_MAX_ATTEMPTS: '2.5', LOG_LEVEL: 'trace' })).toEqual([
      'LOG_LEVEL must be one of: DEBUG, INFO, WARN, ERROR',
      'WEATHER_RETRY_MAX_ATTEMPTS must be an integer',
    ]);
  });

  it('requires a URL for remote recommendations', () => {
    expect(configErrors({ ADVANCED_RECOMMENDATIONS_MODE: 'remote' })).toEqual([
      'ADVANCED_RECOMMENDATIONS_URL is required when ADVANCED_RECOMMENDATIONS_MODE is remote',
    ]);
    expect(
      loadEnvironment({ ADVANCED_RECOMMENDATIONS_MODE: 'remote', ADVANCED_RECOMMENDATIONS_URL: 'http://advisory.test' })
        .advancedRecommendations.baseUrl
    ).toBe('http://advisory.test');
  });

  it('throws a ValidationError with every message', () => {
    expect(() => loadEnvironment({ STAGE: 'qa' })).toThrow(
      new ValidationError('Environment configuration errors:\nSTAGE must be one of: development, staging, production')
    );
  });
});

describe('getEnvironment', () => {
  afterEach(() => {
    resetEnvironment();
  });

  it('caches one configuration until reset', () => {
    const first = getEnvironment();

    expect(getEnvironment()).toBe(first);

    resetEnvironment();
    expect(getEnvironment()).not.toBe(first);
  });
});
