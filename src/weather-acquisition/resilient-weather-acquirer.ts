/**
 * Resilient weather acquisition
 * Wraps the provider gateway with retry, ordered fallback, validation and a short-lived cache
 */

import type { Farm, IsoDate } from '../types/core';
import type { WeatherAlert, WeatherObservation } from '../types/weather';
import type { WeatherAcquisitionConfig } from '../shared/config/environment';
import { FallbackChainResult, ResilienceService } from '../shared/services/resilience-service';
import { ExternalServiceError } from '../shared/utils/errors';
import { Logger } from '../shared/utils/logger';
import { TtlCache } from '../shared/utils/ttl-cache';
import { requireFarmCoordinates } from '../shared/utils/validation';
import type { WeatherObservationRepository } from '../persistence/repositories';
import { WeatherObservationValidator } from './weather-observation-validator';
import type { ProviderLocation, WeatherProvider, WeatherProviderGateway } from './weather-provider';

export interface ResilientWeatherAcquirerDeps {
  gateway: WeatherProviderGateway;
  observations: WeatherObservationRepository;
  resilience: ResilienceService;
  config: WeatherAcquisitionConfig;
  logger: Logger;
  validator?: WeatherObservationValidator;
  now?: () => number;
}

type Operation = 'current' | 'forecast' | 'historical' | 'alerts';

export class ResilientWeatherAcquirer {
  private readonly gateway: WeatherProviderGateway;
  private readonly observations: WeatherObservationRepository;
  private readonly resilience: ResilienceService;
  private readonly config: WeatherAcquisitionConfig;
  private readonly logger: Logger;
  private readonly validator: WeatherObservationValidator;
  private readonly currentCache: TtlCache<WeatherObservation>;
  private readonly forecastCache: TtlCache<WeatherObservation[]>;

  constructor(deps: ResilientWeatherAcquirerDeps) {
    this.gateway = deps.gateway;
    this.observations = deps.observations;
    this.resilience = deps.resilience;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: 'ResilientWeatherAcquirer' });
    this.validator = deps.validator ?? new WeatherObservationValidator(deps.config.validationRanges);

    const ttlMs = deps.config.cacheTtlMinutes * 60 * 1000;
    this.currentCache = new TtlCache({ ttlMs, now: deps.now });
    this.forecastCache = new TtlCache({ ttlMs, now: deps.now });
  }

  /**
   * Latest observation for a farm, or null once every provider is exhausted
   */
  async fetchCurrent(farm: Farm): Promise<WeatherObservation | null> {
    const { observation } = await this.acquireCurrent(farm);
    return observation;
  }

  /**
   * Fetch-and-store entry point for callers that cannot proceed without data
   */
  async fetchWeatherDataForFarm(farm: Farm): Promise<WeatherObservation> {
    const { observation, failure } = await this.acquireCurrent(farm);
    if (observation) {
      return observation;
    }

    const chain = failure?.providersTried.join(' -> ') || this.providerChain().join(' -> ') || 'none';
    throw new ExternalServiceError(
      `Failed to fetch weather data for farm ${farm.id}: all providers exhausted (${failure?.lastError ?? 'no data'})`,
      chain
    );
  }

  async fetchForecast(farm: Farm, days: number): Promise<WeatherObservation[]> {
    const location = this.locate(farm);
    const startTime = Date.now();

    const forecast = await this.forecastCache.getOrCompute(
      `forecast:${farm.id}:${days}`,
      async () => {
        const result = await this.runChain('forecast', farm,
          async provider => this.acceptAll(await provider.fetchForecast(location, days), farm.id),
          observations => observations.length > 0
        );
        return result.value;
      },
      observations => observations.length > 0
    );

    this.logger.performance('weather.fetchForecast', Date.now() - startTime, { farmId: farm.id, days });
    return forecast ?? [];
  }

  /**
   * Stored observation for the date when present, otherwise fetched and stored
   */
  async fetchHistorical(farm: Farm, date: IsoDate): Promise<WeatherObservation | null> {
    const location = this.locate(farm);

    const stored = await this.observations.findByFarmAndDate(farm.id, date);
    if (stored) {
      this.logger.debug('Historical observation served from store', { farmId: farm.id, date });
      return stored;
    }

    const result = await this.runChain('historical', farm,
      async provider => this.accept(await provider.fetchHistorical(location, date), farm.id),
      () => true
    );
    if (!result.value) {
      return null;
    }

    await this.storeIfAbsent(result.value);
    return result.value;
  }

  /**
   * Alerts from the first provider that reports any; none once the chain is exhausted
   */
  async fetchAlerts(farm: Farm): Promise<WeatherAlert[]> {
    const location = this.locate(farm);
    const result = await this.runChain('alerts', farm, provider => provider.fetchAlerts(location), alerts => alerts.length > 0);
    return result.value ?? [];
  }

  private async acquireCurrent(
    farm: Farm
  ): Promise<{ observation: WeatherObservation | null; failure?: FallbackChainResult<WeatherObservation> }> {
    const location = this.locate(farm);
    const startTime = Date.now();
    let failure: FallbackChainResult<WeatherObservation> | undefined;

    const observation = await this.currentCache.getOrCompute(`current:${farm.id}`, async () => {
      const result = await this.runChain('current', farm,
        async provider => this.accept(await provider.fetchCurrent(location), farm.id),
        () => true
      );

      if (!result.value) {
        failure = result;
        return null;
      }

      await this.storeIfAbsent(result.value);
      return result.value;
    });

    this.logger.performance('weather.fetchCurrent', Date.now() - startTime, { farmId: farm.id, found: observation !== null });
    return { observation, failure };
  }

  private runChain<T>(
    operation: Operation,
    farm: Farm,
    call: (provider: WeatherProvider) => Promise<T | null>,
    isUsable: (value: T) => boolean
  ): Promise<FallbackChainResult<T>> {
    return this.resilience.executeWithFallback<T>(
      async providerName => {
        const provider = this.gateway.get(providerName);
        if (!provider) {
          throw new Error(`Weather provider ${providerName} is not registered`);
        }
        return call(provider);
      },
      {
        operation,
        providers: this.providerChain(),
        fallbackEnabled: this.config.fallbackEnabled,
        retry: this.config.retry,
        timeoutMs: this.config.providerTimeoutMs,
        deadlineMs: this.config.fallbackDeadlineMs,
        isAvailable: name => this.gateway.has(name),
        isUsable,
        context: { farmId: farm.id },
      }
    );
  }

  /**
   * Configured chain, primary first; unregistered providers keep their place
   */
  private providerChain(): string[] {
    return [this.config.primaryProvider, ...this.config.fallbackProviders];
  }

  private locate(farm: Farm): ProviderLocation {
    const { latitude, longitude } = requireFarmCoordinates(farm);
    return { farmId: farm.id, latitude, longitude };
  }

  /**
   * Validation gate: invalid observations are dropped, valid ones sanitised
   */
  private accept(observation: WeatherObservation | null, farmId: string): WeatherObservation | null {
    if (!observation) {
      return null;
    }

    const bound: WeatherObservation = { ...observation, farmId };
    if (!this.config.validationEnabled) {
      return bound;
    }

    const result = this.validator.validate(bound);
    if (!result.isValid) {
      this.logger.warn('Discarding invalid weather observation', {
        farmId,
        date: bound.date,
        source: bound.source,
        errors: result.errors,
      });
      return null;
    }

    return this.validator.sanitize(bound);
  }

  private acceptAll(observations: WeatherObservation[], farmId: string): WeatherObservation[] {
    return observations.flatMap(observation => {
      const accepted = this.accept(observation, farmId);
      return accepted ? [accepted] : [];
    });
  }

  private async storeIfAbsent(observation: WeatherObservation): Promise<void> {
    const existing = await this.observations.findByFarmAndDate(observation.farmId, observation.date);
    if (existing) {
      return;
    }

    const stored = await this.observations.upsert(observation);
    this.logger.info('Weather observation stored', {
      farmId: observation.farmId,
      date: observation.date,
      source: observation.source,
      stored,
    });
  }
}
