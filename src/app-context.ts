/**
 * Composition root
 * Every component is built here through its constructor from one frozen configuration.
 */

import { EventBridge } from 'aws-sdk';
import { EnvironmentConfig, getEnvironment } from './shared/config/environment';
import { ResilienceService, Sleep } from './shared/services/resilience-service';
import { Logger, parseLogLevel } from './shared/utils/logger';
import type { Repositories } from './persistence/repositories';
import { createDynamoRepositories } from './persistence/dynamodb-repositories';
import { WeatherProviderGateway } from './weather-acquisition/weather-provider';
import type { WeatherProvider } from './weather-acquisition/weather-provider';
import { WeatherApiProvider } from './weather-acquisition/providers/weatherapi-provider';
import { OpenWeatherProvider } from './weather-acquisition/providers/openweather-provider';
import { WeatherStackProvider } from './weather-acquisition/providers/weatherstack-provider';
import { ResilientWeatherAcquirer } from './weather-acquisition/resilient-weather-acquirer';
import { WeatherCollectionService } from './weather-acquisition/weather-collection';
import { FactorScoringModel } from './yield-prediction/factor-scoring-model';
import {
  EventBridgePredictionPublisher,
  PredictionEventPublisher,
  PredictionEventQueue,
} from './yield-prediction/prediction-events';
import { YieldPredictionService } from './yield-prediction/yield-prediction-service';
import { RiskFactorAnalyzer } from './advisory-engine/risk-factor-analyzer';
import { PredictionAnalyzer } from './advisory-engine/prediction-analyzer';
import {
  AdvancedRecommendationProvider,
  createAdvancedRecommendationProvider,
} from './advisory-engine/advanced-recommendation-provider';
import { RecommendationEngine } from './advisory-engine/recommendation-engine';
import { RecommendationTrigger } from './advisory-engine/recommendation-trigger';

export interface YieldAdvisorOverrides {
  config?: EnvironmentConfig;
  logger?: Logger;
  repositories?: Repositories;
  /** Replaces the providers built from configured API keys. */
  providers?: WeatherProvider[];
  publisher?: PredictionEventPublisher;
  advancedProvider?: AdvancedRecommendationProvider | null;
  eventBridge?: EventBridge;
  sleep?: Sleep;
  clock?: () => Date;
}

export interface YieldAdvisor {
  config: EnvironmentConfig;
  logger: Logger;
  repositories: Repositories;
  gateway: WeatherProviderGateway;
  resilience: ResilienceService;
  acquirer: ResilientWeatherAcquirer;
  weatherCollection: WeatherCollectionService;
  predictionService: YieldPredictionService;
  riskAnalyzer: RiskFactorAnalyzer;
  predictionAnalyzer: PredictionAnalyzer;
  engine: RecommendationEngine;
  trigger: RecommendationTrigger;
  /** In-process prediction events; the trigger is always subscribed. */
  queue: PredictionEventQueue;
  publisher: PredictionEventPublisher;
}

/**
 * Register every provider that has an API key configured
 */
export function createWeatherProviders(config: EnvironmentConfig, logger: Logger): WeatherProvider[] {
  const { apiKeys, providerTimeoutMs } = config.weather;
  const providers: WeatherProvider[] = [];

  if (apiKeys.weatherapi) {
    providers.push(new WeatherApiProvider({ apiKey: apiKeys.weatherapi, logger, timeoutMs: providerTimeoutMs }));
  }
  if (apiKeys.openweather) {
    providers.push(new OpenWeatherProvider({ apiKey: apiKeys.openweather, logger, timeoutMs: providerTimeoutMs }));
  }
  if (apiKeys.weatherstack) {
    providers.push(new WeatherStackProvider({ apiKey: apiKeys.weatherstack, logger, timeoutMs: providerTimeoutMs }));
  }

  if (providers.length === 0) {
    logger.warn('No weather provider API keys configured');
  }
  return providers;
}

export function createYieldAdvisor(overrides: YieldAdvisorOverrides = {}): YieldAdvisor {
  const config = overrides.config ?? getEnvironment();
  const logger = overrides.logger ?? new Logger({ service: 'yield-advisor', stage: config.stage }, parseLogLevel(config.logLevel));
  const clock = overrides.clock;
  const repositories = overrides.repositories ?? createDynamoRepositories(config, logger);

  const gateway = new WeatherProviderGateway(overrides.providers ?? createWeatherProviders(config, logger));
  const resilience = new ResilienceService(logger, {
    eventBusName: config.eventBusName,
    eventBridge: overrides.eventBridge,
    sleep: overrides.sleep,
  });
  const acquirer = new ResilientWeatherAcquirer({
    gateway,
    observations: repositories.weatherObservations,
    resilience,
    config: config.weather,
    logger,
  });
  const weatherCollection = new WeatherCollectionService({
    acquirer,
    farms: repositories.farms,
    observations: repositories.weatherObservations,
    logger,
    sleep: overrides.sleep,
  });

  const queue = new PredictionEventQueue(logger);
  const publisher =
    overrides.publisher ??
    (config.eventBusName
      ? new EventBridgePredictionPublisher(config.eventBusName, logger, overrides.eventBridge)
      : queue);

  const predictionService = new YieldPredictionService({
    sessions: repositories.plantingSessions,
    varieties: repositories.maizeVarieties,
    soilSamples: repositories.soilSamples,
    weatherObservations: repositories.weatherObservations,
    predictions: repositories.yieldPredictions,
    publisher,
    config: config.prediction,
    logger,
    model: new FactorScoringModel(config.prediction.seed),
    clock,
  });

  const riskAnalyzer = new RiskFactorAnalyzer({
    weatherObservations: repositories.weatherObservations,
    soilSamples: repositories.soilSamples,
    thresholds: config.thresholds.risk,
    logger,
  });
  const predictionAnalyzer = new PredictionAnalyzer({
    yieldHistory: repositories.yieldHistory,
    thresholds: config.thresholds.criticality,
    logger,
  });
  const advancedProvider =
    overrides.advancedProvider !== undefined
      ? overrides.advancedProvider
      : createAdvancedRecommendationProvider(config.advancedRecommendations, logger);

  const engine = new RecommendationEngine({
    sessions: repositories.plantingSessions,
    varieties: repositories.maizeVarieties,
    predictions: repositories.yieldPredictions,
    recommendations: repositories.recommendations,
    riskAnalyzer,
    predictionAnalyzer,
    advancedProvider,
    thresholds: config.thresholds.criticality,
    logger,
    clock,
  });
  const trigger = new RecommendationTrigger(engine, logger);
  queue.subscribe(event => trigger.handlePredictionCompleted(event));

  logger.debug('Yield advisor assembled', {
    providers: gateway.names(),
    publisher: publisher === queue ? 'queue' : 'custom',
    advancedProvider: advancedProvider?.name ?? 'disabled',
  });

  return {
    config,
    logger,
    repositories,
    gateway,
    resilience,
    acquirer,
    weatherCollection,
    predictionService,
    riskAnalyzer,
    predictionAnalyzer,
    engine,
    trigger,
    queue,
    publisher,
  };
}
