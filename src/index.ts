/**
 * Public entry point of the maize yield advisor
 */

export * from './types';
export { createYieldAdvisor, createWeatherProviders } from './app-context';
export type { YieldAdvisor, YieldAdvisorOverrides } from './app-context';
export { loadEnvironment, getEnvironment, resetEnvironment } from './shared/config/environment';
export type { EnvironmentConfig } from './shared/config/environment';
export { Logger, LogLevel, createLambdaLogger } from './shared/utils/logger';
export * from './shared/utils/errors';
export { ValidationError } from './shared/utils/validation';
export * from './persistence/repositories';
export { createDynamoRepositories } from './persistence/dynamodb-repositories';
export { ResilientWeatherAcquirer } from './weather-acquisition/resilient-weather-acquirer';
export { WeatherProviderGateway } from './weather-acquisition/weather-provider';
export type { WeatherProvider, ProviderLocation } from './weather-acquisition/weather-provider';
export { FactorScoringModel } from './yield-prediction/factor-scoring-model';
export { YieldPredictionService } from './yield-prediction/yield-prediction-service';
export { PredictionEventQueue, EventBridgePredictionPublisher } from './yield-prediction/prediction-events';
export type { PredictionEventPublisher } from './yield-prediction/prediction-events';
export { RecommendationEngine, applyRecommendationUpdate } from './advisory-engine/recommendation-engine';
export { RecommendationTrigger } from './advisory-engine/recommendation-trigger';
export type { AdvancedRecommendationProvider } from './advisory-engine/advanced-recommendation-provider';
