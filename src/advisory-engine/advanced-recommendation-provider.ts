/**
 * Advanced recommendation providers used when a prediction is severe enough to escalate.
 * The local provider applies growth-window, weather, soil and variety rules; the remote
 * provider asks an external advisory service and falls back to the local rules.
 */

import axios, { AxiosInstance } from 'axios';
import { Priority, RecommendationCategory } from '../types/core';
import type { MaizeVariety, PlantingSession, SoilSample } from '../types/agronomy';
import type { WeatherObservation } from '../types/weather';
import type { RecommendationDraft } from '../types/recommendation';
import type { AdvancedRecommendationConfig } from '../shared/config/environment';
import { average } from '../shared/utils/numbers';
import { ExternalServiceError, errorMessage } from '../shared/utils/errors';
import { Logger } from '../shared/utils/logger';
import { isPriority, isRecommendationCategory } from '../shared/utils/validation';

export interface AdvancedRecommendationContext {
  session: PlantingSession;
  variety: MaizeVariety;
  recentWeather: readonly WeatherObservation[];
  latestSoil: SoilSample | null;
  daysSincePlanting: number;
}

export interface AdvancedRecommendationProvider {
  readonly name: string;
  generate(context: AdvancedRecommendationContext): Promise<RecommendationDraft[]>;
}

function within(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

function numbers(values: ReadonlyArray<number | undefined>): number[] {
  return values.filter((value): value is number => value !== undefined);
}

export class LocalAdvancedRecommendationProvider implements AdvancedRecommendationProvider {
  readonly name = 'local';

  async generate(context: AdvancedRecommendationContext): Promise<RecommendationDraft[]> {
    return [
      ...this.weatherRules(context),
      ...this.soilRules(context),
      ...this.growthWindowRules(context.daysSincePlanting),
      ...this.varietyRules(context),
    ];
  }

  private weatherRules({ recentWeather, daysSincePlanting }: AdvancedRecommendationContext): RecommendationDraft[] {
    if (recentWeather.length === 0) {
      return [];
    }

    const drafts: RecommendationDraft[] = [];
    const avgTemp = average(numbers(recentWeather.map(day => day.avgTemperature)));
    const totalRainfall = numbers(recentWeather.map(day => day.rainfallMm)).reduce((sum, value) => sum + value, 0);
    const avgHumidity = average(numbers(recentWeather.map(day => day.humidity)));
    const maxWind = Math.max(0, ...numbers(recentWeather.map(day => day.windSpeedKmh)));

    if (avgTemp !== null && avgTemp > 35 && within(daysSincePlanting, 30, 80)) {
      drafts.push({
        category: RecommendationCategory.CROP_PROTECTION,
        priority: Priority.CRITICAL,
        confidence: 95,
        title: 'Critical Heat Stress Management',
        description: `Extreme heat (${avgTemp.toFixed(1)}°C) during the reproductive phase. Mulch, irrigate two to three times a day and shade the most exposed areas.`,
      });
    } else if (avgTemp !== null && avgTemp < 15 && daysSincePlanting < 30) {
      drafts.push({
        category: RecommendationCategory.COLD_PROTECTION,
        priority: Priority.HIGH,
        confidence: 88,
        title: 'Cold Weather Protection',
        description: `Low temperatures (${avgTemp.toFixed(1)}°C) slow germination and early growth. Use row covers or plastic tunnels on young stands.`,
      });
    }

    if (totalRainfall < 10 && within(daysSincePlanting, 40, 100)) {
      drafts.push({
        category: RecommendationCategory.DROUGHT_MANAGEMENT,
        priority: Priority.CRITICAL,
        confidence: 92,
        title: 'Drought Stress Mitigation',
        description: `Only ${totalRainfall.toFixed(1)} mm of rain fell this week. Switch to deficit irrigation and apply organic mulch to hold soil moisture.`,
      });
    } else if (totalRainfall > 100) {
      drafts.push({
        category: RecommendationCategory.WATERLOG_PREVENTION,
        priority: Priority.HIGH,
        confidence: 87,
        title: 'Waterlogging Prevention',
        description: `${totalRainfall.toFixed(1)} mm of rain fell this week. Keep drainage channels open and consider a fungicide against root rot.`,
      });
    }

    if (avgHumidity !== null && avgHumidity > 80 && avgTemp !== null && avgTemp > 25) {
      drafts.push({
        category: RecommendationCategory.DISEASE_PREVENTION,
        priority: Priority.HIGH,
        confidence: 85,
        title: 'High Disease Risk Alert',
        description: `Humidity of ${avgHumidity.toFixed(1)}% with warm temperatures favours fungal disease. Apply a preventive fungicide and improve air flow between rows.`,
      });
    }

    if (maxWind > 50) {
      drafts.push({
        category: RecommendationCategory.WIND_PROTECTION,
        priority: Priority.MEDIUM,
        confidence: 78,
        title: 'Wind Damage Prevention',
        description: `Gusts of ${maxWind.toFixed(1)} km/h can cause lodging. Check stands for stalk damage and support tall plants.`,
      });
    }

    return drafts;
  }

  private soilRules({ latestSoil, daysSincePlanting }: AdvancedRecommendationContext): RecommendationDraft[] {
    if (!latestSoil) {
      return [];
    }

    const drafts: RecommendationDraft[] = [];
    const { nitrogen, ph, moisture } = latestSoil;

    if (nitrogen !== undefined && nitrogen < 1.0 && within(daysSincePlanting, 20, 60)) {
      drafts.push({
        category: RecommendationCategory.NUTRITION,
        priority: Priority.CRITICAL,
        confidence: 93,
        title: 'Critical Nitrogen Deficiency',
        description: `Nitrogen is at ${nitrogen}%. Apply a 2% urea foliar spray now and side-dress with 150 kg/ha of CAN.`,
      });
    } else if (nitrogen !== undefined && within(nitrogen, 1.0, 1.5) && within(daysSincePlanting, 30, 70)) {
      drafts.push({
        category: RecommendationCategory.NUTRITION,
        priority: Priority.HIGH,
        confidence: 87,
        title: 'Optimize Nitrogen Supply',
        description: `Nitrogen is at ${nitrogen}%. Split the application: 100 kg/ha now and 50 kg/ha at tasseling.`,
      });
    }

    if (ph !== undefined && ph < 5.5) {
      drafts.push({
        category: RecommendationCategory.SOIL_MANAGEMENT,
        priority: Priority.HIGH,
        confidence: 91,
        title: 'Soil Acidification Treatment',
        description: `Soil pH of ${ph} is locking up nutrients. Apply agricultural lime at 3-4 t/ha and a foliar micronutrient mix.`,
      });
    } else if (ph !== undefined && ph > 8.0) {
      drafts.push({
        category: RecommendationCategory.SOIL_MANAGEMENT,
        priority: Priority.MEDIUM,
        confidence: 84,
        title: 'Alkaline Soil Management',
        description: `Soil pH of ${ph} limits micronutrient uptake. Apply sulfur at 200 kg/ha and prefer ammonium sulfate as the nitrogen source.`,
      });
    }

    if (moisture !== undefined && moisture < 20 && within(daysSincePlanting, 40, 80)) {
      drafts.push({
        category: RecommendationCategory.IRRIGATION,
        priority: Priority.CRITICAL,
        confidence: 89,
        title: 'Critical Soil Moisture Deficit',
        description: `Soil moisture is ${moisture}% in a critical growth period. Irrigate 25-30 mm per week and mulch to reduce evaporation.`,
      });
    } else if (moisture !== undefined && moisture > 80) {
      drafts.push({
        category: RecommendationCategory.DRAINAGE,
        priority: Priority.MEDIUM,
        confidence: 82,
        title: 'Excess Soil Moisture Management',
        description: `Soil moisture is ${moisture}%. Improve drainage and irrigate less often to keep roots out of standing water.`,
      });
    }

    return drafts;
  }

  private growthWindowRules(days: number): RecommendationDraft[] {
    if (within(days, 5, 10)) {
      return [{
        category: RecommendationCategory.GROWTH_MONITORING,
        priority: Priority.HIGH,
        confidence: 90,
        title: 'Emergence Stage Monitoring',
        description: 'Check for even emergence and soil crusting, keep the seedbed moist and apply starter fertilizer if it was skipped at planting.',
      }];
    }
    if (within(days, 25, 35)) {
      return [{
        category: RecommendationCategory.WEED_CONTROL,
        priority: Priority.CRITICAL,
        confidence: 95,
        title: 'Critical Weed Control Period',
        description: 'The crop is entering its critical weed-free period. Apply a post-emergence herbicide or weed mechanically this week.',
      }];
    }
    if (within(days, 45, 55)) {
      return [{
        category: RecommendationCategory.NUTRITION,
        priority: Priority.HIGH,
        confidence: 88,
        title: 'Pre-Tasseling Nutrition Boost',
        description: 'Rapid growth before tasseling drives ear size. Side-dress nitrogen and confirm potassium levels.',
      }];
    }
    if (within(days, 65, 75)) {
      return [{
        category: RecommendationCategory.POLLINATION_SUPPORT,
        priority: Priority.CRITICAL,
        confidence: 93,
        title: 'Pollination Period Support',
        description: 'Tasseling and silking are under way. Avoid any moisture stress, watch for silk-clipping insects and keep machinery out of the field.',
      }];
    }
    if (within(days, 90, 110)) {
      return [{
        category: RecommendationCategory.GRAIN_FILLING,
        priority: Priority.HIGH,
        confidence: 87,
        title: 'Grain Filling Optimization',
        description: 'Keep moisture steady and scout for late-season disease so kernel weight is not lost.',
      }];
    }
    return [];
  }

  private varietyRules({ variety, recentWeather, daysSincePlanting }: AdvancedRecommendationContext): RecommendationDraft[] {
    const drafts: RecommendationDraft[] = [];

    if (variety.droughtResistant && recentWeather.length > 0) {
      const totalRainfall = numbers(recentWeather.map(day => day.rainfallMm)).reduce((sum, value) => sum + value, 0);
      if (totalRainfall < 15) {
        drafts.push({
          category: RecommendationCategory.VARIETY_OPTIMIZATION,
          priority: Priority.LOW,
          confidence: 82,
          title: 'Leverage Drought Tolerance',
          description: `${variety.name} tolerates the current dry spell better than conventional varieties. Keep irrigation minimal and avoid overwatering.`,
        });
      }
    }

    if (variety.maturityDays < 100 && daysSincePlanting > 70) {
      drafts.push({
        category: RecommendationCategory.HARVEST_PLANNING,
        priority: Priority.MEDIUM,
        confidence: 85,
        title: 'Early Variety Harvest Preparation',
        description: `${variety.name} is an early-maturing variety nearing harvest. Start measuring grain moisture and get harvesting equipment ready.`,
      });
    }

    return drafts;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Map one item of the remote response; unknown categories or priorities are dropped.
 * Confidence may arrive as a 0-1 fraction or a 0-100 percentage.
 */
export function parseRemoteDraft(value: unknown): RecommendationDraft | null {
  if (!isRecord(value)) return null;

  const { category, priority, title, description, confidence } = value;
  if (!isRecommendationCategory(category) || !isPriority(priority)) return null;
  if (typeof title !== 'string' || title.trim() === '' || typeof description !== 'string') return null;

  const draft: RecommendationDraft = { category, priority, title, description };
  if (typeof confidence === 'number' && Number.isFinite(confidence)) {
    draft.confidence = confidence <= 1 ? Math.round(confidence * 100) : confidence;
  }
  return draft;
}

export interface RemoteAdvancedRecommendationOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  logger: Logger;
  fallback?: AdvancedRecommendationProvider;
  http?: AxiosInstance;
}

export class RemoteAdvancedRecommendationProvider implements AdvancedRecommendationProvider {
  readonly name = 'remote';

  private readonly http: AxiosInstance;
  private readonly fallback: AdvancedRecommendationProvider;
  private readonly logger: Logger;

  constructor(options: RemoteAdvancedRecommendationOptions) {
    this.logger = options.logger.child({ component: 'RemoteAdvancedRecommendationProvider' });
    this.fallback = options.fallback ?? new LocalAdvancedRecommendationProvider();
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
    });
  }

  async generate(context: AdvancedRecommendationContext): Promise<RecommendationDraft[]> {
    try {
      return await this.requestRemote(context);
    } catch (error) {
      this.logger.warn('Remote recommendation service failed, using local rules', {
        sessionId: context.session.id,
        error: errorMessage(error),
      });
      return this.fallback.generate(context);
    }
  }

  private async requestRemote(context: AdvancedRecommendationContext): Promise<RecommendationDraft[]> {
    const response = await this.http.post<unknown>('/recommendations/generate', buildRemoteRequest(context));

    if (response.status !== 200) {
      throw new ExternalServiceError(`Recommendation service returned status ${response.status}`, this.name);
    }

    const items = isRecord(response.data) ? response.data.recommendations : undefined;
    if (!Array.isArray(items)) {
      throw new ExternalServiceError('Recommendation service returned no recommendation list', this.name);
    }

    const drafts = items
      .map(parseRemoteDraft)
      .filter((draft): draft is RecommendationDraft => draft !== null);

    if (drafts.length < items.length) {
      this.logger.warn('Dropped malformed remote recommendations', {
        sessionId: context.session.id,
        dropped: items.length - drafts.length,
      });
    }

    this.logger.info('Remote recommendations received', { sessionId: context.session.id, count: drafts.length });
    return drafts;
  }
}

function buildRemoteRequest(context: AdvancedRecommendationContext) {
  const { session, variety, latestSoil } = context;
  return {
    farmId: session.farmId,
    plantingSessionId: session.id,
    cropType: 'MAIZE',
    variety: variety.name,
    plantingDate: session.plantingDate,
    daysSincePlanting: context.daysSincePlanting,
    soilData: latestSoil
      ? {
          soilType: latestSoil.soilType,
          phLevel: latestSoil.ph,
          organicMatter: latestSoil.organicMatter,
          nitrogen: latestSoil.nitrogen,
          phosphorus: latestSoil.phosphorus,
          potassium: latestSoil.potassium,
          moisture: latestSoil.moisture,
        }
      : null,
    weatherData: context.recentWeather.map(day => ({
      date: day.date,
      minTemp: day.minTemperature,
      maxTemp: day.maxTemperature,
      avgTemp: day.avgTemperature,
      rainfall: day.rainfallMm,
      humidity: day.humidity,
      windSpeed: day.windSpeedKmh,
    })),
    varietyInfo: {
      maturityDays: variety.maturityDays,
      droughtResistant: variety.droughtResistant,
      optimalTempMin: variety.optimalTempMin,
      optimalTempMax: variety.optimalTempMax,
    },
  };
}

/**
 * Provider for the configured mode, or null when escalation is disabled
 */
export function createAdvancedRecommendationProvider(
  config: AdvancedRecommendationConfig,
  logger: Logger,
  http?: AxiosInstance
): AdvancedRecommendationProvider | null {
  switch (config.mode) {
    case 'disabled':
      return null;
    case 'local':
      return new LocalAdvancedRecommendationProvider();
    case 'remote':
      if (!config.baseUrl) {
        logger.warn('Remote recommendation mode without a URL, using local rules');
        return new LocalAdvancedRecommendationProvider();
      }
      return new RemoteAdvancedRecommendationProvider({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
        logger,
        http,
      });
  }
}
