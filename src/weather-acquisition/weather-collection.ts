/**
 * Weather collection Lambda function
 * Runs daily via EventBridge: fetches today's observation for every farm, then backfills recent gaps
 */

import type { Handler, ScheduledEvent } from 'aws-lambda';
import type { Farm, IsoDate } from '../types/core';
import { WEATHER_DEFAULTS } from '../shared/config/constants';
import { defaultSleep, Sleep } from '../shared/services/resilience-service';
import { addDays, dateRange, todayIsoDate } from '../shared/utils/dates';
import { errorMessage } from '../shared/utils/errors';
import { createLambdaLogger, Logger } from '../shared/utils/logger';
import type { FarmRepository, WeatherObservationRepository } from '../persistence/repositories';
import { createYieldAdvisor } from '../app-context';
import type { ResilientWeatherAcquirer } from './resilient-weather-acquirer';

export interface WeatherCollectionEvent extends Partial<ScheduledEvent> {
  farmIds?: string[];
  asOfDate?: IsoDate;
  backfillDays?: number;
}

export interface CollectionSummary {
  total: number;
  collected: number;
  skipped: number;
  failed: number;
}

export interface WeatherCollectionReport {
  asOfDate: IsoDate;
  daily: CollectionSummary;
  backfill: CollectionSummary;
}

export interface WeatherCollectionDeps {
  acquirer: ResilientWeatherAcquirer;
  farms: FarmRepository;
  observations: WeatherObservationRepository;
  logger: Logger;
  sleep?: Sleep;
  backfillDelayMs?: number;
}

function emptySummary(): CollectionSummary {
  return { total: 0, collected: 0, skipped: 0, failed: 0 };
}

function hasCoordinates(farm: Farm): boolean {
  return farm.latitude !== undefined && farm.longitude !== undefined;
}

export class WeatherCollectionService {
  private acquirer: ResilientWeatherAcquirer;
  private farms: FarmRepository;
  private observations: WeatherObservationRepository;
  private logger: Logger;
  private sleep: Sleep;
  private backfillDelayMs: number;

  constructor(deps: WeatherCollectionDeps) {
    this.acquirer = deps.acquirer;
    this.farms = deps.farms;
    this.observations = deps.observations;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.backfillDelayMs = deps.backfillDelayMs ?? WEATHER_DEFAULTS.BACKFILL_DELAY_MS;
  }

  /**
   * Fetch and store today's observation for each farm that has none yet
   */
  async collectDailyWeather(asOfDate: IsoDate, farmIds?: string[]): Promise<CollectionSummary> {
    const farms = await this.resolveFarms(farmIds);
    const summary = emptySummary();

    for (const farm of farms) {
      summary.total++;

      if (!hasCoordinates(farm)) {
        this.logger.warn('Skipping farm without coordinates', { farmId: farm.id });
        summary.skipped++;
        continue;
      }

      const existing = await this.observations.findByFarmAndDate(farm.id, asOfDate);
      if (existing) {
        summary.skipped++;
        continue;
      }

      try {
        await this.acquirer.fetchWeatherDataForFarm(farm);
        summary.collected++;
      } catch (error) {
        this.logger.error('Failed to collect weather data for farm', error, { farmId: farm.id });
        summary.failed++;
      }
    }

    this.logger.info('Daily weather collection completed', { asOfDate, ...summary });
    return summary;
  }

  /**
   * Fill missing days in the window ending yesterday, pausing between provider calls
   */
  async backfillMissingHistory(
    asOfDate: IsoDate,
    days: number = WEATHER_DEFAULTS.BACKFILL_DAYS,
    farmIds?: string[]
  ): Promise<CollectionSummary> {
    const farms = (await this.resolveFarms(farmIds)).filter(hasCoordinates);
    const summary = emptySummary();
    const window = dateRange(addDays(asOfDate, -days), addDays(asOfDate, -1));
    if (window.length === 0) {
      return summary;
    }

    for (const farm of farms) {
      const stored = await this.observations.findByFarmAndDateRange(farm.id, window[0], window[window.length - 1]);
      const storedDates = new Set(stored.map(observation => observation.date));
      const missing = window.filter(date => !storedDates.has(date));

      for (const date of missing) {
        summary.total++;
        try {
          const observation = await this.acquirer.fetchHistorical(farm, date);
          if (observation) {
            summary.collected++;
          } else {
            summary.failed++;
          }
        } catch (error) {
          this.logger.warn('Historical backfill failed', { farmId: farm.id, date, error: errorMessage(error) });
          summary.failed++;
        }
        await this.sleep(this.backfillDelayMs);
      }
    }

    this.logger.info('Historical weather backfill completed', { asOfDate, days, ...summary });
    return summary;
  }

  private async resolveFarms(farmIds?: string[]): Promise<Farm[]> {
    if (!farmIds || farmIds.length === 0) {
      return this.farms.listFarms();
    }

    const farms: Farm[] = [];
    for (const farmId of farmIds) {
      const farm = await this.farms.findById(farmId);
      if (farm) {
        farms.push(farm);
      } else {
        this.logger.warn('Requested farm not found', { farmId });
      }
    }
    return farms;
  }
}

/**
 * Lambda handler function
 */
export const handler: Handler<WeatherCollectionEvent, WeatherCollectionReport> = async (event, context) => {
  const logger = createLambdaLogger('weather-collection', context.awsRequestId);

  try {
    logger.info('Weather collection Lambda started', { farmIds: event.farmIds, asOfDate: event.asOfDate });

    const advisor = createYieldAdvisor({ logger });
    const asOfDate = event.asOfDate ?? todayIsoDate();
    const daily = await advisor.weatherCollection.collectDailyWeather(asOfDate, event.farmIds);
    const backfill = await advisor.weatherCollection.backfillMissingHistory(
      asOfDate,
      event.backfillDays ?? WEATHER_DEFAULTS.BACKFILL_DAYS,
      event.farmIds
    );

    logger.info('Weather collection Lambda completed successfully');
    return { asOfDate, daily, backfill };
  } catch (error) {
    logger.error('Weather collection Lambda failed', error);
    throw error;
  }
};
