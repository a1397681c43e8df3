/**
 * OpenWeatherMap provider
 */

import type { IsoDate } from '../../types/core';
import type { WeatherAlert, WeatherObservation } from '../../types/weather';
import { average } from '../../shared/utils/numbers';
import { fromUnixSeconds } from '../../shared/utils/dates';
import type { ProviderLocation } from '../weather-provider';
import { HttpWeatherProvider, HttpWeatherProviderOptions } from './http-weather-provider';

const MPS_TO_KMH = 3.6;
const MAX_FORECAST_SLOTS = 40; // 5 days of 3-hour slots on the free tier
const SLOTS_PER_DAY = 8;

interface OpenWeatherCurrentResponse {
  dt: number;
  main: {
    temp: number;
    temp_min?: number;
    temp_max?: number;
    humidity: number;
    pressure?: number;
  };
  wind?: { speed: number };
  rain?: { '1h'?: number; '3h'?: number };
}

interface OpenWeatherForecastResponse {
  list: Array<{
    dt: number;
    main: { temp: number; temp_min: number; temp_max: number; humidity: number };
    wind?: { speed: number };
    rain?: { '3h'?: number };
  }>;
}

interface OpenWeatherTimeMachineResponse {
  data?: Array<{
    dt: number;
    temp: number;
    humidity: number;
    wind_speed?: number;
    rain?: { '1h'?: number };
  }>;
}

interface OpenWeatherOneCallResponse {
  alerts?: Array<{
    sender_name?: string;
    event: string;
    description: string;
    start?: number;
    end?: number;
  }>;
}

function toKmh(speedMps: number | undefined): number | undefined {
  return speedMps === undefined ? undefined : speedMps * MPS_TO_KMH;
}

export class OpenWeatherProvider extends HttpWeatherProvider {
  readonly name = 'openweather';

  constructor(options: HttpWeatherProviderOptions) {
    super('https://api.openweathermap.org', options);
  }

  async fetchCurrent(location: ProviderLocation): Promise<WeatherObservation | null> {
    const data = await this.getJson<OpenWeatherCurrentResponse>('/data/2.5/weather', {
      ...this.coordinates(location),
      appid: this.apiKey,
      units: 'metric',
    });

    if (!data.main) {
      return null;
    }

    return {
      farmId: location.farmId,
      date: fromUnixSeconds(data.dt),
      minTemperature: data.main.temp_min,
      maxTemperature: data.main.temp_max,
      avgTemperature: data.main.temp,
      rainfallMm: data.rain?.['1h'] ?? data.rain?.['3h'] ?? 0,
      humidity: data.main.humidity,
      windSpeedKmh: toKmh(data.wind?.speed),
      source: 'OpenWeatherMap',
    };
  }

  /**
   * Three-hourly slots are folded into one observation per calendar day
   */
  async fetchForecast(location: ProviderLocation, days: number): Promise<WeatherObservation[]> {
    const data = await this.getJson<OpenWeatherForecastResponse>('/data/2.5/forecast', {
      ...this.coordinates(location),
      appid: this.apiKey,
      units: 'metric',
      cnt: Math.min(days * SLOTS_PER_DAY, MAX_FORECAST_SLOTS),
    });

    const slotsByDate = new Map<IsoDate, OpenWeatherForecastResponse['list']>();
    for (const slot of data.list ?? []) {
      const date = fromUnixSeconds(slot.dt);
      slotsByDate.set(date, [...(slotsByDate.get(date) ?? []), slot]);
    }

    return [...slotsByDate.entries()].map(([date, slots]): WeatherObservation => {
      const winds = slots.flatMap(slot => (slot.wind ? [slot.wind.speed] : []));
      return {
        farmId: location.farmId,
        date,
        minTemperature: Math.min(...slots.map(slot => slot.main.temp_min)),
        maxTemperature: Math.max(...slots.map(slot => slot.main.temp_max)),
        avgTemperature: average(slots.map(slot => slot.main.temp)) ?? undefined,
        rainfallMm: slots.reduce((sum, slot) => sum + (slot.rain?.['3h'] ?? 0), 0),
        humidity: average(slots.map(slot => slot.main.humidity)) ?? undefined,
        windSpeedKmh: winds.length > 0 ? toKmh(Math.max(...winds)) : undefined,
        source: 'OpenWeatherMap',
      };
    });
  }

  async fetchHistorical(location: ProviderLocation, date: IsoDate): Promise<WeatherObservation | null> {
    const data = await this.getJson<OpenWeatherTimeMachineResponse>('/data/3.0/onecall/timemachine', {
      ...this.coordinates(location),
      appid: this.apiKey,
      units: 'metric',
      dt: Math.floor(Date.parse(`${date}T12:00:00Z`) / 1000),
    });

    const sample = data.data?.[0];
    if (!sample) {
      return null;
    }

    return {
      farmId: location.farmId,
      date,
      avgTemperature: sample.temp,
      rainfallMm: sample.rain?.['1h'] ?? 0,
      humidity: sample.humidity,
      windSpeedKmh: toKmh(sample.wind_speed),
      source: 'OpenWeatherMap',
    };
  }

  async fetchAlerts(location: ProviderLocation): Promise<WeatherAlert[]> {
    const data = await this.getJson<OpenWeatherOneCallResponse>('/data/3.0/onecall', {
      ...this.coordinates(location),
      appid: this.apiKey,
      exclude: 'current,minutely,hourly,daily',
    });

    return (data.alerts ?? []).map((alert): WeatherAlert => ({
      headline: alert.event,
      description: alert.description,
      areas: alert.sender_name,
      effective: alert.start === undefined ? undefined : new Date(alert.start * 1000).toISOString(),
      expires: alert.end === undefined ? undefined : new Date(alert.end * 1000).toISOString(),
      source: 'OpenWeatherMap',
    }));
  }

  private coordinates(location: ProviderLocation): { lat: number; lon: number } {
    return { lat: location.latitude, lon: location.longitude };
  }
}
