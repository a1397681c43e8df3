/**
 * WeatherStack provider. The free plan only serves current conditions.
 */

import type { IsoDate } from '../../types/core';
import type { WeatherAlert, WeatherObservation } from '../../types/weather';
import type { ProviderLocation } from '../weather-provider';
import { HttpWeatherProvider, HttpWeatherProviderOptions } from './http-weather-provider';

interface WeatherStackResponse {
  success?: boolean;
  error?: { code: number; info: string };
  location?: { localtime: string };
  current?: {
    temperature: number;
    precip: number;
    humidity: number;
    wind_speed: number;
  };
}

export class WeatherStackProvider extends HttpWeatherProvider {
  readonly name = 'weatherstack';

  constructor(options: HttpWeatherProviderOptions) {
    super('http://api.weatherstack.com', options);
  }

  async fetchCurrent(location: ProviderLocation): Promise<WeatherObservation | null> {
    const data = await this.getJson<WeatherStackResponse>('/current', {
      access_key: this.apiKey,
      query: `${location.latitude},${location.longitude}`,
      units: 'm',
    });

    // Errors arrive with HTTP 200 and success=false
    if (data.success === false || data.error) {
      throw new Error(`weatherstack error: ${data.error?.info ?? 'unknown error'}`);
    }
    if (!data.current || !data.location) {
      return null;
    }

    return {
      farmId: location.farmId,
      date: data.location.localtime.slice(0, 10),
      avgTemperature: data.current.temperature,
      rainfallMm: data.current.precip,
      humidity: data.current.humidity,
      windSpeedKmh: data.current.wind_speed,
      source: 'WeatherStack',
    };
  }

  async fetchForecast(_location: ProviderLocation, _days: number): Promise<WeatherObservation[]> {
    this.logger.debug('Forecast requires a paid weatherstack plan');
    return [];
  }

  async fetchHistorical(_location: ProviderLocation, _date: IsoDate): Promise<WeatherObservation | null> {
    this.logger.debug('Historical data requires a paid weatherstack plan');
    return null;
  }

  async fetchAlerts(_location: ProviderLocation): Promise<WeatherAlert[]> {
    return [];
  }
}
