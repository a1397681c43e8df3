/**
 * WeatherAPI.com provider
 */

import type { IsoDate } from '../../types/core';
import type { WeatherAlert, WeatherObservation } from '../../types/weather';
import { WEATHER_DEFAULTS } from '../../shared/config/constants';
import type { ProviderLocation } from '../weather-provider';
import { HttpWeatherProvider, HttpWeatherProviderOptions } from './http-weather-provider';

interface WeatherApiLocation {
  localtime: string; // "2024-05-01 14:30"
}

interface WeatherApiCurrentResponse {
  location: WeatherApiLocation;
  current: {
    temp_c: number;
    precip_mm: number;
    humidity: number;
    wind_kph: number;
    pressure_mb?: number;
    uv?: number;
    vis_km?: number;
    cloud?: number;
  };
}

interface WeatherApiForecastDay {
  date: string;
  day: {
    mintemp_c: number;
    maxtemp_c: number;
    avgtemp_c: number;
    totalprecip_mm: number;
    avghumidity: number;
    maxwind_kph: number;
    uv?: number;
  };
}

interface WeatherApiForecastResponse {
  location: WeatherApiLocation;
  forecast: {
    forecastday: WeatherApiForecastDay[];
  };
  alerts?: {
    alert?: Array<{
      headline: string;
      desc: string;
      severity?: string;
      urgency?: string;
      areas?: string;
      effective?: string;
      expires?: string;
    }>;
  };
}

export class WeatherApiProvider extends HttpWeatherProvider {
  readonly name = 'weatherapi';

  constructor(options: HttpWeatherProviderOptions) {
    super('https://api.weatherapi.com/v1', options);
  }

  async fetchCurrent(location: ProviderLocation): Promise<WeatherObservation | null> {
    const data = await this.getJson<WeatherApiCurrentResponse>('/current.json', {
      key: this.apiKey,
      q: this.query(location),
    });

    if (!data.current) {
      return null;
    }

    return {
      farmId: location.farmId,
      date: data.location.localtime.slice(0, 10),
      avgTemperature: data.current.temp_c,
      rainfallMm: data.current.precip_mm,
      humidity: data.current.humidity,
      windSpeedKmh: data.current.wind_kph,
      source: 'WeatherAPI',
    };
  }

  async fetchForecast(location: ProviderLocation, days: number): Promise<WeatherObservation[]> {
    const data = await this.getJson<WeatherApiForecastResponse>('/forecast.json', {
      key: this.apiKey,
      q: this.query(location),
      days: Math.min(days, WEATHER_DEFAULTS.MAX_FORECAST_DAYS),
      aqi: 'no',
      alerts: 'no',
    });

    return (data.forecast?.forecastday ?? []).map(day => this.toObservation(location, day));
  }

  async fetchHistorical(location: ProviderLocation, date: IsoDate): Promise<WeatherObservation | null> {
    const data = await this.getJson<WeatherApiForecastResponse>('/history.json', {
      key: this.apiKey,
      q: this.query(location),
      dt: date,
    });

    const day = data.forecast?.forecastday?.[0];
    return day ? this.toObservation(location, day) : null;
  }

  async fetchAlerts(location: ProviderLocation): Promise<WeatherAlert[]> {
    const data = await this.getJson<WeatherApiForecastResponse>('/forecast.json', {
      key: this.apiKey,
      q: this.query(location),
      days: 1,
      aqi: 'no',
      alerts: 'yes',
    });

    return (data.alerts?.alert ?? []).map((alert): WeatherAlert => ({
      headline: alert.headline,
      description: alert.desc,
      severity: alert.severity,
      urgency: alert.urgency,
      areas: alert.areas,
      effective: alert.effective,
      expires: alert.expires,
      source: 'WeatherAPI',
    }));
  }

  private query(location: ProviderLocation): string {
    return `${location.latitude},${location.longitude}`;
  }

  private toObservation(location: ProviderLocation, forecastDay: WeatherApiForecastDay): WeatherObservation {
    return {
      farmId: location.farmId,
      date: forecastDay.date,
      minTemperature: forecastDay.day.mintemp_c,
      maxTemperature: forecastDay.day.maxtemp_c,
      avgTemperature: forecastDay.day.avgtemp_c,
      rainfallMm: forecastDay.day.totalprecip_mm,
      humidity: forecastDay.day.avghumidity,
      windSpeedKmh: forecastDay.day.maxwind_kph,
      source: 'WeatherAPI',
    };
  }
}
