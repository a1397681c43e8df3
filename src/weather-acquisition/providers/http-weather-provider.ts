/**
 * Shared axios plumbing for HTTP weather providers
 */

import axios, { AxiosInstance } from 'axios';
import type { IsoDate } from '../../types/core';
import type { WeatherAlert, WeatherObservation } from '../../types/weather';
import { Logger } from '../../shared/utils/logger';
import type { ProviderLocation, WeatherProvider } from '../weather-provider';

export interface HttpWeatherProviderOptions {
  apiKey: string;
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export abstract class HttpWeatherProvider implements WeatherProvider {
  abstract readonly name: string;

  protected readonly apiKey: string;
  protected readonly logger: Logger;
  protected readonly http: AxiosInstance;

  protected constructor(defaultBaseUrl: string, options: HttpWeatherProviderOptions) {
    this.apiKey = options.apiKey;
    this.logger = options.logger;
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl ?? defaultBaseUrl,
      timeout: options.timeoutMs,
      headers: {
        'User-Agent': 'maize-yield-advisor/0.1',
        'Accept': 'application/json',
      },
    });
  }

  abstract fetchCurrent(location: ProviderLocation): Promise<WeatherObservation | null>;
  abstract fetchForecast(location: ProviderLocation, days: number): Promise<WeatherObservation[]>;
  abstract fetchHistorical(location: ProviderLocation, date: IsoDate): Promise<WeatherObservation | null>;
  abstract fetchAlerts(location: ProviderLocation): Promise<WeatherAlert[]>;

  protected async getJson<T>(path: string, params: Record<string, string | number>): Promise<T> {
    const response = await this.http.get<T>(path, { params });

    if (response.status !== 200) {
      throw new Error(`${this.name} returned status ${response.status}`);
    }

    return response.data;
  }
}
