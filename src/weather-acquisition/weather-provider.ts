/**
 * Uniform capability over external weather providers
 */

import type { IsoDate } from '../types/core';
import type { WeatherAlert, WeatherObservation } from '../types/weather';

export interface ProviderLocation {
  farmId: string;
  latitude: number;
  longitude: number;
}

/**
 * A single upstream weather source. Implementations may throw any error;
 * callers treat a throw, a null and an empty list alike as "no data".
 */
export interface WeatherProvider {
  readonly name: string;
  fetchCurrent(location: ProviderLocation): Promise<WeatherObservation | null>;
  fetchForecast(location: ProviderLocation, days: number): Promise<WeatherObservation[]>;
  fetchHistorical(location: ProviderLocation, date: IsoDate): Promise<WeatherObservation | null>;
  fetchAlerts(location: ProviderLocation): Promise<WeatherAlert[]>;
}

export class WeatherProviderGateway {
  private readonly providers = new Map<string, WeatherProvider>();

  constructor(providers: readonly WeatherProvider[] = []) {
    providers.forEach(provider => this.register(provider));
  }

  register(provider: WeatherProvider): void {
    this.providers.set(provider.name, provider);
  }

  get(name: string): WeatherProvider | undefined {
    return this.providers.get(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}
