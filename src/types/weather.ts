/**
 * Weather observation and alert types
 */

import type { IsoDate } from './core';

export type WeatherSource = 'WeatherAPI' | 'OpenWeatherMap' | 'WeatherStack';

/**
 * One daily observation for a farm. At most one is stored per (farmId, date).
 */
export interface WeatherObservation {
  farmId: string;
  date: IsoDate;
  minTemperature?: number;
  maxTemperature?: number;
  avgTemperature?: number;
  rainfallMm?: number;
  humidity?: number;
  windSpeedKmh?: number;
  solarRadiation?: number;
  source: WeatherSource;
}

export interface WeatherAlert {
  headline: string;
  description: string;
  severity?: string;
  urgency?: string;
  areas?: string;
  effective?: string;
  expires?: string;
  source: WeatherSource;
}
