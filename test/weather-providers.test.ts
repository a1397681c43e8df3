import { describe, it, expect } from 'vitest';
import { WeatherApiProvider } from '../src/weather-acquisition/providers/weatherapi-provider';
import { OpenWeatherProvider } from '../src/weather-acquisition/providers/openweather-provider';
import { WeatherStackProvider } from '../src/weather-acquisition/providers/weatherstack-provider';
import type { ProviderLocation } from '../src/weather-acquisition/weather-provider';
import { createHttpStub } from './support/http-stub';
import { testLogger } from './support/fixtures';

const location: ProviderLocation = { farmId: 'farm-1', latitude: -1.29, longitude: 36.82 };
// 2024-06-30T12:00:00Z
const NOON = 1719748800;

describe('WeatherApiProvider', () => {
  it('maps current conditions', async () => {
    const { http, requests } = createHttpStub(() => ({
      data: {
        location: { localtime: '2024-06-30 14:30' },
        current: { temp_c: 24.5, precip_mm: 1.2, humidity: 70, wind_kph: 14.4 },
      },
    }));
    const provider = new WeatherApiProvider({ apiKey: 'test-key', logger: testLogger(), http });

    const observation = await provider.fetchCurrent(location);

    expect(observation).toEqual({
      farmId: 'farm-1',
      date: '2024-06-30',
      avgTemperature: 24.5,
      rainfallMm: 1.2,
      humidity: 70,
      windSpeedKmh: 14.4,
      source: 'WeatherAPI',
    });
    expect(requests[0].url).toBe('/current.json');
    expect(requests[0].params).toEqual({ key: 'test-key', q: '-1.29,36.82' });
  });

  it('limits forecasts to ten days', async () => {
    const { http, requests } = createHttpStub(() => ({
      data: {
        location: { localtime: '2024-06-30 14:30' },
        forecast: {
          forecastday: [
            {
              date: '2024-07-01',
              day: { mintemp_c: 14, maxtemp_c: 27, avgtemp_c: 20.5, totalprecip_mm: 6, avghumidity: 65, maxwind_kph: 20 },
            },
          ],
        },
      },
    }));
    const provider = new WeatherApiProvider({ apiKey: 'test-key', logger: testLogger(), http });

    const forecast = await provider.fetchForecast(location, 14);

    expect(requests[0].params).toEqual({ key: 'test-key', q: '-1.29,36.82', days: 10, aqi: 'no', alerts: 'no' });
    expect(forecast).toEqual([
      {
        farmId: 'farm-1',
        date: '2024-07-01',
        minTemperature: 14,
        maxTemperature: 27,
        avgTemperature: 20.5,
        rainfallMm: 6,
        humidity: 65,
        windSpeedKmh: 20,
        source: 'WeatherAPI',
      },
    ]);
  });

  it('returns no historical observation for an empty day list', async () => {
    const { http, requests } = createHttpStub(() => ({ data: { location: { localtime: '2024-06-30 14:30' }, forecast: { forecastday: [] } } }));
    const provider = new WeatherApiProvider({ apiKey: 'test-key', logger: testLogger(), http });

    expect(await provider.fetchHistorical(location, '2024-06-20')).toBeNull();
    expect(requests[0].url).toBe('/history.json');
  });

  it('maps alerts', async () => {
    const { http } = createHttpStub(() => ({
      data: {
        location: { localtime: '2024-06-30 14:30' },
        forecast: { forecastday: [] },
        alerts: { alert: [{ headline: 'Heavy rain warning', desc: 'Up to 80 mm expected', severity: 'Moderate' }] },
      },
    }));
    const provider = new WeatherApiProvider({ apiKey: 'test-key', logger: testLogger(), http });

    const alerts = await provider.fetchAlerts(location);

    expect(alerts).toEqual([
      {
        headline: 'Heavy rain warning',
        description: 'Up to 80 mm expected',
        severity: 'Moderate',
        urgency: undefined,
        areas: undefined,
        effective: undefined,
        expires: undefined,
        source: 'WeatherAPI',
      },
    ]);
  });

  it('rejects a non-200 response', async () => {
    const { http } = createHttpStub(() => ({ status: 503, data: {} }));
    const provider = new WeatherApiProvider({ apiKey: 'test-key', logger: testLogger(), http });

    await expect(provider.fetchCurrent(location)).rejects.toThrow('weatherapi returned status 503');
  });
});

describe('OpenWeatherProvider', () => {
  it('converts wind to km/h and prefers one-hour rain', async () => {
    const { http, requests } = createHttpStub(() => ({
      data: {
        dt: NOON,
        main: { temp: 23, temp_min: 18, temp_max: 27, humidity: 55 },
        wind: { speed: 5 },
        rain: { '1h': 0.4, '3h': 2.4 },
      },
    }));
    const provider = new OpenWeatherProvider({ apiKey: 'test-key', logger: testLogger(), http });

    const observation = await provider.fetchCurrent(location);

    expect(requests[0].url).toBe('/data/2.5/weather');
    expect(requests[0].params).toEqual({ lat: -1.29, lon: 36.82, appid: 'test-key', units: 'metric' });
    expect(observation?.date).toBe('2024-06-30');
    expect(observation?.rainfallMm).toBe(0.4);
    expect(observation?.windSpeedKmh).toBeCloseTo(18, 10);
    expect(observation?.minTemperature).toBe(18);
    expect(observation?.source).toBe('OpenWeatherMap');
  });

  it('reports zero rain when none is given', async () => {
    const { http } = createHttpStub(() => ({ data: { dt: NOON, main: { temp: 23, humidity: 55 } } }));
    const provider = new OpenWeatherProvider({ apiKey: 'test-key', logger: testLogger(), http });

    const observation = await provider.fetchCurrent(location);

    expect(observation?.rainfallMm).toBe(0);
    expect(observation?.windSpeedKmh).toBeUndefined();
  });

  it('folds three-hour slots into daily observations', async () => {
    const slot = (dt: number, temp: number, min: number, max: number, rain: number) => ({
      dt,
      main: { temp, temp_min: min, temp_max: max, humidity: 60 },
      wind: { speed: 2 },
      rain: { '3h': rain },
    });
    const { http, requests } = createHttpStub(() => ({
      data: {
        list: [
          slot(NOON, 24, 20, 25, 1.5),
          slot(NOON + 3 * 3600, 26, 22, 28, 2.5),
          slot(NOON + 24 * 3600, 21, 17, 23, 0),
        ],
      },
    }));
    const provider = new OpenWeatherProvider({ apiKey: 'test-key', logger: testLogger(), http });

    const forecast = await provider.fetchForecast(location, 2);

    expect(requests[0].params).toEqual({ lat: -1.29, lon: 36.82, appid: 'test-key', units: 'metric', cnt: 16 });
    expect(forecast.map(day => day.date)).toEqual(['2024-06-30', '2024-07-01']);
    expect(forecast[0]).toMatchObject({ minTemperature: 20, maxTemperature: 28, avgTemperature: 25, rainfallMm: 4, humidity: 60 });
    expect(forecast[1]).toMatchObject({ minTemperature: 17, maxTemperature: 23, rainfallMm: 0 });
  });
});

describe('WeatherStackProvider', () => {
  it('maps current conditions', async () => {
    const { http, requests } = createHttpStub(() => ({
      data: {
        location: { localtime: '2024-06-30 09:00' },
        current: { temperature: 19, precip: 0, humidity: 82, wind_speed: 7 },
      },
    }));
    const provider = new WeatherStackProvider({ apiKey: 'test-key', logger: testLogger(), http });

    expect(await provider.fetchCurrent(location)).toEqual({
      farmId: 'farm-1',
      date: '2024-06-30',
      avgTemperature: 19,
      rainfallMm: 0,
      humidity: 82,
      windSpeedKmh: 7,
      source: 'WeatherStack',
    });
    expect(requests[0].params).toEqual({ access_key: 'test-key', query: '-1.29,36.82', units: 'm' });
  });

  it('raises the error body that arrives with HTTP 200', async () => {
    const { http } = createHttpStub(() => ({
      data: { success: false, error: { code: 101, info: 'Invalid access key' } },
    }));
    const provider = new WeatherStackProvider({ apiKey: 'test-key', logger: testLogger(), http });

    await expect(provider.fetchCurrent(location)).rejects.toThrow('weatherstack error: Invalid access key');
  });

  it('serves no forecast, history or alerts on the free plan', async () => {
    const { http, requests } = createHttpStub(() => ({ data: {} }));
    const provider = new WeatherStackProvider({ apiKey: 'test-key', logger: testLogger(), http });

    expect(await provider.fetchForecast(location, 3)).toEqual([]);
    expect(await provider.fetchHistorical(location, '2024-06-20')).toBeNull();
    expect(await provider.fetchAlerts(location)).toEqual([]);
    expect(requests).toHaveLength(0);
  });
});
