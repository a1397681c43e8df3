import { describe, it, expect } from 'vitest';
import {
  FactorScoringModel,
  nutrientTerm,
  organicMatterTerm,
  phTerm,
  rainfallResponse,
  soilFactor,
  temperatureResponse,
  varietyFactor,
  weatherFactor,
} from '../src/yield-prediction/factor-scoring-model';
import { roundTo } from '../src/shared/utils/numbers';
import { AS_OF, buildObservation, buildSession, buildSoil, buildVariety } from './support/fixtures';

describe('soil terms', () => {
  it('scores pH against an optimum of 6.5 with a floor of 0.7', () => {
    expect(phTerm(6.5)).toBe(1);
    expect(phTerm(5.5)).toBeCloseTo(0.9, 10);
    expect(phTerm(3)).toBe(0.7);
    expect(phTerm(undefined)).toBe(0.9);
  });

  it('caps the organic matter term at 1.2', () => {
    expect(organicMatterTerm(3)).toBeCloseTo(1.1, 10);
    expect(organicMatterTerm(5)).toBe(1.2);
    expect(organicMatterTerm(undefined)).toBe(1);
  });

  it('uses nitrogen and phosphorus only and caps at 1.3', () => {
    expect(nutrientTerm(2, 1)).toBeCloseTo(1.1, 10);
    expect(nutrientTerm(5, 5)).toBe(1.3);
    expect(nutrientTerm(2, undefined)).toBe(1);
  });

  it('is neutral without a sample', () => {
    expect(soilFactor(null)).toBe(1);
    expect(soilFactor(buildSoil({ ph: 6.5, organicMatter: 3, nitrogen: 2, phosphorus: 1 }))).toBeCloseTo(1.21, 10);
  });
});

describe('weather response curves', () => {
  it('keeps rainfall optimal between 5 and 15 mm inclusive', () => {
    expect(rainfallResponse(0.5)).toBe(0.6);
    expect(rainfallResponse(4.999)).toBeCloseTo(0.99995, 10);
    expect(rainfallResponse(5)).toBe(1);
    expect(rainfallResponse(15)).toBe(1);
    expect(rainfallResponse(15.001)).toBeCloseTo(0.99998, 10);
    expect(rainfallResponse(30)).toBe(0.8);
  });

  it('keeps temperature optimal between 20 and 30 °C inclusive', () => {
    expect(temperatureResponse(10)).toBe(0.7);
    expect(temperatureResponse(17.5)).toBeCloseTo(0.85, 10);
    expect(temperatureResponse(20)).toBe(1);
    expect(temperatureResponse(30)).toBe(1);
    expect(temperatureResponse(32.5)).toBeCloseTo(0.85, 10);
    expect(temperatureResponse(40)).toBe(0.7);
  });

  it('averages the window and defaults missing fields', () => {
    expect(weatherFactor([])).toBe(1);
    expect(weatherFactor([buildObservation('2024-06-29', { rainfallMm: 2 }), buildObservation('2024-06-30', { rainfallMm: 4 })]))
      .toBeCloseTo(0.9, 10);
    expect(weatherFactor([buildObservation('2024-06-30', { rainfallMm: undefined, avgTemperature: undefined })])).toBe(1);
  });

  it('rewards drought-resistant varieties', () => {
    expect(varietyFactor(buildVariety({ droughtResistant: true }))).toBe(1.1);
    expect(varietyFactor(buildVariety())).toBe(1);
  });
});

describe('FactorScoringModel', () => {
  const model = new FactorScoringModel(1234);
  const weatherWindow = [buildObservation('2024-06-29'), buildObservation('2024-06-30')];

  it('produces identical output for identical input', () => {
    const input = { session: buildSession(), variety: buildVariety(), soilSample: buildSoil(), weatherWindow, asOfDate: AS_OF };

    expect(model.score(input)).toEqual(model.score(input));
    expect(new FactorScoringModel(1234).score(input)).toEqual(model.score(input));
  });

  it('multiplies the seeded base yield by every factor', () => {
    const result = model.score({ session: buildSession(), variety: buildVariety(), soilSample: buildSoil(), weatherWindow, asOfDate: AS_OF });
    const { baseYield, soil, weather, growthStage, variety } = result.scores;

    expect(baseYield).toBeGreaterThanOrEqual(4.5);
    expect(baseYield).toBeLessThan(6);
    expect(growthStage).toBe(0.8);
    expect(weather).toBe(1);
    expect(soil).toBeCloseTo(1.43, 10);
    expect(result.predictedYield).toBe(roundTo(baseYield * soil * weather * growthStage * variety, 2));
    expect(result.daysSincePlanting).toBe(60);
  });

  it('reaches 90-95 confidence with soil and weather, 70-75 without', () => {
    const full = model.score({ session: buildSession(), variety: buildVariety(), soilSample: buildSoil(), weatherWindow, asOfDate: AS_OF });
    const bare = model.score({ session: buildSession(), variety: buildVariety(), soilSample: null, weatherWindow: [], asOfDate: AS_OF });

    expect(full.dataCompleteness).toBe(1);
    expect(full.confidence).toBeGreaterThanOrEqual(90);
    expect(full.confidence).toBeLessThanOrEqual(95);
    expect(full.featuresUsed).toEqual(['PlantingDate', 'DaysSincePlanting', 'MaizeVariety', 'SoilData', 'WeatherData']);

    expect(bare.dataCompleteness).toBe(0);
    expect(bare.confidence).toBeGreaterThanOrEqual(70);
    expect(bare.confidence).toBeLessThanOrEqual(75);
    expect(bare.featuresUsed).toEqual(['PlantingDate', 'DaysSincePlanting', 'MaizeVariety']);
  });

  it.each([
    { inputs: 'soil only', soil: true, weather: false, min: 80, max: 85 },
    { inputs: 'weather only', soil: false, weather: true, min: 80, max: 85 },
    { inputs: 'soil and weather', soil: true, weather: true, min: 90, max: 95 },
    { inputs: 'neither', soil: false, weather: false, min: 70, max: 75 },
  ])('keeps confidence within $min-$max with $inputs for any seed', ({ soil, weather, min, max }) => {
    for (const seed of [1, 1234, 98765, 2024061]) {
      const result = new FactorScoringModel(seed).score({
        session: buildSession(),
        variety: buildVariety(),
        soilSample: soil ? buildSoil() : null,
        weatherWindow: weather ? weatherWindow : [],
        asOfDate: AS_OF,
      });

      expect(result.dataCompleteness).toBe((min - 70) / 20);
      expect(result.confidence).toBeGreaterThanOrEqual(min);
      expect(result.confidence).toBeLessThanOrEqual(max);
    }
  });

  it('predicts zero before the planting date', () => {
    const result = model.score({
      session: buildSession({ plantingDate: '2024-07-10' }),
      variety: buildVariety(),
      soilSample: buildSoil(),
      weatherWindow,
      asOfDate: AS_OF,
    });

    expect(result.daysSincePlanting).toBe(-10);
    expect(result.predictedYield).toBe(0);
  });

  it('explains the four factors with weighted importance', () => {
    const result = model.score({
      session: buildSession(),
      variety: buildVariety({ droughtResistant: true }),
      soilSample: null,
      weatherWindow: [],
      asOfDate: AS_OF,
    });

    expect(result.factors).toEqual([
      { factor: 'Soil Quality', importance: 0.3, effect: 'POSITIVE', description: 'Soil pH, organic matter, and nutrient levels' },
      { factor: 'Weather Conditions', importance: 0.4, effect: 'POSITIVE', description: 'Recent rainfall and temperature patterns' },
      { factor: 'Growth Stage', importance: 0.16, effect: 'NEUTRAL', description: 'Current crop development stage' },
      { factor: 'Maize Variety', importance: 0.11, effect: 'POSITIVE', description: 'Variety-specific characteristics' },
    ]);
  });
});
