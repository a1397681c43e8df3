/**
 * Plausibility checks for fetched weather observations
 */

import type { ValidationResult } from '../types/core';
import type { WeatherObservation } from '../types/weather';
import type { ValidationRange, WeatherValidationRanges } from '../shared/config/environment';
import { WEATHER_VALIDATION_RANGES } from '../shared/config/constants';
import { Validator } from '../shared/utils/validation';

type NumericField = 'minTemperature' | 'maxTemperature' | 'avgTemperature' | 'rainfallMm' | 'humidity' | 'windSpeedKmh' | 'solarRadiation';

export class WeatherObservationValidator {
  private readonly fieldRanges: ReadonlyArray<[NumericField, ValidationRange]>;

  constructor(ranges: WeatherValidationRanges = WEATHER_VALIDATION_RANGES) {
    this.fieldRanges = [
      ['minTemperature', ranges.temperature],
      ['maxTemperature', ranges.temperature],
      ['avgTemperature', ranges.temperature],
      ['rainfallMm', ranges.rainfallMm],
      ['humidity', ranges.humidity],
      ['windSpeedKmh', ranges.windSpeedKmh],
      ['solarRadiation', ranges.solarRadiation],
    ];
  }

  validate(observation: WeatherObservation): ValidationResult {
    const results = this.fieldRanges.map(([field, range]) =>
      Validator.validateOptionalRange(observation[field], range, field)
    );
    results.push(Validator.validateIsoDate(observation.date, 'date'));
    results.push(this.validateTemperatureOrdering(observation));

    return Validator.combineValidationResults(results);
  }

  isValid(observation: WeatherObservation): boolean {
    return this.validate(observation).isValid;
  }

  /**
   * Return a copy with every out-of-range field cleared
   */
  sanitize(observation: WeatherObservation): WeatherObservation {
    const sanitized: WeatherObservation = { ...observation };

    for (const [field, range] of this.fieldRanges) {
      if (!Validator.validateOptionalRange(sanitized[field], range, field).isValid) {
        sanitized[field] = undefined;
      }
    }

    if (!this.validateTemperatureOrdering(sanitized).isValid) {
      sanitized.minTemperature = undefined;
      sanitized.maxTemperature = undefined;
      sanitized.avgTemperature = undefined;
    }

    return sanitized;
  }

  private validateTemperatureOrdering(observation: WeatherObservation): ValidationResult {
    const { minTemperature: min, avgTemperature: avg, maxTemperature: max } = observation;
    const errors: string[] = [];

    if (min !== undefined && max !== undefined && min > max) {
      errors.push(`minTemperature ${min} exceeds maxTemperature ${max}`);
    }
    if (min !== undefined && avg !== undefined && max !== undefined && (avg < min || avg > max)) {
      errors.push(`avgTemperature ${avg} lies outside [${min}, ${max}]`);
    }

    return { isValid: errors.length === 0, errors, warnings: [] };
  }
}
