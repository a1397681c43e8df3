/**
 * Validation utilities for the yield advisor
 * Provides input validation functions for agronomic and geographic data
 */

import { Coordinates, Farm, Priority, RecommendationCategory, ValidationResult } from '../../types/core';

/**
 * Custom validation error class
 */
export class ValidationError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = [message]) {
    super(message);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export interface NumericRange {
  min: number;
  max: number;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Validator class that provides static validation methods
 */
export class Validator {
  /**
   * Validate an optional numeric field against an inclusive range.
   * Absent values are accepted.
   */
  static validateOptionalRange(
    value: number | undefined,
    range: NumericRange,
    fieldName: string
  ): ValidationResult {
    const errors: string[] = [];

    if (value !== undefined) {
      if (!Number.isFinite(value)) {
        errors.push(`${fieldName} must be a finite number`);
      } else if (value < range.min || value > range.max) {
        errors.push(`${fieldName} must be between ${range.min} and ${range.max}, got ${value}`);
      }
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings: [],
    };
  }

  /**
   * Validate required string field
   */
  static validateRequiredString(value: string | undefined, fieldName: string): ValidationResult {
    const errors: string[] = [];

    if (!value || value.trim().length === 0) {
      errors.push(`${fieldName} is required and cannot be empty`);
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings: [],
    };
  }

  static validateIsoDate(value: string, fieldName: string): ValidationResult {
    const errors: string[] = [];

    if (!ISO_DATE_PATTERN.test(value) || Number.isNaN(Date.parse(`${value}T00:00:00Z`))) {
      errors.push(`${fieldName} must be a calendar date in YYYY-MM-DD form`);
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings: [],
    };
  }

  /**
   * Validate coordinates
   */
  static validateCoordinates(coordinates: Coordinates): ValidationResult {
    const errors: string[] = [];

    if (!Number.isFinite(coordinates.latitude) || coordinates.latitude < -90 || coordinates.latitude > 90) {
      errors.push('Invalid latitude: must be between -90 and 90');
    }

    if (!Number.isFinite(coordinates.longitude) || coordinates.longitude < -180 || coordinates.longitude > 180) {
      errors.push('Invalid longitude: must be between -180 and 180');
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings: [],
    };
  }

  /**
   * Combine multiple validation results
   */
  static combineValidationResults(results: ValidationResult[]): ValidationResult {
    const allErrors: string[] = [];
    const allWarnings: string[] = [];

    for (const result of results) {
      allErrors.push(...result.errors);
      allWarnings.push(...result.warnings);
    }

    return {
      isValid: allErrors.length === 0,
      errors: allErrors,
      warnings: allWarnings,
    };
  }

  /**
   * Throw error if validation fails
   */
  static throwIfInvalid(result: ValidationResult): void {
    if (!result.isValid) {
      throw new ValidationError(result.errors.join('; '), result.errors);
    }
  }
}

/**
 * Resolve the coordinates of a farm or fail with a ValidationError
 */
export function requireFarmCoordinates(farm: Farm): Coordinates {
  if (farm.latitude === undefined || farm.longitude === undefined) {
    throw new ValidationError(`Farm ${farm.id} has no coordinates`);
  }

  const coordinates: Coordinates = { latitude: farm.latitude, longitude: farm.longitude };
  Validator.throwIfInvalid(Validator.validateCoordinates(coordinates));
  return coordinates;
}

const PRIORITIES: readonly string[] = Object.values(Priority);
const CATEGORIES: readonly string[] = Object.values(RecommendationCategory);

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && PRIORITIES.includes(value);
}

export function isRecommendationCategory(value: unknown): value is RecommendationCategory {
  return typeof value === 'string' && CATEGORIES.includes(value);
}
