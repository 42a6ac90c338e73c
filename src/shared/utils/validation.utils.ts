/**
 * Shared validation utilities
 */

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class ValidationUtils {
  public static validateTicker(ticker: string): ValidationResult {
    const errors: string[] = [];

    if (!ticker || typeof ticker !== 'string') {
      errors.push('Ticker is required');
    } else {
      const trimmed = ticker.trim().toUpperCase();
      if (trimmed.length === 0) {
        errors.push('Ticker cannot be empty');
      } else if (trimmed.length > 12) {
        errors.push('Ticker cannot exceed 12 characters');
      } else if (!/^[A-Z0-9.\-^=]+$/.test(trimmed)) {
        errors.push('Ticker can only contain letters, numbers, dots, dashes, carets and equals signs');
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  public static validateIsoDate(value: string, fieldName: string): ValidationResult {
    const errors: string[] = [];

    if (!value || !ISO_DATE.test(value)) {
      errors.push(`${fieldName} must be an ISO date (YYYY-MM-DD)`);
    } else {
      const d = new Date(`${value}T00:00:00Z`);
      if (!Number.isFinite(d.getTime()) || d.toISOString().slice(0, 10) !== value) {
        errors.push(`${fieldName} is not a valid calendar date`);
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  public static validateDateRange(from: string, to: string, fromField = 'periodStart', toField = 'periodEnd'): ValidationResult {
    const fromResult = ValidationUtils.validateIsoDate(from, fromField);
    const toResult = ValidationUtils.validateIsoDate(to, toField);
    const combined = ValidationUtils.combineResults(fromResult, toResult);
    if (!combined.isValid) return combined;

    // ISO dates compare lexicographically
    if (from > to) {
      return { isValid: false, errors: [`${fromField} cannot be after ${toField}`] };
    }

    return combined;
  }

  public static validateNumeric(value: unknown, fieldName: string, min?: number, max?: number): ValidationResult {
    const errors: string[] = [];

    if (value === undefined || value === null || value === '') {
      errors.push(`${fieldName} is required`);
      return { isValid: false, errors };
    }

    const num = Number(value);
    if (isNaN(num)) {
      errors.push(`${fieldName} must be a valid number`);
      return { isValid: false, errors };
    }

    if (min !== undefined && num < min) {
      errors.push(`${fieldName} must be at least ${min}`);
    }

    if (max !== undefined && num > max) {
      errors.push(`${fieldName} must be at most ${max}`);
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  public static validateString(value: unknown, fieldName: string, minLength?: number, maxLength?: number): ValidationResult {
    const errors: string[] = [];

    if (value === undefined || value === null) {
      errors.push(`${fieldName} is required`);
      return { isValid: false, errors };
    }

    const str = String(value).trim();
    if (str.length === 0) {
      errors.push(`${fieldName} cannot be empty`);
      return { isValid: false, errors };
    }

    if (minLength !== undefined && str.length < minLength) {
      errors.push(`${fieldName} must be at least ${minLength} characters long`);
    }

    if (maxLength !== undefined && str.length > maxLength) {
      errors.push(`${fieldName} must be at most ${maxLength} characters long`);
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  public static combineResults(...results: ValidationResult[]): ValidationResult {
    const allErrors = results.flatMap(r => r.errors);
    return {
      isValid: allErrors.length === 0,
      errors: allErrors
    };
  }
}
