import type { Coordinates, EnrichedHospital } from "./types";

// Shared validation utilities for the hospital pipeline

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export type ProcessingResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

// Rough British Columbia bounding box
export const BC_BOUNDS = {
  minLat: 48.2,
  maxLat: 60.1,
  minLon: -139.1,
  maxLon: -114.0,
};

export function isInsideBC({ lat, lon }: Coordinates): boolean {
  return (
    lat >= BC_BOUNDS.minLat &&
    lat <= BC_BOUNDS.maxLat &&
    lon >= BC_BOUNDS.minLon &&
    lon <= BC_BOUNDS.maxLon
  );
}

/**
 * Validate coordinates are plausible for a BC facility
 */
export function validateCoordinates(coords: Coordinates | null): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: []
  };

  if (coords === null) {
    result.warnings.push("Missing latitude/longitude");
    return result;
  }

  if (!Number.isFinite(coords.lat) || !Number.isFinite(coords.lon)) {
    result.isValid = false;
    result.errors.push("Invalid latitude or longitude values");
    return result;
  }

  if (!isInsideBC(coords)) {
    result.warnings.push(`Coordinates outside British Columbia: ${coords.lat}, ${coords.lon}`);
  }

  return result;
}

/**
 * Validate hospital record completeness
 */
export function validateHospitalRecord(record: EnrichedHospital): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: []
  };

  if (!record.facility_name.trim()) {
    result.isValid = false;
    result.errors.push("Missing required field: facility_name");
  }
  if (!record.health_authority.trim()) {
    result.isValid = false;
    result.errors.push("Missing required field: health_authority");
  }

  if (!record.city.trim()) {
    result.warnings.push(`Missing city: ${record.facility_name}`);
  }
  if (record.beds_raw !== null && record.beds === null) {
    result.warnings.push(`Unparsed bed count "${record.beds_raw}": ${record.facility_name}`);
  }

  const coords = validateCoordinates(record.coordinates);
  result.isValid = result.isValid && coords.isValid;
  result.errors.push(...coords.errors);
  result.warnings.push(...coords.warnings.map((w) => `${w}: ${record.facility_name}`));

  return result;
}

/**
 * Structured error handling wrapper for async functions
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string
): Promise<ProcessingResult<T>> {
  try {
    const data = await operation();
    return { success: true, data };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${context} failed:`, errorMessage);

    return {
      success: false,
      errors: [`${context}: ${errorMessage}`]
    };
  }
}

export type ValidationSummary = {
  context: string;
  total_checks: number;
  passed: number;
  failed: number;
  total_errors: number;
  total_warnings: number;
};

export function summarizeValidation(results: ValidationResult[], context: string): ValidationSummary {
  return {
    context,
    total_checks: results.length,
    passed: results.filter(r => r.isValid).length,
    failed: results.filter(r => !r.isValid).length,
    total_errors: results.reduce((sum, r) => sum + r.errors.length, 0),
    total_warnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
  };
}

/**
 * Print a validation summary to the console
 */
export function logValidationSummary(results: ValidationResult[], context: string): ValidationSummary {
  const summary = summarizeValidation(results, context);

  console.log(`📊 ${context}`);
  console.log(`   ✅ ${summary.passed}/${summary.total_checks} checks passed`);
  if (summary.failed > 0) {
    console.log(`   ❌ ${summary.failed} checks failed`);
  }
  if (summary.total_warnings > 0) {
    console.log(`   ⚠️  ${summary.total_warnings} warnings`);
  }

  return summary;
}
