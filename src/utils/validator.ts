import { DEFAULT_CONSTRAINTS, QualityConstraints } from '../config/validation';
import { SENTINELS } from '../config/sentinels';
import { Coords, Location } from '../models';

export type QualityReason =
  | 'latitude_range'
  | 'longitude_range'
  | 'negative_accuracy'
  | 'battery_level_range'
  | 'confidence_range'
  | 'invalid_timestamp';

export interface ValidationIssue {
  reason: QualityReason; // stable key, safe as a metric tag
  message: string; // includes the measured value
}

export interface ValidationResult {
  isValid: boolean;
  issues: ValidationIssue[];
}

/**
 * Checks coordinates are within geographic bounds.
 * Sentinel values (-1 for unavailable fields) are not reported.
 */
export function validateCoords(
  coords: Coords,
  constraints: QualityConstraints = DEFAULT_CONSTRAINTS
): ValidationResult {
  const issues: ValidationIssue[] = [];

  if (
    coords.latitude < constraints.minLatitude ||
    coords.latitude > constraints.maxLatitude
  ) {
    issues.push({
      reason: 'latitude_range',
      message: `Latitude out of range: ${coords.latitude} (expected ${constraints.minLatitude}..${constraints.maxLatitude})`,
    });
  }

  if (
    coords.longitude < constraints.minLongitude ||
    coords.longitude > constraints.maxLongitude
  ) {
    issues.push({
      reason: 'longitude_range',
      message: `Longitude out of range: ${coords.longitude} (expected ${constraints.minLongitude}..${constraints.maxLongitude})`,
    });
  }

  if (coords.accuracy < 0) {
    issues.push({
      reason: 'negative_accuracy',
      message: `Accuracy cannot be negative: ${coords.accuracy}`,
    });
  }

  return {
    isValid: issues.length === 0,
    issues,
  };
}

/**
 * Quality checks over a built location. Never rejects the location itself;
 * callers decide what to do with the issues.
 */
export function validateLocation(
  location: Location,
  constraints: QualityConstraints = DEFAULT_CONSTRAINTS
): ValidationResult {
  const issues: ValidationIssue[] = [];

  const coordsValidation = validateCoords(location.coords, constraints);
  if (!coordsValidation.isValid) {
    issues.push(...coordsValidation.issues);
  }

  const { level } = location.battery;
  if (level < constraints.minBatteryLevel || level > constraints.maxBatteryLevel) {
    issues.push({
      reason: 'battery_level_range',
      message: `Battery level out of range: ${level} (expected ${constraints.minBatteryLevel}..${constraints.maxBatteryLevel})`,
    });
  }

  const { confidence } = location.activity;
  if (confidence < 0 || confidence > constraints.maxConfidence) {
    issues.push({
      reason: 'confidence_range',
      message: `Activity confidence out of range: ${confidence} (expected 0..${constraints.maxConfidence})`,
    });
  }

  if (location.timestamp !== SENTINELS.EMPTY_STRING) {
    const date = new Date(location.timestamp);
    if (isNaN(date.getTime())) {
      issues.push({
        reason: 'invalid_timestamp',
        message: `Invalid timestamp format: ${location.timestamp}`,
      });
    }
  }

  return {
    isValid: issues.length === 0,
    issues,
  };
}

/**
 * True for the placeholder payload emitted when no real fix is available
 */
export function isSyntheticLocation(location: Location): boolean {
  const { latitude, longitude, accuracy } = location.coords;
  return (
    location.uuid === SENTINELS.EMPTY_STRING &&
    latitude === SENTINELS.COORDINATE &&
    longitude === SENTINELS.COORDINATE &&
    accuracy === SENTINELS.COORDINATE
  );
}
