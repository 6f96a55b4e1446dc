import { InvalidErrorCodeError, Location, LocationError } from '../models';
import { isRawMap, toMap, toStringOrEmpty } from './coercion';
import { isSyntheticLocation, validateLocation } from './validator';
import { logger } from './logger';
import { metrics } from './metrics';

export interface NormalizedLocation {
  location: Location;
  warnings: string[];
}

/**
 * Builds a Location from a raw platform payload and runs quality checks.
 * Quality problems are logged and returned, never thrown.
 */
export function normalizeLocation(raw: unknown): NormalizedLocation {
  const location = new Location(raw);
  const validation = validateLocation(location);
  const synthetic = isSyntheticLocation(location);

  for (const issue of validation.issues) {
    metrics.recordValidationWarning(issue.reason);
    logger.warn('location_validation_warning', {
      uuid: location.uuid,
      reason: issue.reason,
      warning: issue.message,
    });
  }

  metrics.recordNormalized(location.event, location.sample, synthetic);

  logger.debug('location_normalized', {
    summary: location.toString(),
    synthetic,
    mapped: isRawMap(raw),
  });

  return {
    location,
    warnings: validation.issues.map((issue) => issue.message),
  };
}

/**
 * Accepts either a list of payloads or a single one
 */
export function normalizeLocations(raw: unknown): NormalizedLocation[] {
  const payloads = Array.isArray(raw) ? raw : [raw];
  return payloads.map((payload) => normalizeLocation(payload));
}

/**
 * Adapts a platform error signal `{ code, message }` into a LocationError.
 * A non-integer code is rethrown as InvalidErrorCodeError.
 */
export function adaptLocationError(raw: unknown): LocationError {
  const map = toMap(raw);
  const code = map['code'];
  const message = map['message'];

  try {
    const error = new LocationError({
      code: toStringOrEmpty(code),
      message: typeof message === 'string' ? message : null,
    });
    metrics.recordErrorAdapted(error.code);
    return error;
  } catch (error) {
    if (error instanceof InvalidErrorCodeError) {
      metrics.recordMalformedErrorCode(error.code);
      logger.error('location_error_malformed_code', {
        code: error.code,
        error: error.message,
      });
    }
    throw error;
  }
}
