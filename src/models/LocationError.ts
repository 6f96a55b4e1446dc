import { LOCATION_ERROR_CODES } from '../config/sentinels';
import { LocationErrorJSON, PlatformException } from '../types';

/**
 * Thrown when the platform reports an error code that is not an integer.
 * That indicates a platform/version mismatch rather than degraded data, so
 * it is not defaulted.
 */
export class InvalidErrorCodeError extends Error {
  constructor(readonly code: string) {
    super(`Invalid location error code: "${code}"`);
    this.name = 'InvalidErrorCodeError';
  }
}

/**
 * Location error reported by the platform.
 *
 * | Code | Error                                                    |
 * |------|----------------------------------------------------------|
 * | 0    | Location unknown                                         |
 * | 1    | Location permission denied                               |
 * | 2    | Network error                                            |
 * | 3    | Background start attempted with WhenInUse authorization |
 * | 408  | Location timeout                                         |
 * | 499  | Location request cancelled                               |
 */
export class LocationError implements LocationErrorJSON {
  readonly code: number;
  readonly message: string;

  constructor(e: PlatformException) {
    this.code = parseErrorCode(e.code);
    this.message = e.message ?? '';
  }

  toJSON(): LocationErrorJSON {
    return { code: this.code, message: this.message };
  }

  toString(): string {
    return `[LocationError code: ${this.code}, message: ${this.message}]`;
  }
}

/**
 * Snake-case name of a known platform error code, e.g. 408 -> "timeout".
 * Codes outside the table give "unrecognized".
 */
export function errorCodeName(code: number): string {
  const known = Object.entries(LOCATION_ERROR_CODES).find(
    ([, value]) => value === code
  );
  return known ? known[0].toLowerCase() : 'unrecognized';
}

function parseErrorCode(code: string): number {
  const trimmed = code.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidErrorCodeError(code);
  }
  return parseInt(trimmed, 10);
}
