/**
 * Reserved values substituted for fields the platform did not supply.
 *
 * Several of these share the range of real readings (a heading of -1 or an
 * activity confidence of 0 can't be told apart from a measurement), so
 * consumers compare against these constants rather than literals.
 */
export const SENTINELS = {
  /** latitude, longitude, accuracy, altitude on synthetic payloads */
  COORDINATE: 0.0,
  /** heading, speed and their accuracies; altitudeAccuracy */
  UNAVAILABLE: -1.0,
  BATTERY_LEVEL_UNKNOWN: -1.0,
  ACTIVITY_TYPE_UNKNOWN: 'unknown',
  /** Also what a genuine zero-confidence reading looks like */
  ACTIVITY_CONFIDENCE: 0,
  AGE: 0.0,
  ODOMETER: 0.0,
  EMPTY_STRING: '',
} as const;

/**
 * Error codes reported by the platform location layer
 */
export const LOCATION_ERROR_CODES = {
  LOCATION_UNKNOWN: 0,
  PERMISSION_DENIED: 1,
  NETWORK_ERROR: 2,
  BACKGROUND_WHEN_IN_USE: 3, // background start with WhenInUse authorization
  TIMEOUT: 408,
  CANCELLED: 499,
} as const;
