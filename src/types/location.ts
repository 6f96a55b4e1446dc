/**
 * Untyped key-value structure as delivered by the platform layer
 */
export type RawMap = Record<string, unknown>;

/**
 * Failure signal from the platform layer (string-encoded code)
 */
export interface PlatformException {
  code: string;
  message?: string | null;
}

export interface CoordsJSON {
  latitude: number;
  longitude: number;
  accuracy: number;
  altitude: number;
  ellipsoidalAltitude: number;
  heading: number; // -1 when not from GPS
  headingAccuracy: number;
  speed: number; // m/s, -1 when not from GPS
  speedAccuracy: number;
  altitudeAccuracy: number;
  floor: number | null; // iOS only
}

export interface BatteryJSON {
  isCharging: boolean;
  level: number; // 0.0 - 1.0, -1 when unknown
}

export interface ActivityJSON {
  type: string;
  confidence: number; // percent
}

export interface GeofenceEventJSON {
  identifier: string;
  action: string; // ENTER | EXIT | DWELL
  timestamp: string;
  extras?: RawMap;
}

export interface LocationJSON {
  uuid: string;
  timestamp: string; // ISO-8601
  recordedAt: string;
  age: number; // milliseconds
  event: string;
  mock: boolean;
  sample: boolean;
  odometer: number; // meters
  isMoving: boolean;
  coords: CoordsJSON;
  battery: BatteryJSON;
  activity: ActivityJSON;
  geofence?: GeofenceEventJSON;
  extras?: RawMap;
}

export interface LocationErrorJSON {
  code: number;
  message: string;
}
